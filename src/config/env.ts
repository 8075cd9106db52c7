import { isLogLevel, type LogLevel } from "../logger.js";
import { DEFAULT_CONFIG_PATH } from "./corpora.js";

export interface Env {
  logLevel: LogLevel;
  configPath: string;
}

/** FREQDICT_LOG_LEVEL and FREQDICT_CONFIG; unknown log levels fall back to info. */
export function readEnv(env: NodeJS.ProcessEnv = process.env): Env {
  const level = env.FREQDICT_LOG_LEVEL?.toLowerCase();
  return {
    logLevel: isLogLevel(level) ? level : "info",
    configPath: env.FREQDICT_CONFIG || DEFAULT_CONFIG_PATH,
  };
}
