#!/usr/bin/env node
import { main } from "./cli/commands.js";
import { readEnv } from "./config/env.js";
import { createLogger } from "./logger.js";

const env = readEnv();

try {
  process.exitCode = await main(process.argv.slice(2), {
    configPath: env.configPath,
    logLevel: env.logLevel,
    print: (line) => console.log(line),
  });
} catch (e) {
  createLogger({ level: env.logLevel }).error(e instanceof Error ? (e.stack ?? e.message) : String(e));
  process.exitCode = 1;
}
