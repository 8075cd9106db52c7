/** Dictionary metadata written to index.json. */
export interface DictionaryMetadata {
  title: string;
  revision: string;
  author?: string;
  url?: string;
  description?: string;
  attribution?: string;
}

export interface DictionaryIndex extends DictionaryMetadata {
  format: 3;
  sequenced: false;
  frequencyMode: "rank-based";
}

export type FrequencyPayload = number | { frequency: number; reading: string };

/** One term_meta_bank row: [term, "freq", payload]. */
export type TermMetaEntry = [term: string, mode: "freq", payload: FrequencyPayload];

export const INDEX_FILE = "index.json";
export const MAX_TERM_BANK_SIZE = 10_000;
export const TERM_META_BANK = /^term_meta_bank_(\d+)\.json$/;

export function termMetaBankName(n: number): string {
  return `term_meta_bank_${n}.json`;
}
