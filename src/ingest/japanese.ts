import { kanaToHiragana } from "@birchill/normal-jp";

const KANJI = /[一-龯ヶ々〆]/;
const KANA = /[ぁ-ゟ゠-ヿ]/;

export type TextKind = "kanji" | "kana" | "other";

/** "other" covers Arabic numerals, Latin letters and punctuation. */
export function classifyText(text: string): TextKind {
  if (KANJI.test(text)) return "kanji";
  if (KANA.test(text)) return "kana";
  return "other";
}

/**
 * Reading used for identity matching.
 * Kana-only terms read as themselves; kanji terms take the annotated reading
 * folded to hiragana, or none when the table has no reading column.
 */
export function readingFor(text: string, annotated: string | undefined): string | undefined {
  switch (classifyText(text)) {
    case "kana":
      return text;
    case "kanji":
      return annotated === undefined || annotated === "" ? undefined : kanaToHiragana(annotated);
    case "other":
      return undefined;
  }
}
