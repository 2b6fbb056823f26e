/**
 * Fixed word tables used by the matcher.
 *
 * Loaded once from `data/lexicon.json` when the module is first imported
 * and frozen afterwards. Nothing writes to these sets at runtime.
 */

import fs from "node:fs";

export interface Lexicon {
  /** Function words that are never treated as a match candidate. */
  stopwords: ReadonlySet<string>;
  /** Suffixes that make `word` and `word + suffix` equivalent. */
  suffixes: readonly string[];
  /** Base suffixes plus the extra set allowed in aggressive mode. */
  aggressiveSuffixes: readonly string[];
  /** Prefix/particle morphemes that may bracket a target in aggressive mode. */
  compounds: readonly string[];
}

const LEXICON_URL = new URL("../data/lexicon.json", import.meta.url);

function readStringList(data: Map<string, unknown>, key: string): string[] {
  const value = data.get(key);
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    throw new Error(`lexicon.json: "${key}" must be an array of strings`);
  }
  return value;
}

function loadLexicon(): Lexicon {
  const parsed: unknown = JSON.parse(fs.readFileSync(LEXICON_URL, "utf8"));
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error("lexicon.json: expected an object");
  }
  const data = new Map(Object.entries(parsed));
  const suffixes = readStringList(data, "suffixes");

  return Object.freeze({
    stopwords: new Set(readStringList(data, "stopwords")),
    suffixes: Object.freeze(suffixes),
    aggressiveSuffixes: Object.freeze([
      ...suffixes,
      ...readStringList(data, "aggressiveSuffixes"),
    ]),
    compounds: Object.freeze(readStringList(data, "compounds")),
  });
}

export const LEXICON: Lexicon = loadLexicon();
