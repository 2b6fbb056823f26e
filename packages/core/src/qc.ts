/**
 * Subtitle QC: check that masked text no longer contains any configured
 * word verbatim.
 */

import { maskWholeWord } from "./mask.js";

export interface ResidualHit {
  word: string;
  count: number;
}

/**
 * Count case-insensitive whole-word occurrences of each word across all
 * texts. Only words with at least one hit are returned, in input order.
 */
export function scanResidualTerms(
  texts: readonly string[],
  words: readonly string[],
): ResidualHit[] {
  const hits: ResidualHit[] = [];
  for (const word of words) {
    let count = 0;
    for (const text of texts) {
      count += maskWholeWord(text, word).count;
    }
    if (count > 0) hits.push({ word, count });
  }
  return hits;
}
