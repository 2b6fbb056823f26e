/**
 * Masker: rewrite the original (non-normalized) line with asterisks.
 *
 * Matches only carry normalized window text, not offsets, so each one is
 * re-located in the original by a case-insensitive whole-word search.
 * Longer windows go first so a phrase is masked before the single words
 * inside it. Every replaced run keeps its exact length.
 */

import type { MatchResult } from "./matcher.js";

export interface MaskOutcome {
  /** The masked line. Same length as the input. */
  text: string;
  /**
   * Matches that could not be located in the original text by either
   * their window text or their term's word. They leave no visible
   * redaction but are still real matches.
   */
  unredacted: MatchResult[];
}

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

// Word characters for boundary purposes: letters, digits, underscore.
const WORD_BEFORE = "(?<![\\p{L}\\p{N}_])";
const WORD_AFTER = "(?![\\p{L}\\p{N}_])";

function escapeRegExp(text: string): string {
  return text.replace(REGEX_SPECIALS, "\\$&");
}

function stars(run: string): string {
  // Count code points, not UTF-16 units.
  return "*".repeat(Array.from(run).length);
}

/**
 * Replace every whole-word, case-insensitive occurrence of `literal` with
 * asterisks. Returns the new text and how many runs were replaced.
 */
export function maskWholeWord(text: string, literal: string): { text: string; count: number } {
  if (!literal) return { text, count: 0 };
  const pattern = new RegExp(`${WORD_BEFORE}${escapeRegExp(literal)}${WORD_AFTER}`, "giu");
  let count = 0;
  const masked = text.replace(pattern, (run) => {
    count++;
    return stars(run);
  });
  return { text: masked, count };
}

/** Mask `original`, reporting matches that found nothing to redact. */
export function maskText(original: string, matches: readonly MatchResult[]): MaskOutcome {
  if (matches.length === 0) return { text: original, unredacted: [] };

  // Array.prototype.sort is stable, so equal lengths keep match order.
  const ordered = [...matches].sort((a, b) => b.windowText.length - a.windowText.length);

  let masked = original;
  const unredacted: MatchResult[] = [];

  for (const match of ordered) {
    let replaced = false;
    for (const literal of [match.windowText, match.term.word]) {
      const result = maskWholeWord(masked, literal);
      masked = result.text;
      if (result.count > 0) {
        replaced = true;
        break;
      }
    }
    if (!replaced) unredacted.push(match);
  }

  return { text: masked, unredacted };
}

/** Mask `original` and return only the text. */
export function mask(original: string, matches: readonly MatchResult[]): string {
  return maskText(original, matches).text;
}
