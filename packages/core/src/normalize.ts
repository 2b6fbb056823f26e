/**
 * Text normalization.
 *
 * Turns a raw dialogue line into the canonical form the matcher works on:
 * lowercase, no diacritics, no punctuation or digits, single spaces.
 *
 *   normalize("Café-Owner's 2 dogs!")  // "cafe owner s dogs"
 *
 * Idempotent: normalize(normalize(x)) === normalize(x).
 */

const COMBINING_MARKS = /\p{M}/gu;
const JOINERS = /[-_']/g;
// Anything that is not a letter, digit or whitespace. Underscores were
// already turned into spaces above.
const PUNCTUATION = /[^\p{L}\p{N}\s]/gu;
const DIGITS = /\p{N}+/gu;
const WHITESPACE = /\s+/g;

export function normalize(text: string): string {
  if (!text) return "";
  return text
    .toLowerCase()
    .normalize("NFKD")
    // compatibility forms can decompose to uppercase ("℃" -> "°C")
    .toLowerCase()
    .replace(COMBINING_MARKS, "")
    .replace(JOINERS, " ")
    .replace(PUNCTUATION, " ")
    .replace(DIGITS, " ")
    .replace(WHITESPACE, " ")
    .trim();
}

/** Split normalized text into words. Empty input gives an empty list. */
export function splitWords(normalized: string): string[] {
  return normalized ? normalized.split(" ") : [];
}
