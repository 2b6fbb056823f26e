/**
 * Fuzzy term matcher.
 *
 * Slides a window of the term's word count over the normalized line and
 * scores every window against the term. Single words get morphological
 * leniency (suffixes, and in aggressive mode substrings and compounds);
 * phrases are compared with plain edit similarity.
 *
 * Results are not deduplicated: the same span may match several terms,
 * and overlapping windows may all match. The masker sorts that out.
 */

import { distance } from "fuzzball";
import type { FuzzballBaseOptions } from "fuzzball";

import { LEXICON } from "./lexicon.js";
import { normalize, splitWords } from "./normalize.js";
import { DEFAULT_THRESHOLD } from "./terms.js";
import type { Term } from "./terms.js";

export interface MatchResult {
  term: Term;
  /** The normalized words that produced the score, joined by single spaces. */
  windowText: string;
  /** Similarity, 0-100. */
  score: number;
}

export interface MatcherOptions {
  /**
   * Threshold for terms that carry none of their own. Terms built by the
   * catalog always have one, so this only matters for hand-made terms.
   */
  defaultThreshold?: number;
}

/** Applied when two words of 3+ letters start differently and neither contains the other. */
const FIRST_LETTER_PENALTY = 25;

/** fuzzball reads `subcost` at run time but its typings leave it out. */
interface IndelOptions extends FuzzballBaseOptions {
  subcost: number;
}

// A substitution costs a delete plus an insert, so `distance` is the Indel distance.
const INDEL_OPTIONS: IndelOptions = { full_process: false, subcost: 2 };

/**
 * Normalized Indel similarity, 0-100, unrounded. Symmetric.
 *
 *   similarity("fcuk", "fuck")                   // 75
 *   similarity("abcdefghijkxy", "abcdefghijklm") // 84.615...
 */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (100 * (total - distance(a, b, INDEL_OPTIONS))) / total;
}

function hasSuffixRelation(query: string, target: string, suffixes: readonly string[]): boolean {
  for (const suffix of suffixes) {
    if (!suffix) continue;
    if (query === target + suffix || target === query + suffix) return true;
  }
  return false;
}

function hasCompoundRelation(query: string, target: string): boolean {
  for (const part of LEXICON.compounds) {
    if (query === part + target || query === target + part) return true;
  }
  return false;
}

/**
 * Score a single normalized word against a single normalized target.
 *
 *   scoreWord("damned", "damn", false)  // 100 ("ed" suffix)
 *   scoreWord("misuse", "use", true)    // 100 (substring)
 */
export function scoreWord(query: string, target: string, aggressive: boolean): number {
  if (query === target) return 100;

  const suffixes = aggressive ? LEXICON.aggressiveSuffixes : LEXICON.suffixes;
  if (hasSuffixRelation(query, target, suffixes)) return 100;

  if (aggressive && target.length >= 3) {
    if (query.includes(target)) return 100;
    if (hasCompoundRelation(query, target)) return 100;
  }

  let score = similarity(query, target);
  if (
    query.length >= 3 &&
    target.length >= 3 &&
    query[0] !== target[0] &&
    !query.includes(target) &&
    !target.includes(query)
  ) {
    score = Math.max(0, score - FIRST_LETTER_PENALTY);
  }
  return score;
}

/**
 * Score a window against a normalized target. Uses {@link scoreWord} when
 * both are single words, plain similarity otherwise.
 */
export function scoreWindow(windowText: string, target: string, aggressive: boolean): number {
  const windowWords = splitWords(windowText);
  const targetWords = splitWords(target);
  if (windowWords.length === 0 || targetWords.length === 0) return 0;

  if (windowWords.length === 1 && targetWords.length === 1) {
    return scoreWord(windowText, target, aggressive);
  }
  return similarity(windowText, target);
}

/** A term with its normalized form computed once up front. */
interface PreparedTerm {
  term: Term;
  target: string;
  wordCount: number;
  threshold: number;
}

export interface Matcher {
  readonly terms: readonly Term[];
  /** Find every window of `text` that scores at or above its term's threshold. */
  findMatches(text: string): MatchResult[];
}

/**
 * Build a matcher over a fixed term list. Terms that normalize to nothing
 * (e.g. "123" or "!!!") are ignored.
 */
export function createMatcher(terms: readonly Term[], options?: MatcherOptions): Matcher {
  const defaultThreshold = options?.defaultThreshold ?? DEFAULT_THRESHOLD;

  const prepared: PreparedTerm[] = [];
  for (const term of terms) {
    const target = normalize(term.word);
    if (!target) continue;
    prepared.push({
      term,
      target,
      wordCount: splitWords(target).length,
      threshold: Number.isFinite(term.threshold) ? term.threshold : defaultThreshold,
    });
  }

  return {
    terms,

    findMatches(text: string): MatchResult[] {
      if (prepared.length === 0) return [];

      const words = splitWords(normalize(text));
      const matches: MatchResult[] = [];

      for (const { term, target, wordCount, threshold } of prepared) {
        for (let i = 0; i + wordCount <= words.length; i++) {
          const windowText = words.slice(i, i + wordCount).join(" ");
          if (LEXICON.stopwords.has(windowText)) continue;

          const score = scoreWindow(windowText, target, term.aggressive);
          if (score >= threshold) {
            matches.push({ term, windowText, score });
          }
        }
      }

      return matches;
    },
  };
}

/** One-shot convenience over {@link createMatcher}. */
export function findMatches(
  text: string,
  terms: readonly Term[],
  options?: MatcherOptions,
): MatchResult[] {
  return createMatcher(terms, options).findMatches(text);
}
