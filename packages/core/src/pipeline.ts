/**
 * Masking pipeline: match, mask and record every text unit in order.
 *
 * Units are independent of each other; output order always follows input
 * order, and within a unit, catalog order then window position.
 */

import { createMatcher } from "./matcher.js";
import type { MatchResult } from "./matcher.js";
import { maskText } from "./mask.js";
import { recordMatches } from "./records.js";
import type { MatchRecord, TextUnit } from "./records.js";
import { DEFAULT_THRESHOLD, requireTerms } from "./terms.js";
import type { Term } from "./terms.js";

export interface MaskUnitsOptions {
  /** Used for terms without a usable threshold. Default: 85. */
  defaultThreshold?: number;
  /** Name of the catalog, for error messages. */
  source?: string;
  /** Log per-unit activity to stderr. */
  verbose?: boolean;
}

export interface UnredactedMatch {
  /** Index of the unit in the input. */
  unitIndex: number;
  match: MatchResult;
}

export interface MaskUnitsResult {
  /** Copies of the input units with masked text. */
  units: TextUnit[];
  /** One record per match, in unit order. */
  records: MatchRecord[];
  /** Matches that were recorded but left no visible redaction. */
  unredacted: UnredactedMatch[];
}

/**
 * Mask a sequence of text units against a term catalog.
 *
 * @throws EmptyCatalogError if `terms` is empty.
 */
export function maskUnits(
  units: readonly TextUnit[],
  terms: readonly Term[],
  options?: MaskUnitsOptions,
): MaskUnitsResult {
  requireTerms(terms, options?.source);
  const verbose = options?.verbose ?? false;

  const matcher = createMatcher(terms, {
    defaultThreshold: options?.defaultThreshold ?? DEFAULT_THRESHOLD,
  });

  if (verbose) {
    console.error(`[mask] Loaded ${terms.length} term(s) from ${options?.source ?? "catalog"}`);
  }

  const masked: TextUnit[] = [];
  const records: MatchRecord[] = [];
  const unredacted: UnredactedMatch[] = [];

  units.forEach((unit, unitIndex) => {
    const matches = matcher.findMatches(unit.text);
    const outcome = maskText(unit.text, matches);

    masked.push({ ...unit, text: outcome.text });
    records.push(...recordMatches(unit, matches, outcome.text));

    for (const match of outcome.unredacted) {
      unredacted.push({ unitIndex, match });
    }

    if (verbose && matches.length > 0) {
      const words = matches
        .map((m) => `${m.windowText}~${m.term.word}(${m.score.toFixed(1)})`)
        .join(", ");
      console.error(
        `[mask] Unit ${unitIndex} [${unit.start}-${unit.end}ms]: ${matches.length} match(es): ${words}`,
      );
    }
    if (verbose && outcome.unredacted.length > 0) {
      console.error(
        `[mask] Unit ${unitIndex}: ${outcome.unredacted.length} match(es) could not be located in the original text`,
      );
    }
  });

  return { units: masked, records, unredacted };
}
