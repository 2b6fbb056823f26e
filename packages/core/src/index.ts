/**
 * @hushline/core
 *
 * Fuzzy profanity matching and redaction for subtitle dialogue, plus the
 * interval helpers the muting and QC stages build on.
 *
 * Everything here is synchronous and pure apart from catalog file loading.
 *
 * ```typescript
 * import { loadCatalogFile, maskUnits } from '@hushline/core';
 *
 * const terms = loadCatalogFile("profanities.json");
 * const { units, records } = maskUnits(lines, terms);
 * ```
 *
 * @packageDocumentation
 */

// Normalization: canonical lowercase, diacritic-free, punctuation-free form
export { normalize, splitWords } from "./normalize.js";

// Catalog: entry parsing, file loading, empty-catalog guard
export {
  DEFAULT_THRESHOLD,
  CatalogFormatError,
  EmptyCatalogError,
  loadCatalogFile,
  parseCatalog,
  parseCatalogEntries,
  requireTerms,
  resolveTerms,
  type CatalogEntry,
  type StructuredEntry,
  type Term,
  type WordEntry,
} from "./terms.js";

// Matching: windowed scoring with suffix/compound leniency
export {
  createMatcher,
  findMatches,
  scoreWindow,
  scoreWord,
  similarity,
  type MatchResult,
  type Matcher,
  type MatcherOptions,
} from "./matcher.js";

// Masking: equal-length asterisk substitution in the original text
export { mask, maskText, maskWholeWord, type MaskOutcome } from "./mask.js";

// Records: per-match rows and their CSV form
export {
  MATCH_CSV_COLUMNS,
  formatMatchCsv,
  parseCsvRows,
  parseMatchCsv,
  recordMatches,
  type MatchCsvColumn,
  type MatchRecord,
  type TextUnit,
} from "./records.js";

// Intervals: merge with epsilon, gap extraction, control sampling
export {
  DEFAULT_EPSILON,
  findGaps,
  mergeIntervals,
  selectControlSpans,
  windowsFromRecords,
  type ControlSpanOptions,
  type GapOptions,
  type Interval,
} from "./intervals.js";

// Pipeline: the masking entry point
export {
  maskUnits,
  type MaskUnitsOptions,
  type MaskUnitsResult,
  type UnredactedMatch,
} from "./pipeline.js";

// QC: residual verbatim terms in masked text
export { scanResidualTerms, type ResidualHit } from "./qc.js";

// Interface files
export {
  InputFormatError,
  formatTextUnits,
  formatWindowsJson,
  parseTextUnits,
  parseWindowsJson,
} from "./units.js";

export { LEXICON, type Lexicon } from "./lexicon.js";
