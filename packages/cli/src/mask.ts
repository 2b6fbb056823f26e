/**
 * Mask command: catalog + subtitles in, masked subtitles and match CSV out.
 */

import {
  EmptyCatalogError,
  formatMatchCsv,
  formatTextUnits,
  loadCatalogFile,
  maskUnits,
} from "@hushline/core";
import type { MaskUnitsResult } from "@hushline/core";

import type { MaskArgs } from "./args.js";
import type { ResolvedConfig } from "./config.js";
import { ensureOutputDir, writeOutput } from "./output.js";
import { MASKED_SUBTITLES_FILE, formatSrt, loadUnits } from "./subtitles.js";

export const MASKED_UNITS_FILE = "masked_units.json";
export const MATCHES_CSV_FILE = "profanity_matches.csv";

/**
 * Run the mask command.
 *
 * @returns Exit code (0 on success, 1 when no terms are configured).
 */
export function runMask(args: MaskArgs, config: ResolvedConfig): number {
  const terms = loadCatalogFile(args.catalog, config.threshold);
  const { units, cues } = loadUnits(args.units);

  let result: MaskUnitsResult;
  try {
    result = maskUnits(units, terms, {
      defaultThreshold: config.threshold,
      source: args.catalog,
      verbose: args.verbose,
    });
  } catch (err: unknown) {
    if (err instanceof EmptyCatalogError) {
      console.error(`[mask] ${err.message}`);
      return 1;
    }
    throw err;
  }

  const outDir = ensureOutputDir(config.outDir);
  const maskedPath = writeOutput(outDir, MASKED_UNITS_FILE, formatTextUnits(result.units));
  console.log(`[mask] Masked ${units.length} unit(s) -> ${maskedPath}`);

  if (cues) {
    const srt = formatSrt(cues, result.units.map((u) => u.text));
    const srtPath = writeOutput(outDir, MASKED_SUBTITLES_FILE, srt);
    console.log(`[mask] Masked subtitles saved to ${srtPath}`);
  }

  for (const { unitIndex, match } of result.unredacted) {
    console.error(
      `[mask] Warning: unit ${unitIndex} matched "${match.windowText}" (${match.term.word}) but it could not be masked`,
    );
  }

  if (result.records.length > 0) {
    const csvPath = writeOutput(outDir, MATCHES_CSV_FILE, formatMatchCsv(result.records));
    console.log(`[mask] Match CSV saved to ${csvPath} (${result.records.length} row(s))`);
  } else {
    console.log("[mask] No profanity matches found; CSV not written");
  }

  return 0;
}
