/**
 * QC command: make sure masked units contain no configured word verbatim.
 */

import { loadCatalogFile, scanResidualTerms } from "@hushline/core";

import type { QcArgs } from "./args.js";
import { loadUnits } from "./subtitles.js";

/** @returns Exit code (0 when clean, 1 when terms remain or none are configured). */
export function runQc(args: QcArgs): number {
  const terms = loadCatalogFile(args.catalog);
  if (terms.length === 0) {
    console.error(`[qc] No profanities configured in ${args.catalog}`);
    return 1;
  }

  const { units } = loadUnits(args.units);
  const hits = scanResidualTerms(
    units.map((u) => u.text),
    terms.map((t) => t.word),
  );

  const total = hits.reduce((sum, h) => sum + h.count, 0);
  if (total > 0) {
    if (args.verbose) {
      for (const hit of hits) {
        console.error(`[qc] ${hit.word}: ${hit.count}`);
      }
    }
    console.error(
      `[qc] Subtitle QC failed: found ${total} profanity occurrence(s) in masked subtitles`,
    );
    return 1;
  }

  console.log("[qc] Subtitle QC passed: no profanities found");
  return 0;
}
