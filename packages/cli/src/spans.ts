/**
 * Span commands: control spans and gaps between mute windows.
 *
 * Both print JSON to stdout so the result can be piped into the QC step.
 */

import fs from "node:fs";

import { findGaps, parseWindowsJson, selectControlSpans } from "@hushline/core";
import type { Interval } from "@hushline/core";

import type { ControlsArgs, GapsArgs } from "./args.js";

function readWindows(filePath: string): Interval[] {
  return parseWindowsJson(fs.readFileSync(filePath, "utf8"));
}

/** @returns Exit code (1 when no control span fits). */
export function runControls(args: ControlsArgs): number {
  const spans = selectControlSpans(readWindows(args.windows), args.duration, {
    sampleLength: args.sampleLength,
    maxSamples: args.maxSamples,
  });
  if (spans.length === 0) {
    console.error("[controls] No control spans available for QC");
    return 1;
  }
  console.log(JSON.stringify(spans, null, 2));
  return 0;
}

export function runGaps(args: GapsArgs): number {
  const gaps = findGaps(readWindows(args.windows), args.duration, {
    minLength: args.minLength,
    maxCount: args.maxCount,
  });
  console.log(JSON.stringify(gaps, null, 2));
  return 0;
}
