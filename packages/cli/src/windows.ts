/**
 * Windows command: turn match rows into merged mute windows.
 *
 * Accepts either the match CSV from `hush mask` or an existing window
 * JSON file (which is simply re-merged).
 */

import fs from "node:fs";

import {
  formatWindowsJson,
  mergeIntervals,
  parseMatchCsv,
  parseWindowsJson,
  windowsFromRecords,
} from "@hushline/core";
import type { Interval } from "@hushline/core";

import type { WindowsArgs } from "./args.js";
import type { ResolvedConfig } from "./config.js";
import { ensureOutputDir, writeOutput } from "./output.js";

export const WINDOWS_FILE = "mute_windows.json";

/** Load and merge windows from a match CSV or a window JSON file. */
export function loadWindows(filePath: string, epsilon: number): Interval[] {
  const content = fs.readFileSync(filePath, "utf8");
  if (filePath.toLowerCase().endsWith(".json")) {
    return mergeIntervals(parseWindowsJson(content), epsilon);
  }
  return windowsFromRecords(parseMatchCsv(content), epsilon);
}

/**
 * Volume filter expression that silences every window:
 *
 *   volume=enable='between(t,1.000,2.100)+between(t,3.000,3.200)':volume=0
 */
export function buildVolumeFilter(windows: readonly Interval[]): string {
  const conditions = windows
    .map((w) => `between(t,${w.start.toFixed(3)},${w.end.toFixed(3)})`)
    .join("+");
  return `volume=enable='${conditions}':volume=0`;
}

/**
 * Run the windows command.
 *
 * @returns Exit code (0 on success, 1 when there are no windows).
 */
export function runWindows(args: WindowsArgs, config: ResolvedConfig): number {
  const windows = loadWindows(args.matches, config.epsilon);
  if (windows.length === 0) {
    console.error(`[windows] No mute windows found in ${args.matches}`);
    return 1;
  }

  if (args.verbose) {
    for (const w of windows) {
      console.error(`[windows] ${w.start.toFixed(3)}s - ${w.end.toFixed(3)}s`);
    }
  }

  const outDir = ensureOutputDir(config.outDir);
  const windowsPath = writeOutput(outDir, WINDOWS_FILE, formatWindowsJson(windows));
  console.error(`[windows] ${windows.length} window(s) -> ${windowsPath}`);
  console.log(buildVolumeFilter(windows));
  return 0;
}
