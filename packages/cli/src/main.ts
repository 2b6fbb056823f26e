#!/usr/bin/env tsx

/**
 * hush CLI entry point.
 *
 * Thin wrapper over @hushline/core: reads the interface files, runs the
 * matching/masking or interval step, and writes the results. No media
 * files are touched here.
 */

import { getHelp, isError, parseArgs } from "./args.js";
import { resolveConfig } from "./config.js";
import { dispatchCommand } from "./dispatch.js";
import { runMask } from "./mask.js";
import { runQc } from "./qc.js";
import { runControls, runGaps } from "./spans.js";
import { runWindows } from "./windows.js";

const VERSION = "0.1.0";

function main(): number {
  const result = parseArgs(process.argv);

  if (isError(result)) {
    console.error(result.error);
    return 1;
  }

  return dispatchCommand(result, {
    runHelp: (topic) => {
      console.log(getHelp(topic));
      return 0;
    },
    runVersion: () => {
      console.log(VERSION);
      return 0;
    },
    runMask: (args) =>
      runMask(args, resolveConfig({ threshold: args.threshold, outDir: args.outDir })),
    runWindows: (args) =>
      runWindows(args, resolveConfig({ epsilon: args.epsilon, outDir: args.outDir })),
    runControls,
    runGaps,
    runQc,
  });
}

try {
  process.exitCode = main();
} catch (err: unknown) {
  console.error("Fatal:", err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
