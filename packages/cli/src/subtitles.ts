/**
 * Subtitle input: SRT files through srt-parser-2, or TextUnit JSON.
 *
 * SRT cues keep their parsed form so the masked text can be written back
 * with the original ids and timestamps.
 */

import fs from "node:fs";
import { extname } from "node:path";

import SrtParserModule from "srt-parser-2";
import { parseTextUnits } from "@hushline/core";
import type { TextUnit } from "@hushline/core";

// CommonJS package: the class sits on `default` of the module object.
type SrtParser = InstanceType<typeof SrtParserModule.default>;
export type SubtitleCue = ReturnType<SrtParser["fromSrt"]>[number];

export const MASKED_SUBTITLES_FILE = "masked_subtitles.srt";

export interface LoadedUnits {
  units: TextUnit[];
  /** Parsed cues when the input was SRT, in the same order as `units`. */
  cues: SubtitleCue[] | null;
}

export function isSrtPath(filePath: string): boolean {
  return extname(filePath).toLowerCase() === ".srt";
}

export function parseSrt(content: string): SubtitleCue[] {
  return new SrtParserModule.default().fromSrt(content);
}

/** Cue times become whole milliseconds. */
export function cuesToUnits(cues: readonly SubtitleCue[]): TextUnit[] {
  return cues.map((cue) => ({
    start: Math.round(cue.startSeconds * 1000),
    end: Math.round(cue.endSeconds * 1000),
    text: cue.text,
  }));
}

/** Write `cues` back out with each text replaced by the matching entry of `texts`. */
export function formatSrt(cues: readonly SubtitleCue[], texts: readonly string[]): string {
  if (texts.length !== cues.length) {
    throw new RangeError(`Expected ${cues.length} subtitle text(s), got ${texts.length}`);
  }
  return new SrtParserModule.default().toSrt(cues.map((cue, i) => ({ ...cue, text: texts[i] })));
}

/** Load text units from an .srt file or a TextUnit JSON file. */
export function loadUnits(filePath: string): LoadedUnits {
  const content = fs.readFileSync(filePath, "utf8");
  if (isSrtPath(filePath)) {
    const cues = parseSrt(content);
    return { units: cuesToUnits(cues), cues };
  }
  return { units: parseTextUnits(content), cues: null };
}
