/**
 * JSON codecs for the interface files: text units in, mute windows out.
 */

import type { Interval } from "./intervals.js";
import type { TextUnit } from "./records.js";

export class InputFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputFormatError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function finite(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Parse a JSON array of `{ start, end, text }` (milliseconds). Order is
 * preserved. Throws {@link InputFormatError} naming the first bad item.
 */
export function parseTextUnits(json: string): TextUnit[] {
  const data: unknown = JSON.parse(json);
  if (!Array.isArray(data)) {
    throw new InputFormatError("Text units must be a JSON array");
  }

  return data.map((item: unknown, index): TextUnit => {
    if (!isRecord(item)) {
      throw new InputFormatError(`Unit ${index} is not an object`);
    }
    const { start, end, text } = item;
    if (!finite(start) || !finite(end)) {
      throw new InputFormatError(`Unit ${index} needs numeric start and end`);
    }
    if (end < start) {
      throw new InputFormatError(`Unit ${index} ends before it starts`);
    }
    if (typeof text !== "string") {
      throw new InputFormatError(`Unit ${index} needs a text string`);
    }
    return { start, end, text };
  });
}

export function formatTextUnits(units: readonly TextUnit[]): string {
  return `${JSON.stringify(units, null, 2)}\n`;
}

/** Parse a `[{ start, end }]` window sidecar (seconds). */
export function parseWindowsJson(json: string): Interval[] {
  const data: unknown = JSON.parse(json);
  if (!Array.isArray(data)) {
    throw new InputFormatError("Window file must be a JSON array");
  }
  return data.map((item: unknown, index): Interval => {
    if (!isRecord(item)) {
      throw new InputFormatError(`Window ${index} is not an object`);
    }
    const { start, end } = item;
    if (!finite(start) || !finite(end)) {
      throw new InputFormatError(`Window ${index} needs numeric start and end`);
    }
    return { start, end };
  });
}

export function formatWindowsJson(windows: readonly Interval[]): string {
  const payload = windows.map((w) => ({ start: w.start, end: w.end }));
  return `${JSON.stringify(payload, null, 2)}\n`;
}
