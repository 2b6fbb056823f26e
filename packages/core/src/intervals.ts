/**
 * Time interval utilities shared by the muting and QC stages.
 *
 * All times are seconds. Intervals closer than `epsilon` are treated as
 * touching and merged.
 */

export interface Interval {
  start: number;
  end: number;
}

export const DEFAULT_EPSILON = 0.001;

export interface GapOptions {
  /** Shortest gap to report, in seconds. Default: 1. */
  minLength?: number;
  /** Maximum number of gaps to return. Default: 5. */
  maxCount?: number;
}

export interface ControlSpanOptions {
  /** Length of each control sample, in seconds. Default: 1. */
  sampleLength?: number;
  /** Maximum number of samples. Default: 5. */
  maxSamples?: number;
}

function assertInterval(interval: Interval, index: number): void {
  if (!Number.isFinite(interval.start) || !Number.isFinite(interval.end)) {
    throw new RangeError(`Interval ${index} has a non-finite bound`);
  }
  if (interval.end < interval.start) {
    throw new RangeError(
      `Interval ${index} ends before it starts (${interval.start} > ${interval.end})`,
    );
  }
}

/**
 * Merge overlapping or near-adjacent intervals.
 *
 * Sorts by (start, end), then folds each interval into the current one
 * when it starts no later than `current.end + epsilon`. The input is not
 * modified.
 *
 *   mergeIntervals([{start: 1, end: 2}, {start: 1.9, end: 2.1}, {start: 3, end: 3.2}])
 *   // [{start: 1, end: 2.1}, {start: 3, end: 3.2}]
 */
export function mergeIntervals(
  intervals: readonly Interval[],
  epsilon: number = DEFAULT_EPSILON,
): Interval[] {
  intervals.forEach(assertInterval);
  if (intervals.length === 0) return [];

  const sorted = intervals
    .map((i) => ({ start: i.start, end: i.end }))
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const merged: Interval[] = [];
  let current = sorted[0];
  for (const next of sorted.slice(1)) {
    if (next.start <= current.end + epsilon) {
      current.end = Math.max(current.end, next.end);
    } else {
      merged.push(current);
      current = next;
    }
  }
  merged.push(current);
  return merged;
}

/**
 * Maximal gaps inside `[0, total]` not covered by any interval.
 *
 * Intervals are merged first and clipped to the bound. Gaps shorter than
 * `minLength` are dropped; at most `maxCount` gaps are returned, earliest
 * first.
 */
export function findGaps(
  intervals: readonly Interval[],
  total: number,
  options?: GapOptions,
): Interval[] {
  const minLength = options?.minLength ?? 1;
  const maxCount = options?.maxCount ?? 5;
  if (!Number.isFinite(total) || total < 0) {
    throw new RangeError(`Invalid total duration: ${total}`);
  }

  const gaps: Interval[] = [];
  let cursor = 0;
  for (const window of mergeIntervals(intervals)) {
    const start = Math.min(Math.max(window.start, 0), total);
    if (start - cursor >= minLength) gaps.push({ start: cursor, end: start });
    cursor = Math.max(cursor, Math.min(window.end, total));
  }
  if (total - cursor >= minLength) gaps.push({ start: cursor, end: total });

  return gaps.slice(0, Math.max(0, maxCount));
}

/**
 * Pick short control spans between windows for loudness comparison.
 *
 * Walks the gaps in order and takes the first `sampleLength` seconds of
 * each gap that is at least that long, including the tail after the last
 * window up to `duration`.
 */
export function selectControlSpans(
  windows: readonly Interval[],
  duration: number,
  options?: ControlSpanOptions,
): Interval[] {
  const sampleLength = options?.sampleLength ?? 1;
  const maxSamples = options?.maxSamples ?? 5;

  const controls: Interval[] = [];
  let current = 0;
  for (const w of mergeIntervals(windows)) {
    if (w.start - current >= sampleLength) {
      controls.push({ start: current, end: Math.min(current + sampleLength, w.start) });
    }
    current = Math.max(current, w.end);
  }
  if (duration - current >= sampleLength) {
    controls.push({ start: current, end: Math.min(current + sampleLength, duration) });
  }
  return controls.slice(0, Math.max(0, maxSamples));
}

/**
 * Mute windows from match CSV rows: `start_ms`/`end_ms` become seconds,
 * rows with unparsable or inverted times are skipped, and the result is
 * merged.
 */
export function windowsFromRecords(
  rows: readonly Record<string, string>[],
  epsilon: number = DEFAULT_EPSILON,
): Interval[] {
  const windows: Interval[] = [];
  for (const row of rows) {
    const startMs = parseMs(row.start_ms);
    const endMs = parseMs(row.end_ms);
    if (startMs === null || endMs === null || endMs < startMs) continue;
    windows.push({ start: startMs / 1000, end: endMs / 1000 });
  }
  return mergeIntervals(windows, epsilon);
}

function parseMs(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}
