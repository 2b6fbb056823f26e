/**
 * Match records: the flat, per-match rows handed to the muting stage.
 *
 * Records are written as CSV with a fixed column order:
 *
 *   start_ms,end_ms,matched_text,target_word,score,original_text,masked_text
 *
 * One row per match, no merging. Rows from the same line share the same
 * original/masked snapshots.
 */

import type { MatchResult } from "./matcher.js";

/** One subtitle dialogue event. Times are milliseconds. */
export interface TextUnit {
  start: number;
  end: number;
  text: string;
}

export interface MatchRecord {
  start: number;
  end: number;
  matchedText: string;
  /** The term's word as configured, not normalized. */
  targetWord: string;
  score: number;
  originalText: string;
  maskedText: string;
}

export const MATCH_CSV_COLUMNS = [
  "start_ms",
  "end_ms",
  "matched_text",
  "target_word",
  "score",
  "original_text",
  "masked_text",
] as const;

export type MatchCsvColumn = (typeof MATCH_CSV_COLUMNS)[number];

/** Build one record per match for a unit. */
export function recordMatches(
  unit: TextUnit,
  matches: readonly MatchResult[],
  maskedText: string,
): MatchRecord[] {
  return matches.map((match) => ({
    start: unit.start,
    end: unit.end,
    matchedText: match.windowText,
    targetWord: match.term.word,
    score: match.score,
    originalText: unit.text,
    maskedText,
  }));
}

// --- CSV ---

const NEEDS_QUOTING = /[",\r\n]/;

function csvField(value: string | number): string {
  const text = String(value);
  if (!NEEDS_QUOTING.test(text)) return text;
  return `"${text.replace(/"/g, '""')}"`;
}

function recordRow(record: MatchRecord): Record<MatchCsvColumn, string | number> {
  return {
    start_ms: record.start,
    end_ms: record.end,
    matched_text: record.matchedText,
    target_word: record.targetWord,
    score: record.score,
    original_text: record.originalText,
    masked_text: record.maskedText,
  };
}

/** Serialize records as CSV (header row, CRLF line endings). */
export function formatMatchCsv(records: readonly MatchRecord[]): string {
  const lines = [MATCH_CSV_COLUMNS.join(",")];
  for (const record of records) {
    const row = recordRow(record);
    lines.push(MATCH_CSV_COLUMNS.map((col) => csvField(row[col])).join(","));
  }
  return `${lines.join("\r\n")}\r\n`;
}

/**
 * Split CSV content into rows of fields. Handles quoted fields with
 * embedded commas, quotes and newlines.
 */
export function parseCsvRows(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let i = 0;

  while (i < content.length) {
    const ch = content[i];

    if (quoted) {
      if (ch === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      if (ch === "\r" && content[i + 1] === "\n") i++;
    } else {
      field += ch;
    }
    i++;
  }

  // Last line without a trailing newline
  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

/**
 * Parse CSV with a header row into one object per data row, keyed by
 * header name. Missing trailing fields come back as empty strings.
 */
export function parseMatchCsv(content: string): Record<string, string>[] {
  const [header, ...body] = parseCsvRows(content);
  if (!header) return [];
  return body
    .filter((fields) => !(fields.length === 1 && fields[0] === ""))
    .map((fields) => {
      const row: Record<string, string> = {};
      header.forEach((name, idx) => {
        row[name] = fields[idx] ?? "";
      });
      return row;
    });
}
