/**
 * Term catalog.
 *
 * A catalog file lists the words to mask. Three shapes are accepted:
 *
 *   ["damn", { "word": "heck", "threshold": 90, "aggressive": true }]
 *
 *   { "profanities": [ ...same entries... ] }
 *
 *   # plain text, one word per line (used when the file is not JSON)
 *   damn
 *   heck
 *
 * Structured entries may use `fuzzy_threshold` instead of `threshold`, and
 * `"variant_strategy": "aggressive"` instead of `aggressive: true`.
 * Entries without a usable word are dropped without complaint; an empty
 * result is only an error once someone tries to mask with it.
 */

import fs from "node:fs";

export const DEFAULT_THRESHOLD = 85;

export interface Term {
  /** The word or phrase as configured (not normalized). */
  readonly word: string;
  /** Minimum score (0-100) for a window to count as a match. */
  readonly threshold: number;
  /** Widens suffix matching and enables substring/compound matching. */
  readonly aggressive: boolean;
}

/** A bare string entry. Uses the catalog-wide threshold. */
export interface WordEntry {
  kind: "word";
  word: string;
}

/** An object entry with optional per-term settings. */
export interface StructuredEntry {
  kind: "structured";
  word: string;
  threshold?: number;
  aggressive: boolean;
}

export type CatalogEntry = WordEntry | StructuredEntry;

/** The catalog is valid JSON but not a list of entries. */
export class CatalogFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogFormatError";
  }
}

/** No usable terms were configured. Masking cannot proceed. */
export class EmptyCatalogError extends Error {
  constructor(source: string) {
    super(`No profanities configured in ${source}`);
    this.name = "EmptyCatalogError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a threshold override. Returns undefined when absent, null when
 * present but unusable (the entry is then dropped).
 */
function readThreshold(raw: Record<string, unknown>): number | undefined | null {
  const value = raw.threshold ?? raw.fuzzy_threshold;
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function parseEntry(item: unknown): CatalogEntry | null {
  if (typeof item === "string") {
    const word = item.trim();
    return word ? { kind: "word", word } : null;
  }

  if (!isRecord(item)) return null;

  const rawWord = item.word;
  const word =
    typeof rawWord === "string" || typeof rawWord === "number"
      ? String(rawWord).trim()
      : "";
  if (!word) return null;

  const threshold = readThreshold(item);
  if (threshold === null) return null;

  const strategy =
    typeof item.variant_strategy === "string"
      ? item.variant_strategy.toLowerCase()
      : "";
  const aggressive = item.aggressive === true || strategy === "aggressive";

  const entry: StructuredEntry = { kind: "structured", word, aggressive };
  if (threshold !== undefined) entry.threshold = threshold;
  return entry;
}

/**
 * Resolve raw catalog items (strings or objects) into tagged entries.
 * Items that are neither, or that lack a word, are skipped.
 */
export function parseCatalogEntries(items: readonly unknown[]): CatalogEntry[] {
  const entries: CatalogEntry[] = [];
  for (const item of items) {
    const entry = parseEntry(item);
    if (entry) entries.push(entry);
  }
  return entries;
}

/** Turn entries into terms, applying the catalog-wide default threshold. */
export function resolveTerms(
  entries: readonly CatalogEntry[],
  defaultThreshold: number = DEFAULT_THRESHOLD,
): Term[] {
  return entries.map((entry): Term => {
    switch (entry.kind) {
      case "word":
        return { word: entry.word, threshold: defaultThreshold, aggressive: false };
      case "structured":
        return {
          word: entry.word,
          threshold: entry.threshold ?? defaultThreshold,
          aggressive: entry.aggressive,
        };
    }
  });
}

function parseLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

/** Pull the item list out of parsed JSON, or throw for other shapes. */
function catalogItems(data: unknown): unknown[] {
  let items: unknown = data;
  if (isRecord(data) && "profanities" in data) {
    items = data.profanities ?? [];
  }
  if (!Array.isArray(items)) {
    throw new CatalogFormatError(
      "Profanity config must be a list or an object with 'profanities'",
    );
  }
  return items;
}

/**
 * Parse catalog file content into terms.
 *
 * JSON is tried first; content that does not parse as JSON is read as
 * newline-delimited words, skipping blank lines and `#` comments.
 */
export function parseCatalog(
  content: string,
  defaultThreshold: number = DEFAULT_THRESHOLD,
): Term[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return resolveTerms(parseCatalogEntries(parseLines(content)), defaultThreshold);
  }
  return resolveTerms(parseCatalogEntries(catalogItems(data)), defaultThreshold);
}

/** Load and parse a catalog file (UTF-8). */
export function loadCatalogFile(
  filePath: string,
  defaultThreshold: number = DEFAULT_THRESHOLD,
): Term[] {
  const content = fs.readFileSync(filePath, "utf8");
  return parseCatalog(content, defaultThreshold);
}

/** Throw {@link EmptyCatalogError} if no terms are configured. */
export function requireTerms(terms: readonly Term[], source = "catalog"): void {
  if (terms.length === 0) throw new EmptyCatalogError(source);
}
