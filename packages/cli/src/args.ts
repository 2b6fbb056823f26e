/**
 * Argument parser for the hush CLI.
 *
 * Hand-rolled, in the same shape as the rest of the CLI: subcommands,
 * boolean flags, and `--name value` options. Parse failures come back as
 * `{ error }` values rather than exceptions.
 */

export interface MaskArgs {
  command: "mask";
  /** .srt subtitles, or a JSON file of `{ start, end, text }` units. */
  units: string;
  /** Term catalog (JSON or one word per line). */
  catalog: string;
  /** Output directory. Null means "use config". */
  outDir: string | null;
  /** Default threshold for terms without one. Null means "use config". */
  threshold: number | null;
  verbose: boolean;
}

export interface WindowsArgs {
  command: "windows";
  /** Match CSV, or an existing window JSON to re-merge. */
  matches: string;
  outDir: string | null;
  epsilon: number | null;
  verbose: boolean;
}

export interface ControlsArgs {
  command: "controls";
  windows: string;
  duration: number;
  sampleLength: number;
  maxSamples: number;
}

export interface GapsArgs {
  command: "gaps";
  windows: string;
  duration: number;
  minLength: number;
  maxCount: number;
}

export interface QcArgs {
  command: "qc";
  units: string;
  catalog: string;
  verbose: boolean;
}

export interface HelpArgs {
  command: "help";
  topic: string | null;
}

export interface VersionArgs {
  command: "version";
}

export type ParsedArgs =
  | MaskArgs
  | WindowsArgs
  | ControlsArgs
  | GapsArgs
  | QcArgs
  | HelpArgs
  | VersionArgs;

export interface ParseError {
  error: string;
}

export type ParseResult = ParsedArgs | ParseError;

export function isError(result: ParseResult): result is ParseError {
  return "error" in result;
}

const MASK_HELP = `
hush mask --units <file> --catalog <file> [options]

Mask configured terms in subtitle text units. Writes masked_units.json
(plus masked_subtitles.srt for .srt input) and, when anything matched,
profanity_matches.csv to the output directory.

Options:
  --units <file>       .srt subtitles, or a JSON array of { start, end, text } (milliseconds)
  --catalog <file>     Term catalog: JSON list, { "profanities": [...] }, or one word per line
  --out <dir>          Output directory (default: ./hushline-out, env: HUSHLINE_OUTPUT_DIR)
  --threshold <0-100>  Default match threshold (default: 85, env: HUSHLINE_THRESHOLD)
  --verbose            Log every match
  -h, --help           Show this help

Examples:
  hush mask --units episode.srt --catalog profanities.json
  hush mask --units lines.json --catalog words.txt --threshold 90 --out out/
`.trim();

const WINDOWS_HELP = `
hush windows --matches <file> [options]

Build merged mute windows (seconds) from a match CSV or a window JSON file.
Writes mute_windows.json and prints the matching volume filter.

Options:
  --matches <file>  profanity_matches.csv, or a [{ start, end }] JSON file
  --out <dir>       Output directory (default: ./hushline-out, env: HUSHLINE_OUTPUT_DIR)
  --epsilon <sec>   Merge gap tolerance (default: 0.001, env: HUSHLINE_EPSILON)
  --verbose         Log every window
  -h, --help        Show this help
`.trim();

const CONTROLS_HELP = `
hush controls --windows <file> --duration <sec> [options]

Print control spans outside the mute windows, for loudness comparison.

Options:
  --windows <file>   mute_windows.json
  --duration <sec>   Total media duration
  --sample <sec>     Length of each control span (default: 1)
  --max <n>          Maximum number of spans (default: 5)
  -h, --help         Show this help
`.trim();

const GAPS_HELP = `
hush gaps --windows <file> --duration <sec> [options]

Print the maximal gaps between mute windows.

Options:
  --windows <file>   mute_windows.json
  --duration <sec>   Total media duration
  --min <sec>        Shortest gap to report (default: 1)
  --max <n>          Maximum number of gaps (default: 5)
  -h, --help         Show this help
`.trim();

const QC_HELP = `
hush qc --units <file> --catalog <file>

Check that masked units contain no configured term verbatim.
Exits with status 1 when any remain.

Options:
  --units <file>    Masked subtitles (masked_subtitles.srt or masked_units.json)
  --catalog <file>  Term catalog
  --verbose         List every remaining term
  -h, --help        Show this help
`.trim();

const MAIN_HELP = `
hush - fuzzy profanity masking for subtitles

Usage:
  hush <command> [options]

Commands:
  mask      Mask terms in subtitle units and record matches
  windows   Merge match times into mute windows
  controls  Pick control spans between mute windows
  gaps      List gaps between mute windows
  qc        Check masked units for leftover terms
  version   Show version
  help      Show help for a command

Run 'hush help <command>' for details on a specific command.
`.trim();

export function getHelp(topic: string | null): string {
  switch (topic) {
    case "mask":
      return MASK_HELP;
    case "windows":
      return WINDOWS_HELP;
    case "controls":
      return CONTROLS_HELP;
    case "gaps":
      return GAPS_HELP;
    case "qc":
      return QC_HELP;
    default:
      return MAIN_HELP;
  }
}

export function parseArgs(argv: string[]): ParseResult {
  // Strip node and script path
  const args = argv.slice(2);

  if (args.length === 0) {
    return { command: "help", topic: null };
  }

  const sub = args[0];
  const rest = args.slice(1);

  if (sub === "--version" || sub === "-v" || sub === "version") {
    return { command: "version" };
  }

  if (sub === "--help" || sub === "-h" || sub === "help") {
    return { command: "help", topic: rest[0] ?? null };
  }

  switch (sub) {
    case "mask":
      return parseMaskArgs(rest);
    case "windows":
      return parseWindowsArgs(rest);
    case "controls":
      return parseControlsArgs(rest);
    case "gaps":
      return parseGapsArgs(rest);
    case "qc":
      return parseQcArgs(rest);
  }

  return { error: `Unknown command: ${sub}\n\n${MAIN_HELP}` };
}

// --- Option walking ---

type OptionValue = string | true;

interface OptionSpec {
  /** Options that take a value. */
  values: string[];
  /** Boolean flags. */
  flags: string[];
}

/**
 * Walk `--name value` pairs and `--flag` switches into a map. Returns a
 * ParseError for unknown options, stray arguments, or missing values.
 */
function collectOptions(
  args: string[],
  spec: OptionSpec,
  help: string,
): Map<string, OptionValue> | ParseError {
  const options = new Map<string, OptionValue>();
  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      options.set("help", true);
    } else if (spec.values.includes(arg)) {
      i++;
      if (i >= args.length) return { error: `${arg} requires a value` };
      options.set(arg.slice(2), args[i]);
    } else if (spec.flags.includes(arg)) {
      options.set(arg.slice(2), true);
    } else if (arg.startsWith("-")) {
      return { error: `Unknown option: ${arg}\n\n${help}` };
    } else {
      return { error: `Unexpected argument: ${arg}\n\n${help}` };
    }
    i++;
  }
  return options;
}

function isParseError(value: unknown): value is ParseError {
  return typeof value === "object" && value !== null && "error" in value;
}

function stringOption(options: Map<string, OptionValue>, name: string): string | null {
  const value = options.get(name);
  return typeof value === "string" ? value : null;
}

function requireOption(
  options: Map<string, OptionValue>,
  name: string,
  help: string,
): string | ParseError {
  const value = stringOption(options, name);
  if (value === null) return { error: `--${name} is required\n\n${help}` };
  return value;
}

/**
 * Read a numeric option. Returns `fallback` when absent, or a ParseError
 * when the value is not a number within [min, max].
 */
function numberOption(
  options: Map<string, OptionValue>,
  name: string,
  fallback: number | null,
  min = 0,
  max = Number.POSITIVE_INFINITY,
): number | null | ParseError {
  const raw = stringOption(options, name);
  if (raw === null) return fallback;
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n) || n < min || n > max) {
    return { error: `Invalid value for --${name}: ${raw}` };
  }
  return n;
}

function integerOption(
  options: Map<string, OptionValue>,
  name: string,
  fallback: number,
): number | ParseError {
  const raw = stringOption(options, name);
  if (raw === null) return fallback;
  const n = parseInt(raw, 10);
  if (isNaN(n) || n < 0 || String(n) !== raw.trim()) {
    return { error: `Invalid value for --${name}: ${raw}` };
  }
  return n;
}

// --- Subcommands ---

function parseMaskArgs(args: string[]): ParseResult {
  const options = collectOptions(
    args,
    { values: ["--units", "--catalog", "--out", "--threshold"], flags: ["--verbose"] },
    MASK_HELP,
  );
  if (isParseError(options)) return options;
  if (options.has("help")) return { command: "help", topic: "mask" };

  const units = requireOption(options, "units", MASK_HELP);
  if (isParseError(units)) return units;
  const catalog = requireOption(options, "catalog", MASK_HELP);
  if (isParseError(catalog)) return catalog;
  const threshold = numberOption(options, "threshold", null, 0, 100);
  if (isParseError(threshold)) return threshold;

  return {
    command: "mask",
    units,
    catalog,
    outDir: stringOption(options, "out"),
    threshold,
    verbose: options.has("verbose"),
  };
}

function parseWindowsArgs(args: string[]): ParseResult {
  const options = collectOptions(
    args,
    { values: ["--matches", "--out", "--epsilon"], flags: ["--verbose"] },
    WINDOWS_HELP,
  );
  if (isParseError(options)) return options;
  if (options.has("help")) return { command: "help", topic: "windows" };

  const matches = requireOption(options, "matches", WINDOWS_HELP);
  if (isParseError(matches)) return matches;
  const epsilon = numberOption(options, "epsilon", null);
  if (isParseError(epsilon)) return epsilon;

  return {
    command: "windows",
    matches,
    outDir: stringOption(options, "out"),
    epsilon,
    verbose: options.has("verbose"),
  };
}

/** Shared by `controls` and `gaps`: a window file and a duration. */
function parseSpanInputs(
  options: Map<string, OptionValue>,
  help: string,
): { windows: string; duration: number } | ParseError {
  const windows = requireOption(options, "windows", help);
  if (isParseError(windows)) return windows;
  const duration = numberOption(options, "duration", null);
  if (isParseError(duration)) return duration;
  if (duration === null) return { error: `--duration is required\n\n${help}` };
  return { windows, duration };
}

function parseControlsArgs(args: string[]): ParseResult {
  const options = collectOptions(
    args,
    { values: ["--windows", "--duration", "--sample", "--max"], flags: [] },
    CONTROLS_HELP,
  );
  if (isParseError(options)) return options;
  if (options.has("help")) return { command: "help", topic: "controls" };

  const inputs = parseSpanInputs(options, CONTROLS_HELP);
  if (isParseError(inputs)) return inputs;
  const sampleLength = numberOption(options, "sample", 1);
  if (isParseError(sampleLength)) return sampleLength;
  const maxSamples = integerOption(options, "max", 5);
  if (isParseError(maxSamples)) return maxSamples;

  return {
    command: "controls",
    ...inputs,
    sampleLength: sampleLength ?? 1,
    maxSamples,
  };
}

function parseGapsArgs(args: string[]): ParseResult {
  const options = collectOptions(
    args,
    { values: ["--windows", "--duration", "--min", "--max"], flags: [] },
    GAPS_HELP,
  );
  if (isParseError(options)) return options;
  if (options.has("help")) return { command: "help", topic: "gaps" };

  const inputs = parseSpanInputs(options, GAPS_HELP);
  if (isParseError(inputs)) return inputs;
  const minLength = numberOption(options, "min", 1);
  if (isParseError(minLength)) return minLength;
  const maxCount = integerOption(options, "max", 5);
  if (isParseError(maxCount)) return maxCount;

  return {
    command: "gaps",
    ...inputs,
    minLength: minLength ?? 1,
    maxCount,
  };
}

function parseQcArgs(args: string[]): ParseResult {
  const options = collectOptions(
    args,
    { values: ["--units", "--catalog"], flags: ["--verbose"] },
    QC_HELP,
  );
  if (isParseError(options)) return options;
  if (options.has("help")) return { command: "help", topic: "qc" };

  const units = requireOption(options, "units", QC_HELP);
  if (isParseError(units)) return units;
  const catalog = requireOption(options, "catalog", QC_HELP);
  if (isParseError(catalog)) return catalog;

  return { command: "qc", units, catalog, verbose: options.has("verbose") };
}
