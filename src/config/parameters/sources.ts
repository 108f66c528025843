/**
 * Parameter sources.
 *
 * A capsule instance can receive its parameters three ways:
 *
 *   1. init overrides passed by the calling code
 *   2. a JSON parameters file attached by the pipeline
 *      (any file matching *_input_parameters*.json)
 *   3. command-line options (--session_id VISp ...)
 *
 * Sources are listed in priority order. For each field, the first source
 * that contains a value is used.
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import { parseArgs } from "node:util";

export class ParameterSourceError extends Error {
  constructor(
    public readonly source: string,
    message: string
  ) {
    super(message);
    this.name = "ParameterSourceError";
  }
}

export interface ParameterSource {
  /** Label used in logs and error messages */
  readonly name: string;
  /** Raw, unvalidated field values */
  readonly values: Readonly<Record<string, unknown>>;
}

export interface MergedParameters {
  readonly values: Record<string, unknown>;
  /** Field name → name of the source that supplied it */
  readonly origins: Record<string, string>;
}

/** Matches files written by the parameter sweep. */
export const PARAMETERS_FILE_RE = /_input_parameters.*\.json$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Find the parameters file in a directory.
 * Returns the first match by sorted filename, or undefined when the
 * directory is missing or holds no match.
 */
export function findParametersFile(dir: string): string | undefined {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    return undefined;
  }

  const match = readdirSync(dir)
    .filter((entry) => PARAMETERS_FILE_RE.test(entry))
    .sort()
    .find((entry) => statSync(join(dir, entry)).isFile());

  return match === undefined ? undefined : join(dir, match);
}

/**
 * Read a JSON parameters file.
 *
 * @throws ParameterSourceError if the file is unreadable, not JSON, or
 *         does not hold a JSON object
 */
export function readParametersFile(filePath: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ParameterSourceError(
      filePath,
      `Failed to read parameters file ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ParameterSourceError(
      filePath,
      `Parameters file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ParameterSourceError(
      filePath,
      `Parameters file ${filePath} must contain a JSON object`
    );
  }

  return parsed;
}

/**
 * Numeric CLI strings become numbers; anything else is passed through so
 * schema validation reports it.
 */
function numericOrRaw(value: string): number | string {
  const trimmed = value.trim();
  if (trimmed === "") return value;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : value;
}

const BOOLEAN_WORDS: Readonly<Record<string, boolean>> = {
  true: true,
  false: false,
  "1": true,
  "0": false,
  yes: true,
  no: false,
};

/** Map a boolean word to its value; other text is left for the schema to reject. */
function booleanOrRaw(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(BOOLEAN_WORDS, normalized)
    ? BOOLEAN_WORDS[normalized] === true
    : value;
}

/**
 * Flags that take an optional boolean value: `--test`, `--test false`
 * and `--test=no` are all accepted. A bare flag means true.
 */
const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["--test"]);

function expandBareBooleanFlags(argv: readonly string[]): string[] {
  return argv.map((arg, i) => {
    if (!BOOLEAN_FLAGS.has(arg)) return arg;
    const next = argv[i + 1];
    return next === undefined || next.startsWith("--") ? `${arg}=true` : arg;
  });
}

function parseCliOptions(argv: readonly string[]) {
  return parseArgs({
    args: expandBareBooleanFlags(argv),
    options: {
      session_id: { type: "string" },
      area: { type: "string" },
      n_units: { type: "string" },
      logging_level: { type: "string" },
      test: { type: "string" },
      seed: { type: "string" },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

/**
 * Parse capsule parameters from command-line arguments.
 * Only options that are present appear in the result.
 *
 * @throws ParameterSourceError on unknown options or positionals
 */
export function parseCliParameters(argv: readonly string[]): Record<string, unknown> {
  let values: ReturnType<typeof parseCliOptions>;
  try {
    values = parseCliOptions(argv);
  } catch (err) {
    throw new ParameterSourceError(
      "cli",
      `Invalid command-line parameters: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result: Record<string, unknown> = {};
  if (values.session_id !== undefined) result.session_id = values.session_id;
  if (values.area !== undefined) result.area = values.area;
  if (values.n_units !== undefined) result.n_units = numericOrRaw(values.n_units);
  if (values.logging_level !== undefined) result.logging_level = values.logging_level;
  if (values.test !== undefined) result.test = booleanOrRaw(values.test);
  if (values.seed !== undefined) result.seed = numericOrRaw(values.seed);
  return result;
}

/**
 * Merge sources by priority: the first source holding a (defined) value
 * for a field wins.
 */
export function mergeSources(sources: readonly ParameterSource[]): MergedParameters {
  const values: Record<string, unknown> = {};
  const origins: Record<string, string> = {};

  for (const source of sources) {
    for (const [key, value] of Object.entries(source.values)) {
      if (value === undefined || key in values) continue;
      values[key] = value;
      origins[key] = source.name;
    }
  }

  return { values, origins };
}
