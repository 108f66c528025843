/**
 * Parameter writer.
 *
 * Expands a sweep definition into validated parameter sets and writes one
 * parameters file per set. Each file is consumed by exactly one capsule
 * instance, so files are never overwritten once written.
 *
 * FILE NAMING CONVENTION:
 *   {index}_{session_id}_{area}_{n_units}_input_parameters.json
 * The index is zero-padded to the width of the largest index so files
 * sort in enumeration order. The suffix matches the pattern the capsule
 * searches for.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { ZodIssue } from "zod";

import {
  parseCapsuleParameters,
  ParameterValidationError,
  type CapsuleParameters,
} from "../config/parameters/index.js";
import { cartesianProduct } from "./product.js";
import {
  SweepDefinitionSchema,
  type SweepDefinition,
  type SweepValue,
} from "./schema.js";

export class SweepError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = "SweepError";
  }

  format(): string {
    return [this.message, ...this.details.map((d) => `  - ${d}`)].join("\n");
  }
}

function describeIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a sweep definition.
 *
 * @throws SweepError if the definition is invalid
 */
export function loadSweepDefinition(input: unknown): Readonly<SweepDefinition> {
  const result = SweepDefinitionSchema.safeParse(input);
  if (!result.success) {
    throw new SweepError(
      "Invalid sweep definition",
      describeIssues(result.error.issues)
    );
  }
  return Object.freeze(result.data);
}

/**
 * Read and validate a sweep definition file.
 */
export function readSweepFile(filePath: string): Readonly<SweepDefinition> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new SweepError(
      `Failed to read sweep file ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return loadSweepDefinition(parsed);
}

/** Stable identity of a parameter set, independent of key order. */
export function parameterSetKey(parameters: CapsuleParameters): string {
  const entries = Object.entries(parameters)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}

/**
 * Expand a sweep into one validated parameter set per combination.
 *
 * @throws SweepError if the definition is invalid, a combination is not a
 *         valid parameter set, or two combinations normalize to the same set
 */
export function expandSweep(input: unknown): Readonly<CapsuleParameters>[] {
  const definition = loadSweepDefinition(input);
  const combinations = cartesianProduct<SweepValue>(definition.dimensions);

  const sets: Readonly<CapsuleParameters>[] = [];
  const seen = new Map<string, number>();

  combinations.forEach((combination, index) => {
    let parameters: Readonly<CapsuleParameters>;
    try {
      parameters = parseCapsuleParameters({ ...definition.fixed, ...combination });
    } catch (err) {
      if (err instanceof ParameterValidationError) {
        throw new SweepError(
          `Combination ${index} is not a valid parameter set: ${JSON.stringify(combination)}`,
          err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        );
      }
      throw err;
    }

    const key = parameterSetKey(parameters);
    const previous = seen.get(key);
    if (previous !== undefined) {
      throw new SweepError(
        `Combinations ${previous} and ${index} produce the same parameter set`
      );
    }
    seen.set(key, index);
    sets.push(parameters);
  });

  return sets;
}

function slug(value: string): string {
  return value.replace(/[^A-Za-z0-9.-]+/g, "-");
}

/**
 * Filename for one parameter set.
 *
 * @param index - Position of the set in the sweep
 * @param width - Zero-padding width of the index
 */
export function parameterFilename(
  parameters: CapsuleParameters,
  index: number,
  width = 1
): string {
  const position = String(index).padStart(width, "0");
  return `${position}_${slug(parameters.session_id)}_${slug(parameters.area)}_${parameters.n_units}_input_parameters.json`;
}

export interface WrittenParameterFile {
  readonly path: string;
  readonly parameters: Readonly<CapsuleParameters>;
}

/**
 * Plan the files for a list of parameter sets without writing anything.
 */
export function planParameterFiles(
  sets: readonly Readonly<CapsuleParameters>[],
  outDir: string
): WrittenParameterFile[] {
  const width = String(Math.max(sets.length - 1, 0)).length;
  return sets.map((parameters, index) => ({
    path: join(outDir, parameterFilename(parameters, index, width)),
    parameters,
  }));
}

/**
 * Write one parameters file per set.
 *
 * Every target path is checked before the first write, so a collision
 * leaves the directory untouched.
 *
 * @throws SweepError if any target file already exists
 */
export function writeParameterFiles(
  sets: readonly Readonly<CapsuleParameters>[],
  outDir: string
): WrittenParameterFile[] {
  const planned = planParameterFiles(sets, outDir);

  const existing = planned.filter((file) => existsSync(file.path));
  if (existing.length > 0) {
    throw new SweepError(
      `Refusing to overwrite ${existing.length} existing parameters file(s)`,
      existing.map((file) => file.path)
    );
  }

  if (!existsSync(outDir)) {
    mkdirSync(outDir, { recursive: true });
  }

  for (const file of planned) {
    writeFileSync(file.path, JSON.stringify(file.parameters, null, 2) + "\n", {
      encoding: "utf-8",
      flag: "wx",
    });
  }

  return planned;
}
