/**
 * Capsule parameter loader and validator.
 *
 * Responsible for:
 * - Collecting values from overrides, the parameters file and the CLI
 * - Validating the merged set against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing the result
 */

import type { ZodIssue } from "zod";
import {
  CapsuleParametersSchema,
  type CapsuleParameters,
} from "./schema.js";
import {
  findParametersFile,
  mergeSources,
  parseCliParameters,
  readParametersFile,
  type ParameterSource,
} from "./sources.js";

/**
 * Structured validation error for capsule parameters.
 */
export class ParameterValidationError extends Error {
  public readonly issues: ParameterValidationIssue[];

  constructor(message: string, issues: ParameterValidationIssue[]) {
    super(message);
    this.name = "ParameterValidationError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Capsule parameter validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ParameterValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ParameterValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate a raw value as a parameter set and freeze it.
 *
 * @throws ParameterValidationError if validation fails
 */
export function parseCapsuleParameters(input: unknown): Readonly<CapsuleParameters> {
  const result = CapsuleParametersSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ParameterValidationError(
      `Invalid capsule parameters: ${issues.length} validation error(s)`,
      issues
    );
  }

  return Object.freeze(result.data);
}

/**
 * Validate a parameter set without throwing.
 */
export function validateCapsuleParameters(input: unknown): {
  success: boolean;
  parameters?: CapsuleParameters;
  errors?: ParameterValidationIssue[];
} {
  const result = CapsuleParametersSchema.safeParse(input);

  if (result.success) {
    return { success: true, parameters: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

export interface LoadParametersOptions {
  /** Highest-priority values set by the caller */
  overrides?: Record<string, unknown>;
  /** Explicit parameters file; skips directory discovery */
  parametersFile?: string;
  /** Directory searched for *_input_parameters*.json */
  parametersDir?: string;
  /** Command-line arguments (without node and script path) */
  argv?: readonly string[];
}

export interface LoadedParameters {
  readonly parameters: Readonly<CapsuleParameters>;
  /** Field name → source that supplied it ("overrides", file path, "cli") */
  readonly origins: Readonly<Record<string, string>>;
  /** Parameters file that was read, if any */
  readonly parametersFile?: string;
}

/**
 * Collect, merge and validate the parameter set for this instance.
 *
 * @throws ParameterSourceError     if a source cannot be read
 * @throws ParameterValidationError if the merged set is invalid
 */
export function loadCapsuleParameters(
  options: LoadParametersOptions = {}
): LoadedParameters {
  const sources: ParameterSource[] = [];

  if (options.overrides) {
    sources.push({ name: "overrides", values: options.overrides });
  }

  const parametersFile =
    options.parametersFile ??
    (options.parametersDir !== undefined
      ? findParametersFile(options.parametersDir)
      : undefined);

  if (parametersFile !== undefined) {
    sources.push({ name: parametersFile, values: readParametersFile(parametersFile) });
  }

  if (options.argv) {
    sources.push({ name: "cli", values: parseCliParameters(options.argv) });
  }

  const merged = mergeSources(sources);

  return {
    parameters: parseCapsuleParameters(merged.values),
    origins: Object.freeze(merged.origins),
    parametersFile,
  };
}
