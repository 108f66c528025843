/**
 * Run record creation and serialization.
 *
 * Records are written as pretty JSON next to the report they describe:
 *   <results>/outputs/<session_id><suffix>.json
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import type { CapsuleParameters } from "../config/parameters/index.js";
import type { DriftResult } from "../analysis/drift.js";
import {
  RECORD_VERSION,
  RunRecordSchema,
  type RunMetadata,
  type RunRecord,
} from "./schema.js";

export class RunRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunRecordError";
  }
}

/**
 * Deep freeze an object and all nested objects.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

export interface CreateRunRecordInput {
  runMetadata: RunMetadata;
  parameters: CapsuleParameters;
  result: DriftResult;
  reportFile: string;
}

/**
 * Assemble an immutable run record.
 */
export function createRunRecord(input: CreateRunRecordInput): Readonly<RunRecord> {
  return deepFreeze({
    recordVersion: RECORD_VERSION,
    runMetadata: { ...input.runMetadata },
    parameters: { ...input.parameters },
    result: input.result,
    reportFile: input.reportFile,
  });
}

export function serializeRunRecord(record: RunRecord, pretty = true): string {
  return JSON.stringify(record, null, pretty ? 2 : undefined);
}

/**
 * Accept only records whose major version matches the current one.
 */
export function isVersionCompatible(version: string): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = RECORD_VERSION.split(".").map(Number);
  return major === currentMajor;
}

/**
 * Parse and validate a serialized run record.
 *
 * @throws RunRecordError if parsing, validation, or the version check fails
 */
export function deserializeRunRecord(json: string): Readonly<RunRecord> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new RunRecordError(
      `Failed to parse run record JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = RunRecordSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new RunRecordError(`Invalid run record format: ${errors}`);
  }

  if (!isVersionCompatible(result.data.recordVersion)) {
    throw new RunRecordError(
      `Incompatible run record version: ${result.data.recordVersion} ` +
        `(current: ${RECORD_VERSION})`
    );
  }

  return deepFreeze(result.data);
}

/**
 * Save a run record, creating the parent directory if needed.
 */
export function saveRunRecord(record: RunRecord, filePath: string): string {
  const directory = dirname(filePath);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
  writeFileSync(filePath, serializeRunRecord(record) + "\n", "utf-8");
  return filePath;
}

export function loadRunRecord(filePath: string): Readonly<RunRecord> {
  let json: string;
  try {
    json = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new RunRecordError(
      `Failed to read run record file: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return deserializeRunRecord(json);
}

/**
 * Human-readable summary for logs and the console.
 */
export function summarizeRunRecord(record: RunRecord): string {
  const { runMetadata: meta, parameters, result } = record;
  const lines = [
    "=== Capsule Run ===",
    `Record version: ${record.recordVersion}`,
    `Run ID: ${meta.runId}`,
    `Started: ${meta.startedAt}`,
  ];

  if (meta.finishedAt) lines.push(`Finished: ${meta.finishedAt}`);
  if (meta.hostname) lines.push(`Hostname: ${meta.hostname}`);
  if (meta.jobId) lines.push(`Job: ${meta.jobId}`);

  lines.push("");
  lines.push("--- Parameters ---");
  lines.push(`Session: ${parameters.session_id}`);
  lines.push(`Area: ${parameters.area}`);
  lines.push(`Units requested: ${parameters.n_units}`);
  lines.push(`Test mode: ${parameters.test ? "yes" : "no"}`);

  lines.push("");
  lines.push("--- Result ---");
  lines.push(`Units sampled: ${result.summary.count} of ${result.available_units}`);
  lines.push(`Mean drift: ${result.summary.mean === null ? "n/a" : result.summary.mean.toFixed(4)}`);
  lines.push(`Report: ${record.reportFile}`);

  return lines.join("\n");
}
