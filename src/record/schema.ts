/**
 * Run record schema definitions.
 *
 * A run record is written beside every capsule result. It captures what
 * is needed to trace and reproduce the result:
 *
 * 1. WHAT: the parameter set the instance consumed
 * 2. RESULT: the analysis output
 * 3. WHEN/WHERE: run metadata (run id, timestamps, host, pipeline job)
 *
 * VERSIONING:
 * The recordVersion field lets loaders detect older formats. Only records
 * with the same major version are accepted.
 */

import { z } from "zod";
import { CapsuleParametersSchema } from "../config/parameters/index.js";
import type { CapsuleParameters } from "../config/parameters/index.js";
import type { DriftResult } from "../analysis/drift.js";

export const RECORD_VERSION = "1.0.0";

export const RunMetadataSchema = z
  .object({
    /** Run identifier (batch job id inside a pipeline) */
    runId: z.string().min(1),
    /** Run start timestamp (ISO 8601) */
    startedAt: z.string().datetime(),
    /** Time the result was written (ISO 8601) */
    finishedAt: z.string().datetime().optional(),
    hostname: z.string().optional(),
    /** Whether the instance ran inside a pipeline fan-out */
    pipeline: z.boolean(),
    jobId: z.string().optional(),
    computationId: z.string().optional(),
    /** Parameters file the instance read, if any */
    parametersFile: z.string().optional(),
  })
  .strict();

export type RunMetadata = z.infer<typeof RunMetadataSchema>;

const nullableStat = z.number().nullable();

export const DriftResultSchema = z
  .object({
    session_id: z.string(),
    area: z.string(),
    requested_units: z.number().int().min(0),
    available_units: z.number().int().min(0),
    seed: z.number().int().min(0),
    test: z.boolean(),
    units: z.array(
      z
        .object({
          unit_id: z.string(),
          location: z.string(),
          activity_drift: z.number(),
        })
        .strict()
    ),
    summary: z
      .object({
        count: z.number().int().min(0),
        mean: nullableStat,
        median: nullableStat,
        min: nullableStat,
        max: nullableStat,
      })
      .strict(),
  })
  .strict();

export const RunRecordSchema = z
  .object({
    recordVersion: z.string().regex(/^\d+\.\d+\.\d+$/),
    runMetadata: RunMetadataSchema,
    parameters: CapsuleParametersSchema,
    result: DriftResultSchema,
    /** Report file written with this record */
    reportFile: z.string().min(1),
  })
  .strict();

export interface RunRecord {
  readonly recordVersion: string;
  readonly runMetadata: RunMetadata;
  readonly parameters: CapsuleParameters;
  readonly result: DriftResult;
  readonly reportFile: string;
}
