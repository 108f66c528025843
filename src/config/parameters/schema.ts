/**
 * Capsule parameter schema.
 *
 * A parameter set is the whole input of one capsule instance. The upstream
 * sweep writes one set per combination; the capsule reads exactly one.
 * Sets are immutable once loaded: a changed parameter means a new set and
 * a new instance.
 */

import { z } from "zod";

import { parseLogLevel } from "../../logging/logger.js";

/**
 * Log levels understood by the logger.
 * Upper-case spellings ("INFO"), "warning" and numeric levels (20) are
 * normalized; anything else is left for the enum to reject.
 */
export const LoggingLevel = z.preprocess(
  (value) => parseLogLevel(value) ?? value,
  z.enum(["debug", "info", "warn", "error"])
);
export type LoggingLevel = z.infer<typeof LoggingLevel>;

/** Largest seed accepted; seeds feed a 32-bit generator. */
export const MAX_SEED = 0xffffffff;

export const CapsuleParametersSchema = z
  .object({
    /** Session to analyze, looked up in the attached asset */
    session_id: z
      .string()
      .trim()
      .min(1)
      .describe("Identifier of the session to process"),

    /** Brain-area label that selects units by structure */
    area: z
      .string()
      .trim()
      .min(1)
      .describe("Categorical brain-area label, e.g. VISp"),

    /** Number of units sampled from the selected area */
    n_units: z
      .number()
      .int()
      .min(0)
      .describe("Number of units to sample; 0 yields an empty result"),

    logging_level: LoggingLevel.default("info").describe(
      "Minimum log level for this instance"
    ),

    /** Quick test mode: caps the sample size */
    test: z.boolean().default(false).describe("Run in quick test mode"),

    /** Explicit sampling seed; derived from the parameters when absent */
    seed: z
      .number()
      .int()
      .min(0)
      .max(MAX_SEED)
      .optional()
      .describe("Seed for unit sampling"),
  })
  .strict();

export type CapsuleParameters = z.infer<typeof CapsuleParametersSchema>;
export type CapsuleParametersInput = z.input<typeof CapsuleParametersSchema>;

