/**
 * Run ID generation and management.
 * Each execution gets a unique run ID for tracing.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/** Current run ID for this execution */
let currentRunId: string | null = null;

/**
 * Initialize the run ID for this execution.
 * Should be called once at startup. Inside a pipeline the batch job id is
 * reused so log lines and outputs correlate with the platform's records.
 */
export function initRunId(jobId?: string): string {
  currentRunId = jobId ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID.
 * Returns null if not initialized.
 */
export function getRunId(): string | null {
  return currentRunId;
}
