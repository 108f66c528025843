/**
 * Run metadata capture.
 */

import { hostname } from "node:os";
import type { RunMetadata } from "./schema.js";

export interface RunMetadataOptions {
  runId: string;
  /** Override start timestamp (defaults to now) */
  startedAt?: Date;
  finishedAt?: Date;
  jobId?: string;
  computationId?: string;
  parametersFile?: string;
  /** Whether to capture hostname (default: true) */
  captureHostname?: boolean;
}

/**
 * Create run metadata with current environment context.
 */
export function createRunMetadata(options: RunMetadataOptions): RunMetadata {
  const metadata: RunMetadata = {
    runId: options.runId,
    startedAt: (options.startedAt ?? new Date()).toISOString(),
    pipeline: options.jobId !== undefined,
  };

  if (options.finishedAt) {
    metadata.finishedAt = options.finishedAt.toISOString();
  }

  if (options.captureHostname !== false) {
    metadata.hostname = hostname();
  }

  if (options.jobId !== undefined) metadata.jobId = options.jobId;
  if (options.computationId !== undefined) metadata.computationId = options.computationId;
  if (options.parametersFile !== undefined) metadata.parametersFile = options.parametersFile;

  return metadata;
}
