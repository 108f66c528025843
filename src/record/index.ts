/**
 * Run records written beside each capsule result.
 */

export {
  RECORD_VERSION,
  RunMetadataSchema,
  DriftResultSchema,
  RunRecordSchema,
  type RunMetadata,
  type RunRecord,
} from "./schema.js";
export { createRunMetadata, type RunMetadataOptions } from "./metadata.js";
export {
  RunRecordError,
  createRunRecord,
  serializeRunRecord,
  deserializeRunRecord,
  isVersionCompatible,
  saveRunRecord,
  loadRunRecord,
  summarizeRunRecord,
  type CreateRunRecordInput,
} from "./serialization.js";
