/**
 * Processing capsule: one parameter set in, one result out.
 */

export {
  runAnalysis,
  loadSessionAsset,
  processSession,
  type ProcessOptions,
  type ProcessOutcome,
} from "./process.js";
export {
  outputsDir,
  outputSuffix,
  fileStem,
  resolveOutputPaths,
  resolveLogFile,
  ensureNonemptyResultsDirs,
  type OutputPaths,
} from "./results.js";
export { runCapsule, type RunCapsuleOptions, type CapsuleRun } from "./run.js";
