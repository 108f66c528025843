/**
 * Analysis procedures run by the capsule.
 */

export {
  AnalysisError,
  createRng,
  deriveSeed,
  sampleWithoutReplacement,
  type Rng,
} from "./random.js";
export {
  TEST_MODE_UNIT_LIMIT,
  analyzeActivityDrift,
  effectiveSampleSize,
  summarizeDrift,
  type DriftResult,
  type DriftSummary,
  type DriftUnit,
} from "./drift.js";
