/**
 * Capsule parameter module.
 *
 * Usage:
 *   import { loadCapsuleParameters } from "./config/parameters/index.js";
 *
 *   const { parameters } = loadCapsuleParameters({
 *     parametersDir: "/data/parameters",
 *     argv: process.argv.slice(2),
 *   });
 */

export {
  LoggingLevel,
  CapsuleParametersSchema,
  MAX_SEED,
  type CapsuleParameters,
  type CapsuleParametersInput,
} from "./schema.js";

export {
  ParameterSourceError,
  PARAMETERS_FILE_RE,
  findParametersFile,
  readParametersFile,
  parseCliParameters,
  mergeSources,
  type ParameterSource,
  type MergedParameters,
} from "./sources.js";

export {
  ParameterValidationError,
  parseCapsuleParameters,
  validateCapsuleParameters,
  loadCapsuleParameters,
  type ParameterValidationIssue,
  type LoadParametersOptions,
  type LoadedParameters,
} from "./loader.js";
