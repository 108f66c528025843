/**
 * Parameter sweep: Cartesian expansion and parameter file writing.
 */

export {
  SweepDefinitionSchema,
  SweepValueSchema,
  sweepValueKey,
  type SweepDefinition,
  type SweepDefinitionInput,
  type SweepValue,
} from "./schema.js";
export { cartesianProduct, productSize } from "./product.js";
export {
  SweepError,
  loadSweepDefinition,
  readSweepFile,
  expandSweep,
  parameterSetKey,
  parameterFilename,
  planParameterFiles,
  writeParameterFiles,
  type WrittenParameterFile,
} from "./writer.js";
