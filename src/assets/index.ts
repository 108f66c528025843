/**
 * Session asset access.
 */

export { UnitRecordSchema, UnitsTableSchema, type UnitRecord } from "./schema.js";
export {
  AssetError,
  locateDataRoot,
  locateDatacubeDir,
  consolidatedTablePath,
} from "./locate.js";
export { loadUnits, listSessions, selectSession } from "./units.js";
export {
  encodeUnitsTable,
  generateSampleUnits,
  writeSampleAsset,
  type SampleAssetOptions,
} from "./sample.js";
