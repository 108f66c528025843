/**
 * Session asset table schemas.
 *
 * The asset's consolidated units table holds one record per recorded unit
 * across all sessions. Columns beyond the ones below are allowed and
 * dropped on load.
 */

import { z } from "zod";

/** Identifier column; integer-typed columns are read as their decimal text. */
const Identifier = z.preprocess(
  (value) => (typeof value === "number" || typeof value === "bigint" ? String(value) : value),
  z.string().min(1)
);

export const UnitRecordSchema = z.object({
  unit_id: Identifier,
  session_id: Identifier,
  /** Brain structure the unit was recorded in; matched against `area` */
  structure: z.string(),
  /** Recording location label shown on the chart axis */
  location: z.string(),
  activity_drift: z.number().finite(),
});

export type UnitRecord = z.infer<typeof UnitRecordSchema>;

export const UnitsTableSchema = z.array(UnitRecordSchema);
