/**
 * Synthetic session asset.
 *
 * Generates a small, seeded units table with the same layout as a real
 * asset so the capsule can run end to end without attached data.
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { parquetWriteBuffer } from "hyparquet-writer";
import { createRng } from "../analysis/random.js";
import { consolidatedTablePath } from "./locate.js";
import type { UnitRecord } from "./schema.js";

export interface SampleAssetOptions {
  sessions: readonly string[];
  areas: readonly string[];
  unitsPerArea: number;
  seed?: number;
}

/**
 * Generate unit records for every (session, area) pair.
 * Drift values lie in [-1, 1) rounded to four decimals.
 */
export function generateSampleUnits(options: SampleAssetOptions): UnitRecord[] {
  const rng = createRng(options.seed ?? 0);
  const units: UnitRecord[] = [];

  for (const session of options.sessions) {
    for (const area of options.areas) {
      for (let i = 0; i < options.unitsPerArea; i++) {
        const index = String(i).padStart(3, "0");
        units.push({
          unit_id: `${session}_${area}_${index}`,
          session_id: session,
          structure: area,
          location: `${area}-${index}`,
          activity_drift: Math.round((rng() * 2 - 1) * 10000) / 10000,
        });
      }
    }
  }

  return units;
}

/**
 * Encode unit records as a parquet units table.
 */
export function encodeUnitsTable(units: readonly UnitRecord[]): Uint8Array {
  const buffer = parquetWriteBuffer({
    columnData: [
      { name: "unit_id", data: units.map((u) => u.unit_id), type: "STRING" },
      { name: "session_id", data: units.map((u) => u.session_id), type: "STRING" },
      { name: "structure", data: units.map((u) => u.structure), type: "STRING" },
      { name: "location", data: units.map((u) => u.location), type: "STRING" },
      { name: "activity_drift", data: units.map((u) => u.activity_drift), type: "DOUBLE" },
    ],
  });
  return new Uint8Array(buffer);
}

/**
 * Write units into `<dataRoot>/<datacubeName>/consolidated/units.parquet`.
 *
 * @returns The datacube directory
 */
export function writeSampleAsset(
  dataRoot: string,
  datacubeName: string,
  units: readonly UnitRecord[]
): string {
  const datacubeDir = join(dataRoot, datacubeName);
  const tablePath = consolidatedTablePath(datacubeDir, "units");

  if (!existsSync(dirname(tablePath))) {
    mkdirSync(dirname(tablePath), { recursive: true });
  }
  writeFileSync(tablePath, encodeUnitsTable(units));

  return datacubeDir;
}
