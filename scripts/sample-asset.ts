#!/usr/bin/env node
/**
 * Writes a synthetic session asset and a matching sweep definition so the
 * capsule can be exercised locally:
 *
 *   npx tsx scripts/sample-asset.ts [rootDir]
 *   DATA_ROOTS=<rootDir>/data RESULTS_DIR=<rootDir>/results \
 *     npx tsx src/index.ts --session_id a --area VISp --n_units 5
 */

import { writeFileSync } from "node:fs";
import { join } from "node:path";

import { generateSampleUnits, writeSampleAsset } from "../src/assets/index.js";

const SESSIONS = ["a", "b", "c"] as const;
const AREAS = ["VISp", "AUDp"] as const;

function main(rootDir: string): void {
  const dataRoot = join(rootDir, "data");
  const units = generateSampleUnits({
    sessions: SESSIONS,
    areas: AREAS,
    unitsPerArea: 12,
    seed: 1,
  });
  const datacubeDir = writeSampleAsset(dataRoot, "datacube_sample", units);
  console.log(`Wrote ${units.length} units to ${datacubeDir}`);

  const sweepPath = join(rootDir, "sweep.json");
  const sweep = {
    dimensions: {
      n_units: [0, 5, 10],
      area: [...AREAS],
      session_id: [...SESSIONS],
    },
  };
  writeFileSync(sweepPath, JSON.stringify(sweep, null, 2) + "\n", "utf-8");
  console.log(`Wrote sweep definition to ${sweepPath}`);
}

try {
  main(process.argv[2] ?? process.cwd());
} catch (err: unknown) {
  console.error("Sample asset generation failed:", err);
  process.exitCode = 1;
}
