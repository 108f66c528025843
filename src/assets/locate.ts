/**
 * Session asset discovery.
 *
 * The asset is mounted read-only at one of a few known locations. Inside
 * it, consolidated tables live in a "datacube" directory; when several
 * datacube versions are attached the latest (by name) wins. Older assets
 * put the tables directly in the data root.
 */

import { existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";

export class AssetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AssetError";
  }
}

/** Entry names that mark a data root holding tables directly. */
const ROOT_MARKERS = ["session_table", "nwb", "consolidated"] as const;

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * First candidate that exists as a directory.
 *
 * @throws AssetError if none exists
 */
export function locateDataRoot(candidates: readonly string[]): string {
  const found = candidates.find(isDirectory);
  if (found === undefined) {
    throw new AssetError(
      `Data directory not present at any of: ${candidates.join(", ")}`
    );
  }
  return found;
}

/**
 * Directory holding the consolidated tables.
 *
 * @throws AssetError if the data root has neither a datacube directory
 *         nor table markers
 */
export function locateDatacubeDir(dataRoot: string, prefix: string): string {
  const entries = readdirSync(dataRoot).sort().reverse();

  const datacube = entries.find(
    (entry) => entry.startsWith(prefix) && isDirectory(join(dataRoot, entry))
  );
  if (datacube !== undefined) {
    return join(dataRoot, datacube);
  }

  if (entries.some((entry) => ROOT_MARKERS.some((marker) => entry.includes(marker)))) {
    return dataRoot;
  }

  throw new AssetError(
    `Cannot determine datacube directory in ${dataRoot} (entries: ${entries.join(", ") || "none"})`
  );
}

/**
 * Path of a consolidated parquet table inside a datacube directory.
 */
export function consolidatedTablePath(datacubeDir: string, component: string): string {
  return join(datacubeDir, "consolidated", `${component}.parquet`);
}
