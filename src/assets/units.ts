/**
 * Units table loading and session selection.
 *
 * The consolidated units table is a parquet file; rows are decoded into
 * plain objects and validated like any other document.
 */

import { asyncBufferFromFile, parquetReadObjects } from "hyparquet";
import { AssetError, consolidatedTablePath } from "./locate.js";
import { UnitsTableSchema, type UnitRecord } from "./schema.js";

/** Issues listed in an error before the rest are summarized. */
const MAX_REPORTED_ISSUES = 5;

/**
 * Load and validate the consolidated units table.
 *
 * @throws AssetError if the file is missing, unreadable, or invalid
 */
export async function loadUnits(datacubeDir: string): Promise<UnitRecord[]> {
  const filePath = consolidatedTablePath(datacubeDir, "units");

  let parsed: unknown;
  try {
    const file = await asyncBufferFromFile(filePath);
    parsed = await parquetReadObjects({ file });
  } catch (err) {
    throw new AssetError(
      `Failed to read units table ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = UnitsTableSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues;
    const shown = issues
      .slice(0, MAX_REPORTED_ISSUES)
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    const more = issues.length > MAX_REPORTED_ISSUES
      ? ` (+${issues.length - MAX_REPORTED_ISSUES} more)`
      : "";
    throw new AssetError(
      `Invalid units table ${filePath}: ${shown.join("; ")}${more}`
    );
  }

  return result.data;
}

/**
 * Sorted, de-duplicated session ids present in a table.
 */
export function listSessions(units: readonly UnitRecord[]): string[] {
  return [...new Set(units.map((unit) => unit.session_id))].sort();
}

/**
 * Units recorded in one session.
 *
 * @throws AssetError if the asset holds no units for the session
 */
export function selectSession(
  units: readonly UnitRecord[],
  sessionId: string
): UnitRecord[] {
  const selected = units.filter((unit) => unit.session_id === sessionId);
  if (selected.length === 0) {
    const available = listSessions(units);
    throw new AssetError(
      `Session "${sessionId}" not found in asset (available: ${available.join(", ") || "none"})`
    );
  }
  return selected;
}
