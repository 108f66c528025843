/**
 * Report context construction.
 *
 * Maps a drift result onto the report variables. Only values derived from
 * the result appear here, so identical results render identical reports.
 */

import type { DriftResult } from "../analysis/drift.js";
import { renderBarChart } from "./chart.js";
import { escapeHtml } from "./renderer.js";
import type { ReportVariable } from "./template.js";

function formatStat(value: number | null): string {
  return value === null ? "n/a" : value.toFixed(4);
}

function renderRows(result: DriftResult): string {
  if (result.units.length === 0) {
    return `<tr><td colspan="3">No units sampled</td></tr>`;
  }
  return result.units
    .map(
      (unit) =>
        `<tr><td>${escapeHtml(unit.unit_id)}</td><td>${escapeHtml(unit.location)}</td>` +
        `<td>${unit.activity_drift.toFixed(4)}</td></tr>`
    )
    .join("\n");
}

export function buildReportContext(result: DriftResult): Record<ReportVariable, string> {
  return {
    "session.id": result.session_id,
    "session.area": result.area,
    "sample.requested": String(result.requested_units),
    "sample.count": String(result.summary.count),
    "sample.available": String(result.available_units),
    "sample.seed": String(result.seed),
    "sample.mode": result.test ? "test" : "full",
    "summary.mean": formatStat(result.summary.mean),
    "summary.median": formatStat(result.summary.median),
    "summary.min": formatStat(result.summary.min),
    "summary.max": formatStat(result.summary.max),
    "chart.svg": renderBarChart(result.units),
    "units.rows": renderRows(result),
  };
}
