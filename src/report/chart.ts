/**
 * Inline SVG bar chart of activity drift per unit.
 *
 * Bars grow up (positive drift) or down (negative drift) from a zero line
 * in the middle of the plot. Color runs from blue (most negative) through
 * near-white to red (most positive), scaled to the largest magnitude.
 */

import type { DriftUnit } from "../analysis/drift.js";
import { escapeHtml } from "./renderer.js";

export interface ChartOptions {
  width?: number;
  height?: number;
}

type Rgb = readonly [number, number, number];

const NEGATIVE: Rgb = [33, 102, 172];
const NEUTRAL: Rgb = [247, 247, 247];
const POSITIVE: Rgb = [178, 24, 43];

const MARGIN = { top: 20, right: 20, bottom: 80, left: 50 } as const;

/**
 * Diverging color for a drift value.
 */
export function driftColor(value: number, maxAbs: number): string {
  const t = maxAbs > 0 ? Math.min(Math.abs(value) / maxAbs, 1) : 0;
  const end = value < 0 ? NEGATIVE : POSITIVE;
  const channels = NEUTRAL.map((start, i) => Math.round(start + (end[i] - start) * t));
  return `rgb(${channels.join(",")})`;
}

function fixed(n: number): string {
  return n.toFixed(2);
}

/**
 * Render the chart as a standalone <svg> element.
 */
export function renderBarChart(
  units: readonly DriftUnit[],
  options: ChartOptions = {}
): string {
  const width = options.width ?? 640;
  const height = options.height ?? 320;
  const open = `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" role="img">`;

  if (units.length === 0) {
    return [
      open,
      `<text x="${fixed(width / 2)}" y="${fixed(height / 2)}" text-anchor="middle">No units sampled</text>`,
      "</svg>",
    ].join("\n");
  }

  const plotWidth = width - MARGIN.left - MARGIN.right;
  const plotHeight = height - MARGIN.top - MARGIN.bottom;
  const zeroY = MARGIN.top + plotHeight / 2;
  const maxAbs = units.reduce((max, u) => Math.max(max, Math.abs(u.activity_drift)), 0) || 1;
  const band = plotWidth / units.length;
  const barWidth = band * 0.8;

  const lines = [
    open,
    `<line class="zero" x1="${MARGIN.left}" y1="${fixed(zeroY)}" x2="${MARGIN.left + plotWidth}" y2="${fixed(zeroY)}" stroke="#444"/>`,
    `<text x="${MARGIN.left - 6}" y="${MARGIN.top + 4}" text-anchor="end">${fixed(maxAbs)}</text>`,
    `<text x="${MARGIN.left - 6}" y="${MARGIN.top + plotHeight}" text-anchor="end">${fixed(-maxAbs)}</text>`,
  ];

  units.forEach((unit, i) => {
    const barHeight = (Math.abs(unit.activity_drift) / maxAbs) * (plotHeight / 2);
    const x = MARGIN.left + i * band + (band - barWidth) / 2;
    const y = unit.activity_drift >= 0 ? zeroY - barHeight : zeroY;
    const labelX = x + barWidth / 2;
    const labelY = MARGIN.top + plotHeight + 12;
    const location = escapeHtml(unit.location);

    lines.push(
      `<rect class="bar" x="${fixed(x)}" y="${fixed(y)}" width="${fixed(barWidth)}" height="${fixed(barHeight)}" fill="${driftColor(unit.activity_drift, maxAbs)}">` +
        `<title>${location}: ${unit.activity_drift}</title></rect>`,
      `<text x="${fixed(labelX)}" y="${labelY}" transform="rotate(45 ${fixed(labelX)} ${labelY})" font-size="10">${location}</text>`
    );
  });

  lines.push("</svg>");
  return lines.join("\n");
}
