/**
 * Report template parsing and variable extraction.
 *
 * A report template is an HTML file containing `{{variable.path}}`
 * placeholders. Placeholders are validated against the known report
 * variables when the template is parsed, so a typo fails before any
 * session is processed.
 *
 * Rules:
 *   - Placeholders use double-brace syntax: {{ and }}
 *   - Variable names are dotted alphanumeric paths
 *   - Whitespace inside braces is trimmed: {{ session.id }} is valid
 *   - Unrecognized variable names are rejected at parse time
 *   - Duplicate placeholders are fine (same value rendered)
 */

/**
 * Every variable a report template may reference.
 */
export type ReportVariable =
  | "session.id"
  | "session.area"
  | "sample.requested"
  | "sample.count"
  | "sample.available"
  | "sample.seed"
  | "sample.mode"
  | "summary.mean"
  | "summary.median"
  | "summary.min"
  | "summary.max"
  | "chart.svg"
  | "units.rows";

/**
 * Matches `{{variable.name}}` with optional inner whitespace.
 * Captures the trimmed variable name in group 1.
 */
export const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

export interface ParsedTemplate {
  /** The raw template source (with placeholders intact). */
  source: string;
  /** Unique variable names found in {{…}} placeholders, sorted. */
  variables: ReportVariable[];
  /** Optional name/id for error messages. */
  name?: string;
}

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`
    );
    this.name = "TemplateParseError";
  }
}

const VALID_VARIABLES: ReadonlySet<string> = new Set<ReportVariable>([
  "session.id",
  "session.area",
  "sample.requested",
  "sample.count",
  "sample.available",
  "sample.seed",
  "sample.mode",
  "summary.mean",
  "summary.median",
  "summary.min",
  "summary.max",
  "chart.svg",
  "units.rows",
]);

/**
 * Variables holding markup produced by this package. They are inserted
 * without escaping; everything else is HTML-escaped.
 */
export const RAW_VARIABLES: ReadonlySet<string> = new Set<ReportVariable>([
  "chart.svg",
  "units.rows",
]);

export function isValidVariable(name: string): name is ReportVariable {
  return VALID_VARIABLES.has(name);
}

/**
 * Extract all `{{…}}` placeholder names from a template string.
 * Returns deduplicated, sorted variable names.
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    found.add(match[1]);
  }
  return [...found].sort();
}

/**
 * Parse a template string and validate its variables.
 *
 * @throws TemplateParseError if any {{variable}} name is unknown
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  const rawVariables = extractVariables(source);
  const invalid = rawVariables.filter((v) => !isValidVariable(v));

  if (invalid.length > 0) {
    throw new TemplateParseError(name ?? "(anonymous)", invalid);
  }

  return {
    source,
    variables: rawVariables.filter(isValidVariable),
    name,
  };
}
