/**
 * Report renderer.
 *
 * Substitutes a report context into a parsed template:
 *
 *   1. Every {{variable}} in the template MUST have a value in the context.
 *   2. In strict mode (default), every context variable MUST be used.
 *   3. Values are HTML-escaped, except the raw markup variables.
 */

import {
  PLACEHOLDER_RE,
  RAW_VARIABLES,
  isValidVariable,
  type ParsedTemplate,
  type ReportVariable,
} from "./template.js";

export type ReportContext = Readonly<Partial<Record<ReportVariable, string>>>;

export class ReportRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly variables: string[],
    message: string
  ) {
    super(message);
    this.name = "ReportRenderError";
  }
}

export interface RenderOptions {
  /**
   * When true (default), rendering fails if the context contains
   * variables the template does not reference.
   */
  strict?: boolean;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function lookup(context: ReportContext, name: string): string | undefined {
  return isValidVariable(name) ? context[name] : undefined;
}

/**
 * Render a parsed template against a report context.
 *
 * @throws ReportRenderError if a variable is missing, or (strict) unused
 */
export function renderReport(
  template: ParsedTemplate,
  context: ReportContext,
  options: RenderOptions = {}
): string {
  const { strict = true } = options;
  const templateName = template.name ?? "(anonymous)";

  const missing = template.variables.filter((v) => context[v] === undefined);
  if (missing.length > 0) {
    throw new ReportRenderError(
      templateName,
      missing,
      `Cannot render template "${templateName}": context is missing value(s) for: ${missing.join(", ")}`
    );
  }

  if (strict) {
    const used = new Set<string>(template.variables);
    const unused = Object.keys(context)
      .filter((k) => !used.has(k) && lookup(context, k) !== undefined)
      .sort();
    if (unused.length > 0) {
      throw new ReportRenderError(
        templateName,
        unused,
        `Template "${templateName}" does not use context variable(s): ${unused.join(", ")}. ` +
          `Pass { strict: false } to allow unused variables.`
      );
    }
  }

  return template.source.replace(PLACEHOLDER_RE, (_match, name: string) => {
    const value = lookup(context, name) ?? "";
    return RAW_VARIABLES.has(name) ? value : escapeHtml(value);
  });
}
