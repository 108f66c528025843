/**
 * HTML report generation for drift results.
 *
 * ```typescript
 * const loader = new ReportTemplateLoader(config.templatesDir);
 * const template = loader.load(DRIFT_REPORT_TEMPLATE);
 * const html = renderReport(template, buildReportContext(result));
 * ```
 */

export {
  PLACEHOLDER_RE,
  RAW_VARIABLES,
  TemplateParseError,
  extractVariables,
  isValidVariable,
  parseTemplate,
  type ParsedTemplate,
  type ReportVariable,
} from "./template.js";
export {
  ReportRenderError,
  escapeHtml,
  renderReport,
  type RenderOptions,
  type ReportContext,
} from "./renderer.js";
export { driftColor, renderBarChart, type ChartOptions } from "./chart.js";
export { buildReportContext } from "./context.js";
export {
  DRIFT_REPORT_TEMPLATE,
  ReportTemplateLoader,
  TemplateLoadError,
} from "./loader.js";
