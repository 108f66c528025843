/**
 * Report template loader.
 *
 * Loads HTML templates from a directory, parses and validates them, and
 * caches the parsed result per filename.
 *
 *   const loader = new ReportTemplateLoader("templates/");
 *   const template = loader.load(DRIFT_REPORT_TEMPLATE);
 */

import { existsSync, readFileSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";

import { parseTemplate, type ParsedTemplate } from "./template.js";

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

/** Template rendered for every processed session. */
export const DRIFT_REPORT_TEMPLATE = "drift-report.html";

const TEMPLATE_EXTENSIONS = new Set([".html", ".htm"]);

export class ReportTemplateLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(
        this.baseDir,
        `Template directory does not exist: ${this.baseDir}`
      );
    }
  }

  /**
   * Load and parse a single template file (cached).
   *
   * @throws TemplateLoadError  if the file is missing or has another extension
   * @throws TemplateParseError if the template references unknown variables
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filePath}`);
    }

    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    const parsed = parseTemplate(readFileSync(filePath, "utf-8"), basename(filename, ext));
    this.cache.set(filename, parsed);
    return parsed;
  }
}
