/**
 * Prompt template loader.
 *
 * Loads templates from disk (.md or .txt), parses and validates them, and
 * caches the result. Create one loader and reuse it; only the context
 * changes per article.
 *
 *   const loader = new PromptTemplateLoader(DEFAULT_TEMPLATE_DIR);
 *   const template = loader.load("article.md");
 */

import { existsSync, readFileSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
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

const TEMPLATE_EXTENSIONS = new Set([".md", ".txt"]);

/** The prompts/ directory shipped at the package root */
export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL("../../prompts/", import.meta.url));

export class PromptTemplateLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  constructor(baseDir: string = DEFAULT_TEMPLATE_DIR) {
    this.baseDir = resolve(baseDir);
    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(this.baseDir, `Template directory does not exist: ${this.baseDir}`);
    }
  }

  /**
   * @param filename relative to the base directory, e.g. "article.md"
   * @throws TemplateLoadError   when the file is missing or not a template
   * @throws TemplateParseError  when it references unknown variables
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);
    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }
    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filePath}`);
    }

    const parsed = parseTemplate(readFileSync(filePath, "utf-8"), basename(filename, ext));
    this.cache.set(filename, parsed);
    return parsed;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
