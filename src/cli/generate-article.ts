#!/usr/bin/env node
/**
 * CLI: generate one article from an input document.
 *
 * Usage:
 *   npm run generate -- --input samples/article-input.json
 *   npm run generate -- --input '{"primary_keyword": "..."}' --format html --output out/article.html
 *
 * Options:
 *   -i, --input <file|json>   Input document, as a file path or inline JSON (required)
 *   -o, --output <path>       Write the result here instead of stdout
 *   -f, --format <json|html>  Output format (default: json)
 *   --api-key <key>           Gemini API key (default: GEMINI_API_KEY / GOOGLE_API_KEY)
 *   --contract <path>         Editorial contract JSON (default: built-in contract)
 *   -h, --help                Show help
 *
 * Logs go to stderr; stdout carries only the article.
 *
 * Exit codes:
 *   0 - Article written
 *   1 - Usage, configuration, input, generation or quality failure
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { parseArgs } from "node:util";

import { ConfigError, loadConfig, resolveApiKey, validateConfig } from "../config/index.js";
import { createLogger } from "../logging/index.js";
import { InputLoadError, InputValidationError, loadArticleInputFrom } from "../input/index.js";
import {
  DEFAULT_EDITORIAL_CONTRACT,
  StandardsValidationError,
  loadEditorialContractFromFile,
} from "../standards/index.js";
import { DEFAULT_USER_AGENT, createAxiosHttpClient } from "../sources/http.js";
import { createGeminiGenerationProvider, createGeminiSearchProvider } from "../providers/index.js";
import { renderArticleHtml } from "../content/index.js";
import {
  ArticleGenerator,
  GenerationError,
  QualityCheckError,
  serializeArticle,
} from "../generator/index.js";
import type { Article } from "../types/index.js";

// ============================================================
// Types
// ============================================================

export type OutputFormat = "json" | "html";

export interface CliOptions {
  input: string;
  output?: string;
  format: OutputFormat;
  apiKey?: string;
  contract?: string;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `
Usage: generate-article --input <file|json> [options]

Options:
  -i, --input <file|json>   Input document, as a file path or inline JSON (required)
  -o, --output <path>       Write the result here instead of stdout
  -f, --format <json|html>  Output format (default: json)
  --api-key <key>           Gemini API key (default: GEMINI_API_KEY / GOOGLE_API_KEY)
  --contract <path>         Editorial contract JSON (default: built-in contract)
  -h, --help                Show this help message
`;

// ============================================================
// CLI Parsing
// ============================================================

function isOutputFormat(value: string): value is OutputFormat {
  return value === "json" || value === "html";
}

function readFlags(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o" },
      format: { type: "string", short: "f", default: "json" },
      "api-key": { type: "string" },
      contract: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  }).values;
}

/**
 * @throws CliUsageError on unknown flags, a missing --input or an
 *         unsupported --format
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(argv);
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }

  const help = values.help ?? false;
  const format = values.format ?? "json";
  if (!isOutputFormat(format)) {
    throw new CliUsageError(`Unsupported --format "${format}". Use json or html.`);
  }
  if (!help && (values.input === undefined || values.input.trim() === "")) {
    throw new CliUsageError("--input is required");
  }

  return {
    input: values.input ?? "",
    output: values.output,
    format,
    apiKey: values["api-key"],
    contract: values.contract,
    help,
  };
}

// ============================================================
// Output
// ============================================================

export function renderOutput(article: Article, format: OutputFormat): string {
  if (format === "html") {
    return article.html ?? renderArticleHtml(article);
  }
  return `${serializeArticle(article)}\n`;
}

/**
 * Write to `path` (parent directories created) or to stdout.
 */
export function writeOutput(text: string, path?: string): void {
  if (path === undefined) {
    process.stdout.write(text);
    return;
  }
  const target = resolve(path);
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, text, "utf-8");
}

/**
 * Diagnostic for the error stream. Generation failures carry their stack
 * and the provider error that caused them.
 */
export function describeError(err: unknown): string {
  if (err instanceof InputValidationError || err instanceof StandardsValidationError) {
    return err.format();
  }
  if (err instanceof QualityCheckError) {
    return err.message;
  }
  if (err instanceof GenerationError) {
    const lines = [err.stack ?? err.message];
    if (err.cause instanceof Error) {
      lines.push(`Caused by: ${err.cause.stack ?? err.cause.message}`);
    }
    return lines.join("\n");
  }
  if (err instanceof CliUsageError) {
    return `Error: ${err.message}\n${USAGE}`;
  }
  if (err instanceof ConfigError || err instanceof InputLoadError) {
    return `Error: ${err.message}`;
  }
  if (err instanceof Error) {
    return err.stack ?? err.message;
  }
  return `Error: ${String(err)}`;
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const { logLevel } = validateConfig(config);
  const logger = createLogger({
    level: logLevel,
    file: config.logToFile,
    logDir: config.logDir,
  });
  logger.info("Run started", { runId: logger.runId, contentModel: config.contentModel });

  const input = loadArticleInputFrom(args.input);
  const contract = args.contract
    ? loadEditorialContractFromFile(args.contract)
    : DEFAULT_EDITORIAL_CONTRACT;
  const apiKey = resolveApiKey(config, args.apiKey);

  const generator = new ArticleGenerator({
    generation: createGeminiGenerationProvider({
      apiKey,
      model: config.contentModel,
      logger: logger.child("generation"),
    }),
    search: createGeminiSearchProvider({
      apiKey,
      model: config.validatorModel,
      logger: logger.child("search"),
    }),
    http: createAxiosHttpClient({
      timeoutMs: config.httpTimeoutMs,
      userAgent: `${DEFAULT_USER_AGENT} ${config.appName}`,
    }),
    logger: logger.child("generator"),
    contract,
    timeoutMs: config.httpTimeoutMs,
  });

  const article = await generator.generate(input);
  writeOutput(renderOutput(article, args.format), args.output);

  if (args.output !== undefined) {
    console.error(`Output written to ${args.output}`);
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] !== undefined &&
  /generate-article(\.[jt]s)?$/.test(process.argv[1]);

if (isDirectExecution) {
  main().catch((err: unknown) => {
    console.error(describeError(err));
    process.exit(1);
  });
}
