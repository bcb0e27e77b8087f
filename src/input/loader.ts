/**
 * Article input loader.
 *
 * Accepts either a path to a JSON file or an inline JSON string (the CLI's
 * `--input` takes both), then validates it against the input schema.
 */

import { existsSync, readFileSync } from "node:fs";
import { ArticleInputSchema, type ArticleInput } from "./schema.js";

/**
 * The input could not be read or is not JSON.
 */
export class InputLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InputLoadError";
  }
}

export interface InputIssue {
  /** Dotted path to the invalid field, "(root)" for the document */
  path: string;
  message: string;
  code: string;
}

/**
 * The input is JSON but does not satisfy the input schema.
 */
export class InputValidationError extends Error {
  public readonly issues: InputIssue[];

  constructor(message: string, issues: InputIssue[]) {
    super(message);
    this.name = "InputValidationError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Input validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Read raw input from a file path, or parse the argument as JSON when no
 * such file exists.
 *
 * @throws InputLoadError if the file can't be read or the text isn't JSON
 */
export function readInputSource(source: string): unknown {
  let text = source;
  let origin = "inline JSON";

  if (existsSync(source)) {
    origin = source;
    try {
      text = readFileSync(source, "utf-8");
    } catch (err) {
      throw new InputLoadError(
        `Failed to read input file ${source}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new InputLoadError(
      `Failed to parse ${origin}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}

/**
 * Validate raw input.
 *
 * @throws InputValidationError listing every schema issue
 */
export function loadArticleInput(input: unknown): ArticleInput {
  const result = ArticleInputSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.join(".") || "(root)",
      message: i.message,
      code: i.code,
    }));
    throw new InputValidationError(
      `Invalid article input: ${issues.length} validation error(s)`,
      issues
    );
  }
  return result.data;
}

/**
 * Read and validate in one step.
 */
export function loadArticleInputFrom(source: string): ArticleInput {
  return loadArticleInput(readInputSource(source));
}
