/**
 * Prompt template parsing and variable extraction.
 *
 * A template is plain text (loaded from a .md or .txt file) with
 * `{{variable.path}}` placeholders and optional `{{#if …}}…{{/if}}`
 * blocks. Names are checked against PROMPT_VARIABLES at parse time so a
 * typo fails on load rather than at render time.
 *
 * Rules:
 *   - Whitespace inside braces is trimmed: {{ input.language }} is valid
 *   - A placeholder may appear any number of times
 *   - No nested conditionals
 */

import { isPromptVariable, type PromptVariable } from "./context.js";
import { parseConditionalBlocks, type ConditionalBlock } from "./conditional.js";

/** Captures the trimmed variable name in group 1. */
const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

export interface ParsedTemplate {
  source: string;
  /** Unique placeholder names, sorted */
  variables: PromptVariable[];
  conditionals: ConditionalBlock[];
  /** For error messages */
  name?: string;
}

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: string[]
  ) {
    super(`Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`);
    this.name = "TemplateParseError";
  }
}

/**
 * Deduplicated, sorted `{{…}}` placeholder names. Conditional tags are not
 * placeholders and are not returned.
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    if (match[1] !== undefined) {
      found.add(match[1]);
    }
  }
  return [...found].sort();
}

/**
 * @throws TemplateParseError     on an unknown placeholder
 * @throws ConditionalParseError  on a bad or unbalanced conditional
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  const templateName = name ?? "(anonymous)";
  const conditionals = parseConditionalBlocks(source, templateName, isPromptVariable);

  const variables: PromptVariable[] = [];
  const invalid: string[] = [];
  for (const variable of extractVariables(source)) {
    if (isPromptVariable(variable)) {
      variables.push(variable);
    } else {
      invalid.push(variable);
    }
  }

  if (invalid.length > 0) {
    throw new TemplateParseError(templateName, invalid);
  }

  return { source, variables, conditionals, name };
}
