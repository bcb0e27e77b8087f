/**
 * Conditional blocks in prompt templates.
 *
 *   {{#if input.links}}                    included when the value is non-empty
 *   Internal Links: {{input.links}}
 *   {{/if}}
 *
 *   {{#if input.language == "de"}}         included on an exact match
 *   {{#if input.language != "en"}}         included on a mismatch
 *
 * Blocks cannot nest and there is no `{{#else}}`; use a second block with
 * the opposite operator instead.
 */

import { isPromptVariable, type PromptContext, type PromptVariable } from "./context.js";

export type ConditionalOperator = "==" | "!=" | "truthy";

export interface ConditionalBlock {
  variable: PromptVariable;
  operator: ConditionalOperator;
  /** Literal for == and != */
  value?: string;
  body: string;
  raw: string;
}

export class ConditionalParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly issues: string[]
  ) {
    super(`Template "${templateName}" has invalid conditional(s):\n  - ${issues.join("\n  - ")}`);
    this.name = "ConditionalParseError";
  }
}

/**
 * Groups: 1 variable, 2 operator (optional), 3 literal (optional), 4 body
 */
const CONDITIONAL_RE =
  /\{\{#if\s+([a-zA-Z][a-zA-Z0-9_.]*)\s*(?:(==|!=)\s*"([^"]*)")?\s*\}\}([\s\S]*?)\{\{\/if\}\}/g;

const NESTED_IF_RE = /\{\{#if\s/;

function toOperator(op: string | undefined): ConditionalOperator {
  if (op === "==" || op === "!=") {
    return op;
  }
  return "truthy";
}

/**
 * Extract every conditional block, validating variable names and nesting.
 */
export function parseConditionalBlocks(
  source: string,
  templateName: string,
  isValidVar: (name: string) => name is PromptVariable
): ConditionalBlock[] {
  const blocks: ConditionalBlock[] = [];
  const issues: string[] = [];

  for (const match of source.matchAll(CONDITIONAL_RE)) {
    const [raw, variable = "", operator, value, body = ""] = match;

    if (!isValidVar(variable)) {
      issues.push(`Unknown variable "${variable}" in conditional`);
      continue;
    }
    if (NESTED_IF_RE.test(body)) {
      issues.push(`Nested conditionals are not supported (found {{#if inside {{#if ${variable}}})`);
      continue;
    }

    const op = toOperator(operator);
    blocks.push({ variable, operator: op, value: op === "truthy" ? undefined : value, body, raw });
  }

  const openTags = source.match(/\{\{#if\s/g) ?? [];
  const closeTags = source.match(/\{\{\/if\}\}/g) ?? [];
  if (openTags.length !== closeTags.length) {
    issues.push(
      `Mismatched conditional tags: ${openTags.length} opening {{#if}}, ${closeTags.length} closing {{/if}}`
    );
  }

  if (issues.length > 0) {
    throw new ConditionalParseError(templateName, issues);
  }
  return blocks;
}

export function evaluateCondition(
  block: Pick<ConditionalBlock, "operator" | "value">,
  contextValue: string
): boolean {
  switch (block.operator) {
    case "truthy":
      return contextValue !== "";
    case "==":
      return contextValue === block.value;
    case "!=":
      return contextValue !== block.value;
  }
}

/**
 * Replace each block with its body when the condition holds, or with
 * nothing. The newline after `{{/if}}` goes with the block.
 */
export function resolveConditionals(source: string, context: PromptContext): string {
  return source.replace(
    /\{\{#if\s+([a-zA-Z][a-zA-Z0-9_.]*)\s*(?:(==|!=)\s*"([^"]*)")?\s*\}\}\n?([\s\S]*?)\{\{\/if\}\}\n?/g,
    (_match, variable: string, op: string | undefined, value: string | undefined, body: string) => {
      const contextValue = isPromptVariable(variable) ? context[variable] : "";
      return evaluateCondition({ operator: toOperator(op), value }, contextValue) ? body : "";
    }
  );
}
