/**
 * Prompt renderer.
 *
 * Processing order:
 *   1. Resolve `{{#if …}}…{{/if}}` blocks against the context
 *   2. In strict mode, fail if a context variable is used nowhere
 *      (neither as a placeholder nor as a conditional test)
 *   3. Substitute `{{variable}}` placeholders
 *   4. Append the constraints block, if any
 *
 * Substituted values are never re-scanned, so a value containing braces
 * is inserted literally.
 */

import { isPromptVariable, PROMPT_VARIABLES, type PromptContext } from "./context.js";
import { resolveConditionals } from "./conditional.js";
import type { ParsedTemplate } from "./template.js";
import { formatConstraints, type PromptConstraints } from "./constraints.js";

export class UnusedVariableError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly unusedVariables: string[]
  ) {
    super(
      `Template "${templateName}" does not use context variable(s): ${unusedVariables.join(", ")}. ` +
        `Pass { strict: false } to allow unused variables.`
    );
    this.name = "UnusedVariableError";
  }
}

export interface RenderOptions {
  /**
   * Fail when the template ignores part of the context (default true).
   * Turn off for partial templates.
   */
  strict?: boolean;
  /** Appended after all template processing; templates cannot suppress it */
  constraints?: PromptConstraints;
}

const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

export function renderPrompt(
  template: ParsedTemplate,
  context: PromptContext,
  options: RenderOptions = {}
): string {
  const { strict = true, constraints } = options;
  const templateName = template.name ?? "(anonymous)";

  const resolved =
    template.conditionals.length > 0 ? resolveConditionals(template.source, context) : template.source;

  if (strict) {
    const used = new Set<string>(template.variables);
    for (const block of template.conditionals) {
      used.add(block.variable);
    }
    const unused = PROMPT_VARIABLES.filter((name) => !used.has(name));
    if (unused.length > 0) {
      throw new UnusedVariableError(templateName, unused);
    }
  }

  const rendered = resolved.replace(PLACEHOLDER_RE, (match, name: string) =>
    isPromptVariable(name) ? context[name] : match
  );

  if (constraints) {
    return `${rendered.trimEnd()}\n\n${formatConstraints(constraints)}`;
  }
  return rendered;
}
