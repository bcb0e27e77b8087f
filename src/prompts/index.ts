/**
 * Prompt templates: typed context, parsing, conditionals, rendering and
 * centrally injected constraints.
 */

export {
  PROMPT_VARIABLES,
  buildPromptContext,
  describeOutputFormat,
  isPromptVariable,
  type PromptContext,
  type PromptVariable,
} from "./context.js";
export {
  ConditionalParseError,
  evaluateCondition,
  parseConditionalBlocks,
  resolveConditionals,
  type ConditionalBlock,
  type ConditionalOperator,
} from "./conditional.js";
export { TemplateParseError, extractVariables, parseTemplate, type ParsedTemplate } from "./template.js";
export { UnusedVariableError, renderPrompt, type RenderOptions } from "./renderer.js";
export {
  buildPromptConstraints,
  formatConstraints,
  type ConstraintRule,
  type PromptConstraints,
} from "./constraints.js";
export { DEFAULT_TEMPLATE_DIR, PromptTemplateLoader, TemplateLoadError } from "./loader.js";
export { ARTICLE_TEMPLATE, buildArticlePrompt } from "./article-prompt.js";
