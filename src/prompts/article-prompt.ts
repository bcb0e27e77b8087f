/**
 * The article generation prompt: the article template rendered against
 * one input, followed by the constraints block.
 */

import type { ArticleInput } from "../input/index.js";
import type { EditorialContract } from "../standards/index.js";
import { DEFAULT_EDITORIAL_CONTRACT } from "../standards/index.js";
import { buildPromptContext } from "./context.js";
import { buildPromptConstraints } from "./constraints.js";
import { PromptTemplateLoader } from "./loader.js";
import { renderPrompt } from "./renderer.js";

export const ARTICLE_TEMPLATE = "article.md";

let defaultLoader: PromptTemplateLoader | null = null;

function sharedLoader(): PromptTemplateLoader {
  if (!defaultLoader) {
    defaultLoader = new PromptTemplateLoader();
  }
  return defaultLoader;
}

export function buildArticlePrompt(
  input: Readonly<ArticleInput>,
  contract: Readonly<EditorialContract> = DEFAULT_EDITORIAL_CONTRACT,
  loader: PromptTemplateLoader = sharedLoader()
): string {
  return renderPrompt(loader.load(ARTICLE_TEMPLATE), buildPromptContext(input, contract), {
    constraints: buildPromptConstraints(input, contract),
  });
}
