/**
 * Article generation: orchestration, errors and JSON output.
 */

export {
  ArticleGenerator,
  DATE_WINDOW_DAYS,
  GENERATION_OPTIONS,
  assembleArticle,
  type ArticleGeneratorDeps,
} from "./generator.js";
export { GenerationError, QualityCheckError } from "./errors.js";
export { serializeArticle, toArticleJson, type ArticleJson } from "./serialize.js";
