/**
 * Article input: schema and loading.
 */

export {
  ArticleInputSchema,
  ArticleInputWireSchema,
  type ArticleInput,
  type ArticleInputWire,
} from "./schema.js";

export {
  readInputSource,
  loadArticleInput,
  loadArticleInputFrom,
  InputLoadError,
  InputValidationError,
  type InputIssue,
} from "./loader.js";
