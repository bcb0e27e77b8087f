/**
 * Content parsing, clean-up and rendering.
 */

export {
  ContentScalarsSchema,
  FAQ_SLOTS,
  PAA_SLOTS,
  SECTION_SLOTS,
  TAKEAWAY_SLOTS,
  countRawWords,
  extractJsonPayload,
  parseContent,
  parseSearchQueries,
  type ContentPayload,
  type ParsedContent,
} from "./parser.js";

export { cleanHtmlContent, formatLiterature } from "./post-processor.js";

export {
  charLength,
  countWords,
  estimateReadTime,
  formatDate,
  generateRandomDate,
  leadingChars,
  stripHtmlTags,
} from "./helpers.js";

export { escapeHtml, renderArticleHtml, type HtmlRenderOptions } from "./html.js";
