/**
 * Editorial contract module.
 *
 * The contract declares WHAT a finished article must satisfy; the quality
 * checker in ../quality verifies it. Contracts are plain JSON so editors
 * can tighten or relax thresholds without code changes:
 *
 * ```typescript
 * const contract = loadEditorialContractFromFile("config/editorial-contract.json");
 * const result = validateArticle(article, input, contract);
 * ```
 */

export {
  EditorialContractSchema,
  MetaLimitSchema,
  RangeSchema,
  SectionRulesSchema,
  SourceRulesSchema,
  type EditorialContract,
  type MetaLimit,
  type Range,
  type SectionRules,
  type SourceRules,
} from "./editorial-schema.js";

export {
  loadEditorialContract,
  loadEditorialContractFromFile,
  StandardsValidationError,
  DEFAULT_EDITORIAL_CONTRACT,
  type StandardsIssue,
} from "./loader.js";
