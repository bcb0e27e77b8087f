/**
 * Post-generation quality gate: checks, fixes and the citation toolkit.
 */

export {
  validateArticle,
  type QualityContext,
  type QualityIssue,
  type QualityRule,
  type QualitySeverity,
  type ValidationResult,
} from "./checker.js";

export { applyFixes, truncateAtWord } from "./fixes.js";

export { extractCitations, removeCitations } from "./citations.js";
