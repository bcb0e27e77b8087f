/**
 * Automatic repairs for the fixable quality issues.
 *
 * Only meta tags, intro and section bodies can change. Every other field
 * of the article is carried over as-is.
 */

import type { Article } from "../types/index.js";
import type { EditorialContract } from "../standards/index.js";
import { DEFAULT_EDITORIAL_CONTRACT } from "../standards/index.js";
import { charLength, leadingChars } from "../content/helpers.js";
import { removeCitations } from "./citations.js";
import type { ValidationResult } from "./checker.js";

/**
 * Cut to at most `limit` characters at the last word boundary and append
 * "...". Without a space in range the cut is mid-word.
 */
export function truncateAtWord(text: string, limit: number): string {
  const cut = leadingChars(text, limit);
  const space = cut.lastIndexOf(" ");
  const head = space === -1 ? cut : cut.slice(0, space);
  return `${head.trimEnd()}...`;
}

/**
 * Apply meta truncation and orphaned-citation removal.
 * Idempotent: fixing a fixed article returns an equal article.
 */
export function applyFixes(
  article: Article,
  validation: Pick<ValidationResult, "orphanedCitations">,
  contract: EditorialContract = DEFAULT_EDITORIAL_CONTRACT
): Article {
  const metaTitle =
    charLength(article.metaTitle) > contract.metaTitle.max
      ? truncateAtWord(article.metaTitle, contract.metaTitle.truncateAt)
      : article.metaTitle;

  const metaDescription =
    charLength(article.metaDescription) > contract.metaDescription.max
      ? truncateAtWord(article.metaDescription, contract.metaDescription.truncateAt)
      : article.metaDescription;

  const orphans = new Set(validation.orphanedCitations);
  if (orphans.size === 0) {
    return { ...article, metaTitle, metaDescription };
  }

  return {
    ...article,
    metaTitle,
    metaDescription,
    intro: removeCitations(article.intro, orphans),
    sections: article.sections.map((section) => ({
      ...section,
      content: removeCitations(section.content, orphans),
    })),
  };
}
