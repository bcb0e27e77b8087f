/**
 * Prompt constraints.
 *
 * Guardrails derived in code from the editorial contract and the article
 * input, appended to every rendered prompt after template processing.
 * Template text can be edited freely; these rules can only change with
 * a code change and its tests.
 *
 * Sources:
 *   EditorialContract  → citation, source and meta length rules
 *   ArticleInput       → competitor exclusion, own-site exclusion,
 *                        output language, instruction precedence
 */

import type { ArticleInput } from "../input/index.js";
import type { EditorialContract } from "../standards/index.js";
import { normalizeHostname } from "../sources/hosts.js";

export interface ConstraintRule {
  category: "evidence" | "source_policy" | "exclusion" | "format" | "language";
  /** Written as a directive */
  text: string;
}

export interface PromptConstraints {
  /** Same for every article under one contract */
  editorial: readonly ConstraintRule[];
  /** Derived from the company in the article input */
  company: readonly ConstraintRule[];
}

/**
 * Pure and deterministic: same input and contract, same rules in the same
 * order.
 */
export function buildPromptConstraints(
  input: Readonly<ArticleInput>,
  contract: Readonly<EditorialContract>
): PromptConstraints {
  const editorial: ConstraintRule[] = [
    {
      category: "evidence",
      text: "Every [n] marker in the text MUST have a matching line in Sources, and every source MUST be cited at least once.",
    },
    {
      category: "source_policy",
      text: `List at most ${contract.sources.max} sources, no more than ${contract.sources.maxPerDomain} from the same domain, each URL only once.`,
    },
    {
      category: "format",
      text: "Use HTML tags for emphasis (<strong>, <em>). Markdown such as **bold** MUST NOT appear.",
    },
    {
      category: "format",
      text: `Meta Title MUST NOT exceed ${contract.metaTitle.max} characters; Meta Description MUST NOT exceed ${contract.metaDescription.max} characters.`,
    },
  ];

  const company: ConstraintRule[] = [];

  if (input.competitors.length > 0) {
    company.push({
      category: "exclusion",
      text: `Do NOT mention, cite or link to these competitors: ${input.competitors.join(", ")}.`,
    });
  }

  const ownHost = normalizeHostname(input.companyUrl);
  if (ownHost) {
    company.push({
      category: "source_policy",
      text: `Do NOT cite pages on ${ownHost} as sources; link to them only through internal links.`,
    });
  }

  if (input.instruction.trim() !== "") {
    company.push({
      category: "exclusion",
      text: "Follow the Content Generation Instructions even where other guidance differs.",
    });
  }

  company.push({
    category: "language",
    text: `All output text MUST be written in language "${input.language}".`,
  });

  return Object.freeze({
    editorial: Object.freeze(editorial),
    company: Object.freeze(company),
  });
}

const CONSTRAINTS_HEADING = "## Constraints & Exclusions";
const EDITORIAL_SUBHEADING = "### Editorial Constraints";
const COMPANY_SUBHEADING = "### Company Constraints";

/**
 * The only serializer of constraint text, so every prompt formats them
 * the same way.
 */
export function formatConstraints(constraints: PromptConstraints): string {
  const lines: string[] = [CONSTRAINTS_HEADING, ""];

  if (constraints.editorial.length > 0) {
    lines.push(EDITORIAL_SUBHEADING, "");
    for (const rule of constraints.editorial) {
      lines.push(`- [${rule.category}] ${rule.text}`);
    }
    lines.push("");
  }

  if (constraints.company.length > 0) {
    lines.push(COMPANY_SUBHEADING, "");
    for (const rule of constraints.company) {
      lines.push(`- [${rule.category}] ${rule.text}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}
