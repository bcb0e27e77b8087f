/**
 * ═══════════════════════════════════════════════════════════════════════════
 * ARTICLE QUALITY GATE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Checks a generated article against the editorial contract. Every check
 * runs on every call and reports into exactly one of two lists:
 *
 *   errors    block delivery unless the fix pass removes them
 *   warnings  are advisory and only logged
 *
 * The checker keeps no state between calls. Orphaned citation numbers are
 * returned in the ValidationResult for `applyFixes` to remove.
 */

import type { Article, Source } from "../types/index.js";
import type { EditorialContract } from "../standards/index.js";
import { DEFAULT_EDITORIAL_CONTRACT } from "../standards/index.js";
import { charLength, countWords, leadingChars, stripHtmlTags } from "../content/helpers.js";
import { normalizeHostname, sourceUrlKey } from "../sources/hosts.js";
import { extractCitations } from "./citations.js";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type QualitySeverity = "error" | "warning";

export type QualityRule =
  | "meta_title_length"
  | "meta_description_length"
  | "orphaned_citations"
  | "uncited_sources"
  | "markdown_bold"
  | "broken_href"
  | "tag_balance"
  | "internal_link_coverage"
  | "internal_link_unknown"
  | "word_count"
  | "intro_word_count"
  | "duplicate_source"
  | "domain_concentration"
  | "section_count"
  | "section_title"
  | "section_content"
  | "list_usage"
  | "source_count"
  | "source_title"
  | "key_takeaways"
  | "faq_count"
  | "paa_count"
  | "primary_keyword";

export interface QualityIssue {
  readonly rule: QualityRule;
  readonly severity: QualitySeverity;
  readonly message: string;
  /** The fix pass resolves this issue */
  readonly fixable: boolean;
}

export interface ValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly issues: readonly QualityIssue[];
  /** Citation numbers with no matching source, ascending */
  readonly orphanedCitations: readonly number[];
}

/**
 * The parts of the article input the checks need.
 */
export interface QualityContext {
  readonly primaryKeyword: string;
  /** Allowed internal link paths; empty disables the validity check */
  readonly links: readonly string[];
}

type Report = (rule: QualityRule, severity: QualitySeverity, message: string, fixable?: boolean) => void;

const LINK_HREF = /<a\s+href="([^"]+)"[^>]*>/g;

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function bodyHtml(article: Article): string {
  return [article.intro, ...article.sections.map((s) => s.content)].join(" ");
}

function visibleWords(html: string): number {
  return countWords(stripHtmlTags(html));
}

function occurrences(haystack: string, needle: string): number {
  if (needle === "") {
    return 0;
  }
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

function hrefs(html: string): string[] {
  return [...html.matchAll(LINK_HREF)].map((m) => m[1] ?? "");
}

function formatList(numbers: readonly number[]): string {
  return `[${numbers.join(", ")}]`;
}

function trimTrailingSlashes(path: string): string {
  return path.replace(/\/+$/, "");
}

// ═══════════════════════════════════════════════════════════════════════════
// CHECKS
// ═══════════════════════════════════════════════════════════════════════════

function checkMetaTags(article: Article, contract: EditorialContract, report: Report): void {
  const { metaTitle, metaDescription } = article;
  const titleLength = charLength(metaTitle);
  const descriptionLength = charLength(metaDescription);

  if (titleLength > contract.metaTitle.max) {
    report(
      "meta_title_length",
      "error",
      `Meta title too long (${titleLength} chars, max ${contract.metaTitle.max}): '${leadingChars(metaTitle, 60)}...'`,
      true
    );
  } else if (titleLength < contract.metaTitle.min) {
    report("meta_title_length", "warning", `Meta title might be too short (${titleLength} chars)`);
  }

  if (descriptionLength > contract.metaDescription.max) {
    report(
      "meta_description_length",
      "error",
      `Meta description too long (${descriptionLength} chars, max ${contract.metaDescription.max}): '${leadingChars(metaDescription, 135)}...'`,
      true
    );
  } else if (descriptionLength < contract.metaDescription.min) {
    report(
      "meta_description_length",
      "warning",
      `Meta description might be too short (${descriptionLength} chars)`
    );
  }
}

/**
 * @returns orphaned citation numbers, ascending
 */
function checkCitations(article: Article, report: Report): number[] {
  const cited = extractCitations(article.intro);
  for (const section of article.sections) {
    for (const n of extractCitations(section.content)) {
      cited.add(n);
    }
  }
  const indices = new Set(article.sources.map((s) => s.index));

  const uncited = [...indices].filter((n) => !cited.has(n)).sort((a, b) => a - b);
  if (uncited.length > 0) {
    report("uncited_sources", "warning", `Sources ${formatList(uncited)} are not cited in the content`);
  }

  const orphaned = [...cited].filter((n) => !indices.has(n)).sort((a, b) => a - b);
  if (orphaned.length > 0) {
    report(
      "orphaned_citations",
      "warning",
      `Citations ${formatList(orphaned)} reference non-existent sources - will be removed`,
      true
    );
  }
  return orphaned;
}

function checkHtmlStructure(article: Article, contract: EditorialContract, report: Report): void {
  const html = bodyHtml(article);

  const bold = html.match(/\*\*[^*]+\*\*/g) ?? [];
  if (bold.length > 0) {
    report(
      "markdown_bold",
      "error",
      `Markdown-style bold found (should use <strong>): ${bold.slice(0, 3).join(", ")}`
    );
  }

  const broken = html.match(/href="[^"]*?\s+[^"]*"/g) ?? [];
  if (broken.length > 0) {
    report("broken_href", "error", `Broken href attributes found: ${broken.length} instances`);
  }

  for (const tag of contract.balancedTags) {
    const open = occurrences(html, `<${tag}>`);
    const close = occurrences(html, `</${tag}>`);
    if (open !== close) {
      report("tag_balance", "error", `Unmatched HTML tags: <${tag}> (${open}) vs </${tag}> (${close})`);
    }
  }
}

function checkInternalLinks(
  article: Article,
  context: QualityContext,
  contract: EditorialContract,
  report: Report
): void {
  const allowed = context.links.map(trimTrailingSlashes);

  if (allowed.length > 0) {
    for (const link of hrefs(bodyHtml(article))) {
      if (!link.startsWith("/")) {
        continue;
      }
      const normalized = trimTrailingSlashes(link);
      const known = allowed.some(
        (a) => a === normalized || a.includes(normalized) || normalized.includes(a)
      );
      if (!known) {
        report("internal_link_unknown", "warning", `Internal link '${link}' not in provided links list`);
      }
    }
  }

  article.sections.forEach((section, i) => {
    const internal = hrefs(section.content).filter((href) => href.startsWith("/"));
    if (internal.length === 0 && section.content.length > contract.internalLinkMinSectionLength) {
      report(
        "internal_link_coverage",
        "warning",
        `Section ${i + 1} ('${section.title.slice(0, 50)}...') has no internal links`
      );
    }
  });
}

function checkWordCount(article: Article, contract: EditorialContract, report: Report): void {
  const introWords = visibleWords(article.intro);
  const total = introWords + article.sections.reduce((sum, s) => sum + visibleWords(s.content), 0);

  if (total < contract.wordCount.min) {
    report("word_count", "warning", `Total word count (${total}) is below recommended minimum (${contract.wordCount.min})`);
  } else if (total > contract.wordCount.max) {
    report("word_count", "warning", `Total word count (${total}) exceeds recommended maximum (${contract.wordCount.max})`);
  }

  const range = `${contract.introWords.min}-${contract.introWords.max}`;
  if (introWords < contract.introWords.min) {
    report("intro_word_count", "warning", `Intro too short (${introWords} words, recommended ${range})`);
  } else if (introWords > contract.introWords.max) {
    report("intro_word_count", "warning", `Intro too long (${introWords} words, recommended ${range})`);
  }
}

function checkDuplicateSources(sources: readonly Source[], contract: EditorialContract, report: Report): void {
  const seen = new Set<string>();
  const perHost = new Map<string, number>();

  for (const source of sources) {
    const key = sourceUrlKey(source.url);
    if (seen.has(key)) {
      report("duplicate_source", "error", `Duplicate source URL: ${source.url}`);
    }
    seen.add(key);

    const host = normalizeHostname(source.url);
    if (host) {
      perHost.set(host, (perHost.get(host) ?? 0) + 1);
    }
  }

  for (const [host, count] of perHost) {
    if (count > contract.sources.maxPerDomain) {
      report("domain_concentration", "warning", `Too many sources (${count}) from same domain: ${host}`);
    }
  }
}

function checkSectionStructure(article: Article, contract: EditorialContract, report: Report): void {
  const { sections } = article;
  const rules = contract.sections;

  if (sections.length < rules.min) {
    report("section_count", "error", `Too few sections (${sections.length}, minimum ${rules.min})`);
  } else if (sections.length > rules.max) {
    report("section_count", "warning", `Too many sections (${sections.length}, maximum ${rules.max})`);
  }

  sections.forEach((section, i) => {
    const n = i + 1;
    if (!section.title) {
      report("section_title", "error", `Section ${n} has no title`);
    } else if (section.title.length > rules.maxTitleLength) {
      report("section_title", "warning", `Section ${n} title too long (${section.title.length} chars)`);
    }
    if (!section.content) {
      report("section_content", "error", `Section ${n} ('${section.title}') has no content`);
    }
  });

  const withLists = sections.filter((s) => s.content.includes("<ul>") || s.content.includes("<ol>")).length;
  const range = `${contract.listSections.min}-${contract.listSections.max}`;
  if (withLists < contract.listSections.min) {
    report("list_usage", "warning", `Too few sections with lists (${withLists}, recommended ${range})`);
  } else if (withLists > contract.listSections.max) {
    report("list_usage", "warning", `Too many sections with lists (${withLists}, recommended ${range})`);
  }
}

function checkSourceQuality(sources: readonly Source[], contract: EditorialContract, report: Report): void {
  const rules = contract.sources;

  if (sources.length < rules.min) {
    report("source_count", "warning", `Too few sources (${sources.length}, recommended minimum ${rules.min})`);
  } else if (sources.length > rules.max) {
    report("source_count", "warning", `Too many sources (${sources.length}, maximum ${rules.max})`);
  }

  for (const source of sources) {
    if (source.title.length < rules.minTitleLength) {
      report("source_title", "warning", `Source ${source.index} has invalid title: '${source.title}'`);
    } else if (source.title.length > rules.maxTitleLength) {
      report("source_title", "warning", `Source ${source.index} title too long (${source.title.length} chars)`);
    }
  }
}

function checkContentQuality(
  article: Article,
  context: QualityContext,
  contract: EditorialContract,
  report: Report
): void {
  if (article.keyTakeaways.length < contract.minKeyTakeaways) {
    report(
      "key_takeaways",
      "warning",
      `Too few key takeaways (${article.keyTakeaways.length}, recommended at least ${contract.minKeyTakeaways})`
    );
  }
  if (article.faq.length < contract.minFaq) {
    report("faq_count", "warning", `Too few FAQs (${article.faq.length}, recommended at least ${contract.minFaq})`);
  }
  if (article.paa.length < contract.minPaa) {
    report("paa_count", "warning", `Too few PAA items (${article.paa.length}, recommended at least ${contract.minPaa})`);
  }

  const keyword = context.primaryKeyword.trim();
  if (!keyword) {
    return;
  }
  const text = stripHtmlTags(`${article.headline} ${bodyHtml(article)}`.toLowerCase());
  const count = occurrences(text, keyword.toLowerCase());
  if (count === 0) {
    report("primary_keyword", "error", `Primary keyword '${keyword}' not found in content`);
  } else if (count < contract.minKeywordOccurrences) {
    report("primary_keyword", "warning", `Primary keyword '${keyword}' appears only ${count} times`);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Run every check against an article.
 */
export function validateArticle(
  article: Article,
  context: QualityContext,
  contract: EditorialContract = DEFAULT_EDITORIAL_CONTRACT
): ValidationResult {
  const issues: QualityIssue[] = [];
  const report: Report = (rule, severity, message, fixable = false) => {
    issues.push({ rule, severity, message, fixable });
  };

  checkMetaTags(article, contract, report);
  const orphanedCitations = checkCitations(article, report);
  checkHtmlStructure(article, contract, report);
  checkInternalLinks(article, context, contract, report);
  checkWordCount(article, contract, report);
  checkDuplicateSources(article.sources, contract, report);
  checkSectionStructure(article, contract, report);
  checkSourceQuality(article.sources, contract, report);
  checkContentQuality(article, context, contract, report);

  const errors = issues.filter((i) => i.severity === "error").map((i) => i.message);
  const warnings = issues.filter((i) => i.severity === "warning").map((i) => i.message);

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
    issues,
    orphanedCitations,
  };
}
