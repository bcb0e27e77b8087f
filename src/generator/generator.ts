/**
 * ═══════════════════════════════════════════════════════════════════════════
 * ARTICLE GENERATOR
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * One `generate()` call produces one article:
 *
 *   prompt → model → JSON payload → parsed content → validated sources
 *     → assembled draft → quality check → fixes → quality check
 *
 * The second check decides the outcome: remaining errors raise
 * QualityCheckError, warnings from both checks are logged. The HTML page
 * is rendered from the fixed article only.
 */

import type { Article, Source } from "../types/index.js";
import type { ArticleInput } from "../input/index.js";
import type { EditorialContract } from "../standards/index.js";
import { DEFAULT_EDITORIAL_CONTRACT } from "../standards/index.js";
import type { GenerationOptions, GenerationProvider, SearchProvider } from "../providers/types.js";
import type { HttpClient } from "../sources/http.js";
import { extractSources } from "../sources/extractor.js";
import {
  cleanHtmlContent,
  estimateReadTime,
  extractJsonPayload,
  formatLiterature,
  generateRandomDate,
  parseContent,
  renderArticleHtml,
  type ParsedContent,
} from "../content/index.js";
import { applyFixes, validateArticle, type QualityContext } from "../quality/index.js";
import { buildArticlePrompt, type PromptTemplateLoader } from "../prompts/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { GenerationError, QualityCheckError } from "./errors.js";

export const GENERATION_OPTIONS: GenerationOptions = Object.freeze({
  temperature: 0.3,
  maxOutputTokens: 65536,
});

/** Publication dates are drawn from this many days back */
export const DATE_WINDOW_DAYS = 90;

export interface ArticleGeneratorDeps {
  generation: GenerationProvider;
  /** Replacement search for dead sources; omit to drop them instead */
  search?: SearchProvider;
  http: HttpClient;
  logger?: Logger;
  contract?: Readonly<EditorialContract>;
  templates?: PromptTemplateLoader;
  /** Per HTTP request */
  timeoutMs?: number;
  now?: () => Date;
  random?: () => number;
}

/**
 * Assemble a draft article from parsed content and validated sources.
 * Intro and section bodies are cleaned; everything else is taken as-is.
 */
export function assembleArticle(content: ParsedContent, sources: readonly Source[], date: string): Article {
  return {
    headline: content.headline,
    subtitle: content.subtitle === "" ? undefined : content.subtitle,
    teaser: content.teaser,
    intro: cleanHtmlContent(content.intro),
    metaTitle: content.metaTitle,
    metaDescription: content.metaDescription,
    sections: content.sections.map((section) => ({
      title: section.title,
      content: cleanHtmlContent(section.content),
    })),
    keyTakeaways: content.keyTakeaways,
    faq: content.faq,
    paa: content.paa,
    sources,
    searchQueries: content.searchQueries,
    readTime: estimateReadTime(content.rawWordCount),
    date,
    literature: formatLiterature(sources),
  };
}

export class ArticleGenerator {
  private readonly logger: Logger;
  private readonly contract: Readonly<EditorialContract>;

  constructor(private readonly deps: ArticleGeneratorDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.contract = deps.contract ?? DEFAULT_EDITORIAL_CONTRACT;
  }

  /**
   * @throws GenerationError    when the model call fails
   * @throws QualityCheckError  when errors remain after the fix pass
   */
  async generate(input: Readonly<ArticleInput>): Promise<Article> {
    const { deps, logger, contract } = this;
    logger.info("Generating article", { keyword: input.primaryKeyword, language: input.language });

    const prompt = buildArticlePrompt(input, contract, deps.templates);
    let answer: string;
    try {
      answer = await deps.generation.generate(prompt, GENERATION_OPTIONS);
    } catch (err) {
      throw new GenerationError(
        `Content generation failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    const payload = extractJsonPayload(answer);
    if (Object.keys(payload).length === 0) {
      logger.warn("Model answer contained no JSON object", { chars: answer.length });
    }
    const content = parseContent(payload);

    const sources = await extractSources(
      content.sourcesText,
      {
        companyUrl: input.companyUrl,
        competitors: input.competitors,
        primaryKeyword: input.primaryKeyword,
        language: input.language,
      },
      {
        http: deps.http,
        search: deps.search,
        logger: logger.child("sources"),
        timeoutMs: deps.timeoutMs,
      }
    );

    const date = generateRandomDate(
      DATE_WINDOW_DAYS,
      deps.now ? deps.now() : new Date(),
      deps.random ?? Math.random
    );
    const draft = assembleArticle(content, sources, date);

    const qualityContext: QualityContext = {
      primaryKeyword: input.primaryKeyword,
      links: input.links,
    };
    const initial = validateArticle(draft, qualityContext, contract);
    const fixed = applyFixes(draft, initial, contract);
    const final = validateArticle(fixed, qualityContext, contract);

    for (const warning of new Set([...initial.warnings, ...final.warnings])) {
      logger.warn(`Quality warning: ${warning}`);
    }

    if (!final.isValid) {
      logger.error("Quality check failed", { errors: final.errors.length });
      throw new QualityCheckError(final.errors);
    }

    logger.info("Article generated", {
      sections: fixed.sections.length,
      sources: fixed.sources.length,
      fixedErrors: initial.errors.length,
    });

    return { ...fixed, html: renderArticleHtml(fixed, { language: input.language }) };
  }
}
