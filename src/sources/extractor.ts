/**
 * Source extraction.
 *
 * Turns the model's "Sources" block into validated Source entries:
 *
 *   [1]: https://example.org/report – Annual cold chain report
 *   [2]: https://example.org/guide - Storage guide
 *
 * Entries are validated concurrently. The first few failures get one
 * chance at a replacement found through grounded search; the replacement
 * keeps the failed entry's citation number so body markers stay correct.
 */

import pLimit from "p-limit";
import type { Source } from "../types/index.js";
import type { SearchProvider } from "../providers/types.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { HttpClient } from "./http.js";
import { buildHostRules, sourceUrlKey } from "./hosts.js";
import { UrlValidator, type ResolveOptions, type ResolvedUrl } from "./url-validator.js";

/** Entries beyond this many are ignored */
export const MAX_SOURCE_ENTRIES = 20;
export const VALIDATION_CONCURRENCY = 10;
export const REPLACEMENT_CONCURRENCY = 3;
export const MAX_REPLACEMENTS = 3;

const SOURCE_LINE = /^\[(\d+)\]:\s*(https?:\/\/\S+)\s*[-–—]\s*(.+)$/;

export interface ParsedSourceLine {
  index: number;
  url: string;
  description: string;
}

export interface SourceContext {
  companyUrl: string;
  competitors: readonly string[];
  primaryKeyword: string;
  language: string;
}

/**
 * Anything that can resolve a URL the way UrlValidator does.
 */
export interface SourceResolver {
  resolve(url: string, options?: ResolveOptions): Promise<ResolvedUrl>;
}

export interface SourceExtractorDeps {
  http: HttpClient;
  /** Replacement search; without it failed entries are simply dropped */
  search?: SearchProvider;
  logger?: Logger;
  timeoutMs?: number;
}

/**
 * Parse "[n]: url – description" lines. Lines that don't match are skipped.
 */
export function parseSourceLines(text: string, limit = MAX_SOURCE_ENTRIES): ParsedSourceLine[] {
  const entries: ParsedSourceLine[] = [];
  for (const rawLine of text.split("\n")) {
    const match = SOURCE_LINE.exec(rawLine.trim());
    if (!match) {
      continue;
    }
    const [, index = "", url = "", description = ""] = match;
    entries.push({ index: Number(index), url, description: description.trim() });
    if (entries.length >= limit) {
      break;
    }
  }
  return entries;
}

interface ValidationOutcome {
  entry: ParsedSourceLine;
  source: Source | null;
}

async function validateEntry(
  resolver: SourceResolver,
  entry: ParsedSourceLine,
  language: string,
  logger: Logger
): Promise<ValidationOutcome> {
  try {
    const resolved = await resolver.resolve(entry.url, {
      fallbackTitle: entry.description,
      language,
    });
    if (!resolved.valid) {
      return { entry, source: null };
    }
    return { entry, source: { url: resolved.finalUrl, title: resolved.title, index: entry.index } };
  } catch (err) {
    logger.debug("Source validation task failed", {
      index: entry.index,
      error: err instanceof Error ? err.message : String(err),
    });
    return { entry, source: null };
  }
}

async function findReplacement(
  resolver: SourceResolver,
  search: SearchProvider,
  entry: ParsedSourceLine,
  context: SourceContext,
  taken: Set<string>,
  logger: Logger
): Promise<Source | null> {
  const query = `${context.primaryKeyword} ${entry.description}`;
  try {
    const results = await search.search(query);
    for (const result of results) {
      const resolved = await resolver.resolve(result.uri, {
        fallbackTitle: result.title,
        language: context.language,
        unwrapRedirects: true,
      });
      if (!resolved.valid) {
        continue;
      }
      const key = sourceUrlKey(resolved.finalUrl);
      if (taken.has(key)) {
        logger.debug("Replacement already cited", { index: entry.index, url: resolved.finalUrl });
        continue;
      }
      taken.add(key);
      logger.debug("Replaced source", { index: entry.index, url: resolved.finalUrl });
      return { url: resolved.finalUrl, title: resolved.title, index: entry.index };
    }
  } catch (err) {
    logger.debug("Replacement search failed", {
      index: entry.index,
      query,
      error: err instanceof Error ? err.message : String(err),
    });
  }
  return null;
}

/**
 * Validate parsed entries and replace failures, using an explicit resolver.
 * Results are sorted by citation index; indices are never renumbered.
 */
export async function resolveSources(
  entries: readonly ParsedSourceLine[],
  context: SourceContext,
  resolver: SourceResolver,
  options: { search?: SearchProvider; logger?: Logger } = {}
): Promise<Source[]> {
  const logger = options.logger ?? silentLogger;

  const validationLimit = pLimit(VALIDATION_CONCURRENCY);
  const outcomes = await Promise.all(
    entries.map((entry) =>
      validationLimit(() => validateEntry(resolver, entry, context.language, logger))
    )
  );

  const sources: Source[] = [];
  const failures: ParsedSourceLine[] = [];
  for (const outcome of outcomes) {
    if (outcome.source) {
      sources.push(outcome.source);
    } else {
      failures.push(outcome.entry);
    }
  }

  const { search } = options;
  if (search && failures.length > 0) {
    const replacementLimit = pLimit(REPLACEMENT_CONCURRENCY);
    // Kept sources and earlier replacements; a repeat URL would fail the duplicate check
    const taken = new Set(sources.map((s) => sourceUrlKey(s.url)));
    const replacements = await Promise.all(
      failures
        .slice(0, MAX_REPLACEMENTS)
        .map((entry) =>
          replacementLimit(() => findReplacement(resolver, search, entry, context, taken, logger))
        )
    );
    for (const replacement of replacements) {
      if (replacement) {
        sources.push(replacement);
      }
    }
  }

  logger.info("Sources validated", {
    parsed: entries.length,
    valid: outcomes.length - failures.length,
    final: sources.length,
  });

  return sources.sort((a, b) => a.index - b.index);
}

/**
 * Parse, validate and repair the model's Sources block.
 */
export async function extractSources(
  rawSourcesText: string,
  context: SourceContext,
  deps: SourceExtractorDeps
): Promise<Source[]> {
  const entries = parseSourceLines(rawSourcesText);
  if (entries.length === 0) {
    return [];
  }

  const resolver = new UrlValidator(deps.http, buildHostRules(context.companyUrl, context.competitors), {
    timeoutMs: deps.timeoutMs,
    logger: deps.logger,
  });

  return resolveSources(entries, context, resolver, { search: deps.search, logger: deps.logger });
}
