/**
 * Source URL validation.
 *
 * `resolve()` answers one question for a candidate citation URL: can a
 * reader follow it to a live, external, non-competitor page? When the
 * answer is yes it also returns the post-redirect URL (tracking parameters
 * removed) and a display title.
 *
 * Order of work:
 *   1. Host exclusion on the given URL (no network I/O when excluded);
 *      grounding redirect URLs may be let through to be unwrapped
 *   2. HEAD following redirects, GET as fallback
 *   3. Disguised error page detection on the page that answered 200
 *   4. Host exclusion again on the final URL (redirects can land anywhere)
 *   5. Title extraction, falling back to the caller's title, then to a
 *      localized "Source: host" label
 *
 * Every failure, including timeouts and unexpected exceptions, yields
 * `valid: false`. resolve() never rejects.
 */

import * as cheerio from "cheerio";
import type { HttpClient, HttpMethod, HttpResponse } from "./http.js";
import {
  classifyHost,
  normalizeHostname,
  stripTrackingParams,
  type HostRules,
} from "./hosts.js";
import { silentLogger, type Logger } from "../logging/index.js";

export interface ResolveOptions {
  /** Title to use when the page has none (e.g. the model's description) */
  fallbackTitle?: string;
  /** Two-letter language code for the generated "Source: host" label */
  language?: string;
  /**
   * Follow URLs on forbidden redirect hosts instead of rejecting them up
   * front. The final URL is still subject to every host rule.
   */
  unwrapRedirects?: boolean;
}

export interface ResolvedUrl {
  readonly valid: boolean;
  /** Final URL when valid, the input URL otherwise */
  readonly finalUrl: string;
  readonly title: string;
  /** Why the URL was rejected */
  readonly reason?: string;
}

export interface UrlValidatorOptions {
  /** Per request; defaults to 8 seconds */
  timeoutMs?: number;
  logger?: Logger;
}

const ERROR_PATH_PATTERNS = [
  "/notfound",
  "/not-found",
  "/404",
  "/error",
  "/page-not-found",
  "notfound.aspx",
  "404.aspx",
  "error.aspx",
  "page-not-found.aspx",
];

const NOT_FOUND_BODY_PHRASES = [
  "page not found",
  "404",
  "not found",
  "error 404",
  "die seite wurde nicht gefunden",
  "seite nicht gefunden",
  "nicht gefunden",
  "page introuvable",
  "página no encontrada",
];

const NOT_FOUND_TITLE_PHRASES = [
  "not found",
  "404",
  "nicht gefunden",
  "introuvable",
  "no encontrada",
];

const ERROR_STATUSES: ReadonlySet<number> = new Set([404, 410, 500, 503]);

const SOURCE_LABELS: Record<string, string> = {
  en: "Source: {host}",
  de: "Quelle: {host}",
  fr: "Source : {host}",
  es: "Fuente: {host}",
  pt: "Fonte: {host}",
};

const TITLE_SEPARATORS = /[-|•·:—]/;
const LONG_TITLE = 120;
const MAX_TITLE = 140;

type LivenessOutcome = { ok: true; page: HttpResponse } | { ok: false; reason: string };

/** Longest first, so a phrase inside a longer one is not counted again */
const BODY_PHRASES_LONGEST_FIRST = [...NOT_FOUND_BODY_PHRASES].sort((a, b) => b.length - a.length);

/**
 * Error-page patterns are matched against the URL path only; host and
 * query string are ignored.
 */
export function hasErrorPath(url: string): boolean {
  let path: string;
  try {
    path = new URL(url).pathname.toLowerCase();
  } catch {
    return false;
  }
  return ERROR_PATH_PATTERNS.some((pattern) => path.includes(pattern));
}

/**
 * Number of distinct not-found phrases in a lower-cased body. Each match
 * is blanked out before shorter phrases are tried.
 */
export function countNotFoundPhrases(body: string): number {
  let rest = body;
  let hits = 0;
  for (const phrase of BODY_PHRASES_LONGEST_FIRST) {
    if (rest.includes(phrase)) {
      hits++;
      rest = rest.split(phrase).join(" ");
    }
  }
  return hits;
}

/**
 * Detect "soft 404" pages that answer 200 but say the page doesn't exist.
 */
export function isErrorPage(page: HttpResponse): boolean {
  if (hasErrorPath(page.url)) {
    return true;
  }
  if (ERROR_STATUSES.has(page.status)) {
    return true;
  }

  const body = page.body.toLowerCase();
  if (body === "") {
    return false;
  }

  if (countNotFoundPhrases(body) >= 2) {
    return true;
  }

  const title = rawTitle(page.body)?.toLowerCase();
  return title !== undefined && NOT_FOUND_TITLE_PHRASES.some((p) => title.includes(p));
}

function rawTitle(html: string): string | undefined {
  const $ = cheerio.load(html);
  const title = $("title").first();
  return title.length > 0 ? title.text() : undefined;
}

/**
 * Shorten a display title: long titles are cut at the first separator,
 * anything still too long is truncated with "...".
 */
export function tidyTitle(raw: string): string {
  let title = raw.replace(/\s+/g, " ").trim();
  if (title.length > LONG_TITLE) {
    const head = title.split(TITLE_SEPARATORS)[0]?.trim() ?? "";
    if (head !== "") {
      title = head;
    }
  }
  if (title.length > MAX_TITLE) {
    title = `${title.slice(0, MAX_TITLE - 3)}...`;
  }
  return title;
}

/**
 * Title of an HTML page, entity-decoded and tidied; null when the
 * response isn't HTML or has no usable <title>.
 */
export function extractPageTitle(page: HttpResponse): string | null {
  const contentType = page.headers["content-type"] ?? "";
  if (page.status !== 200 || !contentType.toLowerCase().includes("text/html")) {
    return null;
  }
  const title = rawTitle(page.body);
  if (title === undefined) {
    return null;
  }
  const tidy = tidyTitle(title);
  return tidy === "" ? null : tidy;
}

export function localizedSourceLabel(host: string, language = "en"): string {
  const template = SOURCE_LABELS[language.toLowerCase().slice(0, 2)] ?? SOURCE_LABELS["en"] ?? "Source: {host}";
  return template.replace("{host}", host);
}

export class UrlValidator {
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly http: HttpClient,
    private readonly rules: HostRules,
    options: UrlValidatorOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.logger = options.logger ?? silentLogger;
  }

  async resolve(url: string, options: ResolveOptions = {}): Promise<ResolvedUrl> {
    const rejected = (reason: string): ResolvedUrl => {
      this.logger.debug("Source URL rejected", { url, reason });
      return { valid: false, finalUrl: url, title: options.fallbackTitle ?? "", reason };
    };

    try {
      const exclusion = classifyHost(url, this.rules);
      if (exclusion !== null && !(exclusion === "forbidden" && options.unwrapRedirects)) {
        return rejected(`excluded host (${exclusion})`);
      }

      const outcome = await this.fetchLivePage(url);
      if (!outcome.ok) {
        return rejected(outcome.reason);
      }
      if (isErrorPage(outcome.page)) {
        return rejected("error page");
      }

      const finalUrl = stripTrackingParams(outcome.page.url);
      const finalExclusion = classifyHost(finalUrl, this.rules);
      if (finalExclusion !== null) {
        return rejected(`redirected to excluded host (${finalExclusion})`);
      }

      const fallback = options.fallbackTitle?.trim();
      const title =
        extractPageTitle(outcome.page) ??
        (fallback ? fallback : localizedSourceLabel(normalizeHostname(finalUrl), options.language));

      return { valid: true, finalUrl, title };
    } catch (err) {
      return rejected(`unexpected failure: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  /**
   * HEAD first; a 200 is confirmed with a GET on the final URL so the body
   * can be inspected. Anything else falls back to a plain GET.
   */
  private async fetchLivePage(url: string): Promise<LivenessOutcome> {
    const head = await this.tryRequest("HEAD", url);

    if (head?.status === 404) {
      return { ok: false, reason: "HTTP 404" };
    }

    if (head?.status === 200) {
      if (hasErrorPath(head.url)) {
        return { ok: false, reason: "error page path" };
      }
      const page = await this.tryRequest("GET", head.url);
      if (page?.status === 200) {
        return { ok: true, page };
      }
    }

    const page = await this.tryRequest("GET", url);
    if (page?.status === 200) {
      return { ok: true, page };
    }
    return { ok: false, reason: page ? `HTTP ${page.status}` : "unreachable" };
  }

  private async tryRequest(method: HttpMethod, url: string): Promise<HttpResponse | null> {
    try {
      return await this.http.request(method, url, { timeoutMs: this.timeoutMs });
    } catch (err) {
      this.logger.debug(`${method} failed`, {
        url,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
}
