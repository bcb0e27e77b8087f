/**
 * Source handling: host rules, HTTP probing, URL validation and extraction.
 */

export {
  FORBIDDEN_HOSTS,
  buildHostRules,
  classifyHost,
  isSameOrSubdomain,
  isTrackingParam,
  normalizeDomainEntry,
  normalizeHostname,
  sourceUrlKey,
  stripTrackingParams,
  type HostExclusionReason,
  type HostRules,
} from "./hosts.js";

export {
  DEFAULT_USER_AGENT,
  HttpRequestError,
  createAxiosHttpClient,
  type AxiosHttpClientOptions,
  type HttpClient,
  type HttpMethod,
  type HttpRequestOptions,
  type HttpResponse,
} from "./http.js";

export {
  UrlValidator,
  extractPageTitle,
  countNotFoundPhrases,
  hasErrorPath,
  isErrorPage,
  localizedSourceLabel,
  tidyTitle,
  type ResolveOptions,
  type ResolvedUrl,
  type UrlValidatorOptions,
} from "./url-validator.js";

export {
  MAX_REPLACEMENTS,
  MAX_SOURCE_ENTRIES,
  REPLACEMENT_CONCURRENCY,
  VALIDATION_CONCURRENCY,
  extractSources,
  parseSourceLines,
  resolveSources,
  type ParsedSourceLine,
  type SourceContext,
  type SourceExtractorDeps,
  type SourceResolver,
} from "./extractor.js";
