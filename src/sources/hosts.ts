/**
 * Host rules shared by source validation and replacement search.
 *
 * Company, competitor and forbidden-host exclusion all go through
 * `isSameOrSubdomain`, so the three rules can't disagree about what
 * "same site" means.
 */

/**
 * Redirect hosts of the grounding service. They never resolve to a page a
 * reader could cite.
 */
export const FORBIDDEN_HOSTS: ReadonlySet<string> = new Set([
  "vertexaisearch.cloud.google.com",
  "cloud.google.com",
]);

const TRACKING_PARAMS: ReadonlySet<string> = new Set(["gclid", "fbclid"]);

export type HostExclusionReason = "invalid" | "forbidden" | "company" | "competitor";

export interface HostRules {
  /** Normalized company host; "" disables the rule */
  readonly companyHost: string;
  /** Normalized competitor hosts */
  readonly competitorHosts: readonly string[];
}

/**
 * Lower-cased hostname without leading dots or a leading "www.".
 * Returns "" for anything that isn't an absolute URL.
 */
export function normalizeHostname(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return "";
  }
  return parsed.hostname.toLowerCase().replace(/^\.+/, "").replace(/^www\./, "");
}

/**
 * Normalize a competitor entry, which may be a bare domain or a URL.
 */
export function normalizeDomainEntry(entry: string): string {
  const trimmed = entry.trim();
  if (trimmed === "") {
    return "";
  }
  return normalizeHostname(/^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
}

export function isSameOrSubdomain(host: string, root: string): boolean {
  if (!host || !root) {
    return false;
  }
  const h = host.toLowerCase();
  const r = root.toLowerCase().replace(/^\.+/, "");
  return h === r || h.endsWith(`.${r}`);
}

export function buildHostRules(companyUrl: string, competitors: readonly string[]): HostRules {
  return {
    companyHost: normalizeDomainEntry(companyUrl),
    competitorHosts: competitors.map(normalizeDomainEntry).filter((h) => h !== ""),
  };
}

/**
 * Decide whether a URL's host is excluded from citation.
 *
 * @returns the reason, or null when the host may be cited
 */
export function classifyHost(url: string, rules: HostRules): HostExclusionReason | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return "invalid";
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return "invalid";
  }

  const host = normalizeHostname(url);
  if (!host) {
    return "invalid";
  }
  if ([...FORBIDDEN_HOSTS].some((f) => isSameOrSubdomain(host, f))) {
    return "forbidden";
  }
  if (isSameOrSubdomain(host, rules.companyHost)) {
    return "company";
  }
  if (rules.competitorHosts.some((c) => isSameOrSubdomain(host, c))) {
    return "competitor";
  }
  return null;
}

export function isTrackingParam(key: string): boolean {
  const k = key.toLowerCase();
  return k.startsWith("utm_") || TRACKING_PARAMS.has(k);
}

/**
 * Remove utm_*, gclid and fbclid query parameters.
 * URLs without tracking parameters are returned unchanged.
 */
export function stripTrackingParams(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  const keys = [...new Set(parsed.searchParams.keys())];
  const tracking = keys.filter(isTrackingParam);
  if (tracking.length === 0) {
    return url;
  }

  for (const key of tracking) {
    parsed.searchParams.delete(key);
  }
  return parsed.toString();
}

/**
 * Key used to detect duplicate sources: lower-cased, trailing slashes trimmed.
 */
export function sourceUrlKey(url: string): string {
  return url.trim().toLowerCase().replace(/\/+$/, "");
}
