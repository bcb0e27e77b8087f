/**
 * HTTP access for source probing.
 *
 * The URL validator depends on the small `HttpClient` interface rather than
 * on axios directly, so tests can run it against an in-process fake.
 */

import axios, { AxiosError, type AxiosInstance } from "axios";

export type HttpMethod = "HEAD" | "GET";

export interface HttpResponse {
  readonly status: number;
  /** URL after redirects */
  readonly url: string;
  /** Lower-cased header names */
  readonly headers: Readonly<Record<string, string>>;
  /** Response text; "" for HEAD */
  readonly body: string;
}

export interface HttpRequestOptions {
  timeoutMs?: number;
}

export interface HttpClient {
  /**
   * Issue a request, following redirects.
   * Resolves for every HTTP status; rejects with HttpRequestError on
   * timeouts and transport failures.
   */
  request(method: HttpMethod, url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export class HttpRequestError extends Error {
  public readonly url: string;
  public readonly code?: string;

  constructor(message: string, url: string, options?: { cause?: unknown; code?: string }) {
    super(message, { cause: options?.cause });
    this.name = "HttpRequestError";
    this.url = url;
    this.code = options?.code;
  }
}

export interface AxiosHttpClientOptions {
  /** Default per-request timeout */
  timeoutMs?: number;
  userAgent?: string;
  maxRedirects?: number;
  /** Bodies larger than this are rejected */
  maxContentLength?: number;
}

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) " +
  "AppleWebKit/537.36 (KHTML, like Gecko) " +
  "Chrome/124.0.0.0 Safari/537.36";

/**
 * Node's http adapter records the post-redirect URL on the response
 * object behind `request.res.responseUrl`.
 */
function finalUrlOf(request: unknown, fallback: string): string {
  if (typeof request === "object" && request !== null && "res" in request) {
    const res = request.res;
    if (
      typeof res === "object" &&
      res !== null &&
      "responseUrl" in res &&
      typeof res.responseUrl === "string" &&
      res.responseUrl !== ""
    ) {
      return res.responseUrl;
    }
  }
  return fallback;
}

function flattenHeaders(headers: object): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) {
      continue;
    }
    out[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : String(value);
  }
  return out;
}

/**
 * HttpClient backed by one axios instance, so checks for one article share
 * a connection pool.
 */
export function createAxiosHttpClient(options: AxiosHttpClientOptions = {}): HttpClient {
  const defaultTimeout = options.timeoutMs ?? 8000;
  const instance: AxiosInstance = axios.create({
    maxRedirects: options.maxRedirects ?? 10,
    maxContentLength: options.maxContentLength ?? 5 * 1024 * 1024,
    responseType: "text",
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true,
    headers: {
      "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
      Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
    },
  });

  return {
    async request(method, url, requestOptions = {}) {
      try {
        const response = await instance.request<unknown>({
          method,
          url,
          timeout: requestOptions.timeoutMs ?? defaultTimeout,
        });
        return {
          status: response.status,
          url: finalUrlOf(response.request, url),
          headers: flattenHeaders(response.headers),
          body: typeof response.data === "string" ? response.data : "",
        };
      } catch (err) {
        if (err instanceof AxiosError) {
          throw new HttpRequestError(`${method} ${url} failed: ${err.message}`, url, {
            cause: err,
            code: err.code,
          });
        }
        throw new HttpRequestError(
          `${method} ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
          url,
          { cause: err }
        );
      }
    },
  };
}
