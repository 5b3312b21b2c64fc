import { TransportError, describeError } from '../errors.js';

/** User-Agent sent when the caller supplies none. */
export const DEFAULT_USER_AGENT = 'recursive-crawler/1.0';

/**
 * Options for a single GET request.
 */
export interface HttpRequestOptions {
  /** Timeout in milliseconds, covering the request and the body read; 0 for none. */
  timeout: number;
  headers?: Record<string, string>;
}

/**
 * Raw response of a GET request.
 */
export interface HttpResponse {
  statusCode: number;
  body: Uint8Array;
}

/**
 * Transport used by the page fetcher. Rejects on network failure or timeout.
 */
export interface HttpClient {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

/**
 * Case-insensitive check for a header already present in a record.
 */
function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

/**
 * Create the default HttpClient, backed by the global `fetch`.
 *
 * Redirects are followed; the status checked by the caller is the one of the
 * final response.
 */
export function createHttpClient(): HttpClient {
  return {
    async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
      const headers: Record<string, string> = { ...options.headers };
      if (!hasHeader(headers, 'User-Agent')) {
        headers['User-Agent'] = DEFAULT_USER_AGENT;
      }

      const controller = new AbortController();
      const timeout =
        options.timeout > 0 ? setTimeout(() => controller.abort(), options.timeout) : undefined;

      try {
        const response = await fetch(url, {
          headers,
          signal: controller.signal,
          redirect: 'follow',
        });
        const body = new Uint8Array(await response.arrayBuffer());
        return { statusCode: response.status, body };
      } catch (error) {
        if (controller.signal.aborted) {
          throw new TransportError(
            `Request timed out after ${options.timeout}ms: ${url}`,
            url,
            { cause: error },
          );
        }
        throw new TransportError(
          `Network error fetching ${url}: ${describeError(error)}`,
          url,
          { cause: error },
        );
      } finally {
        clearTimeout(timeout);
      }
    },
  };
}
