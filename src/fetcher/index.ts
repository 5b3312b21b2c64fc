import type { FetchedPage } from '../types.js';
import { BadStatusError, TransportError, describeError } from '../errors.js';
import { createHttpClient, type HttpClient, type HttpResponse } from './http.js';

/**
 * The page fetcher used by the crawler.
 */
export interface Fetcher {
  /** Fetch a URL and return its body if the status is accepted. */
  fetch(url: string): Promise<FetchedPage>;
}

/**
 * Options controlling how pages are requested and which responses count
 * as a success.
 */
export interface FetcherOptions {
  /** Request timeout in milliseconds. */
  timeout: number;
  statusCodeMin: number;
  statusCodeMax: number;
  headers?: Record<string, string>;
}

/**
 * Create a Fetcher on top of an HTTP collaborator.
 *
 * @param options - Timeout, accepted status range and request headers
 * @param httpClient - Transport; the global `fetch` by default
 */
export function createFetcher(
  options: FetcherOptions,
  httpClient: HttpClient = createHttpClient(),
): Fetcher {
  const decoder = new TextDecoder();

  return {
    async fetch(url: string): Promise<FetchedPage> {
      const startTime = Date.now();

      let response: HttpResponse;
      try {
        response = await httpClient.get(url, {
          timeout: options.timeout,
          headers: options.headers,
        });
      } catch (error) {
        if (error instanceof TransportError && error.url === url) {
          throw error;
        }
        throw new TransportError(
          `Network error fetching ${url}: ${describeError(error)}`,
          url,
          { cause: error },
        );
      }

      const { statusCode } = response;
      if (statusCode < options.statusCodeMin || statusCode > options.statusCodeMax) {
        throw new BadStatusError(url, statusCode, {
          min: options.statusCodeMin,
          max: options.statusCodeMax,
        });
      }

      return {
        url,
        body: decoder.decode(response.body),
        statusCode,
        duration: Date.now() - startTime,
      };
    },
  };
}

export { createHttpClient, DEFAULT_USER_AGENT } from './http.js';
export type { HttpClient, HttpRequestOptions, HttpResponse } from './http.js';
export { createHtmlParser } from './html.js';
export type { HtmlDocument, HtmlParser } from './html.js';
export { extractLinks, iterateLinks, parseDocument } from './link-extractor.js';
export type { ExtractLinksOptions } from './link-extractor.js';
export { mainDomain, sameMainDomain } from './domain.js';
