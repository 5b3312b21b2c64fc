import type { HttpClient } from './fetcher/http.js';
import type { HtmlParser } from './fetcher/html.js';

/**
 * Checks the body of every newly fetched page. Throwing (or rejecting)
 * aborts the crawl.
 */
export type ContentCallback = (pageBody: string) => void | Promise<void>;

/**
 * A successfully fetched page.
 */
export interface FetchedPage {
  url: string;
  body: string;
  statusCode: number;
  /** Request time in milliseconds. */
  duration: number;
}

/**
 * Per-run crawl parameters, passed unchanged through every recursive call.
 */
export interface CrawlParameters {
  /** Request timeout in milliseconds; 0 disables it. */
  timeout: number;
  statusCodeMin: number;
  statusCodeMax: number;
  /** Only follow links whose host shares the page's main domain. */
  onlySameHost: boolean;
  /** Stop descending once more than this many pages are visited. 0 = unlimited. */
  linksLimit: number;
  /** Link schemes (without the colon) that are never followed, e.g. `mailto`. */
  ignoredSchemes: string[];
  onContent: ContentCallback;
}

/**
 * Progress events fired during a crawl.
 */
export interface CrawlEvents {
  onPageFetched?: (page: FetchedPage) => void;
  onPageSkipped?: (url: string, reason: string) => void;
  onLimitReached?: (parentUrl: string, visitedCount: number) => void;
}

/**
 * Full configuration of a crawl run.
 */
export interface CrawlConfig extends CrawlParameters, CrawlEvents {
  // Required
  url: string;

  // Fetching
  headers?: Record<string, string>;

  // Collaborators (defaults: global fetch, jsdom)
  httpClient?: HttpClient;
  htmlParser?: HtmlParser;
}

/**
 * User-facing options: everything but the seed URL is optional.
 */
export type CrawlOptions = Partial<CrawlConfig> & { url: string };

/**
 * Result of a completed crawl.
 */
export interface CrawlResult {
  seedUrl: string;
  /** Visited URLs in visiting order. */
  visited: string[];
  stats: {
    totalPages: number;
    duration: number;
    limitReached: boolean;
  };
}

/** Parameters that have a default value. */
export type CrawlDefaults = Omit<CrawlParameters, 'onContent'>;

/**
 * Default configuration values, merged under user-provided options.
 */
export const CONFIG_DEFAULTS: CrawlDefaults = {
  timeout: 30_000,
  statusCodeMin: 200,
  statusCodeMax: 299,
  onlySameHost: true,
  linksLimit: 100,
  ignoredSchemes: [],
};
