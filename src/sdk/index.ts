import { z } from 'zod';
import type {
  ContentCallback,
  CrawlConfig,
  CrawlOptions,
  CrawlResult,
} from '../types.js';
import { CONFIG_DEFAULTS } from '../types.js';
import { createFetcher } from '../fetcher/index.js';
import { createHtmlParser } from '../fetcher/html.js';
import { RecursiveCrawler } from '../crawler/recursive.js';
import { buildCrawlResult } from '../crawler/base.js';

/**
 * Constraints on the data fields of a merged crawl config.
 */
const crawlConfigSchema = z
  .object({
    url: z
      .string()
      .url()
      .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL'),
    timeout: z.number().int().nonnegative(),
    statusCodeMin: z.number().int(),
    statusCodeMax: z.number().int(),
    onlySameHost: z.boolean(),
    linksLimit: z.number().int().nonnegative(),
    ignoredSchemes: z.array(z.string()),
  })
  .refine((config) => config.statusCodeMin <= config.statusCodeMax, {
    message: 'must not be lower than statusCodeMin',
    path: ['statusCodeMax'],
  });

/**
 * Merge user options over CONFIG_DEFAULTS and validate the result.
 *
 * Merge order (later wins):
 * 1. CONFIG_DEFAULTS
 * 2. A content callback that accepts every page
 * 3. User-provided values
 *
 * @param options - The partial config provided by the user
 * @returns A validated, fully populated CrawlConfig
 * @throws Error naming the first invalid field
 */
export function validateAndMergeConfig(options: CrawlOptions): CrawlConfig {
  const config: CrawlConfig = {
    ...CONFIG_DEFAULTS,
    onContent: () => {},
    ...options,
  };

  const result = crawlConfigSchema.safeParse(config);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue?.path.join('.') || 'config';
    throw new Error(`crawlSite: "${field}" ${issue?.message ?? 'is invalid'}`);
  }
  if (typeof config.onContent !== 'function') {
    throw new Error('crawlSite: "onContent" must be a function');
  }

  return config;
}

/**
 * Crawl a site recursively from `options.url`.
 *
 * Each newly fetched page body is handed to `onContent`; its links are then
 * followed depth-first until nothing unvisited is left or the links limit
 * is exceeded. The first error anywhere rejects the returned promise.
 *
 * @param options - Seed URL plus any overrides of CONFIG_DEFAULTS
 * @returns The visited URLs and run statistics
 *
 * @example
 * ```ts
 * const result = await crawlSite({
 *   url: 'https://example.com',
 *   linksLimit: 50,
 *   onContent: (body) => {
 *     if (body.includes('Internal Server Error')) throw new Error('error page');
 *   },
 * });
 * ```
 */
export async function crawlSite(options: CrawlOptions): Promise<CrawlResult> {
  const config = validateAndMergeConfig(options);
  const startTime = Date.now();

  const fetcher = createFetcher(
    {
      timeout: config.timeout,
      statusCodeMin: config.statusCodeMin,
      statusCodeMax: config.statusCodeMax,
      headers: config.headers,
    },
    config.httpClient,
  );
  const crawler = new RecursiveCrawler(
    config,
    fetcher,
    config.htmlParser ?? createHtmlParser(),
  );

  await crawler.crawl(config.url);

  return buildCrawlResult(config.url, crawler.registry, crawler.limitReached, startTime);
}

/**
 * Positional form of {@link crawlSite}. Resolves once the crawl completes
 * and rejects with the first error.
 *
 * @param timeout - Request timeout in milliseconds, 0 for none
 * @param statusCodeMin - Lowest accepted status; `0` and `999` bound every status
 * @param linksLimit - 0 for no limit
 */
export async function run(
  seedUrl: string,
  timeout: number,
  contentCallback: ContentCallback,
  statusCodeMin: number,
  statusCodeMax: number,
  onlySameHost: boolean,
  linksLimit: number,
): Promise<void> {
  await crawlSite({
    url: seedUrl,
    timeout,
    onContent: contentCallback,
    statusCodeMin,
    statusCodeMax,
    onlySameHost,
    linksLimit,
  });
}

// Re-export types and errors for SDK consumers
export type {
  ContentCallback,
  CrawlConfig,
  CrawlEvents,
  CrawlOptions,
  CrawlParameters,
  CrawlResult,
  FetchedPage,
} from '../types.js';
export { CONFIG_DEFAULTS } from '../types.js';
export {
  CrawlError,
  TransportError,
  BadStatusError,
  ParseError,
  LinkParseError,
  CallbackError,
} from '../errors.js';
export type { StatusCodeRange } from '../errors.js';
export { mainDomain, sameMainDomain } from '../fetcher/domain.js';
export type { HttpClient, HttpResponse } from '../fetcher/http.js';
export type { HtmlDocument, HtmlParser } from '../fetcher/html.js';
