import type { CrawlEvents, CrawlParameters } from '../types.js';
import type { Fetcher } from '../fetcher/index.js';
import type { HtmlParser } from '../fetcher/html.js';
import { iterateLinks, parseDocument } from '../fetcher/link-extractor.js';
import { CallbackError } from '../errors.js';
import { VisitedRegistry } from './base.js';

/**
 * Configuration of a RecursiveCrawler.
 */
export type RecursiveCrawlerConfig = CrawlParameters & CrawlEvents;

/**
 * Depth-first crawler that follows every extracted link recursively.
 *
 * Traversal is sequential: a link and everything reachable from it is fully
 * crawled before the next sibling starts. The first failure anywhere
 * (fetch, content check, HTML or link parsing) rejects the whole crawl.
 * Reaching the links limit is not a failure; the current page stops
 * descending and the crawl unwinds normally.
 */
export class RecursiveCrawler {
  private reachedLimit = false;

  constructor(
    private config: RecursiveCrawlerConfig,
    private fetcher: Fetcher,
    private htmlParser: HtmlParser,
    readonly registry: VisitedRegistry = new VisitedRegistry(),
  ) {}

  /** Whether any page stopped descending because of the links limit. */
  get limitReached(): boolean {
    return this.reachedLimit;
  }

  /**
   * Crawl `url` and, recursively, every unvisited link found on it.
   *
   * Resolves immediately for a URL that is already visited.
   */
  async crawl(url: string): Promise<void> {
    if (this.registry.isVisited(url)) {
      this.config.onPageSkipped?.(url, 'already visited');
      return;
    }

    const page = await this.fetcher.fetch(url);
    this.config.onPageFetched?.(page);

    try {
      await this.config.onContent(page.body);
    } catch (error) {
      throw new CallbackError(url, error);
    }

    for (const link of this.visitLinks(url, page.body)) {
      if (this.isOverLimit()) {
        this.reachedLimit = true;
        this.config.onLimitReached?.(url, this.registry.size);
        return;
      }
      await this.crawl(link);
    }
  }

  /**
   * Parse a fetched page, mark it visited and collect its links. The parsed
   * document does not outlive this call.
   */
  private visitLinks(url: string, body: string): string[] {
    const document = parseDocument(url, body, this.htmlParser);

    // Marked before the links are followed, so a page whose children fail
    // still counts as visited.
    this.registry.markVisited(url);

    return [
      ...iterateLinks(url, document, {
        onlySameHost: this.config.onlySameHost,
        ignoredSchemes: this.config.ignoredSchemes,
      }),
    ];
  }

  private isOverLimit(): boolean {
    return this.config.linksLimit > 0 && this.registry.size > this.config.linksLimit;
  }
}
