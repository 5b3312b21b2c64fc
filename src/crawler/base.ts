import type { CrawlResult } from '../types.js';

/**
 * The set of URLs already fetched during one crawl.
 *
 * URLs are compared as given, with no normalization: `https://example.com`
 * and `https://example.com/` are distinct entries. Every method is
 * synchronous and runs to completion on the event loop, so concurrent
 * callers always observe some serial order of operations. The
 * `isVisited`-then-`markVisited` sequence of a caller that awaits in between
 * is not atomic: two branches crawling the same URL at once may both fetch it.
 */
export class VisitedRegistry {
  private readonly visited = new Set<string>();

  isVisited(url: string): boolean {
    return this.visited.has(url);
  }

  /**
   * Record a URL as visited. Marking a URL twice is a no-op.
   */
  markVisited(url: string): void {
    this.visited.add(url);
  }

  get size(): number {
    return this.visited.size;
  }

  /**
   * Snapshot of the visited URLs in the order they were marked.
   */
  urls(): string[] {
    return [...this.visited];
  }
}

/**
 * Build a CrawlResult from the registry and timing info.
 */
export function buildCrawlResult(
  seedUrl: string,
  registry: VisitedRegistry,
  limitReached: boolean,
  startTime: number,
): CrawlResult {
  const visited = registry.urls();
  return {
    seedUrl,
    visited,
    stats: {
      totalPages: visited.length,
      duration: Date.now() - startTime,
      limitReached,
    },
  };
}
