import type { CrawlEvents, CrawlOptions, CrawlResult, FetchedPage } from '../types.js';
import { CONFIG_DEFAULTS } from '../types.js';

/**
 * Output verbosity level for the CLI.
 */
export type Verbosity = 'normal' | 'verbose' | 'quiet';

/**
 * Create crawl event handlers that report progress on stderr, so they
 * don't interfere with stdout output.
 *
 * - quiet mode: no output
 * - normal mode: page count and URL for each fetched page
 * - verbose mode: also status code, size and request time, plus skipped
 *   pages and the links limit being reached
 */
export function createProgressCallbacks(verbosity: Verbosity): Required<CrawlEvents> {
  let fetchedCount = 0;

  if (verbosity === 'quiet') {
    return {
      onPageFetched: () => { fetchedCount++; },
      onPageSkipped: () => {},
      onLimitReached: () => {},
    };
  }

  return {
    onPageFetched: (page: FetchedPage) => {
      fetchedCount++;
      if (verbosity === 'verbose') {
        process.stderr.write(
          `[${fetchedCount}] Fetched: ${page.url} (${page.statusCode}, ${page.body.length} chars, ${page.duration}ms)\n`,
        );
      } else {
        process.stderr.write(`[${fetchedCount}] ${page.url}\n`);
      }
    },

    onPageSkipped: (url: string, reason: string) => {
      if (verbosity === 'verbose') {
        process.stderr.write(`  Skipped: ${url} (${reason})\n`);
      }
    },

    onLimitReached: (parentUrl: string, visitedCount: number) => {
      if (verbosity === 'verbose') {
        process.stderr.write(
          `  Links limit reached on ${parentUrl} (${visitedCount} visited)\n`,
        );
      }
    },
  };
}

/**
 * Print a summary of the crawl results to stderr.
 */
export function printSummary(result: CrawlResult, verbosity: Verbosity): void {
  if (verbosity === 'quiet') {
    return;
  }

  const durationSec = (result.stats.duration / 1000).toFixed(1);

  process.stderr.write('\n');
  process.stderr.write(`Done! Visited ${result.stats.totalPages} pages in ${durationSec}s\n`);
  if (result.stats.limitReached) {
    process.stderr.write('Stopped early: links limit reached\n');
  }
}

/**
 * Print the effective settings of a crawl without running it.
 */
export function printDryRun(config: CrawlOptions): void {
  const linksLimit = config.linksLimit ?? CONFIG_DEFAULTS.linksLimit;
  const statusMin = config.statusCodeMin ?? CONFIG_DEFAULTS.statusCodeMin;
  const statusMax = config.statusCodeMax ?? CONFIG_DEFAULTS.statusCodeMax;

  process.stderr.write('\n--- Dry Run ---\n');
  process.stderr.write(`URL: ${config.url}\n`);
  process.stderr.write(`Timeout: ${config.timeout ?? CONFIG_DEFAULTS.timeout}ms\n`);
  process.stderr.write(`Accepted status codes: ${statusMin}-${statusMax}\n`);
  process.stderr.write(`Same host only: ${config.onlySameHost ?? CONFIG_DEFAULTS.onlySameHost}\n`);
  process.stderr.write(`Links limit: ${linksLimit === 0 ? 'unlimited' : linksLimit}\n`);
  if (config.ignoredSchemes && config.ignoredSchemes.length > 0) {
    process.stderr.write(`Ignored schemes: ${config.ignoredSchemes.join(', ')}\n`);
  }
  process.stderr.write('--- No pages will be fetched ---\n');
}
