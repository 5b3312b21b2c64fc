export { RecursiveCrawler } from './recursive.js';
export type { RecursiveCrawlerConfig } from './recursive.js';
export { VisitedRegistry, buildCrawlResult } from './base.js';
