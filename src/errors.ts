/**
 * Base class for every failure that aborts a crawl. Carries the URL of the
 * page whose processing failed.
 */
export class CrawlError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CrawlError';
  }
}

/**
 * Network failure or timeout while requesting a page.
 */
export class TransportError extends CrawlError {
  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, url, options);
    this.name = 'TransportError';
  }
}

/** Inclusive range of accepted HTTP status codes. */
export interface StatusCodeRange {
  min: number;
  max: number;
}

/**
 * Response status outside the accepted range.
 */
export class BadStatusError extends CrawlError {
  constructor(
    url: string,
    public readonly statusCode: number,
    public readonly acceptedRange: StatusCodeRange,
  ) {
    super(
      `Bad status code ${statusCode} for ${url}, accepted range: ${acceptedRange.min}-${acceptedRange.max}`,
      url,
    );
    this.name = 'BadStatusError';
  }
}

/**
 * The page body could not be parsed as HTML.
 */
export class ParseError extends CrawlError {
  constructor(url: string, cause: unknown) {
    super(`Cannot parse HTML of ${url}: ${describeError(cause)}`, url, { cause });
    this.name = 'ParseError';
  }
}

/**
 * An anchor's href on the page is not a valid URL reference.
 */
export class LinkParseError extends CrawlError {
  constructor(
    url: string,
    public readonly href: string,
    cause?: unknown,
  ) {
    super(`Malformed link "${href}" on ${url}`, url, { cause });
    this.name = 'LinkParseError';
  }
}

/**
 * The content callback rejected a page. The original failure is kept as `cause`.
 */
export class CallbackError extends CrawlError {
  constructor(url: string, cause: unknown) {
    super(`Content check failed for ${url}: ${describeError(cause)}`, url, { cause });
    this.name = 'CallbackError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
