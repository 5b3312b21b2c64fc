import { LinkParseError, ParseError } from '../errors.js';
import { createHtmlParser, type HtmlDocument, type HtmlParser } from './html.js';
import { sameMainDomain } from './domain.js';

/**
 * Options for link extraction and filtering.
 */
export interface ExtractLinksOptions {
  /** Drop links to hosts outside the page's main domain. */
  onlySameHost: boolean;
  /** Schemes (e.g. `mailto`, `javascript:`) whose links are dropped. */
  ignoredSchemes?: string[];
}

/** RFC 3986 appendix B: scheme, authority, path, query, fragment. */
const REFERENCE_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;

const SCHEME_PATTERN = /^[a-z][a-z\d+.-]*$/i;
const CONTROL_CHARACTER = /[\x00-\x1f\x7f]/;
const BAD_PERCENT_ESCAPE = /%(?![\da-f]{2})/i;

/**
 * A URL reference split into its components. Empty strings stand for absent
 * parts, except `query` and `fragment`, which are `undefined` when absent.
 */
interface UrlReference {
  scheme: string;
  authority: string;
  path: string;
  query?: string;
  fragment?: string;
}

/** Host part of an authority, without user info. */
function hostOf(authority: string): string {
  return authority.slice(authority.lastIndexOf('@') + 1);
}

/**
 * Split a URL reference into its components without resolving it.
 *
 * @throws Error naming the first reason the reference is invalid
 */
function parseReference(reference: string): UrlReference {
  if (CONTROL_CHARACTER.test(reference)) {
    throw new Error('invalid control character in URL');
  }
  const match = REFERENCE_PATTERN.exec(reference);
  if (!match) {
    throw new Error('not a URL reference');
  }
  const [, scheme = '', authority = '', path = '', query, fragment] = match;

  if (scheme !== '' && !SCHEME_PATTERN.test(scheme)) {
    throw new Error(`invalid scheme "${scheme}"`);
  }
  if (scheme === '' && authority === '' && path.split('/')[0]?.includes(':')) {
    throw new Error('first path segment in URL cannot contain colon');
  }
  if (BAD_PERCENT_ESCAPE.test(path) || BAD_PERCENT_ESCAPE.test(fragment ?? '')) {
    throw new Error('invalid URL escape');
  }
  if (authority !== '' && !URL.canParse(`http://${hostOf(authority)}`)) {
    throw new Error(`invalid host "${hostOf(authority)}"`);
  }

  return { scheme: scheme.toLowerCase(), authority, path, query, fragment };
}

/** A scheme followed by no `/`, e.g. `mailto:someone@example.com`. */
function isOpaque({ scheme, authority, path }: UrlReference): boolean {
  return scheme !== '' && authority === '' && path !== '' && !path.startsWith('/');
}

/** Write a reference back out; query and fragment only when present. */
function formatReference(reference: UrlReference): string {
  const { scheme, authority, path, query, fragment } = reference;
  let result: string;
  if (isOpaque(reference)) {
    result = `${scheme}:${path}`;
  } else {
    result = scheme === '' ? '' : `${scheme}:`;
    if (scheme !== '' || authority !== '') {
      result += `//${authority}`;
    }
    if (authority !== '' && path !== '' && !path.startsWith('/')) {
      result += '/';
    }
    result += path;
  }
  if (query !== undefined) {
    result += `?${query}`;
  }
  if (fragment !== undefined) {
    result += `#${fragment}`;
  }
  return result;
}

function normalizeScheme(scheme: string): string {
  const lower = scheme.trim().toLowerCase();
  return lower.endsWith(':') ? lower.slice(0, -1) : lower;
}

/**
 * Parse a page body into a document.
 *
 * @throws ParseError if the parser gives up on the body
 */
export function parseDocument(
  pageUrl: string,
  body: string,
  parser: HtmlParser = createHtmlParser(),
): HtmlDocument {
  try {
    return parser.parse(body);
  } catch (error) {
    throw new ParseError(pageUrl, error);
  }
}

/**
 * Lazily yield the outbound links of a parsed page as absolute URLs, in
 * document order.
 *
 * Anchors without an href, or with a blank one, are skipped. Hosts and
 * schemes missing from an href are taken from `pageUrl`; nothing else is,
 * so `c` on `http://example.com/dir/page` yields `http://example.com/c`.
 *
 * @throws LinkParseError on the first href that is not a valid URL reference
 */
export function* iterateLinks(
  pageUrl: string,
  document: HtmlDocument,
  options: ExtractLinksOptions,
): Generator<string, void, undefined> {
  let page: UrlReference;
  try {
    page = parseReference(pageUrl);
  } catch (error) {
    throw new LinkParseError(pageUrl, pageUrl, error);
  }
  const ignoredSchemes = new Set((options.ignoredSchemes ?? []).map(normalizeScheme));

  for (const rawHref of document.anchorHrefs()) {
    if (rawHref === null) {
      continue;
    }
    const href = rawHref.trim();
    if (href === '') {
      continue;
    }

    let link: UrlReference;
    try {
      link = parseReference(href);
    } catch (error) {
      throw new LinkParseError(pageUrl, href, error);
    }

    if (
      options.onlySameHost &&
      link.authority !== '' &&
      !sameMainDomain(hostOf(page.authority), hostOf(link.authority))
    ) {
      continue;
    }

    const resolved: UrlReference = isOpaque(link)
      ? link
      : {
          ...link,
          scheme: link.scheme || page.scheme,
          authority: link.authority || page.authority,
        };
    if (ignoredSchemes.has(resolved.scheme)) {
      continue;
    }

    yield formatReference(resolved);
  }
}

/**
 * Extract every outbound link of a page, resolved to absolute form.
 *
 * Duplicates are kept; deduplication is the crawler's job.
 *
 * @param pageUrl - URL the body was fetched from; supplies missing hosts and schemes
 * @param body - Raw HTML
 * @param options - Host and scheme filtering
 * @param parser - HTML collaborator; jsdom by default
 */
export function extractLinks(
  pageUrl: string,
  body: string,
  options: ExtractLinksOptions,
  parser?: HtmlParser,
): string[] {
  const document = parseDocument(pageUrl, body, parser);
  return [...iterateLinks(pageUrl, document, options)];
}
