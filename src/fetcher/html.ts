import { JSDOM } from 'jsdom';

/**
 * A parsed page that can enumerate its anchors.
 */
export interface HtmlDocument {
  /** `href` of every `<a>` element in document order; `null` when absent. */
  anchorHrefs(): Iterable<string | null>;
}

/**
 * Parses a page body into a queryable document. May throw on input it
 * cannot recover from.
 */
export interface HtmlParser {
  parse(html: string): HtmlDocument;
}

/**
 * Create the default HtmlParser, backed by jsdom. Scripts and subresources
 * are never loaded.
 */
export function createHtmlParser(): HtmlParser {
  return {
    parse(html: string): HtmlDocument {
      const dom = new JSDOM(html);
      const anchors = Array.from(dom.window.document.querySelectorAll('a'));
      return {
        *anchorHrefs() {
          for (const anchor of anchors) {
            yield anchor.getAttribute('href');
          }
        },
      };
    },
  };
}
