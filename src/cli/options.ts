import type { ContentCallback, CrawlOptions } from '../types.js';

/**
 * Raw CLI options as parsed by commander.
 */
export interface CLIOptions {
  timeout?: string;
  statusMin?: string;
  statusMax?: string;
  sameHost?: boolean;
  limit?: string;
  header?: string[];
  ignoreScheme?: string[];
  forbid?: string[];
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
}

/**
 * Parse --header values from "key:value" format into a Record.
 * Splits on the first colon to allow colons in the value.
 *
 * @param headers - Array of "key:value" strings
 * @returns A Record mapping header names to values
 * @throws Error if a header value does not contain a colon
 */
export function parseHeaders(headers: string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const header of headers) {
    const colonIndex = header.indexOf(':');
    if (colonIndex === -1) {
      throw new Error(
        `Invalid header format: "${header}". Expected "key:value" format.`,
      );
    }
    const key = header.slice(0, colonIndex).trim();
    const value = header.slice(colonIndex + 1).trim();
    if (!key) {
      throw new Error(
        `Invalid header format: "${header}". Header name cannot be empty.`,
      );
    }
    result[key] = value;
  }

  return result;
}

/**
 * Parse a whole-number option value.
 *
 * @throws Error if the value is not an integer
 */
export function parseInteger(value: string, optionName: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new Error(`Invalid value for ${optionName}: "${value}". Expected an integer.`);
  }
  return parseInt(value, 10);
}

/**
 * Build a content check that fails on the first page whose body matches
 * any of the given regular expressions.
 *
 * @throws Error if a pattern is not a valid regular expression
 */
export function buildContentCheck(patterns: string[]): ContentCallback {
  const compiled = patterns.map((pattern) => {
    try {
      return new RegExp(pattern);
    } catch {
      throw new Error(`Invalid --forbid pattern: "${pattern}"`);
    }
  });

  return (pageBody: string) => {
    const match = compiled.find((regex) => regex.test(pageBody));
    if (match) {
      throw new Error(`page matches forbidden pattern ${match}`);
    }
  };
}

/**
 * Build CrawlOptions from the parsed CLI options and URL argument.
 *
 * Only sets properties that were explicitly provided by the user;
 * the SDK's own default merging handles the rest.
 *
 * @param url - The positional URL argument
 * @param options - The parsed commander options
 */
export function buildConfig(url: string, options: CLIOptions): CrawlOptions {
  const config: CrawlOptions = { url };

  // Fetching
  if (options.timeout !== undefined) {
    config.timeout = parseInteger(options.timeout, '--timeout');
  }
  if (options.statusMin !== undefined) {
    config.statusCodeMin = parseInteger(options.statusMin, '--status-min');
  }
  if (options.statusMax !== undefined) {
    config.statusCodeMax = parseInteger(options.statusMax, '--status-max');
  }
  if (options.header !== undefined && options.header.length > 0) {
    config.headers = parseHeaders(options.header);
  }

  // Scope
  // Commander negated option: --no-same-host sets options.sameHost to false
  if (options.sameHost === false) {
    config.onlySameHost = false;
  }
  if (options.limit !== undefined) {
    config.linksLimit = parseInteger(options.limit, '--limit');
  }
  if (options.ignoreScheme !== undefined && options.ignoreScheme.length > 0) {
    config.ignoredSchemes = options.ignoreScheme;
  }

  // Content check
  if (options.forbid !== undefined && options.forbid.length > 0) {
    config.onContent = buildContentCheck(options.forbid);
  }

  return config;
}
