import { Command } from 'commander';
import { crawlSite } from '../sdk/index.js';
import { CONFIG_DEFAULTS } from '../types.js';
import { buildConfig } from './options.js';
import type { CLIOptions } from './options.js';
import {
  createProgressCallbacks,
  printSummary,
  printDryRun,
  type Verbosity,
} from './progress.js';

/**
 * Accumulate repeated option values into an array.
 * Used for --header, --ignore-scheme and --forbid.
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create and configure the commander program with all CLI options.
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('recursive-crawler')
    .description('Recursively crawl a website and check the content of every page')
    .version('0.1.0')
    .argument('<url>', 'Seed URL to crawl')

    // Fetching
    .option('--timeout <ms>', 'Request timeout in ms (0 for none)', String(CONFIG_DEFAULTS.timeout))
    .option('--status-min <code>', 'Lowest accepted status code', String(CONFIG_DEFAULTS.statusCodeMin))
    .option('--status-max <code>', 'Highest accepted status code', String(CONFIG_DEFAULTS.statusCodeMax))
    .option('--header <key:value>', 'Custom header (repeatable)', collect, [])

    // Scope
    .option('--no-same-host', 'Also follow links to other domains')
    .option('--limit <n>', 'Stop descending after this many pages (0 = unlimited)', String(CONFIG_DEFAULTS.linksLimit))
    .option('--ignore-scheme <scheme>', 'Never follow links with this scheme, e.g. mailto (repeatable)', collect, [])

    // Content check
    .option('--forbid <pattern>', 'Fail when a page body matches this regex (repeatable)', collect, [])

    // General
    .option('-v, --verbose', 'Verbose logging')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('--dry-run', 'Show the effective settings without crawling');

  return program;
}

/**
 * Determine the verbosity level from CLI flags.
 */
function getVerbosity(options: CLIOptions): Verbosity {
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

/**
 * Main CLI entry point. Parses command-line arguments, builds the crawl
 * options and runs the crawl.
 *
 * @param argv - The process.argv array to parse
 * @returns The process exit code: 0 on success, 1 on any error
 */
export async function run(argv: string[]): Promise<number> {
  const program = createProgram();
  let exitCode = 0;

  program.action(async (url: string, options: CLIOptions) => {
    try {
      if (options.verbose && options.quiet) {
        throw new Error('Cannot use --verbose and --quiet at the same time.');
      }

      const verbosity = getVerbosity(options);
      const config = buildConfig(url, options);

      if (options.dryRun) {
        printDryRun(config);
        return;
      }

      const result = await crawlSite({
        ...config,
        ...createProgressCallbacks(verbosity),
      });

      printSummary(result, verbosity);
    } catch (error) {
      process.stderr.write(
        `Error: ${error instanceof Error ? error.message : String(error)}\n`,
      );
      exitCode = 1;
    }
  });

  await program.parseAsync(argv);
  return exitCode;
}
