#!/usr/bin/env node

/**
 * @file index.ts
 * @module index
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview CLI entry point for fetching and printing C++ reference pages.
 */

/**
 * @example
 * ```bash
 * # Download every page cited in ./contents that is not cached yet
 * refbook fetch
 *
 * # Re-download everything
 * refbook fetch --overwrite
 *
 * # Build cppreference_print_colored.html from the cache
 * refbook print --colored
 * ```
 */

import { InvalidArgumentError, program } from 'commander';

import { listReferences, runFetch, runPrint } from './commands.js';
import {
  DEFAULT_CACHE_DIR,
  DEFAULT_CONTENTS_DIR,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_REQUEST_DELAY_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from './config.js';
import { MissingCachedPagesError } from './shared/errors.js';

/**
 * Command-line options for the fetch command.
 */
interface FetchOptions {
  /** Re-download pages that are already cached */
  overwrite?: boolean;
  /** Markdown corpus directory */
  contents: string;
  /** Cache directory */
  cache: string;
  /** Pause between requests in milliseconds */
  delay: number;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Enable verbose output */
  verbose?: boolean;
}

/**
 * Command-line options for the print command.
 */
interface PrintOptions {
  /** Keep syntax highlighting */
  colored?: boolean;
  contents: string;
  cache: string;
  /** Directory receiving the print file */
  outputDir: string;
  verbose?: boolean;
}

function parseMilliseconds(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of milliseconds.');
  }
  return parsed;
}

/**
 * CLI entry point.
 */
async function main() {
  program
    .name('refbook')
    .description('Download C++ references from cppreference.com and concatenate them for printing')
    .version('1.0.0');

  program
    .command('fetch')
    .description('Download the reference pages cited in the Markdown corpus')
    .option('--overwrite', 'Re-download pages that are already cached', false)
    .option('-c, --contents <dir>', 'Markdown corpus directory', DEFAULT_CONTENTS_DIR)
    .option('--cache <dir>', 'Cache directory', DEFAULT_CACHE_DIR)
    .option('--delay <ms>', 'Pause between requests', parseMilliseconds, DEFAULT_REQUEST_DELAY_MS)
    .option('--timeout <ms>', 'Request timeout', parseMilliseconds, DEFAULT_REQUEST_TIMEOUT_MS)
    .option('-v, --verbose', 'Enable verbose output')
    .action(fetchCommand);

  program
    .command('print')
    .description('Concatenate the cached pages into one printable HTML file')
    .option('--colored', 'Keep syntax highlighting', false)
    .option('-c, --contents <dir>', 'Markdown corpus directory', DEFAULT_CONTENTS_DIR)
    .option('--cache <dir>', 'Cache directory', DEFAULT_CACHE_DIR)
    .option('-o, --output-dir <dir>', 'Output directory', DEFAULT_OUTPUT_DIR)
    .option('-v, --verbose', 'Enable verbose output')
    .action(printCommand);

  program
    .command('list')
    .description('List the references cited in the Markdown corpus')
    .option('-c, --contents <dir>', 'Markdown corpus directory', DEFAULT_CONTENTS_DIR)
    .action(listCommand);

  await program.parseAsync();
}

async function fetchCommand(options: FetchOptions) {
  await runFetch({
    contentsDir: options.contents,
    cacheDir: options.cache,
    overwrite: options.overwrite,
    delayMs: options.delay,
    timeoutMs: options.timeout,
    verbose: options.verbose,
  });
}

async function printCommand(options: PrintOptions) {
  runPrint({
    contentsDir: options.contents,
    cacheDir: options.cache,
    outputDir: options.outputDir,
    colored: options.colored,
    verbose: options.verbose,
  });
}

async function listCommand(options: { contents: string }) {
  const references = listReferences({ contentsDir: options.contents });
  for (const reference of references) {
    console.log(`${reference.name}  ${reference.url}`);
  }
  console.log(`\n${references.length} reference(s)`);
}

main().catch((error: unknown) => {
  if (error instanceof MissingCachedPagesError) {
    console.error('Error: Missing required HTML files:');
    for (const name of error.missing) {
      console.error(`  - ${name}.html`);
    }
    console.error('Run "refbook fetch" first.');
  } else {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exit(1);
});
