#!/usr/bin/env node
/**
 * book-png.ts
 *
 * Converts a text file into a square PNG, one pixel per word (or word
 * pair), coloured by a statistic of that word.
 *
 * Usage:
 *   npx tsx scripts/book-png.ts book.txt
 *   npx tsx scripts/book-png.ts book.txt --metric word-freq --color heat
 *   npx tsx scripts/book-png.ts book.txt -m bigram-diversity -c rainbow -o output.png
 *   npx tsx scripts/book-png.ts --list
 *
 * Env vars (or .env in the working directory): BOOK_PNG_METRIC,
 * BOOK_PNG_COLOR, BOOK_PNG_SUFFIX, BOOK_PNG_BACKGROUND
 */

import { run } from '../src/cli.js';
import { loadConfig } from '../src/config.js';
import { EmptyInputError, UsageError } from '../src/errors.js';

async function main() {
  const config = loadConfig();
  await run(process.argv.slice(2), config);
}

main().catch((err: unknown) => {
  if (err instanceof UsageError || err instanceof EmptyInputError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error('Fatal error:', err);
  }
  process.exit(1);
});
