#!/usr/bin/env node
/**
 * Render CLI
 *
 * Compile a book into every output format its configuration lists.
 *
 * Usage:
 *   quillpress book.book                  Render all configured outputs
 *   quillpress book.yaml --format epub    Render only the EPUB
 *   quillpress book.book --verbose        Also print per-chapter progress
 */

import { loadBook } from "../book.js";
import { errorMessage } from "../errors.js";
import { renderBook } from "../runner/render-runner.js";
import { createConsoleProgress } from "../runner/types.js";
import { USAGE, UsageError, parseFlags, type ParsedFlags } from "./args.js";

async function main() {
  let flags: ParsedFlags;
  try {
    flags = parseFlags(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(err.message);
    console.error(USAGE);
    process.exit(1);
  }

  if (flags.help) {
    console.log(USAGE);
    process.exit(0);
  }

  const [bookFile] = flags.positional;
  if (!bookFile || flags.positional.length > 1) {
    console.error(USAGE);
    process.exit(1);
  }

  const book = loadBook(bookFile);
  const verbose = flags.verbose || book.verbose;
  const report = await renderBook(book, {
    progress: createConsoleProgress({ verbose }),
    formats: flags.formats,
  });

  if (!report.succeeded) {
    const failed = report.outcomes.filter((o) => !o.ok).map((o) => o.format);
    console.error(`\nFailed to generate: ${failed.join(", ")}`);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("\nRender failed:", errorMessage(err));
  process.exit(1);
});
