#!/usr/bin/env node
/**
 * devnotes CLI
 *
 * Browse and search a catalog of command notes.
 *
 * @example
 * ```bash
 * # Show help
 * devnotes --help
 *
 * # List topics of the bundled notes
 * devnotes topics
 *
 * # Search another notes directory
 * devnotes --source ./my-notes search "compose"
 * ```
 */

import { createProgram, exitCodeFor, formatError } from './program.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    console.error(formatError(err));
    process.exit(exitCodeFor(err));
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
