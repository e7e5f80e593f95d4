/**
 * devnotes CLI Library
 *
 * Command-line front end for @devnotes/catalog. This module exports the
 * program factory, configuration helpers and command creators.
 *
 * @packageDocumentation
 */

export { createProgram, exitCodeFor, formatError, VERSION } from './program.js';
export { createContext, createAdapters } from './context.js';
export type { CommandContext, GlobalOptions } from './context.js';
export { createLogger } from './logger.js';

// Re-export configuration utilities
export * from './config/index.js';

// Re-export utility functions
export { findNotesDir } from './utils/find-notes.js';

// Re-export command creators (for extending the CLI)
export * from './commands/index.js';
