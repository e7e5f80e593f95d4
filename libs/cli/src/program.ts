/**
 * Root command definition
 */

import { Command, Option } from 'commander';
import { ConfigError, LOG_LEVELS } from './config/index.js';
import {
  createTopicsCommand,
  createShowCommand,
  createSearchCommand,
  createRenderCommand,
  createPromptCommand,
} from './commands/index.js';

export const VERSION = '0.1.0';

/**
 * Exit code for a failed command: 2 for bad configuration, 1 otherwise.
 */
export function exitCodeFor(err: unknown): number {
  return err instanceof ConfigError ? 2 : 1;
}

export function formatError(err: unknown): string {
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}

/**
 * Create and configure the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('devnotes')
    .description('devnotes - Browse and search command notes')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-s, --source <path>', 'Notes file or directory (default: bundled notes)')
    .option('-c, --config <file>', 'YAML config file (default: ./.devnotesrc.yaml when present)')
    .addOption(new Option('--log-level <level>', 'Log level for stderr diagnostics').choices(LOG_LEVELS))
    .addHelpText(
      'after',
      `
Environment:
  DEVNOTES_SOURCE, DEVNOTES_LOG_LEVEL, DEVNOTES_SEARCH_MODE

Examples:
  $ devnotes topics                        List topics
  $ devnotes show Containers               Show one topic
  $ devnotes search docker                 Substring search
  $ devnotes search "run db" --mode ranked Ranked search
  $ devnotes prompt "How do I list containers?"
  $ devnotes render > notes.md             Canonical Markdown
`
    );

  // Register commands
  program.addCommand(createTopicsCommand());
  program.addCommand(createShowCommand());
  program.addCommand(createSearchCommand());
  program.addCommand(createRenderCommand());
  program.addCommand(createPromptCommand());

  return program;
}
