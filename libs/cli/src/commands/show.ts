/**
 * Show command
 *
 * Prints the entries of one topic.
 */

import { Command } from 'commander';
import { NotFoundError } from '@devnotes/catalog';
import type { Entry } from '@devnotes/catalog';
import { createContext } from '../context.js';

export function formatEntry(entry: Entry, indent = '  '): string {
  return entry.description ? `${indent}${entry.label}\n${indent}    ${entry.description}` : `${indent}${entry.label}`;
}

export function createShowCommand(): Command {
  const cmd = new Command('show')
    .description('Show the entries of a topic')
    .argument('<topic>', 'Topic name (exact)')
    .option('-j, --json', 'Output as JSON')
    .action((topicName: string, options: { json?: boolean }, command: Command) => {
      const ctx = createContext(command);
      const detail = ctx.createService().getTopic(topicName);
      if (!detail) throw new NotFoundError(topicName);

      if (options.json) {
        console.log(JSON.stringify(detail, null, 2));
        return;
      }

      console.log(detail.topic);
      console.log('='.repeat(detail.topic.length));
      for (const entry of detail.entries) {
        console.log(formatEntry(entry));
      }
    });

  return cmd;
}
