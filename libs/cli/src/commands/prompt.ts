/**
 * Prompt command
 *
 * Builds a question-answering prompt from the best ranked entries. Nothing is
 * sent to a model; the prompt goes to stdout.
 */

import { Command } from 'commander';
import { buildPrompt } from '@devnotes/catalog';
import { createContext } from '../context.js';
import { parseLimit } from './options.js';

export function createPromptCommand(): Command {
  const cmd = new Command('prompt')
    .description('Build a prompt that answers a question from matching entries')
    .argument('<question>', 'Question to answer')
    .option('-t, --topic <topic>', 'Only use entries from this topic')
    .option('-l, --limit <n>', 'Number of entries to include', parseLimit)
    .action((question: string, options: { topic?: string; limit?: number }, command: Command) => {
      const ctx = createContext(command, { limit: options.limit });
      const hits = ctx
        .createService('ranked')
        .search(question, { topic: options.topic, limit: ctx.config.search.topK });

      console.log(buildPrompt(question, hits));
    });

  return cmd;
}
