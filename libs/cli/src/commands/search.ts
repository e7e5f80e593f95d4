/**
 * Search command
 *
 * Substring search by default; `--mode ranked` orders hits by TF-IDF score.
 */

import { Command, Option } from 'commander';
import { SEARCH_MODES } from '../config/index.js';
import { createContext } from '../context.js';
import { parseLimit } from './options.js';
import { formatEntry } from './show.js';

interface SearchCommandOptions {
  mode?: string;
  topic?: string;
  limit?: number;
  json?: boolean;
}

export function createSearchCommand(): Command {
  const cmd = new Command('search')
    .description('Search entry labels and descriptions')
    .argument('[query]', 'Text to look for (empty lists everything)', '')
    .addOption(new Option('-m, --mode <mode>', 'Search mode').choices(SEARCH_MODES))
    .option('-t, --topic <topic>', 'Only search this topic')
    .option('-l, --limit <n>', 'Maximum number of results', parseLimit)
    .option('-j, --json', 'Output as JSON')
    .action((query: string, options: SearchCommandOptions, command: Command) => {
      const ctx = createContext(command, { mode: options.mode, limit: options.limit });
      const mode = ctx.config.search.mode;
      const limit = options.limit ?? (mode === 'ranked' ? ctx.config.search.topK : undefined);

      const hits = ctx.createService().search(query, { topic: options.topic, limit });
      ctx.logger.debug({ query, mode, hits: hits.length }, 'search finished');

      if (options.json) {
        console.log(JSON.stringify(hits, null, 2));
        return;
      }

      if (hits.length === 0) {
        console.log('No matches.');
        return;
      }

      let currentTopic: string | undefined;
      for (const hit of hits) {
        if (hit.topic !== currentTopic) {
          if (currentTopic !== undefined) console.log('');
          console.log(`${hit.topic}:`);
          currentTopic = hit.topic;
        }
        console.log(formatEntry(hit.entry));
      }
    });

  return cmd;
}
