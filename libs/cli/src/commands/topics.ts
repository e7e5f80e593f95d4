/**
 * Topics command
 *
 * Lists topic names with entry counts, in source order.
 */

import { Command } from 'commander';
import { createContext } from '../context.js';

export function createTopicsCommand(): Command {
  const cmd = new Command('topics')
    .description('List catalog topics in source order')
    .option('-j, --json', 'Output as JSON')
    .action((options: { json?: boolean }, command: Command) => {
      const ctx = createContext(command);
      const topics = ctx.createService().listTopics();

      if (options.json) {
        console.log(JSON.stringify(topics, null, 2));
        return;
      }

      if (topics.length === 0) {
        console.log('No topics.');
        return;
      }
      const width = Math.max(...topics.map((t) => t.name.length));
      for (const topic of topics) {
        console.log(`${topic.name.padEnd(width)}  ${topic.entryCount}`);
      }
    });

  return cmd;
}
