/**
 * Render command
 *
 * Prints the loaded catalog as canonical Markdown.
 */

import { Command } from 'commander';
import { createContext } from '../context.js';

export function createRenderCommand(): Command {
  const cmd = new Command('render')
    .description('Print the catalog as canonical Markdown')
    .action((_options: Record<string, unknown>, command: Command) => {
      const ctx = createContext(command);
      process.stdout.write(ctx.store.render());
    });

  return cmd;
}
