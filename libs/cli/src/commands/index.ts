/**
 * CLI Commands
 *
 * Exports all command creator functions for registration in the main CLI.
 */

export { createTopicsCommand } from './topics.js';
export { createShowCommand } from './show.js';
export { createSearchCommand } from './search.js';
export { createRenderCommand } from './render.js';
export { createPromptCommand } from './prompt.js';
