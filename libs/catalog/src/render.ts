/**
 * Canonical Markdown rendering of a catalog
 *
 * Output reloads into an equal catalog: one `#` heading per topic and one bullet
 * per entry with the label in a code span.
 */

import type { Entry, Topic } from './types.js';

/** Wrap a label in a code span long enough not to collide with backticks inside it. */
export function codeSpan(label: string): string {
  const longestRun = Math.max(0, ...(label.match(/`+/g) ?? []).map((run) => run.length));
  const fence = '`'.repeat(longestRun + 1);
  const pad = longestRun > 0 ? ' ' : '';
  return `${fence}${pad}${label}${pad}${fence}`;
}

export function renderEntry(entry: Entry): string {
  const label = codeSpan(entry.label);
  return entry.description ? `- ${label} - ${entry.description}` : `- ${label}`;
}

export function renderCatalog(topics: readonly Topic[]): string {
  if (topics.length === 0) return '';

  const blocks = topics.map((topic) => {
    const heading = `# ${topic.name}`;
    if (topic.entries.length === 0) return heading;
    return `${heading}\n\n${topic.entries.map(renderEntry).join('\n')}`;
  });

  return `${blocks.join('\n\n')}\n`;
}
