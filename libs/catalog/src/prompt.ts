/**
 * Prompt assembly for answering a question from catalog hits
 */

import type { SearchHit } from './types.js';

const PROMPT_TEMPLATE = `
You're a developer assistant. Answer the QUESTION based on the CONTEXT from the notes catalog.
Use only the facts from the CONTEXT when answering the QUESTION.

QUESTION: {question}

CONTEXT:
{context}
`.trim();

export function formatContext(hits: readonly SearchHit[]): string {
  return hits
    .map((hit) => {
      const lines = [`topic: ${hit.topic}`, `command: ${hit.entry.label}`];
      if (hit.entry.description) lines.push(`note: ${hit.entry.description}`);
      return lines.join('\n');
    })
    .join('\n\n');
}

export function buildPrompt(question: string, hits: readonly SearchHit[]): string {
  return PROMPT_TEMPLATE.replace('{question}', () => question)
    .replace('{context}', () => formatContext(hits))
    .trim();
}
