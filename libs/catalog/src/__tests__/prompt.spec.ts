/**
 * Prompt builder tests
 */

import { buildPrompt, formatContext } from '../prompt';

describe('buildPrompt', () => {
  const hits = [
    { topic: 'Containers', entry: { label: 'docker ps', description: 'list running containers' } },
    { topic: 'Compose', entry: { label: 'docker compose up -d' } },
  ];

  it('formats each hit as a block', () => {
    expect(formatContext(hits)).toBe(
      'topic: Containers\ncommand: docker ps\nnote: list running containers\n\ntopic: Compose\ncommand: docker compose up -d',
    );
  });

  it('places question and context into the template', () => {
    const prompt = buildPrompt('How do I see running containers?', hits);
    const lines = prompt.split('\n');

    expect(lines[0]).toBe(
      "You're a developer assistant. Answer the QUESTION based on the CONTEXT from the notes catalog.",
    );
    expect(lines).toContain('QUESTION: How do I see running containers?');
    expect(prompt.endsWith('command: docker compose up -d')).toBe(true);
  });

  it('keeps dollar signs in the question literal', () => {
    expect(buildPrompt('what does $$ do?', [])).toContain('QUESTION: what does $$ do?');
  });

  it('ends at the CONTEXT header when there are no hits', () => {
    expect(buildPrompt('q', []).endsWith('CONTEXT:')).toBe(true);
  });
});
