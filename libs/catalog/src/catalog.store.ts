/**
 * CatalogStore — immutable, read-only view over loaded topics and entries
 */

import { NotFoundError, ParseError } from './errors.js';
import { parseNotes } from './parser/markdown.js';
import type { ParseOptions } from './parser/markdown.js';
import { renderCatalog } from './render.js';
import type { CatalogData, Entry, NoteMetadata, SearchHit, Topic } from './types.js';

const LINE_BREAK_RE = /[\r\n]/;
const TRAILING_MARKER_RE = /\s#+$/;

export class CatalogStore {
  private readonly byName: ReadonlyMap<string, Topic>;

  private constructor(
    private readonly ordered: readonly Topic[],
    readonly metadata: NoteMetadata = {},
  ) {
    this.byName = new Map(ordered.map((t) => [t.name, t]));
  }

  /**
   * Parse note text into a store. Empty input gives an empty catalog.
   *
   * @throws ParseError when the text is malformed
   */
  static load(source: string, options?: ParseOptions): CatalogStore {
    const { metadata, topics } = parseNotes(source, options);
    return new CatalogStore(Object.freeze(topics), metadata);
  }

  /**
   * Build a store from already structured topics. Values that would not survive
   * a render and reload are rejected.
   *
   * @throws ParseError on duplicate or empty topic names, empty labels, line
   *   breaks, or a name ending in heading markers
   */
  static fromTopics(
    topics: ReadonlyArray<{ name: string; entries: readonly Entry[] }>,
    metadata: NoteMetadata = {},
  ): CatalogStore {
    const seen = new Set<string>();
    const frozen = topics.map((topic) => {
      const name = topic.name.trim();
      if (!name) throw new ParseError('Empty topic name');
      if (LINE_BREAK_RE.test(name)) throw new ParseError(`Topic name "${name}" contains a line break`);
      if (TRAILING_MARKER_RE.test(name)) throw new ParseError(`Topic name "${name}" ends with heading markers`);
      if (seen.has(name)) throw new ParseError(`Duplicate topic "${name}"`);
      seen.add(name);

      const entries = topic.entries.map((entry) => {
        const label = entry.label.trim();
        if (!label) throw new ParseError(`Entry with an empty label in topic "${name}"`);
        const description = entry.description?.trim();
        if (LINE_BREAK_RE.test(label) || (description !== undefined && LINE_BREAK_RE.test(description))) {
          throw new ParseError(`Entry "${label}" in topic "${name}" contains a line break`);
        }
        return Object.freeze(description ? { label, description } : { label });
      });

      return Object.freeze({ name, entries: Object.freeze(entries) });
    });

    return new CatalogStore(Object.freeze(frozen), Object.freeze({ ...metadata }));
  }

  static empty(): CatalogStore {
    return new CatalogStore(Object.freeze([]));
  }

  get size(): number {
    return this.ordered.length;
  }

  get entryCount(): number {
    return this.ordered.reduce((sum, t) => sum + t.entries.length, 0);
  }

  topics(): readonly Topic[] {
    return this.ordered;
  }

  listTopics(): string[] {
    return this.ordered.map((t) => t.name);
  }

  hasTopic(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * @throws NotFoundError when no topic has this name
   */
  getEntries(topicName: string): readonly Entry[] {
    const topic = this.byName.get(topicName);
    if (!topic) throw new NotFoundError(topicName);
    return topic.entries;
  }

  /**
   * Case-insensitive substring match over labels and descriptions, in topic
   * then entry order. An empty query matches every entry.
   */
  search(query: string): SearchHit[] {
    const needle = query.toLowerCase();
    const hits: SearchHit[] = [];

    for (const topic of this.ordered) {
      for (const entry of topic.entries) {
        if (
          entry.label.toLowerCase().includes(needle) ||
          (entry.description?.toLowerCase().includes(needle) ?? false)
        ) {
          hits.push({ topic: topic.name, entry });
        }
      }
    }

    return hits;
  }

  render(): string {
    return renderCatalog(this.ordered);
  }

  /** Structural equality: same topic names and the same entries in the same order. */
  equals(other: CatalogStore): boolean {
    const a = this.ordered;
    const b = other.topics();
    if (a.length !== b.length) return false;

    return a.every((topic, i) => {
      const theirs = b[i];
      if (topic.name !== theirs.name || topic.entries.length !== theirs.entries.length) return false;
      return topic.entries.every(
        (entry, j) =>
          entry.label === theirs.entries[j].label && entry.description === theirs.entries[j].description,
      );
    });
  }

  toJSON(): CatalogData {
    return {
      topics: this.ordered.map((t) => ({
        name: t.name,
        entries: t.entries.map((e) => (e.description === undefined ? { label: e.label } : { ...e })),
      })),
    };
  }
}
