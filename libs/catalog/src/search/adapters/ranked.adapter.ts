/**
 * RankedSearchAdapter — TF-IDF ranking over labels, descriptions and topic names
 */

import type { CatalogStore } from '../../catalog.store.js';
import type { Entry, RankedHit, SearchOptions } from '../../types.js';
import { TextIndex } from '../text-index.js';
import type { SearchAdapter } from '../types.js';

interface EntryDocument {
  [field: string]: string | undefined;
  label: string;
  description?: string;
  topic: string;
}

export const DEFAULT_BOOST: Readonly<Record<string, number>> = Object.freeze({
  label: 3,
  description: 1,
  topic: 0.5,
});

const DEFAULT_LIMIT = 5;

export class RankedSearchAdapter implements SearchAdapter {
  readonly id = 'ranked';
  readonly displayName = 'Ranked (TF-IDF)';

  private readonly index = new TextIndex<EntryDocument>({
    textFields: ['label', 'description', 'topic'],
    keywordFields: ['topic'],
  });
  private readonly entries: Entry[] = [];

  constructor(
    store: CatalogStore,
    private readonly defaultBoost: Readonly<Record<string, number>> = DEFAULT_BOOST,
  ) {
    const docs: EntryDocument[] = [];
    for (const topic of store.topics()) {
      for (const entry of topic.entries) {
        this.entries.push(entry);
        docs.push({ label: entry.label, description: entry.description, topic: topic.name });
      }
    }
    this.index.fit(docs);
  }

  search(query: string, options: SearchOptions = {}): RankedHit[] {
    const results = this.index.search(query, {
      boost: { ...this.defaultBoost, ...options.boost },
      filter: options.topic === undefined ? undefined : { topic: options.topic },
      topK: options.limit ?? DEFAULT_LIMIT,
    });

    return results.map(({ doc, index, score }) => ({
      topic: doc.topic,
      entry: this.entries[index],
      score,
    }));
  }
}
