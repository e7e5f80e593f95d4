/**
 * Catalog service — Search via pluggable adapters + topic detail/list operations
 */

import type { CatalogStore } from '../catalog.store.js';
import type { Entry, RankedHit, SearchOptions } from '../types.js';
import type { SearchAdapter } from './types.js';

export interface TopicSummary {
  name: string;
  entryCount: number;
}

export class CatalogService {
  constructor(
    private readonly store: CatalogStore,
    private readonly searchAdapters: SearchAdapter[],
  ) {}

  /**
   * Run every adapter in order, keeping the first hit for each entry. Adapters
   * return the store's own entry objects, so two entries that share a label stay
   * distinct.
   */
  search(query: string, options?: SearchOptions): RankedHit[] {
    const results: RankedHit[] = [];
    const seen = new Set<Entry>();

    for (const adapter of this.searchAdapters) {
      for (const hit of adapter.search(query, options)) {
        if (!seen.has(hit.entry)) {
          seen.add(hit.entry);
          results.push(hit);
        }
      }
    }

    return options?.limit === undefined ? results : results.slice(0, options.limit);
  }

  getTopic(name: string): { topic: string; entries: readonly Entry[] } | null {
    if (!this.store.hasTopic(name)) return null;
    return { topic: name, entries: this.store.getEntries(name) };
  }

  listTopics(): TopicSummary[] {
    return this.store.topics().map((t) => ({ name: t.name, entryCount: t.entries.length }));
  }
}
