/**
 * SubstringSearchAdapter — Wraps CatalogStore.search() for plain substring lookup
 */

import type { CatalogStore } from '../../catalog.store.js';
import type { RankedHit, SearchOptions } from '../../types.js';
import type { SearchAdapter } from '../types.js';

export class SubstringSearchAdapter implements SearchAdapter {
  readonly id = 'substring';
  readonly displayName = 'Substring Match';

  constructor(private readonly store: CatalogStore) {}

  search(query: string, options: SearchOptions = {}): RankedHit[] {
    const hits = this.store
      .search(query)
      .filter((hit) => options.topic === undefined || hit.topic === options.topic)
      .map((hit) => ({ ...hit, score: 1 }));
    return options.limit === undefined ? hits : hits.slice(0, options.limit);
  }
}
