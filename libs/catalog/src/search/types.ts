/**
 * Catalog search adapter interfaces
 */

import type { RankedHit, SearchOptions } from '../types.js';

/** Adapter for pluggable search strategies. Multiple adapters run together. */
export interface SearchAdapter {
  /** Unique adapter identifier */
  readonly id: string;
  /** Human-readable name */
  readonly displayName: string;
  /** Search for entries matching the query. */
  search(query: string, options?: SearchOptions): RankedHit[];
}
