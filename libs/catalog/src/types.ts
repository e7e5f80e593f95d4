/**
 * Catalog data model — shared across packages
 */

/** A single labeled item within a topic, usually one shell command. */
export interface Entry {
  readonly label: string;
  readonly description?: string;
}

/** A named, ordered group of entries. */
export interface Topic {
  readonly name: string;
  readonly entries: readonly Entry[];
}

/** Plain serialisable form of a catalog, as read from and written to JSON. */
export interface CatalogData {
  topics: Array<{ name: string; entries: Array<{ label: string; description?: string }> }>;
}

export interface SearchHit {
  topic: string;
  entry: Entry;
}

export interface RankedHit extends SearchHit {
  score: number;
}

export interface SearchOptions {
  /** Restrict results to a single topic (exact name match). */
  topic?: string;
  /** Maximum number of results. Unlimited when omitted. */
  limit?: number;
  /** Per-field score multipliers, used by ranked adapters only. */
  boost?: Record<string, number>;
}

/** Metadata read from a note file's YAML front matter. */
export interface NoteMetadata {
  title?: string;
}
