/**
 * TextIndex — small TF-IDF index over documents with text and keyword fields
 *
 * Each text field gets its own vocabulary and IDF table. A query is scored
 * against every field by cosine similarity; field scores are multiplied by
 * their boost and summed. Keyword fields only filter, by exact value. Stop words
 * are dropped from documents and queries alike.
 */

export type IndexDocument = Record<string, string | undefined>;

export interface TextIndexOptions {
  textFields: string[];
  keywordFields?: string[];
  /** Tokens left out of documents and queries. Defaults to `ENGLISH_STOP_WORDS`. */
  stopWords?: Iterable<string>;
}

export interface IndexSearchOptions {
  /** Field name → score multiplier. Unlisted fields count 1. */
  boost?: Record<string, number>;
  /** Keyword field name → required exact value. Non-keyword fields are ignored. */
  filter?: Record<string, string>;
  /** Maximum results, default 5. */
  topK?: number;
}

export interface IndexResult<T extends IndexDocument> {
  doc: T;
  index: number;
  score: number;
}

type SparseVector = Map<string, number>;

interface FieldIndex {
  idf: Map<string, number>;
  vectors: SparseVector[];
}

// Single letters stay: they are usually command flags (`ps -a`).
export const ENGLISH_STOP_WORDS: ReadonlySet<string> = new Set([
  'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'does', 'for', 'from',
  'has', 'have', 'how', 'in', 'into', 'is', 'me', 'my', 'of', 'on', 'or', 'so',
  'than', 'that', 'the', 'then', 'there', 'these', 'this', 'those', 'to', 'was',
  'what', 'when', 'where', 'which', 'who', 'why', 'will', 'with', 'you', 'your',
]);

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

function termCounts(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) counts.set(token, (counts.get(token) ?? 0) + 1);
  return counts;
}

/** Weight term counts by IDF and L2-normalise. Terms unknown to the index are dropped. */
function weigh(counts: Map<string, number>, idf: Map<string, number>): SparseVector {
  const vector: SparseVector = new Map();
  let norm = 0;
  for (const [term, count] of counts) {
    const weight = idf.get(term);
    if (weight === undefined) continue;
    const value = count * weight;
    vector.set(term, value);
    norm += value * value;
  }
  if (norm === 0) return vector;

  const length = Math.sqrt(norm);
  for (const [term, value] of vector) vector.set(term, value / length);
  return vector;
}

function dot(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let sum = 0;
  for (const [term, value] of small) {
    const other = large.get(term);
    if (other !== undefined) sum += value * other;
  }
  return sum;
}

export class TextIndex<T extends IndexDocument = IndexDocument> {
  private readonly textFields: string[];
  private readonly keywordFields: string[];
  private readonly stopWords: ReadonlySet<string>;
  private docs: T[] = [];
  private fields = new Map<string, FieldIndex>();

  constructor(options: TextIndexOptions) {
    this.textFields = [...options.textFields];
    this.keywordFields = [...(options.keywordFields ?? [])];
    this.stopWords = new Set(options.stopWords ?? ENGLISH_STOP_WORDS);
  }

  private terms(text: string): Map<string, number> {
    return termCounts(tokenize(text).filter((token) => !this.stopWords.has(token)));
  }

  get size(): number {
    return this.docs.length;
  }

  /** Build the index. Replaces anything fitted before. */
  fit(docs: readonly T[]): this {
    this.docs = [...docs];
    this.fields = new Map();
    const n = this.docs.length;

    for (const field of this.textFields) {
      const counts = this.docs.map((doc) => this.terms(doc[field] ?? ''));

      const df = new Map<string, number>();
      for (const docCounts of counts) {
        for (const term of docCounts.keys()) df.set(term, (df.get(term) ?? 0) + 1);
      }

      const idf = new Map<string, number>();
      for (const [term, freq] of df) idf.set(term, Math.log((1 + n) / (1 + freq)) + 1);

      this.fields.set(field, { idf, vectors: counts.map((c) => weigh(c, idf)) });
    }

    return this;
  }

  search(query: string, options: IndexSearchOptions = {}): Array<IndexResult<T>> {
    const { boost = {}, filter = {}, topK = 5 } = options;
    const queryCounts = this.terms(query);
    const scores = new Array<number>(this.docs.length).fill(0);

    for (const field of this.textFields) {
      const fieldIndex = this.fields.get(field);
      if (!fieldIndex) continue;
      const weight = boost[field] ?? 1;
      if (weight === 0) continue;

      const queryVector = weigh(queryCounts, fieldIndex.idf);
      if (queryVector.size === 0) continue;

      fieldIndex.vectors.forEach((vector, i) => {
        scores[i] += dot(queryVector, vector) * weight;
      });
    }

    const filters = Object.entries(filter).filter(([field]) => this.keywordFields.includes(field));

    const results: Array<IndexResult<T>> = [];
    this.docs.forEach((doc, index) => {
      const score = scores[index];
      if (score <= 0) return;
      if (!filters.every(([field, value]) => doc[field] === value)) return;
      results.push({ doc, index, score });
    });

    results.sort((a, b) => b.score - a.score || a.index - b.index);
    return results.slice(0, Math.max(0, topK));
  }
}
