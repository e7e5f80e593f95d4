/**
 * @devnotes/catalog — Note catalog: parsing, lookup, search and rendering
 *
 * @packageDocumentation
 */

// Store
export { CatalogStore } from './catalog.store.js';

// Parsing and rendering
export { parseNotes, parseEntryText } from './parser/markdown.js';
export type { ParseOptions, ParsedNotes } from './parser/markdown.js';
export { renderCatalog, renderEntry, codeSpan } from './render.js';

// Loading from disk
export { loadCatalog, loadCatalogFile, loadCatalogDir, listNoteFiles, CatalogDataSchema } from './loader.js';
export type { LoadedSource } from './loader.js';

// Search
export { CatalogService } from './search/catalog.service.js';
export type { TopicSummary } from './search/catalog.service.js';
export { SubstringSearchAdapter } from './search/adapters/substring.adapter.js';
export { RankedSearchAdapter, DEFAULT_BOOST } from './search/adapters/ranked.adapter.js';
export type { SearchAdapter } from './search/types.js';
export { ENGLISH_STOP_WORDS, TextIndex, tokenize } from './search/text-index.js';
export type { IndexDocument, IndexResult, IndexSearchOptions, TextIndexOptions } from './search/text-index.js';

// Prompt
export { buildPrompt, formatContext } from './prompt.js';

// Errors
export { CatalogError, ParseError, NotFoundError, SourceNotFoundError } from './errors.js';

// Types
export type { Entry, Topic, CatalogData, SearchHit, RankedHit, SearchOptions, NoteMetadata } from './types.js';
