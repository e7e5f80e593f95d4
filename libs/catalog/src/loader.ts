/**
 * Catalog loader
 *
 * Reads note files from disk: a single Markdown or JSON file, or every such file
 * in a directory (sorted by name). Topics from several files are concatenated in
 * file order and must stay unique across files.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { CatalogStore } from './catalog.store.js';
import { CatalogError, ParseError, SourceNotFoundError } from './errors.js';
import { parseNotes } from './parser/markdown.js';
import type { NoteMetadata, Topic } from './types.js';

const NOTE_EXTENSIONS = new Set(['.md', '.markdown', '.json']);

export const CatalogDataSchema = z.object({
  topics: z.array(
    z.object({
      name: z.string().min(1),
      entries: z.array(
        z.object({
          label: z.string().min(1),
          description: z.string().optional(),
        }),
      ),
    }),
  ),
});

export interface LoadedSource {
  store: CatalogStore;
  files: string[];
  /** Front matter of each file (empty for JSON), keyed by its path in `files`. */
  metadata: Record<string, NoteMetadata>;
}

interface NoteFile {
  topics: readonly Topic[];
  metadata: NoteMetadata;
}

function readNoteFile(filePath: string): NoteFile {
  const file = path.basename(filePath);
  const content = fs.readFileSync(filePath, 'utf-8');

  if (path.extname(filePath).toLowerCase() !== '.json') {
    return parseNotes(content, { file });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(`Invalid JSON: ${reason}`, { file });
  }

  const parsed = CatalogDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ParseError(`Invalid catalog: ${issues}`, { file });
  }

  try {
    return { topics: CatalogStore.fromTopics(parsed.data.topics).topics(), metadata: {} };
  } catch (err) {
    if (err instanceof ParseError) throw new ParseError(err.message, { file });
    throw err;
  }
}

/**
 * Read every file and merge its topics in order. A single file keeps its front
 * matter on the store; for several files it stays per file in `metadata`.
 */
function mergeFiles(files: string[]): Omit<LoadedSource, 'files'> {
  const merged: Topic[] = [];
  const owner = new Map<string, string>();
  const metadata: Record<string, NoteMetadata> = {};

  for (const filePath of files) {
    const file = path.basename(filePath);
    const note = readNoteFile(filePath);
    metadata[filePath] = note.metadata;

    for (const topic of note.topics) {
      const previous = owner.get(topic.name);
      if (previous !== undefined) {
        throw new ParseError(`Duplicate topic "${topic.name}" (already defined in ${previous})`, { file });
      }
      owner.set(topic.name, file);
      merged.push(topic);
    }
  }

  const storeMetadata = files.length === 1 ? metadata[files[0]] : {};
  return { store: CatalogStore.fromTopics(merged, storeMetadata), metadata };
}

/** Note files directly inside `dir`, sorted by file name. */
export function listNoteFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && NOTE_EXTENSIONS.has(path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}

export function loadCatalogFile(filePath: string): CatalogStore {
  if (!fs.existsSync(filePath)) throw new SourceNotFoundError(filePath);
  return mergeFiles([filePath]).store;
}

export function loadCatalogDir(dir: string): CatalogStore {
  if (!fs.existsSync(dir)) throw new SourceNotFoundError(dir);
  return mergeFiles(listNoteFiles(dir)).store;
}

/**
 * Load a catalog from a file or a directory of note files.
 *
 * @throws SourceNotFoundError when the path does not exist
 * @throws ParseError when any file is malformed
 */
export function loadCatalog(sourcePath: string): LoadedSource {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(sourcePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new SourceNotFoundError(sourcePath);
    }
    throw err;
  }

  if (stat.isDirectory()) {
    const files = listNoteFiles(sourcePath);
    return { ...mergeFiles(files), files };
  }
  if (!stat.isFile()) {
    throw new CatalogError(`Catalog source is not a file or directory: ${sourcePath}`, 'SOURCE_INVALID');
  }
  return { ...mergeFiles([sourcePath]), files: [sourcePath] };
}
