/**
 * Markdown note parser
 *
 * Turns a note file into topics and entries. Headings open topics; bullet lines
 * and the non-blank lines of fenced code blocks become entries. Indented lines
 * directly under a bullet extend that entry's description. Everything else is
 * prose and is skipped.
 */

import { parse as parseYaml } from 'yaml';
import { ParseError } from '../errors.js';
import type { Entry, NoteMetadata, Topic } from '../types.js';

export interface ParseOptions {
  /** File name reported in parse errors. */
  file?: string;
}

export interface ParsedNotes {
  metadata: NoteMetadata;
  topics: Topic[];
}

interface MutableEntry {
  label: string;
  description?: string;
}

interface MutableTopic {
  name: string;
  entries: MutableEntry[];
}

const HEADING_RE = /^(#{1,6})(?:\s+(.*))?$/;
const BULLET_RE = /^\s*[-*+](?:\s+(.*))?$/;
const FENCE_RE = /^\s*(`{3,}|~{3,})/;
const CONTINUATION_RE = /^(?: {2,}|\t)\s*\S/;
const SEPARATOR_RE = /\s+[—–-]\s+/;
const LEADING_SEPARATOR_RE = /^[—–:-]\s*/;
const BACKTICK_LABEL_RE = /^(`+)(.+?)\1(?!`)(.*)$/;

/**
 * Split the text of a bullet into label and description.
 *
 * `` `docker ps` - list containers `` and `docker ps — list containers` both give
 * the label `docker ps`.
 */
export function parseEntryText(text: string, line?: number, file?: string): Entry {
  const trimmed = text.trim();
  let label: string;
  let description: string | undefined;

  const quoted = trimmed.match(BACKTICK_LABEL_RE);
  if (quoted) {
    label = quoted[2].trim();
    const rest = quoted[3].trim().replace(LEADING_SEPARATOR_RE, '').trim();
    description = rest || undefined;
  } else {
    const sep = SEPARATOR_RE.exec(trimmed);
    if (sep) {
      label = trimmed.slice(0, sep.index).trim();
      description = trimmed.slice(sep.index + sep[0].length).trim() || undefined;
    } else {
      label = trimmed;
    }
  }

  if (!label) {
    throw new ParseError('Entry has an empty label', { line, file });
  }

  return description === undefined ? { label } : { label, description };
}

/**
 * Split off YAML front matter. Returns the metadata and the index of the first
 * body line.
 */
function readFrontMatter(lines: string[], file?: string): { metadata: NoteMetadata; bodyStart: number } {
  if (lines.length === 0 || lines[0].trim() !== '---') {
    return { metadata: {}, bodyStart: 0 };
  }

  const end = lines.findIndex((l, i) => i > 0 && l.trim() === '---');
  if (end === -1) {
    throw new ParseError('Unterminated front matter', { line: 1, file });
  }

  let raw: unknown;
  try {
    raw = parseYaml(lines.slice(1, end).join('\n'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(`Invalid front matter: ${reason}`, { line: 1, file });
  }

  if (raw === null || raw === undefined) {
    return { metadata: {}, bodyStart: end + 1 };
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ParseError('Front matter must be a mapping', { line: 1, file });
  }

  const metadata: NoteMetadata = {};
  if ('title' in raw && typeof raw.title === 'string') metadata.title = raw.title;

  return { metadata, bodyStart: end + 1 };
}

function freezeTopics(topics: MutableTopic[]): Topic[] {
  return topics.map((t) =>
    Object.freeze({
      name: t.name,
      entries: Object.freeze(t.entries.map((e) => Object.freeze({ ...e }))),
    }),
  );
}

/**
 * Parse note text into topics.
 *
 * @throws ParseError on an entry outside any topic, a duplicate or empty heading,
 *   an indented line before the first topic, or an unterminated fence
 */
export function parseNotes(source: string, options: ParseOptions = {}): ParsedNotes {
  const { file } = options;
  if (source.trim() === '') {
    return { metadata: {}, topics: [] };
  }

  const lines = source.split(/\r?\n/);
  const { metadata, bodyStart } = readFrontMatter(lines, file);

  const topics: MutableTopic[] = [];
  const names = new Set<string>();
  let current: MutableTopic | null = null;
  let lastEntry: MutableEntry | null = null;
  let fence: { marker: string; line: number } | null = null;

  const addEntry = (entry: MutableEntry, line: number): MutableEntry => {
    if (!current) {
      throw new ParseError('Entry outside of any topic', { line, file });
    }
    current.entries.push(entry);
    return entry;
  };

  for (let i = bodyStart; i < lines.length; i++) {
    const line = lines[i];
    const lineNo = i + 1;

    if (fence) {
      const trimmed = line.trim();
      if (trimmed.startsWith(fence.marker)) {
        fence = null;
      } else if (trimmed) {
        addEntry({ label: trimmed }, lineNo);
      }
      continue;
    }

    const fenceOpen = line.match(FENCE_RE);
    if (fenceOpen) {
      fence = { marker: fenceOpen[1], line: lineNo };
      lastEntry = null;
      continue;
    }

    const heading = line.match(HEADING_RE);
    if (heading) {
      const name = (heading[2] ?? '').replace(/(?:\s+#+)+\s*$/, '').trim();
      if (!name) {
        throw new ParseError('Empty topic heading', { line: lineNo, file });
      }
      if (names.has(name)) {
        throw new ParseError(`Duplicate topic "${name}"`, { line: lineNo, file });
      }
      names.add(name);
      current = { name, entries: [] };
      topics.push(current);
      lastEntry = null;
      continue;
    }

    const bullet = line.match(BULLET_RE);
    if (bullet) {
      lastEntry = addEntry({ ...parseEntryText(bullet[1] ?? '', lineNo, file) }, lineNo);
      continue;
    }

    if (CONTINUATION_RE.test(line)) {
      if (lastEntry) {
        const text = line.trim();
        lastEntry.description = lastEntry.description ? `${lastEntry.description} ${text}` : text;
        continue;
      }
      // Indented prose or code inside a topic is skipped like any other prose
      if (!current) {
        throw new ParseError('Continuation line without an entry', { line: lineNo, file });
      }
      continue;
    }

    if (line.trim()) {
      // Prose between entries
      lastEntry = null;
    }
  }

  if (fence) {
    throw new ParseError('Unterminated code fence', { line: fence.line, file });
  }

  return { metadata, topics: freezeTopics(topics) };
}
