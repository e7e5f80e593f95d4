/**
 * CatalogStore tests
 */

import * as path from 'node:path';
import { CatalogStore } from '../catalog.store';
import { NotFoundError, ParseError } from '../errors';
import { loadCatalog } from '../loader';

const NOTES_DIR = path.resolve(__dirname, '../../../../notes');

const SAMPLE = `
# Images

- \`docker build -t <name> .\` - build an image
- \`docker images\` - list local images

# Containers

- \`docker ps\` - list running containers
- \`kubectl get pods\` - list pods, not Docker containers
- \`podman ps\`
`;

describe('CatalogStore', () => {
  describe('load', () => {
    it('produces an empty catalog from empty input', () => {
      const store = CatalogStore.load('');
      expect(store.listTopics()).toEqual([]);
      expect(store.size).toBe(0);
      expect(store.entryCount).toBe(0);
      expect(store.search('')).toEqual([]);
    });

    it('fails with ParseError on an entry outside any topic', () => {
      expect(() => CatalogStore.load('- docker ps')).toThrow(ParseError);
    });

    it('keeps front matter metadata', () => {
      const store = CatalogStore.load('---\ntitle: Cheatsheet\n---\n# A\n- one');
      expect(store.metadata).toEqual({ title: 'Cheatsheet' });
    });
  });

  describe('listTopics', () => {
    it('returns topic names in source order', () => {
      const store = CatalogStore.load('# Zeta\n- z\n# Alpha\n- a\n# Mid\n');
      expect(store.listTopics()).toEqual(['Zeta', 'Alpha', 'Mid']);
    });
  });

  describe('getEntries', () => {
    const store = CatalogStore.load(SAMPLE);

    it('returns entries in source order', () => {
      expect(store.getEntries('Containers').map((e) => e.label)).toEqual(['docker ps', 'kubectl get pods', 'podman ps']);
    });

    it('fails with NotFoundError for an unknown topic', () => {
      expect(() => store.getEntries('Volumes')).toThrow(NotFoundError);
      expect(() => store.getEntries('Volumes')).toThrow('Topic not found: Volumes');
    });

    it('is case-sensitive on topic names', () => {
      expect(store.hasTopic('images')).toBe(false);
      expect(store.hasTopic('Images')).toBe(true);
    });
  });

  describe('search', () => {
    const store = CatalogStore.load(SAMPLE);

    it('matches labels and descriptions case-insensitively in topic then entry order', () => {
      const hits = store.search('DOCKER');
      expect(hits.map((h) => [h.topic, h.entry.label])).toEqual([
        ['Images', 'docker build -t <name> .'],
        ['Images', 'docker images'],
        ['Containers', 'docker ps'],
        ['Containers', 'kubectl get pods'],
      ]);
    });

    it('returns every entry for an empty query', () => {
      expect(store.search('')).toHaveLength(5);
    });

    it('returns an empty list when nothing matches', () => {
      expect(store.search('helm')).toEqual([]);
    });
  });

  describe('fromTopics', () => {
    it('trims names and labels and drops empty descriptions', () => {
      const store = CatalogStore.fromTopics([{ name: ' A ', entries: [{ label: ' one ', description: '  ' }] }]);
      expect(store.toJSON()).toEqual({ topics: [{ name: 'A', entries: [{ label: 'one' }] }] });
    });

    it('rejects duplicate names', () => {
      expect(() =>
        CatalogStore.fromTopics([
          { name: 'A', entries: [] },
          { name: 'A', entries: [] },
        ]),
      ).toThrow('Duplicate topic "A"');
    });

    it('rejects names ending in heading markers and values with line breaks', () => {
      expect(() => CatalogStore.fromTopics([{ name: 'C ##', entries: [] }])).toThrow(
        'Topic name "C ##" ends with heading markers',
      );
      expect(() => CatalogStore.fromTopics([{ name: 'A\nB', entries: [] }])).toThrow(ParseError);
      expect(() => CatalogStore.fromTopics([{ name: 'A', entries: [{ label: 'x\ny' }] }])).toThrow(
        'Entry "x\ny" in topic "A" contains a line break',
      );
    });

    it('keeps the metadata it is given', () => {
      expect(CatalogStore.fromTopics([], { title: 'Notes' }).metadata).toEqual({ title: 'Notes' });
      expect(CatalogStore.fromTopics([]).metadata).toEqual({});
    });
  });

  describe('render round trip', () => {
    it('reloads rendered text into an equal structure', () => {
      const store = CatalogStore.load(SAMPLE);
      const reloaded = CatalogStore.load(store.render());
      expect(reloaded.equals(store)).toBe(true);
      expect(reloaded.toJSON()).toEqual(store.toJSON());
    });

    it('round-trips labels that contain backticks and dashes', () => {
      const store = CatalogStore.fromTopics([
        {
          name: 'Shell',
          entries: [
            { label: 'echo `date`', description: '-n drops the newline' },
            { label: 'ls - la' },
            { label: '`quoted`' },
          ],
        },
        { name: 'Empty', entries: [] },
      ]);
      expect(CatalogStore.load(store.render()).equals(store)).toBe(true);
    });

    it('detects differences in entry order', () => {
      const a = CatalogStore.load('# A\n- one\n- two');
      const b = CatalogStore.load('# A\n- two\n- one');
      expect(a.equals(b)).toBe(false);
    });
  });

  describe('bundled notes', () => {
    const { store } = loadCatalog(NOTES_DIR);

    it('lists topics in file then heading order', () => {
      expect(store.listTopics()).toEqual(['Images', 'Containers', 'Compose', 'RAG', 'Vector search', 'Elasticsearch']);
    });

    it('finds every docker command', () => {
      const labels = store.search('docker').map((h) => h.entry.label);
      expect(labels).toContain('docker build -t <name> .');
      expect(labels).toContain('docker ps');
      expect(labels).toHaveLength(15);
      expect(labels.every((l) => l.toLowerCase().includes('docker'))).toBe(true);
    });

    it('returns all entries for an empty query', () => {
      expect(store.search('')).toHaveLength(store.entryCount);
      expect(store.entryCount).toBe(23);
    });

    it('survives a render round trip', () => {
      expect(CatalogStore.load(store.render()).equals(store)).toBe(true);
    });
  });
});
