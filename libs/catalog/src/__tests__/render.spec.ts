/**
 * Renderer tests
 */

import { codeSpan, renderCatalog } from '../render';
import { CatalogStore } from '../catalog.store';

describe('codeSpan', () => {
  it('uses a single backtick for plain labels', () => {
    expect(codeSpan('docker ps')).toBe('`docker ps`');
  });

  it('lengthens the fence past backtick runs inside the label', () => {
    expect(codeSpan('echo `date`')).toBe('`` echo `date` ``');
    expect(codeSpan('a``b')).toBe('``` a``b ```');
  });
});

describe('renderCatalog', () => {
  it('renders nothing for an empty catalog', () => {
    expect(renderCatalog([])).toBe('');
  });

  it('renders headings and bullets separated by blank lines', () => {
    const store = CatalogStore.fromTopics([
      { name: 'Images', entries: [{ label: 'docker images', description: 'list local images' }, { label: 'docker pull <image>' }] },
      { name: 'Empty', entries: [] },
    ]);

    expect(renderCatalog(store.topics())).toBe(
      '# Images\n\n- `docker images` - list local images\n- `docker pull <image>`\n\n# Empty\n',
    );
  });
});
