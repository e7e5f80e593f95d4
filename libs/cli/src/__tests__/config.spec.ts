/**
 * CLI configuration loader tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigError, DEFAULT_CONFIG_FILE, loadConfig } from '../config';
import { findNotesDir } from '../utils/find-notes';

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'devnotes-config-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  function writeConfig(content: string, name = DEFAULT_CONFIG_FILE): string {
    const file = path.join(cwd, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  }

  it('falls back to defaults and the bundled notes', () => {
    const { config, configFile } = loadConfig({ env: {}, cwd });

    expect(configFile).toBeUndefined();
    expect(config).toEqual({
      source: findNotesDir(),
      logLevel: 'warn',
      search: { mode: 'substring', topK: 5, boost: { label: 3, description: 1, topic: 0.5 } },
    });
  });

  it('finds the bundled notes directory', () => {
    expect(fs.existsSync(path.join(findNotesDir(), '01-containers.md'))).toBe(true);
  });

  it('reads .devnotesrc.yaml from the working directory', () => {
    const file = writeConfig('source: ./mine\nlogLevel: info\nsearch:\n  mode: ranked\n  topK: 3\n');
    const { config, configFile } = loadConfig({ env: {}, cwd });

    expect(configFile).toBe(file);
    expect(config.source).toBe(path.join(cwd, 'mine'));
    expect(config.logLevel).toBe('info');
    expect(config.search).toEqual({ mode: 'ranked', topK: 3, boost: { label: 3, description: 1, topic: 0.5 } });
  });

  it('lets environment variables override the file', () => {
    writeConfig('source: ./mine\nlogLevel: info\n');
    const { config } = loadConfig({
      env: { DEVNOTES_SOURCE: 'other', DEVNOTES_LOG_LEVEL: 'debug', DEVNOTES_SEARCH_MODE: 'ranked' },
      cwd,
    });

    expect(config.source).toBe(path.join(cwd, 'other'));
    expect(config.logLevel).toBe('debug');
    expect(config.search.mode).toBe('ranked');
  });

  it('lets command-line flags override everything', () => {
    writeConfig('search:\n  topK: 3\n  boost:\n    label: 10\n', 'custom.yaml');
    const { config } = loadConfig({
      overrides: { config: 'custom.yaml', source: 'flag-notes', logLevel: 'error', mode: 'substring', limit: 9 },
      env: { DEVNOTES_LOG_LEVEL: 'debug', DEVNOTES_SEARCH_MODE: 'ranked' },
      cwd,
    });

    expect(config.source).toBe(path.join(cwd, 'flag-notes'));
    expect(config.logLevel).toBe('error');
    expect(config.search).toEqual({ mode: 'substring', topK: 9, boost: { label: 10 } });
  });

  it('treats an empty config file as no settings', () => {
    writeConfig('');
    expect(loadConfig({ env: {}, cwd }).config.logLevel).toBe('warn');
  });

  it('rejects invalid values with the offending path', () => {
    const err = configErrorOf(() => loadConfig({ env: { DEVNOTES_SEARCH_MODE: 'fuzzy' }, cwd }));
    expect(err.code).toBe('CONFIG_INVALID');
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0].startsWith('search.mode: ')).toBe(true);
  });

  it('rejects unknown keys in the config file', () => {
    writeConfig('colour: red\n');
    const err = configErrorOf(() => loadConfig({ env: {}, cwd }));
    expect(err.issues).toEqual(["(root): Unrecognized key(s) in object: 'colour'"]);
  });

  it('rejects a config file that is not valid YAML', () => {
    writeConfig('search: [unclosed\n');
    expect(() => loadConfig({ env: {}, cwd })).toThrow(/^Cannot read config file /);
  });

  it('fails when an explicit config file is missing', () => {
    expect(() => loadConfig({ overrides: { config: 'nope.yaml' }, env: {}, cwd })).toThrow(
      `Config file not found: ${path.join(cwd, 'nope.yaml')}`,
    );
  });
});
