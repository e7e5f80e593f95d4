/**
 * Command context
 *
 * Resolves configuration from the global options, creates the logger and loads
 * the catalog once per invocation.
 */

import type { Command } from 'commander';
import {
  CatalogService,
  RankedSearchAdapter,
  SubstringSearchAdapter,
  loadCatalog,
} from '@devnotes/catalog';
import type { CatalogStore, SearchAdapter } from '@devnotes/catalog';
import { loadConfig } from './config/index.js';
import type { CliConfig, ConfigOverrides, SearchMode } from './config/index.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

export interface CommandContext {
  config: CliConfig;
  logger: Logger;
  store: CatalogStore;
  createService(mode?: SearchMode): CatalogService;
}

/** Options the root program defines for every command. */
export interface GlobalOptions {
  source?: string;
  config?: string;
  logLevel?: string;
}

function readGlobals(cmd: Command): GlobalOptions {
  const opts: Record<string, unknown> = cmd.optsWithGlobals();
  const str = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);
  return { source: str(opts.source), config: str(opts.config), logLevel: str(opts.logLevel) };
}

export function createAdapters(store: CatalogStore, config: CliConfig, mode: SearchMode): SearchAdapter[] {
  return mode === 'ranked'
    ? [new RankedSearchAdapter(store, config.search.boost)]
    : [new SubstringSearchAdapter(store)];
}

export function createContext(cmd: Command, extra: Omit<ConfigOverrides, keyof GlobalOptions> = {}): CommandContext {
  const { config, configFile } = loadConfig({ overrides: { ...readGlobals(cmd), ...extra } });
  const logger = createLogger(config.logLevel);
  logger.debug({ configFile, source: config.source, search: config.search }, 'configuration resolved');

  const { store, files, metadata } = loadCatalog(config.source);
  const titles = files.flatMap((file) => metadata[file]?.title ?? []);
  logger.debug(
    { files: files.length, titles, topics: store.size, entries: store.entryCount },
    'catalog loaded',
  );

  return {
    config,
    logger,
    store,
    createService: (mode = config.search.mode) => new CatalogService(store, createAdapters(store, config, mode)),
  };
}
