/**
 * Configuration loader for the devnotes CLI
 *
 * Layers, lowest first: schema defaults, YAML config file, DEVNOTES_* environment
 * variables, command-line flags. The result is validated once with zod.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { findNotesDir } from '../utils/find-notes.js';
import { ConfigError } from './errors.js';
import { CliConfigSchema, ConfigFileSchema } from './schema.js';
import type { CliConfig, ConfigFile } from './schema.js';

export const DEFAULT_CONFIG_FILE = '.devnotesrc.yaml';

export const ENV_VARS = {
  source: 'DEVNOTES_SOURCE',
  logLevel: 'DEVNOTES_LOG_LEVEL',
  searchMode: 'DEVNOTES_SEARCH_MODE',
} as const;

/** Values given on the command line. */
export interface ConfigOverrides {
  config?: string;
  source?: string;
  logLevel?: string;
  mode?: string;
  limit?: number;
}

export interface LoadConfigOptions {
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface LoadedConfig {
  config: CliConfig;
  /** Config file that was read, if any. */
  configFile?: string;
}

/**
 * Read and validate a YAML config file. A relative `source` is resolved against
 * the file's directory.
 */
export function readConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${filePath}: ${reason}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${filePath}`, parsed.error.issues);
  }

  const data = parsed.data;
  if (data.source !== undefined) {
    data.source = path.resolve(path.dirname(filePath), data.source);
  }
  return data;
}

function locateConfigFile(explicit: string | undefined, cwd: string): string | undefined {
  if (explicit !== undefined) {
    const resolved = path.resolve(cwd, explicit);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    return resolved;
  }

  const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(candidate) ? candidate : undefined;
}

/**
 * Resolve the effective configuration.
 *
 * @throws ConfigError when the config file is missing or any layer holds an invalid value
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const { overrides = {}, env = process.env, cwd = process.cwd() } = options;

  const configFile = locateConfigFile(overrides.config, cwd);
  const file: ConfigFile = configFile ? readConfigFile(configFile) : {};

  const envSource = env[ENV_VARS.source];
  const source =
    overrides.source !== undefined
      ? path.resolve(cwd, overrides.source)
      : envSource
        ? path.resolve(cwd, envSource)
        : file.source ?? findNotesDir();

  const candidate = {
    source,
    logLevel: overrides.logLevel ?? env[ENV_VARS.logLevel] ?? file.logLevel,
    search: {
      ...file.search,
      mode: overrides.mode ?? env[ENV_VARS.searchMode] ?? file.search?.mode,
      topK: overrides.limit ?? file.search?.topK,
    },
  };

  const parsed = CliConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', parsed.error.issues);
  }

  return { config: parsed.data, configFile };
}
