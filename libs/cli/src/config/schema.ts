/**
 * Zod schemas for devnotes CLI configuration
 */

import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export const SEARCH_MODES = ['substring', 'ranked'] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);
export const SearchModeSchema = z.enum(SEARCH_MODES);

/**
 * Search configuration schema
 */
export const SearchConfigSchema = z.object({
  mode: SearchModeSchema.default('substring'),
  topK: z.number().int().positive().default(5),
  boost: z.record(z.string(), z.number().min(0)).default({ label: 3, description: 1, topic: 0.5 }),
});

export const CliConfigSchema = z.object({
  source: z.string().min(1),
  logLevel: LogLevelSchema.default('warn'),
  search: SearchConfigSchema.default({}),
});

/** Shape accepted in a YAML config file; every key optional. */
export const ConfigFileSchema = z
  .object({
    source: z.string().min(1).optional(),
    logLevel: LogLevelSchema.optional(),
    search: z
      .object({
        mode: SearchModeSchema.optional(),
        topK: z.number().int().positive().optional(),
        boost: z.record(z.string(), z.number().min(0)).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type CliConfig = z.infer<typeof CliConfigSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type SearchMode = z.infer<typeof SearchModeSchema>;
