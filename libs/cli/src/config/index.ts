/**
 * Configuration utilities
 */

export * from './schema.js';
export * from './loader.js';
export * from './errors.js';
