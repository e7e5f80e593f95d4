/**
 * Configuration error types
 */

import type { ZodIssue } from 'zod';

export class ConfigError extends Error {
  public readonly code = 'CONFIG_INVALID';
  public readonly issues: string[];

  constructor(message: string, issues: ZodIssue[] = []) {
    const details = issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
    super(details.length > 0 ? `${message}\n  ${details.join('\n  ')}` : message);
    this.name = 'ConfigError';
    this.issues = details;
    Error.captureStackTrace?.(this, this.constructor);
  }
}
