/**
 * Typed error classes for the catalog library
 */

export class CatalogError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'CatalogError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ParseError extends CatalogError {
  public readonly line?: number;
  public readonly file?: string;

  constructor(message: string, opts?: { line?: number; file?: string }) {
    const where =
      opts?.file && opts.line !== undefined
        ? `${opts.file}:${opts.line}`
        : opts?.file ?? (opts?.line !== undefined ? `line ${opts.line}` : '');
    super(where ? `${where}: ${message}` : message, 'PARSE_ERROR');
    this.name = 'ParseError';
    this.line = opts?.line;
    this.file = opts?.file;
  }
}

export class NotFoundError extends CatalogError {
  public readonly topic: string;

  constructor(topic: string) {
    super(`Topic not found: ${topic}`, 'TOPIC_NOT_FOUND');
    this.name = 'NotFoundError';
    this.topic = topic;
  }
}

export class SourceNotFoundError extends CatalogError {
  public readonly path: string;

  constructor(sourcePath: string) {
    super(`Catalog source not found: ${sourcePath}`, 'SOURCE_NOT_FOUND');
    this.name = 'SourceNotFoundError';
    this.path = sourcePath;
  }
}
