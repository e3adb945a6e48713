/**
 * Error handling for catalog loading
 */

export type CatalogErrorCode = 'CATALOG_NOT_FOUND' | 'CATALOG_PARSE_ERROR' | 'CATALOG_INVALID';

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  /**
   * File the error is about
   */
  readonly filePath: string;

  /**
   * Schema violations, for CATALOG_INVALID
   */
  readonly details: Array<{ path: string; message: string }>;

  constructor(
    message: string,
    code: CatalogErrorCode,
    filePath: string,
    details: Array<{ path: string; message: string }> = []
  ) {
    super(message);
    this.name = 'CatalogError';
    this.code = code;
    this.filePath = filePath;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CatalogError);
    }
  }

  is(code: CatalogErrorCode): boolean {
    return this.code === code;
  }

  getUserMessage(): string {
    switch (this.code) {
      case 'CATALOG_NOT_FOUND':
        return `Catalog file not found: ${this.filePath}. Point catalogDir at a directory holding the exported symbol tables.`;
      case 'CATALOG_PARSE_ERROR':
        return `Catalog file is not valid JSON: ${this.filePath}.`;
      case 'CATALOG_INVALID': {
        const lines = this.details.map(detail => `  - ${detail.path}: ${detail.message}`);
        return [`Catalog file has an unexpected shape: ${this.filePath}`, ...lines].join('\n');
      }
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      filePath: this.filePath,
      details: this.details,
      stack: this.stack,
    };
  }
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}
