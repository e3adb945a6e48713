/**
 * Errors that abort a generation run
 */

export type GenerationErrorCode =
  | 'MISSING_AVAILABILITY'
  | 'IDENTIFIER_COLLISION'
  | 'INVALID_IDENTIFIER';

export class GenerationError extends Error {
  readonly code: GenerationErrorCode;

  /**
   * Raw symbol names involved in the failure
   */
  readonly symbolNames: string[];

  constructor(message: string, code: GenerationErrorCode, symbolNames: string[] = []) {
    super(message);
    this.name = 'GenerationError';
    this.code = code;
    this.symbolNames = symbolNames;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationError);
    }
  }

  is(code: GenerationErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Message for tool output, naming the symbols involved
   */
  getUserMessage(): string {
    const names = this.symbolNames.map(name => `"${name}"`).join(', ');
    switch (this.code) {
      case 'MISSING_AVAILABILITY':
        return `The catalog has no release record for ${names}. Fix the catalog or set onMissingAvailability to "skip".`;
      case 'IDENTIFIER_COLLISION':
        return `Symbols ${names} derive the same Swift identifier.`;
      case 'INVALID_IDENTIFIER':
        return `Symbol ${names} does not contain any word to build an identifier from.`;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      symbolNames: this.symbolNames,
      stack: this.stack,
    };
  }
}

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}
