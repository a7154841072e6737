/**
 * symdoc - Error Handling
 * @module utils/errors
 *
 * SymdocError hierarchy for consistent error handling across the builder
 * and the resolver.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * All symdoc error codes
 */
export const ErrorCodes = {
  // File errors
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',

  // Source document errors
  MISSING_FRONT_MATTER: 'MISSING_FRONT_MATTER',
  MISSING_TITLE: 'MISSING_TITLE',
  UNSUPPORTED_TITLE: 'UNSUPPORTED_TITLE',
  INVALID_NAME: 'INVALID_NAME',

  // Store errors
  STORE_CORRUPTED: 'STORE_CORRUPTED',
  CODEC_MISMATCH: 'CODEC_MISMATCH',

  // Build errors
  EMPTY_BUILD: 'EMPTY_BUILD',

  // System errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type FormatErrorCode = Extract<
  ErrorCode,
  'MISSING_FRONT_MATTER' | 'MISSING_TITLE' | 'UNSUPPORTED_TITLE' | 'INVALID_NAME'
>;

// =============================================================================
// Error Solutions
// =============================================================================

/**
 * User-facing hints for each error code
 */
const errorSolutions: Record<ErrorCode, string> = {
  FILE_NOT_FOUND: 'Verify the path exists. Run `symdoc build` to create a database.',
  MISSING_FRONT_MATTER: 'The file has no `---` delimited front matter and is skipped.',
  MISSING_TITLE: 'The front matter has no `title:` field and is skipped.',
  UNSUPPORTED_TITLE:
    'Only titles of the form `<Name> function` are indexed. Structures, enums and callbacks are skipped.',
  INVALID_NAME:
    'Operator, overload and scoped names are skipped. Use `symdoc inspect` to parse the file anyway.',
  STORE_CORRUPTED: 'Rebuild the database with `symdoc build`.',
  CODEC_MISMATCH: 'Open the database with the codec it was built with, or rebuild it.',
  EMPTY_BUILD:
    'Check that the documentation repositories are checked out under the given directory.',
  INTERNAL_ERROR: 'An unexpected error occurred. Please report this issue.',
};

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class for all symdoc errors
 */
export class SymdocError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;
  /** User-friendly error message */
  readonly userMessage: string;
  /** Technical details for debugging */
  readonly technical?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      userMessage?: string;
      technical?: unknown;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'SymdocError';
    this.code = code;
    this.userMessage = options?.userMessage || `${message}\n\nFix: ${errorSolutions[code]}`;
    this.technical = options?.technical;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Format error for CLI display
   */
  toCliOutput(symbol = true): string {
    const prefix = symbol ? '✗' : '[ERR]';
    return `${prefix} ${this.message}\n\n${this.userMessage}`;
  }

  /**
   * Format error for JSON output
   */
  toJSON(): {
    code: string;
    message: string;
    userMessage: string;
    technical?: unknown;
  } {
    return {
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      ...(this.technical ? { technical: this.technical } : {}),
    };
  }
}

// =============================================================================
// Specialized Error Classes
// =============================================================================

/**
 * A store or source file is absent
 */
export class MissingFileError extends SymdocError {
  /** Path that was not found */
  readonly path: string;

  constructor(path: string, message = `File not found: ${path}`) {
    super('FILE_NOT_FOUND', message);
    this.name = 'MissingFileError';
    this.path = path;
  }
}

/**
 * A source document cannot yield a valid symbol name
 */
export class FormatError extends SymdocError {
  /** File that failed to parse */
  readonly filePath: string;

  constructor(
    code: FormatErrorCode,
    message: string,
    options: { filePath: string; technical?: unknown }
  ) {
    super(code, message, { technical: options.technical });
    this.name = 'FormatError';
    this.filePath = options.filePath;
  }
}

/**
 * The persisted store cannot be read back
 */
export class StoreError extends SymdocError {
  constructor(
    code: Extract<ErrorCode, 'STORE_CORRUPTED' | 'CODEC_MISMATCH'>,
    message: string,
    options?: { userMessage?: string; technical?: unknown; cause?: Error }
  ) {
    super(code, message, options);
    this.name = 'StoreError';
  }
}

/**
 * A build produced no records
 */
export class EmptyResultError extends SymdocError {
  constructor(docsets: readonly string[]) {
    super('EMPTY_BUILD', 'No files were parsed', { technical: { docsets } });
    this.name = 'EmptyResultError';
  }
}

// =============================================================================
// Error Helpers
// =============================================================================

/**
 * Check if an error is a symdoc error
 */
export function isSymdocError(error: unknown): error is SymdocError {
  return error instanceof SymdocError;
}

/**
 * Wrap an unknown error as a symdoc error
 */
export function wrapError(error: unknown, context?: string): SymdocError {
  if (isSymdocError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new SymdocError('INTERNAL_ERROR', context ? `${context}: ${message}` : message, {
    cause: error instanceof Error ? error : undefined,
    technical: error,
  });
}
