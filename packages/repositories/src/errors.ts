// Table loading error types

import type { TableValidationError } from '@thermalwin/protocol';

/**
 * Base class for coefficient and emissivity table errors.
 */
export class TableError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = 'TableError';
    this.code = code;
  }
}

/**
 * Error when a table file cannot be read.
 */
export class TableLoadError extends TableError {
  readonly path: string;

  constructor(path: string, cause?: Error) {
    super('TABLE_LOAD_ERROR', `Failed to read table ${path}: ${cause?.message ?? 'unknown error'}`, {
      cause,
    });
    this.name = 'TableLoadError';
    this.path = path;
  }
}

/**
 * Error when table text is malformed. Carries the 1-based source line.
 */
export class TableParseError extends TableError {
  readonly path: string;
  readonly line: number;
  readonly reason: string;

  constructor(path: string, line: number, reason: string) {
    super('TABLE_PARSE_ERROR', `Failed to parse table ${path} at line ${line}: ${reason}`);
    this.name = 'TableParseError';
    this.path = path;
    this.line = line;
    this.reason = reason;
  }
}

/**
 * Error when a decoded table fails validation.
 */
export class InvalidTableError extends TableError {
  readonly errors: TableValidationError[];

  constructor(table: string, errors: TableValidationError[]) {
    super(
      'INVALID_TABLE',
      `Invalid ${table} table: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`
    );
    this.name = 'InvalidTableError';
    this.errors = errors;
  }
}
