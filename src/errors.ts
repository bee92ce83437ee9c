/**
 * Error types raised by apisift
 */

export class ApisiftError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid configuration file or CLI option. Fatal at startup. */
export class ConfigError extends ApisiftError {}

/**
 * Malformed custom filter expression. `position` is the 0-based offset
 * in the expression where parsing failed.
 */
export class FilterSyntaxError extends ApisiftError {
  readonly expression: string;
  readonly position: number;

  constructor(message: string, expression: string, position: number) {
    super(`${message} at position ${position} in filter "${expression}"`);
    this.expression = expression;
    this.position = position;
  }
}

export type StoreOperation = 'open' | 'lookup' | 'scan' | 'insert' | 'read' | 'close';

/** Failure of a single database operation; the connection stays usable. */
export class StoreError extends ApisiftError {
  readonly operation: StoreOperation;

  constructor(operation: StoreOperation, cause: unknown) {
    super(`Store ${operation} failed: ${describeError(cause)}`, { cause });
    this.operation = operation;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
