/**
 * Error taxonomy shared by every storage component
 */

/**
 * A caller violated a documented precondition: bad argument, mismatched
 * translator kind, or a name already bound in the other namespace
 */
export class ArgumentError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ArgumentError';
  }
}

/**
 * Operation attempted in the wrong lifecycle state (not loaded, closed, ...)
 */
export class StateError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StateError';
  }
}

/**
 * A value could not be represented in the target encoding
 */
export class TranslationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TranslationError';
  }
}

/**
 * The backing store rejected or failed an operation
 */
export class StorageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
