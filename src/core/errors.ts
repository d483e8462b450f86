/**
 * Error taxonomy shared by the stores, the dispatcher and the entrypoints.
 */

export type NotebookErrorCode =
  | 'NAME_ALREADY_TAKEN'
  | 'NOT_FOUND'
  | 'STORAGE_FAILURE'
  | 'INPUT_FAILURE'
  | 'CONFIG_ERROR';

export class NotebookError extends Error {
  constructor(
    message: string,
    public readonly code: NotebookErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'NotebookError';
  }
}

/**
 * A create or rename targeted a notename that another note already uses.
 */
export class NameAlreadyTakenError extends NotebookError {
  constructor(public readonly noteName: string, options?: ErrorOptions) {
    super(
      `The notename \`${noteName}\` is already taken; try another notename`,
      'NAME_ALREADY_TAKEN',
      options
    );
    this.name = 'NameAlreadyTakenError';
  }
}

export class NotFoundError extends NotebookError {
  constructor(public readonly noteName: string) {
    super(`Note \`${noteName}\` does not exist`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class StorageFailureError extends NotebookError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORAGE_FAILURE', options);
    this.name = 'StorageFailureError';
  }
}

/**
 * Reading note text from the terminal failed. Fatal for the process.
 */
export class InputFailureError extends NotebookError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INPUT_FAILURE', options);
    this.name = 'InputFailureError';
  }
}

export class ConfigError extends NotebookError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
