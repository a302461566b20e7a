import { CleanError, ErrorType } from '../types';

/**
 * Raised when a profile cannot be read or does not match the document shape.
 * Aborts the whole run.
 */
export class ProfileLoadError extends Error {
  readonly profilePath: string;

  constructor(profilePath: string, reason: string, options?: { cause?: unknown }) {
    super(`failed to load profile <${profilePath}> [${reason}]`, options);
    this.name = 'ProfileLoadError';
    this.profilePath = profilePath;
  }
}

/**
 * Raised when a pattern entry cannot be compiled as a glob
 */
export class EntryError extends Error {
  readonly pattern: string;

  constructor(pattern: string, cause: unknown) {
    super(`failed to parse glob pattern <${pattern}> [${errorMessage(cause)}]`, { cause });
    this.name = 'EntryError';
    this.pattern = pattern;
  }

  toCleanError(entry: string): CleanError {
    return {
      type: 'invalid_pattern',
      message: this.message,
      entry,
      timestamp: new Date(),
      recoverable: false
    };
  }
}

export type RemoveErrorKind = 'inspect' | 'readDirectory' | 'removeFile' | 'removeDirectory';

const REMOVE_ERROR_LABELS: Record<RemoveErrorKind, string> = {
  inspect: 'failed to inspect entry',
  readDirectory: 'failed to read directory files',
  removeFile: 'failed to remove file',
  removeDirectory: 'failed to remove directory'
};

const REMOVE_ERROR_TYPES: Record<RemoveErrorKind, ErrorType> = {
  inspect: 'inspect',
  readDirectory: 'read_directory',
  removeFile: 'remove_file',
  removeDirectory: 'remove_directory'
};

/**
 * A single failed filesystem operation while removing a path
 */
export class RemoveError extends Error {
  readonly kind: RemoveErrorKind;
  readonly path: string;
  readonly code?: string;

  constructor(kind: RemoveErrorKind, path: string, cause: unknown) {
    super(`${REMOVE_ERROR_LABELS[kind]} <${path}> [${errorMessage(cause)}]`, { cause });
    this.name = 'RemoveError';
    this.kind = kind;
    this.path = path;
    this.code = errorCode(cause);
  }

  toCleanError(): CleanError {
    return {
      type: REMOVE_ERROR_TYPES[this.kind],
      message: this.message,
      path: this.path,
      timestamp: new Date(),
      recoverable: true
    };
  }
}

// Node's own errors may come from another realm (e.g. under Jest), so
// these read the shape rather than checking `instanceof Error`.

/**
 * Extract the errno code (ENOENT, EACCES, ...) from a Node filesystem error
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
