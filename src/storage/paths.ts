// Path rules shared by all backends, so a key accepted by one backend is
// accepted by every other and resolves to the same object name.

import { posix } from 'node:path';

import { StorageValidationError } from './errors.js';

export const SEPARATOR = '/';

/** Reject paths no backend can store. */
export function assertObjectPath(path: string): void {
  if (path.length === 0) {
    throw new StorageValidationError('path must not be empty');
  }
  if (path.includes('\0')) {
    throw new StorageValidationError(`path contains a NUL byte: ${JSON.stringify(path)}`);
  }
  if (path.startsWith(SEPARATOR)) {
    throw new StorageValidationError(`path must be relative: ${path}`);
  }
}

/** Directory paths are object paths ending with the separator. */
export function assertDirectoryPath(path: string): void {
  assertObjectPath(path);
  if (!path.endsWith(SEPARATOR)) {
    throw new StorageValidationError(`directory path must end with '${SEPARATOR}': ${path}`);
  }
}

/**
 * Object path for an uploaded file. Only the base name of `filename` is kept,
 * and an empty `dir` stores at the top level.
 */
export function joinObjectPath(dir: string, filename: string): string {
  const name = posix.basename(filename);
  if (name.length === 0 || name === '.' || name === '..') {
    throw new StorageValidationError(`invalid file name: ${filename}`);
  }
  const joined = posix.join(dir, name).replace(/^(\.\/|\/)+/, '');
  if (joined.startsWith('../')) {
    throw new StorageValidationError(`directory escapes the storage root: ${dir}`);
  }
  return joined;
}
