import createError from '@fastify/error';
import type { FastifyError } from 'fastify';

// Storage errors (STORAGE_*)

/** Object absent for read, delete, rename/copy source, open or checked getUrl (404) */
export const StorageNotFoundError = createError<[string]>(
  'STORAGE_NOT_FOUND',
  'Object not found: %s',
  404
);

/** Malformed path argument (400) */
export const StorageValidationError = createError<[string]>(
  'STORAGE_INVALID_PATH',
  'Invalid path: %s',
  400
);

/** Operation structurally unavailable on this backend (501) */
export const StorageUnsupportedError = createError<[string, string]>(
  'STORAGE_UNSUPPORTED',
  'Operation %s is not supported by the %s driver',
  501
);

/** Rename copied the object but could not delete the source; both paths now exist (500) */
export const StoragePartialFailureError = createError<[string, string]>(
  'STORAGE_PARTIAL_FAILURE',
  'Rename copied %s to %s but failed to delete the source',
  500
);

export function isNotFoundError(error: unknown): boolean {
  return error instanceof StorageNotFoundError;
}

/**
 * Build a partial-failure error for a rename whose delete step failed.
 * The delete error is kept as `cause`.
 */
export function renamePartialFailure(
  oldPath: string,
  newPath: string,
  cause: unknown
): FastifyError {
  const error = new StoragePartialFailureError(oldPath, newPath);
  error.cause = cause;
  return error;
}
