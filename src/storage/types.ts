// Storage contract shared by every backend.
//
// Backends are interchangeable: the same operation on the same inputs has the
// same observable result and raises the same error kinds (see ./errors.ts),
// whether the bytes live in memory, on local disk, in GCS or in S3.

import type { FileHandle } from 'node:fs/promises';
import type { Readable } from 'node:stream';

/** Identifying names of the backend kinds. */
export const Driver = {
  Memory: 'memory',
  Local: 'local',
  Gcs: 'gcs',
  S3: 's3',
} as const;

export type Driver = (typeof Driver)[keyof typeof Driver];

export const DRIVERS = [Driver.Memory, Driver.Local, Driver.Gcs, Driver.S3] as const;

/** One stored object in the memory backend. */
export interface Entry {
  name: string;
  content: Buffer;
}

/**
 * A file readable through the local filesystem.
 *
 * Cloud backends hand out a temporary snapshot of the object, not a live view.
 * The caller owns the file: `release()` closes the handle and, for temporary
 * copies, deletes the file. Calling it more than once is harmless.
 */
export interface LocalFile {
  /** Absolute path on the local filesystem */
  readonly path: string;
  /** Read-only handle positioned at the start of the file */
  readonly handle: FileHandle;
  /** Whether `path` is a temporary copy that `release()` removes */
  readonly temporary: boolean;
  release(): Promise<void>;
}

export interface Storage {
  /** Driver name of this backend */
  driver(): Driver;

  /** Open a stream over the object's bytes. Rejects with StorageNotFoundError if absent. */
  read(path: string): Promise<Readable>;

  /** Create or overwrite an object. Empty content is allowed. */
  write(path: string, contents: Buffer | Uint8Array): Promise<void>;

  /** Remove an object. Rejects with StorageNotFoundError if absent. */
  delete(path: string): Promise<void>;

  /** Whether an object exists. Absence is not an error. */
  exists(path: string): Promise<boolean>;

  /**
   * Move an object. On object stores this is copy-then-delete: if the delete
   * fails the object remains at both paths and StoragePartialFailureError is
   * raised.
   */
  rename(oldPath: string, newPath: string): Promise<void>;

  /** Duplicate an object. The copy is independent of the source. */
  copy(sourcePath: string, destinationPath: string): Promise<void>;

  /** Ensure a directory exists. `path` must end with '/'. Idempotent. */
  createDirectory(path: string): Promise<void>;

  /**
   * Locator for an object. Not every locator is dereferenceable: memory URLs
   * only identify, cloud URLs are not checked for existence or access.
   */
  getUrl(path: string): Promise<string>;

  /** Expose an object as a local file. */
  open(path: string): Promise<LocalFile>;

  /**
   * Store `source` at `dir/filename` and return what `open` would return for
   * the new object. Backends without local files (memory) resolve to null.
   */
  upload(source: Readable, filename: string, dir: string): Promise<LocalFile | null>;
}
