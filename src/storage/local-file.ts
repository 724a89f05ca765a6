// Caller-owned local file handles.
//
// Cloud backends satisfy open()/upload() by copying the object into a fresh
// temporary directory. The returned LocalFile owns that directory: release()
// closes the handle and removes it.

import { createWriteStream } from 'node:fs';
import { mkdtemp, open, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import type { LocalFile } from './types.js';

interface LocalFileOptions {
  /** Directory removed on release (temporary copies only) */
  cleanupDir?: string;
}

/** Open `path` read-only and wrap it as a LocalFile. */
export async function openLocalFile(path: string, options: LocalFileOptions = {}): Promise<LocalFile> {
  const handle = await open(path, 'r');
  const { cleanupDir } = options;
  let released = false;

  return {
    path,
    handle,
    temporary: cleanupDir !== undefined,
    async release(): Promise<void> {
      if (released) return;
      released = true;
      await handle.close();
      if (cleanupDir !== undefined) {
        await rm(cleanupDir, { recursive: true, force: true });
      }
    },
  };
}

/**
 * Copy `source` into a new temporary file named after `objectPath`.
 * The temporary directory is removed again if the copy fails.
 */
export async function materializeTemporaryFile(
  source: Readable,
  objectPath: string,
  prefix: string
): Promise<LocalFile> {
  const dir = await mkdtemp(join(tmpdir(), `${prefix}-`));
  const target = join(dir, basename(objectPath) || 'object');

  try {
    await pipeline(source, createWriteStream(target));
    return await openLocalFile(target, { cleanupDir: dir });
  } catch (error) {
    await rm(dir, { recursive: true, force: true });
    throw error;
  }
}

/** Run `fn` with the file and release it afterwards, whatever `fn` does. */
export async function withLocalFile<T>(
  file: LocalFile,
  fn: (file: LocalFile) => Promise<T>
): Promise<T> {
  try {
    return await fn(file);
  } finally {
    await file.release();
  }
}
