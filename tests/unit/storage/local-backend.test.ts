import { existsSync } from 'node:fs';
import { mkdtemp, readFile, readdir, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { pathToFileURL } from 'node:url';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { LocalBackend } from '@/storage/local-backend.js';

import { createMockLogger } from '../../helpers/mock-logger.js';

import { abortedSource, describeStorageContract } from './storage-contract.js';

describeStorageContract(
  'local',
  async () => {
    const rootDir = await mkdtemp(join(tmpdir(), 'storage-local-contract-'));
    return {
      storage: new LocalBackend({ rootDir }),
      cleanup: () => rm(rootDir, { recursive: true, force: true }),
    };
  },
  { producesLocalFiles: true }
);

describe('LocalBackend', () => {
  let rootDir: string;
  let storage: LocalBackend;

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), 'storage-local-test-'));
    storage = new LocalBackend({ rootDir });
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it('should report the local driver', () => {
    expect(storage.driver()).toBe('local');
  });

  it('should store objects as plain files under the root', async () => {
    await storage.write('docs/a.txt', Buffer.from('on disk'));

    expect(await readFile(join(rootDir, 'docs', 'a.txt'), 'utf-8')).toBe('on disk');
  });

  it('should reject paths that escape the root', async () => {
    await expect(storage.write('../escape.txt', Buffer.from('x'))).rejects.toMatchObject({
      code: 'STORAGE_INVALID_PATH',
      message: 'Invalid path: path escapes the storage root: ../escape.txt',
    });
    await expect(storage.exists('docs/../../escape.txt')).rejects.toMatchObject({
      code: 'STORAGE_INVALID_PATH',
    });
  });

  it('should reject absolute paths', async () => {
    await expect(storage.read('/etc/hosts')).rejects.toMatchObject({
      code: 'STORAGE_INVALID_PATH',
    });
  });

  it('should create real directories and log them', async () => {
    const logger = createMockLogger();
    storage = new LocalBackend({ rootDir, logger });

    await storage.createDirectory('reports/2024/');

    expect((await stat(join(rootDir, 'reports', '2024'))).isDirectory()).toBe(true);
    expect(logger.debug).toHaveBeenCalledWith({ path: 'reports/2024/' }, 'Directory created');
  });

  it('should return a file:// URL for existing objects', async () => {
    await storage.write('docs/a.txt', Buffer.from('hello'));

    expect(await storage.getUrl('docs/a.txt')).toBe(
      pathToFileURL(join(rootDir, 'docs', 'a.txt')).href
    );
  });

  it('should reject getUrl for missing objects', async () => {
    await expect(storage.getUrl('docs/missing.txt')).rejects.toMatchObject({
      code: 'STORAGE_NOT_FOUND',
    });
  });

  it('should rename into a directory that does not exist yet', async () => {
    await storage.write('a.txt', Buffer.from('moved'));

    await storage.rename('a.txt', 'deep/nested/b.txt');

    expect(await readFile(join(rootDir, 'deep', 'nested', 'b.txt'), 'utf-8')).toBe('moved');
    expect(existsSync(join(rootDir, 'a.txt'))).toBe(false);
  });

  describe('paths below a stored file', () => {
    beforeEach(async () => {
      await storage.write('a.txt', Buffer.from('file, not a directory'));
    });

    it('should report them as absent', async () => {
      expect(await storage.exists('a.txt/b')).toBe(false);
    });

    it('should reject read, delete and getUrl with STORAGE_NOT_FOUND', async () => {
      const notFound = { code: 'STORAGE_NOT_FOUND', message: 'Object not found: a.txt/b' };

      await expect(storage.read('a.txt/b')).rejects.toMatchObject(notFound);
      await expect(storage.delete('a.txt/b')).rejects.toMatchObject(notFound);
      await expect(storage.getUrl('a.txt/b')).rejects.toMatchObject(notFound);
    });
  });

  describe('upload()', () => {
    it('should leave no temporary file behind when the source fails', async () => {
      await expect(storage.upload(abortedSource('partial'), 'p.bin', 'in')).rejects.toThrow(
        'client aborted'
      );

      expect(await readdir(join(rootDir, 'in'))).toEqual([]);
    });

    it('should leave only the stored file after a successful upload', async () => {
      const file = await storage.upload(Readable.from([Buffer.from('new')]), 'q.bin', 'in');
      await file?.release();

      expect(await readdir(join(rootDir, 'in'))).toEqual(['q.bin']);
    });
  });

  describe('open()', () => {
    it('should open the stored file itself, not a temporary copy', async () => {
      await storage.write('docs/a.txt', Buffer.from('hello'));

      const file = await storage.open('docs/a.txt');

      expect(file.temporary).toBe(false);
      expect(file.path).toBe(join(rootDir, 'docs', 'a.txt'));
      await file.release();
      expect(existsSync(file.path)).toBe(true);
    });
  });
});
