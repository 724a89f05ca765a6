// In-memory storage backend.
//
// Objects live in a Map keyed by path. Every operation reads and mutates the
// map without awaiting in between, so operations never interleave: copy and
// rename are exclusive with respect to writes on the same paths.
// Directories are a path convention only and are never stored.

import { Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';

import { StorageNotFoundError, StorageUnsupportedError } from './errors.js';
import { assertDirectoryPath, assertObjectPath, joinObjectPath } from './paths.js';
import { Driver, type Entry, type LocalFile, type Storage } from './types.js';

export class MemoryBackend implements Storage {
  private readonly entries = new Map<string, Entry>();

  driver(): Driver {
    return Driver.Memory;
  }

  async read(path: string): Promise<Readable> {
    const entry = this.require(path);
    return Readable.from([Buffer.from(entry.content)]);
  }

  async write(path: string, contents: Buffer | Uint8Array): Promise<void> {
    assertObjectPath(path);
    this.entries.set(path, { name: path, content: Buffer.from(contents) });
  }

  async delete(path: string): Promise<void> {
    this.require(path);
    this.entries.delete(path);
  }

  async exists(path: string): Promise<boolean> {
    assertObjectPath(path);
    return this.entries.has(path);
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    assertObjectPath(newPath);
    const entry = this.require(oldPath);
    this.entries.delete(oldPath);
    this.entries.set(newPath, { name: newPath, content: entry.content });
  }

  async copy(sourcePath: string, destinationPath: string): Promise<void> {
    assertObjectPath(destinationPath);
    const entry = this.require(sourcePath);
    this.entries.set(destinationPath, {
      name: destinationPath,
      content: Buffer.from(entry.content),
    });
  }

  async createDirectory(path: string): Promise<void> {
    assertDirectoryPath(path);
  }

  async getUrl(path: string): Promise<string> {
    this.require(path);
    return `mem://${path}`;
  }

  async open(path: string): Promise<LocalFile> {
    assertObjectPath(path);
    throw new StorageUnsupportedError('open', Driver.Memory);
  }

  async upload(source: Readable, filename: string, dir: string): Promise<LocalFile | null> {
    const path = joinObjectPath(dir, filename);
    const content = await buffer(source);
    this.entries.set(path, { name: path, content });
    return null;
  }

  private require(path: string): Entry {
    assertObjectPath(path);
    const entry = this.entries.get(path);
    if (!entry) {
      throw new StorageNotFoundError(path);
    }
    return entry;
  }
}
