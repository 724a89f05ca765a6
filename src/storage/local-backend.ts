// Local filesystem storage backend.
//
// Objects are plain files under a root directory. Every path is resolved
// inside the root; anything resolving outside it is rejected before touching
// the disk. Rename is the filesystem's native (atomic) rename.

import { randomUUID } from 'node:crypto';
import { createReadStream, createWriteStream } from 'node:fs';
import { access, copyFile, mkdir, rename, rm, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname, resolve, sep } from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { pathToFileURL } from 'node:url';

import type { FastifyBaseLogger } from 'fastify';

import { StorageNotFoundError, StorageValidationError } from './errors.js';
import { openLocalFile } from './local-file.js';
import { assertDirectoryPath, assertObjectPath, joinObjectPath } from './paths.js';
import { Driver, type LocalFile, type Storage } from './types.js';

export interface LocalBackendOptions {
  /** Directory that holds every stored object */
  rootDir: string;
  logger?: FastifyBaseLogger;
}

// ENOTDIR: a parent component of the path is a stored file
function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

export class LocalBackend implements Storage {
  private readonly rootDir: string;
  private readonly logger?: FastifyBaseLogger;

  constructor(options: LocalBackendOptions) {
    this.rootDir = resolve(options.rootDir);
    this.logger = options.logger;
  }

  driver(): Driver {
    return Driver.Local;
  }

  async read(path: string): Promise<Readable> {
    const fullPath = this.fullPathOf(path);
    await this.mapMissing(path, () => stat(fullPath));
    return createReadStream(fullPath);
  }

  async write(path: string, contents: Buffer | Uint8Array): Promise<void> {
    const fullPath = this.fullPathOf(path);
    await this.replaceFile(fullPath, (tempPath) => writeFile(tempPath, contents));
  }

  async delete(path: string): Promise<void> {
    const fullPath = this.fullPathOf(path);
    await this.mapMissing(path, () => unlink(fullPath));
  }

  async exists(path: string): Promise<boolean> {
    const fullPath = this.fullPathOf(path);
    try {
      await access(fullPath);
      return true;
    } catch (error) {
      if (isMissingFileError(error)) return false;
      throw error;
    }
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    const from = this.fullPathOf(oldPath);
    const to = this.fullPathOf(newPath);
    await this.mapMissing(oldPath, () => stat(from));
    await mkdir(dirname(to), { recursive: true });
    await this.mapMissing(oldPath, () => rename(from, to));
  }

  async copy(sourcePath: string, destinationPath: string): Promise<void> {
    const from = this.fullPathOf(sourcePath);
    const to = this.fullPathOf(destinationPath);
    await this.mapMissing(sourcePath, () => stat(from));
    await mkdir(dirname(to), { recursive: true });
    await this.mapMissing(sourcePath, () => copyFile(from, to));
  }

  async createDirectory(path: string): Promise<void> {
    assertDirectoryPath(path);
    const fullPath = this.fullPathOf(path);
    await mkdir(fullPath, { recursive: true });
    this.logger?.debug({ path }, 'Directory created');
  }

  async getUrl(path: string): Promise<string> {
    const fullPath = this.fullPathOf(path);
    await this.mapMissing(path, () => access(fullPath));
    return pathToFileURL(fullPath).href;
  }

  async open(path: string): Promise<LocalFile> {
    const fullPath = this.fullPathOf(path);
    return this.mapMissing(path, () => openLocalFile(fullPath));
  }

  async upload(source: Readable, filename: string, dir: string): Promise<LocalFile | null> {
    const path = joinObjectPath(dir, filename);
    const fullPath = this.fullPathOf(path);
    await this.replaceFile(fullPath, (tempPath) => pipeline(source, createWriteStream(tempPath)));
    return this.open(path);
  }

  /**
   * Fill a sibling temporary file, then rename it over `fullPath`.
   * A failed fill leaves any previous object untouched.
   */
  private async replaceFile(
    fullPath: string,
    fill: (tempPath: string) => Promise<void>
  ): Promise<void> {
    await mkdir(dirname(fullPath), { recursive: true });
    const tempPath = `${fullPath}.${randomUUID()}.partial`;
    try {
      await fill(tempPath);
      await rename(tempPath, fullPath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  private fullPathOf(path: string): string {
    assertObjectPath(path);
    const fullPath = resolve(this.rootDir, path);
    if (!fullPath.startsWith(this.rootDir + sep)) {
      throw new StorageValidationError(`path escapes the storage root: ${path}`);
    }
    return fullPath;
  }

  private async mapMissing<T>(path: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new StorageNotFoundError(path);
      }
      throw error;
    }
  }
}
