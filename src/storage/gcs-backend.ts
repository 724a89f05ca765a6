// Google Cloud Storage backend.
//
// Each operation is a thin translation to the bucket API. GCS has no native
// rename for flat buckets, so rename is copy-then-delete: a failed delete
// leaves the object at both paths and is reported, never hidden.

import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { type Bucket, Storage as GcsClient } from '@google-cloud/storage';
import type { FastifyBaseLogger } from 'fastify';

import { StorageNotFoundError, renamePartialFailure } from './errors.js';
import { materializeTemporaryFile } from './local-file.js';
import { assertDirectoryPath, assertObjectPath, joinObjectPath } from './paths.js';
import { Driver, type LocalFile, type Storage } from './types.js';

const PUBLIC_URL_BASE = 'https://storage.googleapis.com';

export interface GcsBackendOptions {
  bucket: Bucket;
  logger?: FastifyBaseLogger;
}

export interface GcsConnectionConfig {
  bucket: string;
  projectId?: string;
  /** Service account key file; application default credentials when omitted */
  keyFilename?: string;
}

/** GCS API errors carry the HTTP status in `code`. */
function hasStatus(error: unknown, status: number): boolean {
  return error instanceof Error && 'code' in error && error.code === status;
}

export class GcsBackend implements Storage {
  private readonly bucket: Bucket;
  private readonly logger?: FastifyBaseLogger;

  constructor(options: GcsBackendOptions) {
    this.bucket = options.bucket;
    this.logger = options.logger;
  }

  driver(): Driver {
    return Driver.Gcs;
  }

  async read(path: string): Promise<Readable> {
    assertObjectPath(path);
    const file = this.bucket.file(path);
    await this.mapMissing(path, () => file.getMetadata());
    return file.createReadStream();
  }

  async write(path: string, contents: Buffer | Uint8Array): Promise<void> {
    assertObjectPath(path);
    await this.bucket.file(path).save(Buffer.from(contents), { resumable: false });
  }

  async delete(path: string): Promise<void> {
    assertObjectPath(path);
    await this.mapMissing(path, () => this.bucket.file(path).delete());
  }

  async exists(path: string): Promise<boolean> {
    assertObjectPath(path);
    try {
      await this.bucket.file(path).getMetadata();
      return true;
    } catch (error) {
      if (hasStatus(error, 404)) return false;
      throw error;
    }
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    if (oldPath === newPath) {
      // Copy-then-delete onto itself would delete the only copy
      assertObjectPath(oldPath);
      await this.mapMissing(oldPath, () => this.bucket.file(oldPath).getMetadata());
      return;
    }
    await this.copy(oldPath, newPath);
    try {
      await this.delete(oldPath);
    } catch (error) {
      this.logger?.warn(
        { oldPath, newPath, err: error instanceof Error ? error.message : 'Unknown error' },
        'Rename left the object at both paths'
      );
      throw renamePartialFailure(oldPath, newPath, error);
    }
  }

  async copy(sourcePath: string, destinationPath: string): Promise<void> {
    assertObjectPath(sourcePath);
    assertObjectPath(destinationPath);
    const destination = this.bucket.file(destinationPath);
    await this.mapMissing(sourcePath, () => this.bucket.file(sourcePath).copy(destination));
  }

  /**
   * Write a zero-byte marker object named `path` itself. `path` must already
   * end with '/' (`docs` is rejected, `docs/` is the marker key).
   */
  async createDirectory(path: string): Promise<void> {
    assertDirectoryPath(path);
    try {
      // Zero-byte marker; generation 0 means "only if it does not exist yet"
      await this.bucket.file(path).save(Buffer.alloc(0), {
        resumable: false,
        preconditionOpts: { ifGenerationMatch: 0 },
      });
    } catch (error) {
      if (hasStatus(error, 412)) {
        this.logger?.debug({ path }, 'Directory marker already exists');
        return;
      }
      throw error;
    }
  }

  async getUrl(path: string): Promise<string> {
    assertObjectPath(path);
    return `${PUBLIC_URL_BASE}/${this.bucket.name}/${path}`;
  }

  async open(path: string): Promise<LocalFile> {
    assertObjectPath(path);
    const file = await this.mapMissing(path, () =>
      materializeTemporaryFile(this.bucket.file(path).createReadStream(), path, Driver.Gcs)
    );
    this.logger?.debug({ path, localPath: file.path }, 'Object copied to temporary file');
    return file;
  }

  async upload(source: Readable, filename: string, dir: string): Promise<LocalFile | null> {
    const path = joinObjectPath(dir, filename);
    await pipeline(source, this.bucket.file(path).createWriteStream({ resumable: false }));
    return this.open(path);
  }

  private async mapMissing<T>(path: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (hasStatus(error, 404)) {
        throw new StorageNotFoundError(path);
      }
      throw error;
    }
  }
}

/** Build a backend from connection settings. */
export function createGcsBackend(config: GcsConnectionConfig, logger?: FastifyBaseLogger): GcsBackend {
  const client = new GcsClient({
    ...(config.projectId && { projectId: config.projectId }),
    ...(config.keyFilename && { keyFilename: config.keyFilename }),
  });
  return new GcsBackend({ bucket: client.bucket(config.bucket), logger });
}
