// S3-compatible storage backend (AWS S3, MinIO, R2, ...).
//
// Same contract as the GCS backend. Two S3 behaviours need bridging:
// DeleteObject succeeds on missing keys, so delete probes first; and
// rename is copy-then-delete with the same partial-failure reporting.

import { Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';

import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { FastifyBaseLogger } from 'fastify';

import { StorageNotFoundError, renamePartialFailure } from './errors.js';
import { materializeTemporaryFile } from './local-file.js';
import { assertDirectoryPath, assertObjectPath, joinObjectPath } from './paths.js';
import { Driver, type LocalFile, type Storage } from './types.js';

export interface S3BackendOptions {
  client: S3Client;
  bucket: string;
  region: string;
  /** Custom endpoint for S3-compatible services; switches URLs to path style */
  endpoint?: string;
  logger?: FastifyBaseLogger;
}

export interface S3ConnectionConfig {
  bucket: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
}

function isMissingObjectError(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) return false;
  return (
    error.name === 'NoSuchKey' ||
    error.name === 'NotFound' ||
    error.$metadata.httpStatusCode === 404
  );
}

function isPreconditionFailedError(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) return false;
  return error.name === 'PreconditionFailed' || error.$metadata.httpStatusCode === 412;
}

export class S3Backend implements Storage {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly region: string;
  private readonly endpoint?: string;
  private readonly logger?: FastifyBaseLogger;

  constructor(options: S3BackendOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.region = options.region;
    this.endpoint = options.endpoint?.replace(/\/+$/, '');
    this.logger = options.logger;
  }

  driver(): Driver {
    return Driver.S3;
  }

  async read(path: string): Promise<Readable> {
    assertObjectPath(path);
    const { Body } = await this.mapMissing(path, () =>
      this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: path }))
    );
    if (Body === undefined) {
      return Readable.from([Buffer.alloc(0)]);
    }
    if (Body instanceof Readable) {
      return Body;
    }
    return Readable.from([Buffer.from(await Body.transformToByteArray())]);
  }

  async write(path: string, contents: Buffer | Uint8Array): Promise<void> {
    assertObjectPath(path);
    await this.client.send(
      new PutObjectCommand({ Bucket: this.bucket, Key: path, Body: Buffer.from(contents) })
    );
  }

  async delete(path: string): Promise<void> {
    assertObjectPath(path);
    await this.head(path);
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: path }));
  }

  async exists(path: string): Promise<boolean> {
    assertObjectPath(path);
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: path }));
      return true;
    } catch (error) {
      if (isMissingObjectError(error)) return false;
      throw error;
    }
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    if (oldPath === newPath) {
      // Copy-then-delete onto itself would delete the only copy
      assertObjectPath(oldPath);
      await this.head(oldPath);
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
    await this.mapMissing(sourcePath, () =>
      this.client.send(
        new CopyObjectCommand({
          Bucket: this.bucket,
          Key: destinationPath,
          CopySource: `${this.bucket}/${encodeURIComponent(sourcePath)}`,
        })
      )
    );
  }

  /** Zero-byte marker at `path` itself, which must end with '/'. */
  async createDirectory(path: string): Promise<void> {
    assertDirectoryPath(path);
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: path,
          Body: Buffer.alloc(0),
          IfNoneMatch: '*',
        })
      );
    } catch (error) {
      if (isPreconditionFailedError(error)) {
        this.logger?.debug({ path }, 'Directory marker already exists');
        return;
      }
      throw error;
    }
  }

  async getUrl(path: string): Promise<string> {
    assertObjectPath(path);
    if (this.endpoint) {
      return `${this.endpoint}/${this.bucket}/${path}`;
    }
    return `https://${this.bucket}.s3.${this.region}.amazonaws.com/${path}`;
  }

  async open(path: string): Promise<LocalFile> {
    const file = await materializeTemporaryFile(await this.read(path), path, Driver.S3);
    this.logger?.debug({ path, localPath: file.path }, 'Object copied to temporary file');
    return file;
  }

  async upload(source: Readable, filename: string, dir: string): Promise<LocalFile | null> {
    const path = joinObjectPath(dir, filename);
    // PutObject needs a known length, so the source is buffered first
    const body = await buffer(source);
    await this.client.send(new PutObjectCommand({ Bucket: this.bucket, Key: path, Body: body }));
    return this.open(path);
  }

  private async head(path: string): Promise<void> {
    await this.mapMissing(path, () =>
      this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: path }))
    );
  }

  private async mapMissing<T>(path: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isMissingObjectError(error)) {
        throw new StorageNotFoundError(path);
      }
      throw error;
    }
  }
}

/** Build a backend from connection settings. */
export function createS3Backend(config: S3ConnectionConfig, logger?: FastifyBaseLogger): S3Backend {
  const client = new S3Client({
    region: config.region,
    forcePathStyle: config.forcePathStyle,
    ...(config.endpoint && { endpoint: config.endpoint }),
    ...(config.accessKeyId &&
      config.secretAccessKey && {
        credentials: {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        },
      }),
  });
  return new S3Backend({
    client,
    bucket: config.bucket,
    region: config.region,
    endpoint: config.endpoint,
    logger,
  });
}
