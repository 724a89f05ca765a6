// Storage module barrel export and factory function.

import type { FastifyBaseLogger } from 'fastify';

import { ConfigInvalidError } from '../errors/index.js';
import { type GcsConnectionConfig, createGcsBackend } from './gcs-backend.js';
import { LocalBackend } from './local-backend.js';
import { MemoryBackend } from './memory-backend.js';
import { type S3ConnectionConfig, createS3Backend } from './s3-backend.js';
import { Driver, type Storage } from './types.js';

export type { Entry, LocalFile, Storage } from './types.js';
export { Driver, DRIVERS } from './types.js';
export {
  StorageNotFoundError,
  StoragePartialFailureError,
  StorageUnsupportedError,
  StorageValidationError,
  isNotFoundError,
} from './errors.js';
export { withLocalFile } from './local-file.js';
export { joinObjectPath } from './paths.js';
export { MemoryBackend } from './memory-backend.js';
export { LocalBackend } from './local-backend.js';
export type { LocalBackendOptions } from './local-backend.js';
export { GcsBackend, createGcsBackend } from './gcs-backend.js';
export type { GcsBackendOptions, GcsConnectionConfig } from './gcs-backend.js';
export { S3Backend, createS3Backend } from './s3-backend.js';
export type { S3BackendOptions, S3ConnectionConfig } from './s3-backend.js';

export interface StorageConfig {
  driver: Driver;
  local: { rootDir: string };
  gcs?: GcsConnectionConfig;
  s3?: S3ConnectionConfig;
}

/**
 * Create the storage backend selected by `config.driver`.
 * Cloud drivers require their configuration section.
 */
export function createStorage(config: StorageConfig, logger?: FastifyBaseLogger): Storage {
  switch (config.driver) {
    case Driver.Memory:
      return new MemoryBackend();
    case Driver.Local:
      return new LocalBackend({ rootDir: config.local.rootDir, logger });
    case Driver.Gcs:
      if (!config.gcs) throw new ConfigInvalidError(`storage.${config.driver} is required`);
      return createGcsBackend(config.gcs, logger);
    case Driver.S3:
      if (!config.s3) throw new ConfigInvalidError(`storage.${config.driver} is required`);
      return createS3Backend(config.s3, logger);
  }
}
