import { z } from 'zod';

import { DRIVERS } from '../storage/types.js';

const DEFAULT_ROOT_DIR = './data/files';

export const StorageConfigSchema = z
  .object({
    /** Backend kind */
    driver: z.enum(DRIVERS).default('local'),

    /** Local filesystem backend options */
    local: z
      .object({
        /** Directory for stored objects (default: ./data/files) */
        rootDir: z.string().min(1).default(DEFAULT_ROOT_DIR),
      })
      .default(() => ({ rootDir: DEFAULT_ROOT_DIR })),

    /** Google Cloud Storage backend options (required when driver is "gcs") */
    gcs: z
      .object({
        bucket: z.string().min(1, 'GCS bucket name is required'),
        projectId: z.string().optional(),
        /** Service account key file (sensitive - never log its contents) */
        keyFilename: z.string().optional(),
      })
      .optional(),

    /** S3-compatible backend options (required when driver is "s3") */
    s3: z
      .object({
        bucket: z.string().min(1, 'S3 bucket name is required'),
        region: z.string().default('us-east-1'),
        /** Custom endpoint for S3-compatible services (MinIO, R2, ...) */
        endpoint: z.string().url().optional(),
        forcePathStyle: z.boolean().default(false),
        /** Static credentials (sensitive - never log); default provider chain when omitted */
        accessKeyId: z.string().optional(),
        secretAccessKey: z.string().optional(),
      })
      .refine(
        (d) => (d.accessKeyId === undefined) === (d.secretAccessKey === undefined),
        'accessKeyId and secretAccessKey must be provided together'
      )
      .optional(),
  })
  .refine((d) => d.driver !== 'gcs' || d.gcs !== undefined, {
    message: 'storage.gcs is required when driver is "gcs"',
    path: ['gcs'],
  })
  .refine((d) => d.driver !== 's3' || d.s3 !== undefined, {
    message: 'storage.s3 is required when driver is "s3"',
    path: ['s3'],
  });

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(3000),
    })
    .default(() => ({ host: '0.0.0.0', port: 3000 })),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Optional Sentry integration
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('development'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode
  env: z.enum(['development', 'production', 'test']).default('development'),

  // Rate limiting configuration
  rateLimit: z
    .object({
      global: z.number().int().min(1).default(100),
      sensitive: z.number().int().min(1).default(20),
      windowMs: z.number().int().min(1000).default(60000),
    })
    .default(() => ({ global: 100, sensitive: 20, windowMs: 60000 })),

  // Uploads (multipart)
  upload: z
    .object({
      /** Maximum accepted file size in bytes */
      maxFileSize: z.number().int().min(1).default(10 * 1024 * 1024),
    })
    .default(() => ({ maxFileSize: 10 * 1024 * 1024 })),

  // Storage backend configuration (optional -- defaults to the local filesystem)
  storage: StorageConfigSchema.default(() => ({
    driver: 'local' as const,
    local: { rootDir: DEFAULT_ROOT_DIR },
  })),
});

export type Config = z.infer<typeof ConfigSchema>;
