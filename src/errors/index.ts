import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Request errors (UPLOAD_*)
export const UploadInvalidError = createError<[string]>(
  'UPLOAD_INVALID',
  'Invalid upload: %s',
  400
);

// Storage errors (STORAGE_*) - re-exported from storage domain
export {
  StorageNotFoundError,
  StorageValidationError,
  StorageUnsupportedError,
  StoragePartialFailureError,
} from '../storage/errors.js';

