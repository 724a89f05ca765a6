import { describe, it, expect } from 'vitest';

import { StorageValidationError } from '@/storage/errors.js';
import { assertDirectoryPath, assertObjectPath, joinObjectPath } from '@/storage/paths.js';

describe('assertObjectPath', () => {
  it('should accept nested relative paths', () => {
    expect(() => assertObjectPath('docs/2024/report.pdf')).not.toThrow();
  });

  it('should reject an empty path', () => {
    expect(() => assertObjectPath('')).toThrow('Invalid path: path must not be empty');
  });

  it('should reject a leading separator', () => {
    expect(() => assertObjectPath('/docs/a.txt')).toThrow(
      'Invalid path: path must be relative: /docs/a.txt'
    );
  });

  it('should reject NUL bytes', () => {
    expect(() => assertObjectPath('a\0b')).toThrow(StorageValidationError);
  });
});

describe('assertDirectoryPath', () => {
  it('should accept paths ending with a separator', () => {
    expect(() => assertDirectoryPath('docs/')).not.toThrow();
  });

  it('should reject paths without a trailing separator', () => {
    expect(() => assertDirectoryPath('docs')).toThrow(
      "Invalid path: directory path must end with '/': docs"
    );
  });
});

describe('joinObjectPath', () => {
  it('should join directory and file name', () => {
    expect(joinObjectPath('docs', 'report.txt')).toBe('docs/report.txt');
    expect(joinObjectPath('docs/', 'report.txt')).toBe('docs/report.txt');
  });

  it('should store at the top level for an empty directory', () => {
    expect(joinObjectPath('', 'report.txt')).toBe('report.txt');
  });

  it('should drop leading ./ and / from the directory', () => {
    expect(joinObjectPath('./docs', 'a.txt')).toBe('docs/a.txt');
    expect(joinObjectPath('/docs/', 'a.txt')).toBe('docs/a.txt');
  });

  it('should keep only the base name of the file', () => {
    expect(joinObjectPath('docs', '../../etc/passwd')).toBe('docs/passwd');
  });

  it('should normalize dot segments inside the directory', () => {
    expect(joinObjectPath('docs/drafts/..', 'a.txt')).toBe('docs/a.txt');
  });

  it('should reject a directory that climbs above the top level', () => {
    expect(() => joinObjectPath('docs/../..', 'a.txt')).toThrow(
      'Invalid path: directory escapes the storage root: docs/../..'
    );
  });

  it('should reject file names without a base name', () => {
    expect(() => joinObjectPath('docs', '')).toThrow('Invalid path: invalid file name: ');
    expect(() => joinObjectPath('docs', '..')).toThrow(StorageValidationError);
  });
});
