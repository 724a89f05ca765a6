// In-process stand-in for S3Client.send(), covering the commands the S3
// backend issues. Errors are the SDK's own exception classes.

import { Readable } from 'node:stream';

import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  NoSuchKey,
  NotFound,
  PutObjectCommand,
  S3ServiceException,
} from '@aws-sdk/client-s3';

export type FakeS3Operation = 'GetObject' | 'PutObject' | 'HeadObject' | 'DeleteObject' | 'CopyObject';

export interface FakeS3Call {
  operation: FakeS3Operation;
  key: string;
  ifNoneMatch?: string;
}

export function preconditionFailed(): S3ServiceException {
  return new S3ServiceException({
    name: 'PreconditionFailed',
    $fault: 'client',
    $metadata: { httpStatusCode: 412 },
    message: 'At least one of the pre-conditions you specified did not hold',
  });
}

export function serviceUnavailable(): S3ServiceException {
  return new S3ServiceException({
    name: 'ServiceUnavailable',
    $fault: 'server',
    $metadata: { httpStatusCode: 503 },
    message: 'Please reduce your request rate.',
  });
}

function noSuchKey(): NoSuchKey {
  return new NoSuchKey({
    message: 'The specified key does not exist.',
    $metadata: { httpStatusCode: 404 },
  });
}

export class FakeS3Client {
  readonly objects = new Map<string, Buffer>();
  readonly calls: FakeS3Call[] = [];
  private readonly failures = new Map<FakeS3Operation, Error>();

  constructor(readonly bucket: string) {}

  /** Make the next `operation` reject with `error`. */
  failNext(operation: FakeS3Operation, error: Error): void {
    this.failures.set(operation, error);
  }

  async send(command: unknown): Promise<unknown> {
    if (command instanceof GetObjectCommand) {
      const key = this.record('GetObject', command.input.Key);
      const content = this.objects.get(key);
      if (content === undefined) throw noSuchKey();
      return { Body: Readable.from([Buffer.from(content)]), ContentLength: content.length };
    }

    if (command instanceof PutObjectCommand) {
      const { Body, IfNoneMatch } = command.input;
      const key = this.record('PutObject', command.input.Key, IfNoneMatch);
      if (IfNoneMatch === '*' && this.objects.has(key)) throw preconditionFailed();
      if (!Buffer.isBuffer(Body)) throw new Error('FakeS3Client only accepts Buffer bodies');
      this.objects.set(key, Buffer.from(Body));
      return {};
    }

    if (command instanceof HeadObjectCommand) {
      const key = this.record('HeadObject', command.input.Key);
      const content = this.objects.get(key);
      if (content === undefined) {
        throw new NotFound({ message: 'NotFound', $metadata: { httpStatusCode: 404 } });
      }
      return { ContentLength: content.length };
    }

    if (command instanceof DeleteObjectCommand) {
      // Like S3, deleting a missing key succeeds
      const key = this.record('DeleteObject', command.input.Key);
      this.objects.delete(key);
      return {};
    }

    if (command instanceof CopyObjectCommand) {
      const key = this.record('CopyObject', command.input.Key);
      const source = command.input.CopySource ?? '';
      const prefix = `${this.bucket}/`;
      if (!source.startsWith(prefix)) throw new Error(`Unexpected CopySource: ${source}`);
      const content = this.objects.get(decodeURIComponent(source.slice(prefix.length)));
      if (content === undefined) throw noSuchKey();
      this.objects.set(key, Buffer.from(content));
      return {};
    }

    throw new Error('FakeS3Client: unsupported command');
  }

  private record(operation: FakeS3Operation, key: string | undefined, ifNoneMatch?: string): string {
    this.calls.push({ operation, key: key ?? '', ...(ifNoneMatch && { ifNoneMatch }) });
    const error = this.failures.get(operation);
    if (error) {
      this.failures.delete(operation);
      throw error;
    }
    return key ?? '';
  }
}
