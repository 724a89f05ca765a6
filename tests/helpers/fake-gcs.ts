// In-process stand-in for the slice of the @google-cloud/storage Bucket/File
// API the GCS backend uses. Errors mimic ApiError: the HTTP status in `code`.

import { Readable, Writable } from 'node:stream';

export class FakeApiError extends Error {
  constructor(
    readonly code: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export type FakeGcsOperation = 'getMetadata' | 'save' | 'delete' | 'copy' | 'createWriteStream';

interface SaveOptions {
  resumable?: boolean;
  preconditionOpts?: { ifGenerationMatch?: number };
}

export class FakeGcsFile {
  constructor(
    private readonly bucket: FakeGcsBucket,
    readonly name: string
  ) {}

  async getMetadata(): Promise<[{ name: string; size: number }]> {
    this.bucket.take('getMetadata');
    const content = this.bucket.require(this.name);
    return [{ name: this.name, size: content.length }];
  }

  async save(data: Buffer, options: SaveOptions = {}): Promise<void> {
    this.bucket.take('save');
    this.bucket.saveCalls.push({ name: this.name, options });
    if (options.preconditionOpts?.ifGenerationMatch === 0 && this.bucket.objects.has(this.name)) {
      throw new FakeApiError(412, 'At least one of the pre-conditions you specified did not hold.');
    }
    this.bucket.objects.set(this.name, Buffer.from(data));
  }

  async delete(): Promise<[unknown]> {
    this.bucket.take('delete');
    this.bucket.require(this.name);
    this.bucket.objects.delete(this.name);
    return [{}];
  }

  async copy(destination: FakeGcsFile): Promise<[FakeGcsFile]> {
    this.bucket.take('copy');
    const content = this.bucket.require(this.name);
    this.bucket.objects.set(destination.name, Buffer.from(content));
    return [destination];
  }

  createReadStream(): Readable {
    const content = this.bucket.objects.get(this.name);
    if (content === undefined) {
      const name = this.name;
      return new Readable({
        read() {
          this.destroy(new FakeApiError(404, `No such object: ${name}`));
        },
      });
    }
    return Readable.from([Buffer.from(content)]);
  }

  createWriteStream(): Writable {
    this.bucket.take('createWriteStream');
    const chunks: Buffer[] = [];
    const { bucket, name } = this;
    return new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
      final(callback) {
        bucket.objects.set(name, Buffer.concat(chunks));
        callback();
      },
    });
  }
}

export class FakeGcsBucket {
  readonly objects = new Map<string, Buffer>();
  readonly saveCalls: { name: string; options: SaveOptions }[] = [];
  private readonly failures = new Map<FakeGcsOperation, Error>();

  constructor(readonly name: string) {}

  file(name: string): FakeGcsFile {
    return new FakeGcsFile(this, name);
  }

  /** Make the next call of `operation` reject with `error`. */
  failNext(operation: FakeGcsOperation, error: Error): void {
    this.failures.set(operation, error);
  }

  take(operation: FakeGcsOperation): void {
    const error = this.failures.get(operation);
    if (error) {
      this.failures.delete(operation);
      throw error;
    }
  }

  require(name: string): Buffer {
    const content = this.objects.get(name);
    if (content === undefined) {
      throw new FakeApiError(404, `No such object: ${this.name}/${name}`);
    }
    return content;
  }
}
