import { Readable } from 'stream';
import { StorageError } from '../errors';
import { ObjectStorage, PutObjectRequest, StoredObject } from '../types';

export interface StoredPut extends Omit<PutObjectRequest, 'body'> {
  body: Buffer;
}

async function readBody(body: Buffer | Readable): Promise<Buffer> {
  if (Buffer.isBuffer(body)) return body;
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/** In-process bucket for tests; records every put attempt. */
export class MemoryStorage implements ObjectStorage {
  readonly bucket: string;
  objects = new Map<string, StoredObject>();
  puts: StoredPut[] = [];
  attemptedKeys: string[] = [];
  failOnPut = new Set<string>();
  /** Keys rejected before the body is read. */
  rejectUnread = new Set<string>();
  failListing = false;

  constructor(bucket: string = 'test-bucket') {
    this.bucket = bucket;
  }

  seed(object: StoredObject): void {
    this.objects.set(object.key, object);
  }

  async listObjects(prefix: string = ''): Promise<StoredObject[]> {
    if (this.failListing) {
      throw new StorageError('List objects failed: AccessDenied', 403);
    }
    return [...this.objects.values()].filter((object) => object.key.startsWith(prefix));
  }

  async putObject(request: PutObjectRequest): Promise<void> {
    this.attemptedKeys.push(request.key);
    if (this.rejectUnread.has(request.key)) {
      throw new StorageError(`Upload of ${request.key} failed: RequestTimeout`, 400);
    }
    const body = await readBody(request.body);
    if (this.failOnPut.has(request.key)) {
      throw new StorageError(`Upload of ${request.key} failed: InternalError`, 500);
    }
    this.puts.push({ ...request, body });
    this.objects.set(request.key, {
      key: request.key,
      etag: `"${request.key}"`,
      size: body.length,
      lastModified: new Date(),
    });
  }

  async emptyBucket(prefix: string = ''): Promise<number> {
    const keys = [...this.objects.keys()].filter((key) => key.startsWith(prefix));
    keys.forEach((key) => this.objects.delete(key));
    return keys.length;
  }
}
