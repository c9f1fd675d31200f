import COS from 'cos-nodejs-sdk-v5';
import { ConnectionError, StorageError, formatError } from './errors';
import { ObjectStorage, PutObjectRequest, StorageSettings, StoredObject } from './types';

const MAX_KEYS = 1000;

function describeCosError(error: unknown): { message: string; statusCode?: number } {
  if (typeof error === 'object' && error !== null) {
    const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined;
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    const message = 'message' in error && typeof error.message === 'string' ? error.message : formatError(error);
    return { message: code ? `${code}: ${message}` : message, statusCode };
  }
  return { message: formatError(error) };
}

export function toStorageError(action: string, error: unknown): StorageError {
  const { message, statusCode } = describeCosError(error);
  return new StorageError(`${action} failed: ${message}`, statusCode, error);
}

function parseSize(size: string | number): number {
  const value = typeof size === 'number' ? size : parseInt(size, 10);
  return Number.isNaN(value) ? 0 : value;
}

/** COS bucket access through the callback API of cos-nodejs-sdk-v5. */
export class COSClient implements ObjectStorage {
  private client: COS;
  private config: Readonly<StorageSettings>;

  constructor(config: Readonly<StorageSettings>) {
    this.config = config;
    this.client = new COS({
      SecretId: config.secretId,
      SecretKey: config.secretKey,
      Protocol: config.protocol,
      ForcePathStyle: config.forcePathStyle,
      ...(config.endpoint ? { Domain: config.endpoint } : {}),
      ...(config.timeout > 0 ? { Timeout: config.timeout } : {}),
    });
  }

  /**
   * Builds a client, turning any construction failure into a {@link ConnectionError}.
   */
  static connect(config: Readonly<StorageSettings>): COSClient {
    if (!config.secretId || !config.secretKey) {
      throw new ConnectionError('Missing COS credentials');
    }
    if (!config.bucket || !config.region) {
      throw new ConnectionError('Missing COS bucket or region');
    }
    try {
      return new COSClient(config);
    } catch (error) {
      throw new ConnectionError(`Connection error: ${formatError(error)}`, error);
    }
  }

  get bucket(): string {
    return this.config.bucket;
  }

  /**
   * 查询对象列表, 单页
   * @param prefix Prefix表示列出的object的key以prefix开始
   * @param marker 分页标记
   */
  private listPage(prefix: string, marker?: string): Promise<COS.GetBucketResult> {
    return new Promise((resolve, reject) => {
      const params: COS.GetBucketParams = {
        Bucket: this.config.bucket,
        Region: this.config.region,
        Prefix: prefix,
        MaxKeys: MAX_KEYS,
        ...(marker ? { Marker: marker } : {}),
      };

      this.client.getBucket(params, (err, data) => {
        if (err) reject(toStorageError('List objects', err));
        else resolve(data);
      });
    });
  }

  /** Every object under `prefix`, following markers until the listing is exhausted. */
  async listObjects(prefix: string = ''): Promise<StoredObject[]> {
    const objects: StoredObject[] = [];
    let marker: string | undefined;

    for (;;) {
      const page = await this.listPage(prefix, marker);
      const contents = page.Contents ?? [];

      for (const item of contents) {
        objects.push({
          key: item.Key,
          etag: item.ETag,
          size: parseSize(item.Size),
          lastModified: new Date(item.LastModified),
        });
      }

      if (page.IsTruncated !== 'true') break;

      const nextMarker = page.NextMarker || contents[contents.length - 1]?.Key;
      if (!nextMarker || nextMarker === marker) {
        throw new StorageError('List objects failed: truncated listing without a next marker');
      }
      marker = nextMarker;
    }

    return objects;
  }

  async putObject(request: PutObjectRequest): Promise<void> {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.metadata)) {
      headers[`x-cos-meta-${name}`] = value;
    }

    const params: COS.PutObjectParams = {
      Bucket: this.config.bucket,
      Region: this.config.region,
      Key: request.key,
      Body: request.body,
      ACL: request.acl,
      ContentType: request.contentType,
      ContentEncoding: request.contentEncoding,
      ContentLength: request.contentLength,
      ...(request.cacheControl ? { CacheControl: request.cacheControl } : {}),
      ...(request.expires ? { Expires: request.expires } : {}),
      ...(Object.keys(headers).length > 0 ? { Headers: headers } : {}),
    };

    return new Promise((resolve, reject) => {
      this.client.putObject(params, (err) => {
        if (err) reject(toStorageError(`Upload of ${request.key}`, err));
        else resolve();
      });
    });
  }

  /**
   * 批量删除对象
   * @param keys 对象键, 最多1000个
   */
  private deleteBatch(keys: string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.deleteMultipleObject({
        Bucket: this.config.bucket,
        Region: this.config.region,
        Objects: keys.map((Key) => ({ Key })),
      }, (err, data) => {
        if (err) {
          reject(toStorageError('Delete objects', err));
          return;
        }
        const failed = data.Error ?? [];
        if (failed.length > 0) {
          reject(new StorageError(`Delete objects failed for ${failed.length} keys, first: ${failed[0].Key}`));
          return;
        }
        resolve();
      });
    });
  }

  /** Deletes every object under `prefix` and returns how many were removed. */
  async emptyBucket(prefix: string = ''): Promise<number> {
    const objects = await this.listObjects(prefix);
    const keys = objects.map((object) => object.key);

    for (let i = 0; i < keys.length; i += MAX_KEYS) {
      await this.deleteBatch(keys.slice(i, i + MAX_KEYS));
    }

    return keys.length;
  }
}
