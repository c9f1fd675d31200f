import { materialize } from './content-transformer';
import { remoteKeyFor } from './delta-calculator';
import { resolveContentType } from './mimetypes';
import { CompressionPolicy, LocalAsset, ObjectStorage, StorageSettings } from './types';

export interface UploadedFile {
  key: string;
  compressed: boolean;
  size: number;
}

type UploadSettings = Pick<StorageSettings, 'uploadFolder' | 'acl' | 'cacheControl' | 'expires' | 'metadata'>;

/** Puts single assets into the bucket with their headers and encoding. */
export class FileUploader {
  private storage: ObjectStorage;
  private settings: Readonly<UploadSettings>;
  private compression: Readonly<CompressionPolicy>;
  private mimetypes: Readonly<Record<string, string>>;

  constructor(
    storage: ObjectStorage,
    settings: Readonly<UploadSettings>,
    compression: Readonly<CompressionPolicy>,
    mimetypes: Readonly<Record<string, string>> = {}
  ) {
    this.storage = storage;
    this.settings = settings;
    this.compression = compression;
    this.mimetypes = mimetypes;
  }

  keyFor(asset: LocalAsset): string {
    return remoteKeyFor(asset, this.settings.uploadFolder);
  }

  async uploadAsset(asset: LocalAsset): Promise<UploadedFile> {
    const key = this.keyFor(asset);
    const contentType = await resolveContentType(asset, this.mimetypes);
    const content = await materialize(asset, this.compression);

    try {
      await this.storage.putObject({
        key,
        body: content.body,
        contentType,
        contentEncoding: content.contentEncoding,
        contentLength: content.compressed ? content.body.length : asset.size,
        acl: this.settings.acl,
        cacheControl: this.settings.cacheControl,
        expires: this.settings.expires,
        metadata: { ...this.settings.metadata },
      });
    } catch (error) {
      // 上传失败时流可能未被读取, 关闭文件句柄
      if (!content.compressed) {
        content.body.destroy();
      }
      throw error;
    }

    return { key, compressed: content.compressed, size: asset.size };
  }
}
