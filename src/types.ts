import { Readable } from 'stream';

export const COMPRESSION_ALGORITHMS = ['gzip', 'deflate'] as const;
export type CompressionAlgorithm = (typeof COMPRESSION_ALGORITHMS)[number];

export const OBJECT_ACLS = ['default', 'private', 'public-read'] as const;
export type ObjectAcl = (typeof OBJECT_ACLS)[number];

// 本地待同步文件
export interface LocalAsset {
  /** Path relative to the source root, always with forward slashes. */
  relativePath: string;
  absolutePath: string;
  /** Modification time in whole seconds. */
  mtime: number;
  size: number;
  /** Extension with its leading dot, or '' when the file has none. */
  extension: string;
}

// 远端对象记录
export interface RemoteObjectRecord {
  key: string;
  /** Integrity tag without quotes, lowercased. */
  hash: string;
  size: number;
  /** Last-modified time in whole seconds. */
  lastModified: number;
}

export type RemoteInventory = Map<string, RemoteObjectRecord>;

/** One entry of a raw storage listing, before normalization. */
export interface StoredObject {
  key: string;
  etag: string;
  size: number;
  lastModified: Date;
}

export interface CompressionPolicy {
  algorithm: CompressionAlgorithm | null;
  level: number;
  extensions: string[];
}

export interface AddressingConfig {
  /** Bucket mapping; the first key names the bucket. */
  buckets: Record<string, string>;
  url: string;
  usePathStyleEndpoint: boolean;
  cdn: {
    use: boolean;
    url: string | null;
  };
}

export interface ChecksumSettings {
  chunkSizeMB: number;
  guessChunkSize: boolean;
  /** Files compared at the same time while planning. */
  threads: number;
}

export interface SourceSettings {
  root: string;
  include: {
    directories: string[];
    extensions: string[];
  };
  exclude: {
    directories: string[];
    files: string[];
    patterns: string[];
    hidden: boolean;
  };
}

export interface StorageSettings {
  region: string;
  secretId: string;
  secretKey: string;
  bucket: string;
  uploadFolder: string;
  acl: ObjectAcl;
  cacheControl: string | null;
  expires: string | null;
  metadata: Record<string, string>;
  endpoint: string | null;
  protocol: 'http:' | 'https:';
  forcePathStyle: boolean;
  timeout: number;
}

// 扁平化、只读的运行配置
export interface SyncSettings {
  readonly storage: Readonly<StorageSettings>;
  readonly addressing: Readonly<AddressingConfig>;
  readonly compression: Readonly<CompressionPolicy>;
  readonly checksum: Readonly<ChecksumSettings>;
  readonly source: Readonly<SourceSettings>;
  readonly mimetypes: Readonly<Record<string, string>>;
}

export interface PutObjectRequest {
  key: string;
  body: Buffer | Readable;
  contentType: string;
  contentEncoding: string;
  contentLength: number;
  acl: ObjectAcl;
  cacheControl: string | null;
  expires: string | null;
  metadata: Record<string, string>;
}

/** The storage collaborator the sync core talks to. */
export interface ObjectStorage {
  readonly bucket: string;
  listObjects(prefix?: string): Promise<StoredObject[]>;
  putObject(request: PutObjectRequest): Promise<void>;
  emptyBucket(prefix?: string): Promise<number>;
}

export type StorageConnector = () => ObjectStorage;

export enum SyncState {
  Idle = 'idle',
  Connected = 'connected',
  Planning = 'planning',
  Uploading = 'uploading',
  Completed = 'completed',
  Failed = 'failed',
}

export interface UploadReport {
  state: SyncState.Completed | SyncState.Failed;
  scannedLocal: number;
  scannedRemote: number;
  planned: number;
  uploaded: number;
  totalSize: number;
  elapsedTime: number;
  error?: Error;
}

export interface EmptyReport {
  success: boolean;
  deleted: number;
  error?: Error;
}
