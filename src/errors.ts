export type AssetSyncErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'CONNECTION_ERROR'
  | 'STORAGE_ERROR'
  | 'READ_ERROR'
  | 'COMPRESSION_ERROR';

export class AssetSyncError extends Error {
  readonly code: AssetSyncErrorCode;

  constructor(code: AssetSyncErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

/** A required setting is missing or malformed; the pass never starts. */
export class ConfigurationError extends AssetSyncError {
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super('CONFIGURATION_ERROR', message);
    this.fields = fields;
  }
}

/** The storage client could not be built. */
export class ConnectionError extends AssetSyncError {
  constructor(message: string, cause?: unknown) {
    super('CONNECTION_ERROR', message, cause);
  }
}

/** Listing, put or delete failed on the remote side. */
export class StorageError extends AssetSyncError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super('STORAGE_ERROR', message, cause);
    this.statusCode = statusCode;
  }
}

export class ReadError extends AssetSyncError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('READ_ERROR', `Cannot read ${path}: ${formatError(cause)}`, cause);
    this.path = path;
  }
}

export class CompressionError extends AssetSyncError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('COMPRESSION_ERROR', `Cannot compress ${path}: ${formatError(cause)}`, cause);
    this.path = path;
  }
}

export const formatError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

export const toError = (error: unknown): Error => {
  return error instanceof Error ? error : new Error(formatError(error));
};
