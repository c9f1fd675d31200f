import dotenv from 'dotenv';
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, formatError } from './errors';
import { COMPRESSION_ALGORITHMS, OBJECT_ACLS, SyncSettings } from './types';
import { bucketFromMapping } from './url-resolver';

export const DEFAULT_CONFIG_FILE = 'asset-sync.config.json';

export const SECRET_ID_ENV = 'ASSET_SYNC_SECRET_ID';
export const SECRET_KEY_ENV = 'ASSET_SYNC_SECRET_KEY';

/** Settings that must be present before a pass may start. */
export const REQUIRED_SETTINGS = ['url', 'region', 'secretId', 'secretKey', 'buckets'] as const;

const stringList = z.array(z.string()).default([]);

// 每个字段显式给出默认值
const ConfigFileSchema = z.object({
  url: z.string().optional(),
  storage: z.object({
    region: z.string().optional(),
    secretId: z.string().optional(),
    secretKey: z.string().optional(),
    buckets: z.record(z.string()).optional(),
    uploadFolder: z.string().default(''),
    acl: z.enum(OBJECT_ACLS).default('public-read'),
    cacheControl: z.string().nullable().default(null),
    expires: z.string().nullable().default(null),
    metadata: z.record(z.string()).default({}),
    endpoint: z.string().nullable().default(null),
    protocol: z.enum(['http:', 'https:']).default('https:'),
    timeout: z.number().int().min(0).default(0),
    usePathStyleEndpoint: z.boolean().default(false),
    cdn: z.object({
      use: z.boolean().default(false),
      url: z.string().nullable().default(null),
    }).default({}),
  }).default({}),
  compression: z.object({
    algorithm: z.enum(COMPRESSION_ALGORITHMS).nullable().default(null),
    level: z.number().int().min(0).max(9).default(9),
    extensions: stringList,
  }).default({}),
  mimetypes: z.record(z.string()).default({}),
  checksum: z.object({
    chunkSizeMB: z.number().positive().default(8),
    guessChunkSize: z.boolean().default(true),
    threads: z.number().int().positive().default(1),
  }).default({}),
  source: z.object({
    root: z.string().default('public'),
    include: z.object({
      directories: stringList,
      extensions: stringList,
    }).default({}),
    exclude: z.object({
      directories: stringList,
      files: stringList,
      patterns: stringList,
      hidden: z.boolean().default(true),
    }).default({}),
  }).default({}),
});

export type ConfigFile = z.input<typeof ConfigFileSchema>;

type FlatRecord = Record<string, unknown>;

function isMissing(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

/**
 * Fails with one {@link ConfigurationError} naming every required field that
 * is absent from the flattened record.
 */
export function validateRequired(record: FlatRecord, rules: readonly string[]): void {
  const missing = rules.filter((rule) => isMissing(record[rule]));
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required configuration: ${missing.join(', ')}`, missing);
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validates raw configuration and builds the immutable settings for a pass.
 * Credentials missing from the file are taken from the environment.
 */
export function buildSettings(raw: unknown, env: NodeJS.ProcessEnv = process.env): SyncSettings {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${describeIssues(parsed.error)}`,
      parsed.error.issues.map((issue) => issue.path.join('.'))
    );
  }

  const config = parsed.data;
  const { storage } = config;
  const secretId = storage.secretId || env[SECRET_ID_ENV];
  const secretKey = storage.secretKey || env[SECRET_KEY_ENV];

  validateRequired(
    {
      url: config.url,
      region: storage.region,
      secretId,
      secretKey,
      buckets: storage.buckets,
    },
    REQUIRED_SETTINGS
  );

  if (storage.cdn.use && !storage.cdn.url) {
    throw new ConfigurationError('storage.cdn.url is required when storage.cdn.use is true', ['cdnUrl']);
  }

  const buckets = storage.buckets ?? {};

  return deepFreeze({
    storage: {
      region: storage.region ?? '',
      secretId: secretId ?? '',
      secretKey: secretKey ?? '',
      bucket: bucketFromMapping(buckets),
      uploadFolder: storage.uploadFolder,
      acl: storage.acl,
      cacheControl: storage.cacheControl,
      expires: storage.expires,
      metadata: storage.metadata,
      endpoint: storage.endpoint,
      protocol: storage.protocol,
      forcePathStyle: storage.usePathStyleEndpoint,
      timeout: storage.timeout,
    },
    addressing: {
      buckets,
      url: config.url ?? '',
      usePathStyleEndpoint: storage.usePathStyleEndpoint,
      cdn: { use: storage.cdn.use, url: storage.cdn.url },
    },
    compression: config.compression,
    checksum: config.checksum,
    source: config.source,
    mimetypes: config.mimetypes,
  });
}

// 加载配置文件
export async function loadConfig(configPath?: string, cwd: string = process.cwd()): Promise<SyncSettings> {
  dotenv.config({ path: path.join(cwd, '.env') });

  const file = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
  if (!(await fs.pathExists(file))) {
    throw new ConfigurationError(`Configuration file not found: ${file}`);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(file);
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${file}: ${formatError(error)}`);
  }

  return buildSettings(raw, process.env);
}
