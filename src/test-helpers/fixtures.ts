import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { LocalAsset, SyncSettings } from '../types';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'asset-sync-'));
}

/** Writes a file under `root` and returns it as a scanned asset. */
export async function writeAsset(root: string, relativePath: string, content: string | Buffer): Promise<LocalAsset> {
  const absolutePath = path.join(root, relativePath);
  await fs.outputFile(absolutePath, content);
  const stat = await fs.stat(absolutePath);
  return {
    relativePath,
    absolutePath,
    mtime: Math.floor(stat.mtimeMs / 1000),
    size: stat.size,
    extension: path.extname(relativePath),
  };
}

/** Deterministic pseudo-random bytes. */
export function patternBytes(length: number, seed: number = 7): Buffer {
  const buffer = Buffer.alloc(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (state * 1103515245 + 12345) & 0x7fffffff;
    buffer[i] = state >> 16;
  }
  return buffer;
}

export function testSettings(overrides: Partial<SyncSettings> = {}): SyncSettings {
  return {
    storage: {
      region: 'ap-test',
      secretId: 'test-id',
      secretKey: 'test-secret',
      bucket: 'test-bucket',
      uploadFolder: '',
      acl: 'public-read',
      cacheControl: null,
      expires: null,
      metadata: {},
      endpoint: null,
      protocol: 'https:',
      forcePathStyle: false,
      timeout: 0,
    },
    addressing: {
      buckets: { 'test-bucket': '*' },
      url: 'https://cos.ap-test.example.com',
      usePathStyleEndpoint: false,
      cdn: { use: false, url: null },
    },
    compression: { algorithm: null, level: 9, extensions: [] },
    checksum: { chunkSizeMB: 8, guessChunkSize: true, threads: 1 },
    source: {
      root: '.',
      include: { directories: [], extensions: [] },
      exclude: { directories: [], files: [], patterns: [], hidden: true },
    },
    mimetypes: {},
    ...overrides,
  };
}
