import fs from 'fs-extra';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { buildSettings, loadConfig, validateRequired } from './config';
import { ConfigurationError } from './errors';
import { makeTempDir } from './test-helpers/fixtures';

const MINIMAL = {
  url: 'https://cos.ap-test.example.com',
  storage: {
    region: 'ap-test',
    secretId: 'test-id',
    secretKey: 'test-secret',
    buckets: { 'assets-1250000000/': '*' },
  },
};

describe('validateRequired', () => {
  it('passes when every rule is present', () => {
    expect(() => validateRequired({ url: 'x', region: 'y' }, ['url', 'region'])).not.toThrow();
  });

  it('names every missing field at once', () => {
    try {
      validateRequired({ url: '', region: 'y', buckets: {} }, ['url', 'region', 'buckets', 'secretId']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.fields).toEqual(['url', 'buckets', 'secretId']);
      expect(error.message).toBe('Missing required configuration: url, buckets, secretId');
    }
  });
});

describe('buildSettings', () => {
  it('fills defaults for every optional field', () => {
    const settings = buildSettings(MINIMAL, {});

    expect(settings.storage).toEqual({
      region: 'ap-test',
      secretId: 'test-id',
      secretKey: 'test-secret',
      bucket: 'assets-1250000000',
      uploadFolder: '',
      acl: 'public-read',
      cacheControl: null,
      expires: null,
      metadata: {},
      endpoint: null,
      protocol: 'https:',
      forcePathStyle: false,
      timeout: 0,
    });
    expect(settings.compression).toEqual({ algorithm: null, level: 9, extensions: [] });
    expect(settings.checksum).toEqual({ chunkSizeMB: 8, guessChunkSize: true, threads: 1 });
    expect(settings.source.root).toBe('public');
    expect(settings.source.exclude.hidden).toBe(true);
    expect(settings.addressing.cdn).toEqual({ use: false, url: null });
  });

  it('returns a frozen structure', () => {
    const settings = buildSettings(MINIMAL, {});
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.storage)).toBe(true);
    expect(Object.isFrozen(settings.compression.extensions)).toBe(true);
  });

  it('takes credentials from the environment when the file has none', () => {
    const raw = { ...MINIMAL, storage: { region: 'ap-test', buckets: { assets: '*' } } };
    const settings = buildSettings(raw, { ASSET_SYNC_SECRET_ID: 'env-id', ASSET_SYNC_SECRET_KEY: 'env-secret' });
    expect(settings.storage.secretId).toBe('env-id');
    expect(settings.storage.secretKey).toBe('env-secret');
  });

  it('reports missing required settings', () => {
    expect(() => buildSettings({ storage: { region: 'ap-test' } }, {})).toThrow(
      'Missing required configuration: url, secretId, secretKey, buckets'
    );
  });

  it('rejects values of the wrong shape', () => {
    const raw = { ...MINIMAL, compression: { algorithm: 'brotli' } };
    expect(() => buildSettings(raw, {})).toThrow(ConfigurationError);
  });

  it('takes the comparison concurrency from the checksum section', () => {
    const settings = buildSettings({ ...MINIMAL, checksum: { threads: 4 } }, {});
    expect(settings.checksum).toEqual({ chunkSizeMB: 8, guessChunkSize: true, threads: 4 });
    expect(() => buildSettings({ ...MINIMAL, checksum: { threads: 0 } }, {})).toThrow(ConfigurationError);
  });

  it('requires a CDN URL when CDN addressing is on', () => {
    const raw = { ...MINIMAL, storage: { ...MINIMAL.storage, cdn: { use: true } } };
    expect(() => buildSettings(raw, {})).toThrow('storage.cdn.url is required when storage.cdn.use is true');
  });
});

describe('loadConfig', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.remove(dir);
    dir = undefined;
  });

  it('reads the default file from the working directory', async () => {
    dir = await makeTempDir();
    await fs.writeJson(path.join(dir, 'asset-sync.config.json'), {
      ...MINIMAL,
      compression: { algorithm: 'gzip', extensions: ['.css', '.js'] },
    });

    const settings = await loadConfig(undefined, dir);
    expect(settings.compression).toEqual({ algorithm: 'gzip', level: 9, extensions: ['.css', '.js'] });
    expect(settings.addressing.buckets).toEqual({ 'assets-1250000000/': '*' });
  });

  it('fails when the file does not exist', async () => {
    dir = await makeTempDir();
    await expect(loadConfig('missing.json', dir)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('fails on malformed JSON', async () => {
    dir = await makeTempDir();
    await fs.writeFile(path.join(dir, 'broken.json'), '{ "url": ');
    await expect(loadConfig('broken.json', dir)).rejects.toThrow('Cannot read configuration file');
  });
});
