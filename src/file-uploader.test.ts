import fs from 'fs-extra';
import { Readable } from 'stream';
import zlib from 'zlib';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageError } from './errors';
import { FileUploader } from './file-uploader';
import { makeTempDir, patternBytes, testSettings, writeAsset } from './test-helpers/fixtures';
import { MemoryStorage } from './test-helpers/memory-storage';
import { CompressionPolicy, PutObjectRequest } from './types';

const NO_COMPRESSION: CompressionPolicy = { algorithm: null, level: 9, extensions: [] };

describe('FileUploader', () => {
  let dir: string;
  let storage: MemoryStorage;

  beforeEach(async () => {
    dir = await makeTempDir();
    storage = new MemoryStorage();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  function uploader(compression: CompressionPolicy = NO_COMPRESSION): FileUploader {
    return new FileUploader(storage, testSettings().storage, compression);
  }

  it('declares the file size for streamed bodies', async () => {
    const asset = await writeAsset(dir, 'img/logo.png', patternBytes(2048));

    const result = await uploader().uploadAsset(asset);

    expect(result).toEqual({ key: 'img/logo.png', compressed: false, size: 2048 });
    expect(storage.puts[0]).toMatchObject({ contentLength: 2048, contentEncoding: 'identity' });
    expect(storage.puts[0].body.length).toBe(2048);
  });

  it('declares the compressed length for compressed bodies', async () => {
    const asset = await writeAsset(dir, 'site.css', 'body { color: red; }'.repeat(20));

    await uploader({ algorithm: 'gzip', level: 9, extensions: ['.css'] }).uploadAsset(asset);

    const put = storage.puts[0];
    expect(put.contentLength).toBe(put.body.length);
    expect(put.contentLength).toBeLessThan(asset.size);
    expect(zlib.gunzipSync(put.body).toString()).toBe('body { color: red; }'.repeat(20));
  });

  it('closes the file stream when the put fails before reading it', async () => {
    const asset = await writeAsset(dir, 'img/logo.png', patternBytes(64));
    const bodies: Array<Buffer | Readable> = [];
    const rejecting = new MemoryStorage();
    rejecting.rejectUnread.add('img/logo.png');
    const put = rejecting.putObject.bind(rejecting);
    rejecting.putObject = (request: PutObjectRequest) => {
      bodies.push(request.body);
      return put(request);
    };

    await expect(
      new FileUploader(rejecting, testSettings().storage, NO_COMPRESSION).uploadAsset(asset)
    ).rejects.toBeInstanceOf(StorageError);

    expect(bodies).toHaveLength(1);
    const body = bodies[0];
    expect(body).toBeInstanceOf(Readable);
    expect(body instanceof Readable && body.destroyed).toBe(true);
  });
});
