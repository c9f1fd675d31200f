import fs from 'fs-extra';
import { ReadStream } from 'fs';
import path from 'path';
import zlib from 'zlib';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { IDENTITY_ENCODING, materialize, needsCompression } from './content-transformer';
import { ReadError } from './errors';
import { makeTempDir, writeAsset } from './test-helpers/fixtures';
import { CompressionPolicy, LocalAsset } from './types';

const CSS = 'body { margin: 0; padding: 0; }\n'.repeat(20);

describe('content-transformer', () => {
  let dir: string;
  let css: LocalAsset;
  let png: LocalAsset;

  beforeAll(async () => {
    dir = await makeTempDir();
    css = await writeAsset(dir, 'css/site.css', CSS);
    png = await writeAsset(dir, 'img/logo.png', Buffer.from([0x89, 0x50, 0x4e, 0x47]));
  });

  afterAll(async () => {
    await fs.remove(dir);
  });

  describe('needsCompression', () => {
    const policy = (algorithm: CompressionPolicy['algorithm'], extensions: string[]): CompressionPolicy => ({
      algorithm,
      level: 9,
      extensions,
    });

    it('compresses listed extensions with gzip or deflate', () => {
      expect(needsCompression(css, policy('gzip', ['.css', '.js']))).toBe(true);
      expect(needsCompression(css, policy('deflate', ['.css']))).toBe(true);
    });

    it('skips files whose extension is not listed', () => {
      expect(needsCompression(png, policy('gzip', ['.css']))).toBe(false);
    });

    it('skips everything without an algorithm or extensions', () => {
      expect(needsCompression(css, policy(null, ['.css']))).toBe(false);
      expect(needsCompression(css, policy('gzip', []))).toBe(false);
    });

    it('requires the leading dot in the extension list', () => {
      expect(needsCompression(css, policy('gzip', ['css']))).toBe(false);
    });
  });

  describe('materialize', () => {
    it('gzips eligible files into one buffer', async () => {
      const content = await materialize(css, { algorithm: 'gzip', level: 9, extensions: ['.css'] });
      expect(content.compressed).toBe(true);
      expect(content.contentEncoding).toBe('gzip');
      if (!content.compressed) throw new Error('expected a buffer');
      expect(content.body.subarray(0, 2)).toEqual(Buffer.from([0x1f, 0x8b]));
      expect(zlib.gunzipSync(content.body).toString()).toBe(CSS);
    });

    it('uses the zlib format for deflate', async () => {
      const content = await materialize(css, { algorithm: 'deflate', level: 6, extensions: ['.css'] });
      expect(content.contentEncoding).toBe('deflate');
      if (!content.compressed) throw new Error('expected a buffer');
      expect(zlib.inflateSync(content.body).toString()).toBe(CSS);
    });

    it('streams other files raw with the identity encoding', async () => {
      const content = await materialize(png, { algorithm: 'gzip', level: 9, extensions: ['.css'] });
      expect(content.compressed).toBe(false);
      expect(content.contentEncoding).toBe(IDENTITY_ENCODING);
      expect(content.body).toBeInstanceOf(ReadStream);
      if (content.body instanceof ReadStream) content.body.destroy();
    });

    it('fails with a ReadError for a missing file', async () => {
      const missing: LocalAsset = { ...css, absolutePath: path.join(dir, 'gone.css') };
      await expect(materialize(missing, { algorithm: 'gzip', level: 9, extensions: ['.css'] })).rejects.toBeInstanceOf(ReadError);
      await expect(materialize(missing, { algorithm: null, level: 9, extensions: [] })).rejects.toBeInstanceOf(ReadError);
    });
  });
});
