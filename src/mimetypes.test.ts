import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ReadError } from './errors';
import { FALLBACK_CONTENT_TYPE, resolveContentType } from './mimetypes';
import { makeTempDir, writeAsset } from './test-helpers/fixtures';
import { LocalAsset } from './types';

const PNG_HEADER = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d, 0x49, 0x48, 0x44, 0x52]);

function asset(relativePath: string, extension: string): LocalAsset {
  return { relativePath, absolutePath: `/srv/public/${relativePath}`, mtime: 0, size: 0, extension };
}

describe('resolveContentType', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('prefers the configured override', async () => {
    await expect(resolveContentType(asset('fonts/a.woff2', '.woff2'), { '.woff2': 'font/woff2-custom' })).resolves.toBe(
      'font/woff2-custom'
    );
  });

  it('falls back to the mime-types table', async () => {
    await expect(resolveContentType(asset('css/site.css', '.css'), {})).resolves.toBe('text/css');
    await expect(resolveContentType(asset('img/logo.png', '.png'), { '.css': 'text/plain' })).resolves.toBe('image/png');
  });

  it('detects the type from the content of files without a known extension', async () => {
    const image = await writeAsset(dir, 'logo', Buffer.concat([PNG_HEADER, Buffer.alloc(32)]));
    await expect(resolveContentType(image, {})).resolves.toBe('image/png');
  });

  it('uses a generic binary type when the content is not recognized', async () => {
    const license = await writeAsset(dir, 'LICENSE', 'Permission is hereby granted');
    const blob = await writeAsset(dir, 'data/blob.unknownext', 'just some bytes');
    await expect(resolveContentType(license, {})).resolves.toBe(FALLBACK_CONTENT_TYPE);
    await expect(resolveContentType(blob, {})).resolves.toBe(FALLBACK_CONTENT_TYPE);
  });

  it('fails with a ReadError when the file cannot be read', async () => {
    await expect(resolveContentType(asset('missing', ''), {})).rejects.toBeInstanceOf(ReadError);
  });
});
