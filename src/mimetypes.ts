import * as FileType from 'file-type';
import mime from 'mime-types';
import { ReadError } from './errors';
import { LocalAsset } from './types';

export const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

// 按文件头识别类型
async function sniffContentType(absolutePath: string): Promise<string | undefined> {
  try {
    const detected = await FileType.fromFile(absolutePath);
    return detected?.mime;
  } catch (error) {
    throw new ReadError(absolutePath, error);
  }
}

/**
 * Content type for an asset: the configured override for its extension,
 * then the mime-types table, then the file's leading bytes, then a
 * generic binary type.
 */
export async function resolveContentType(
  asset: LocalAsset,
  overrides: Readonly<Record<string, string>>
): Promise<string> {
  const override = asset.extension ? overrides[asset.extension] : undefined;
  if (override) {
    return override;
  }
  const byName = mime.lookup(asset.relativePath);
  if (byName) {
    return byName;
  }
  return (await sniffContentType(asset.absolutePath)) ?? FALLBACK_CONTENT_TYPE;
}
