import { createReadStream, ReadStream } from 'fs';
import fs from 'fs-extra';
import { promisify } from 'util';
import zlib from 'zlib';
import { CompressionError, ReadError } from './errors';
import { COMPRESSION_ALGORITHMS, CompressionAlgorithm, CompressionPolicy, LocalAsset } from './types';

const gzip = promisify(zlib.gzip);
const deflate = promisify(zlib.deflate);

export const IDENTITY_ENCODING = 'identity';

export type MaterializedContent =
  | { body: Buffer; contentEncoding: CompressionAlgorithm; compressed: true }
  | { body: ReadStream; contentEncoding: typeof IDENTITY_ENCODING; compressed: false };

function isSupportedAlgorithm(algorithm: string | null): algorithm is CompressionAlgorithm {
  return COMPRESSION_ALGORITHMS.some((supported) => supported === algorithm);
}

export function needsCompression(asset: LocalAsset, policy: CompressionPolicy): boolean {
  return (
    !!policy.algorithm &&
    policy.extensions.length > 0 &&
    isSupportedAlgorithm(policy.algorithm) &&
    asset.extension !== '' &&
    policy.extensions.includes(asset.extension)
  );
}

function clampLevel(level: number): number {
  if (!Number.isFinite(level)) return zlib.constants.Z_DEFAULT_COMPRESSION;
  return Math.min(9, Math.max(0, Math.round(level)));
}

// gzip 输出 gzip 封装, deflate 输出 zlib 封装
async function compress(data: Buffer, algorithm: CompressionAlgorithm, level: number): Promise<Buffer> {
  const options = { level: clampLevel(level) };
  switch (algorithm) {
    case 'gzip':
      return gzip(data, options);
    case 'deflate':
      return deflate(data, options);
  }
}

/**
 * Produces the upload body for an asset: one compressed buffer when the
 * policy applies, otherwise a lazy stream over the file.
 */
export async function materialize(asset: LocalAsset, policy: CompressionPolicy): Promise<MaterializedContent> {
  const algorithm = policy.algorithm;
  if (!needsCompression(asset, policy) || algorithm === null) {
    try {
      await fs.access(asset.absolutePath, fs.constants.R_OK);
    } catch (error) {
      throw new ReadError(asset.absolutePath, error);
    }
    return { body: createReadStream(asset.absolutePath), contentEncoding: IDENTITY_ENCODING, compressed: false };
  }

  let data: Buffer;
  try {
    data = await fs.readFile(asset.absolutePath);
  } catch (error) {
    throw new ReadError(asset.absolutePath, error);
  }

  try {
    const body = await compress(data, algorithm, policy.level);
    return { body, contentEncoding: algorithm, compressed: true };
  } catch (error) {
    throw new CompressionError(asset.absolutePath, error);
  }
}
