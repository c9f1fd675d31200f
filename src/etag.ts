import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import fs from 'fs-extra';
import { ReadError } from './errors';
import { MEGABYTE } from './utils';

/** `<32 hex>-<parts>`, the tag format of multipart uploads. */
const MULTIPART_ETAG = /^\w{32}-\w+$/;
const PART_COUNT = /-(\d+)$/;

export interface VerifyOptions {
  /**
   * Scan every chunk size consistent with the part count in the expected tag
   * when the given chunk size does not reproduce it.
   */
  guessChunkSize?: boolean;
}

export function normalizeEtag(etag: string): string {
  return etag.replace(/^"+|"+$/g, '').toLowerCase();
}

export function isMultipartEtag(etag: string): boolean {
  return MULTIPART_ETAG.test(etag);
}

// 计算整个文件的MD5
export async function computeFileMD5(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('md5');
    const stream = createReadStream(filePath);

    stream.on('data', (chunk: Buffer | string) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', (error) => reject(new ReadError(filePath, error)));
  });
}

/**
 * MD5 digests of consecutive `partBytes`-sized slices of the file.
 * An empty file yields a single digest of the empty slice.
 */
export async function computePartDigests(filePath: string, partBytes: number): Promise<Buffer[]> {
  return new Promise((resolve, reject) => {
    const digests: Buffer[] = [];
    let hash = createHash('md5');
    let filled = 0;
    const stream = createReadStream(filePath);

    stream.on('data', (chunk: Buffer | string) => {
      const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      let offset = 0;
      while (offset < data.length) {
        const take = Math.min(partBytes - filled, data.length - offset);
        hash.update(data.subarray(offset, offset + take));
        filled += take;
        offset += take;
        if (filled === partBytes) {
          digests.push(hash.digest());
          hash = createHash('md5');
          filled = 0;
        }
      }
    });
    stream.on('end', () => {
      if (filled > 0 || digests.length === 0) {
        digests.push(hash.digest());
      }
      resolve(digests);
    });
    stream.on('error', (error) => reject(new ReadError(filePath, error)));
  });
}

/** Multipart tag: md5 of the concatenated binary part digests, then `-<count>`. */
export async function computeMultipartEtag(filePath: string, chunkSizeMB: number): Promise<string> {
  const digests = await computePartDigests(filePath, toPartBytes(chunkSizeMB));
  const combined = createHash('md5').update(Buffer.concat(digests)).digest('hex');
  return `${combined}-${digests.length}`;
}

function toPartBytes(chunkSizeMB: number): number {
  return Math.max(1, Math.floor(chunkSizeMB * MEGABYTE));
}

async function fileSizeOf(filePath: string): Promise<number> {
  try {
    const stat = await fs.stat(filePath);
    return stat.size;
  } catch (error) {
    throw new ReadError(filePath, error);
  }
}

function assertChunkSize(chunkSizeMB: number): void {
  if (!Number.isFinite(chunkSizeMB) || chunkSizeMB <= 0) {
    throw new RangeError(`Chunk size must be a positive number of megabytes, got ${chunkSizeMB}`);
  }
}

/**
 * Computes the integrity tag the store would report for this file.
 * Files smaller than one chunk get a plain MD5; everything else gets the
 * multipart form, including `-1` for a file of exactly one chunk.
 */
export async function computeEtag(filePath: string, chunkSizeMB: number): Promise<string> {
  assertChunkSize(chunkSizeMB);
  const size = await fileSizeOf(filePath);
  if (size < toPartBytes(chunkSizeMB)) {
    return computeFileMD5(filePath);
  }
  return computeMultipartEtag(filePath, chunkSizeMB);
}

/**
 * Inclusive range of whole-megabyte chunk sizes that split `fileSize` bytes
 * into exactly `parts` parts.
 */
export function candidateChunkSizes(fileSize: number, parts: number): number[] {
  if (!Number.isInteger(parts) || parts < 1) return [];

  const min = Math.max(1, Math.ceil(fileSize / parts / MEGABYTE));
  // any size at or above the file size gives one part, so the smallest one is enough
  const max = parts === 1 ? min : Math.floor(fileSize / (parts - 1) / MEGABYTE);

  const sizes: number[] = [];
  for (let size = min; size <= max; size++) {
    sizes.push(size);
  }
  return sizes;
}

/**
 * Checks the file against an integrity tag from a listing.
 *
 * Returns false for a non-positive chunk size instead of throwing, so the
 * caller can treat the file as unverifiable. Read failures still throw
 * {@link ReadError}.
 */
export async function verifyEtag(
  filePath: string,
  chunkSizeMB: number,
  expectedEtag: string,
  options: VerifyOptions = {}
): Promise<boolean> {
  if (!Number.isFinite(chunkSizeMB) || chunkSizeMB <= 0) {
    return false;
  }

  const expected = normalizeEtag(expectedEtag);
  const multipart = isMultipartEtag(expected);
  const size = await fileSizeOf(filePath);

  // a single PUT reports a plain MD5 whatever the size
  if (!multipart) {
    return (await computeFileMD5(filePath)) === expected;
  }

  if ((await computeMultipartEtag(filePath, chunkSizeMB)) === expected) {
    return true;
  }
  if (!options.guessChunkSize) {
    return false;
  }

  const match = PART_COUNT.exec(expected);
  if (!match) {
    return false;
  }

  const parts = parseInt(match[1], 10);
  for (const candidate of candidateChunkSizes(size, parts)) {
    if (candidate === chunkSizeMB) continue;
    if ((await computeMultipartEtag(filePath, candidate)) === expected) {
      return true;
    }
  }
  return false;
}
