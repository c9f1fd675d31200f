import { ConfigurationError } from './errors';
import { AddressingConfig } from './types';
import { stripTrailingSlashes } from './utils';

/** The bucket named by the first key of the mapping, without trailing slashes. */
export function bucketFromMapping(buckets: Readonly<Record<string, string>>): string {
  const [first] = Object.keys(buckets);
  return first === undefined ? '' : stripTrailingSlashes(first);
}

function parseUrl(value: string, field: string): URL {
  try {
    return new URL(value);
  } catch {
    throw new ConfigurationError(`Invalid ${field}: ${value}`, [field]);
  }
}

/**
 * Builds public URLs for uploaded assets.
 *
 * - CDN: `scheme://cdnHost/path`, bucket ignored.
 * - Path style: `scheme://host[:port]/bucket/path`, default ports dropped.
 * - Virtual hosted (default): `scheme://bucket.host/path`.
 */
export class UrlResolver {
  private config: Readonly<AddressingConfig>;

  constructor(config: Readonly<AddressingConfig>) {
    this.config = config;
  }

  get bucket(): string {
    return bucketFromMapping(this.config.buckets);
  }

  resolve(relativePath: string): string {
    const path = relativePath.replace(/\\/g, '/').replace(/^\/+/, '');

    if (this.config.cdn.use === true) {
      if (!this.config.cdn.url) {
        throw new ConfigurationError('CDN addressing is enabled but no CDN URL is set', ['cdnUrl']);
      }
      const cdn = parseUrl(this.config.cdn.url, 'cdnUrl');
      return `${cdn.protocol}//${cdn.hostname}/${path}`;
    }

    const base = parseUrl(this.config.url, 'url');
    const bucket = this.bucket;

    if (this.config.usePathStyleEndpoint) {
      // URL 会自动去掉协议默认端口
      const port = base.port ? `:${base.port}` : '';
      const bucketSegment = bucket ? `${bucket}/` : '';
      return `${base.protocol}//${base.hostname}${port}/${bucketSegment}${path}`;
    }

    const bucketLabel = bucket ? `${bucket}.` : '';
    return `${base.protocol}//${bucketLabel}${base.hostname}/${path}`;
  }
}
