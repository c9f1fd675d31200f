import { verifyEtag } from './etag';
import { Reporter, SilentReporter } from './reporter';
import { ChecksumSettings, LocalAsset, RemoteInventory } from './types';
import { normalizePrefix, toRemoteKey } from './utils';

export interface DeltaOptions extends Omit<ChecksumSettings, 'threads'> {
  /** Upload folder the remote keys live under. */
  keyPrefix?: string;
  /** Files compared at the same time; results keep the input order. */
  threads?: number;
}

export function remoteKeyFor(asset: LocalAsset, keyPrefix: string = ''): string {
  return normalizePrefix(keyPrefix) + toRemoteKey(asset.relativePath);
}

export class DeltaCalculator {
  private options: DeltaOptions;
  private threads: number;
  private reporter: Reporter;

  constructor(options: DeltaOptions, reporter: Reporter = new SilentReporter()) {
    this.options = options;
    this.threads = Math.max(1, Math.floor(options.threads ?? 1));
    this.reporter = reporter;
  }

  /**
   * Decides whether one asset has to be uploaded.
   * Matching timestamp and size skip the content check entirely, so a file
   * whose content changed while both stayed the same is not detected.
   */
  async needsUpload(asset: LocalAsset, remote: RemoteInventory): Promise<boolean> {
    const key = remoteKeyFor(asset, this.options.keyPrefix);
    const remoteInfo = remote.get(key);

    if (!remoteInfo) {
      return true;
    }

    if (remoteInfo.lastModified === asset.mtime && remoteInfo.size === asset.size) {
      return false;
    }

    const verified = await verifyEtag(asset.absolutePath, this.options.chunkSizeMB, remoteInfo.hash, {
      guessChunkSize: this.options.guessChunkSize,
    });
    return !verified;
  }

  /** The subset of `assets` that must be uploaded, in input order. */
  async plan(assets: LocalAsset[], remote: RemoteInventory): Promise<LocalAsset[]> {
    if (remote.size === 0) {
      this.reporter.info('[Diff] Remote is empty, every file will be uploaded');
      return [...assets];
    }

    const toUpload: LocalAsset[] = [];
    const total = assets.length;
    let processed = 0;

    for (let i = 0; i < assets.length; i += this.threads) {
      const batch = assets.slice(i, i + this.threads);
      const decisions = await Promise.all(batch.map((asset) => this.needsUpload(asset, remote)));

      decisions.forEach((needUpload, index) => {
        if (needUpload) {
          toUpload.push(batch[index]);
        }
      });

      processed += batch.length;
      if (processed % 100 === 0 || processed === total) {
        this.reporter.debug(`[Diff] Progress: ${processed}/${total}`);
      }
    }

    this.reporter.info(`[Diff] To upload: ${toUpload.length} files`);
    return toUpload;
  }
}
