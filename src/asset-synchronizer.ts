import { DeltaCalculator } from './delta-calculator';
import { formatError, toError } from './errors';
import { FileUploader } from './file-uploader';
import { fetchRemoteInventory } from './remote-inventory';
import { Reporter, SilentReporter } from './reporter';
import {
  EmptyReport,
  LocalAsset,
  ObjectStorage,
  StorageConnector,
  SyncSettings,
  SyncState,
  UploadReport,
} from './types';
import { normalizePrefix } from './utils';

const TRANSITIONS: Record<SyncState, SyncState[]> = {
  [SyncState.Idle]: [SyncState.Connected, SyncState.Failed],
  [SyncState.Connected]: [SyncState.Planning, SyncState.Completed, SyncState.Failed],
  [SyncState.Planning]: [SyncState.Uploading, SyncState.Completed, SyncState.Failed],
  [SyncState.Uploading]: [SyncState.Completed, SyncState.Failed],
  [SyncState.Completed]: [],
  [SyncState.Failed]: [],
};

export interface PlanResult {
  storage: ObjectStorage;
  scannedRemote: number;
  toUpload: LocalAsset[];
}

interface PassCounters {
  scannedLocal: number;
  scannedRemote: number;
  planned: number;
  uploaded: number;
  totalSize: number;
}

/**
 * Drives one upload pass:
 * Idle → Connected → Planning → Uploading → Completed | Failed.
 * The first failure ends the pass; objects already uploaded stay uploaded.
 */
export class AssetSynchronizer {
  private settings: SyncSettings;
  private connector: StorageConnector;
  private reporter: Reporter;
  private currentState: SyncState = SyncState.Idle;
  private history: SyncState[] = [SyncState.Idle];

  constructor(settings: SyncSettings, connector: StorageConnector, reporter: Reporter = new SilentReporter()) {
    this.settings = settings;
    this.connector = connector;
    this.reporter = reporter;
  }

  get state(): SyncState {
    return this.currentState;
  }

  /** Every state the last pass went through, starting with Idle. */
  get stateHistory(): readonly SyncState[] {
    return this.history;
  }

  private get uploadFolder(): string {
    return normalizePrefix(this.settings.storage.uploadFolder);
  }

  private reset(): void {
    this.currentState = SyncState.Idle;
    this.history = [SyncState.Idle];
  }

  private transition(next: SyncState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new Error(`Invalid sync state transition: ${this.currentState} -> ${next}`);
    }
    this.currentState = next;
    this.history.push(next);
  }

  private connect(): ObjectStorage {
    try {
      const storage = this.connector();
      this.transition(SyncState.Connected);
      return storage;
    } catch (error) {
      this.reporter.error(`[Sync] Connection error: ${formatError(error)}`);
      throw error;
    }
  }

  private createDeltaCalculator(): DeltaCalculator {
    return new DeltaCalculator(
      {
        chunkSizeMB: this.settings.checksum.chunkSizeMB,
        guessChunkSize: this.settings.checksum.guessChunkSize,
        threads: this.settings.checksum.threads,
        keyPrefix: this.uploadFolder,
      },
      this.reporter
    );
  }

  /** Connects and works out which assets differ from the bucket, without uploading. */
  async plan(assets: LocalAsset[]): Promise<PlanResult> {
    this.reset();
    try {
      const storage = this.connect();
      return await this.planWith(storage, assets);
    } catch (error) {
      this.fail();
      throw error;
    }
  }

  private async planWith(storage: ObjectStorage, assets: LocalAsset[]): Promise<PlanResult> {
    this.transition(SyncState.Planning);
    this.reporter.info('[Remote] Comparing local files and bucket...');

    const remote = await fetchRemoteInventory(storage, this.uploadFolder);
    const toUpload = await this.createDeltaCalculator().plan(assets, remote);
    return { storage, scannedRemote: remote.size, toUpload };
  }

  private fail(): void {
    if (this.currentState !== SyncState.Failed) {
      this.transition(SyncState.Failed);
    }
  }

  async upload(assets: LocalAsset[]): Promise<UploadReport> {
    const startTime = Date.now();
    const counters: PassCounters = {
      scannedLocal: assets.length,
      scannedRemote: 0,
      planned: 0,
      uploaded: 0,
      totalSize: 0,
    };
    const finish = (state: SyncState.Completed | SyncState.Failed, error?: Error): UploadReport => ({
      state,
      ...counters,
      elapsedTime: (Date.now() - startTime) / 1000,
      ...(error ? { error } : {}),
    });

    this.reset();

    let storage: ObjectStorage;
    try {
      storage = this.connect();
    } catch (error) {
      this.fail();
      return finish(SyncState.Failed, toError(error));
    }

    try {
      const { toUpload, scannedRemote } = await this.planWith(storage, assets);
      counters.scannedRemote = scannedRemote;
      counters.planned = toUpload.length;

      if (toUpload.length === 0) {
        this.transition(SyncState.Completed);
        this.reporter.info('[Upload] No new files to upload.');
        return finish(SyncState.Completed);
      }

      this.transition(SyncState.Uploading);
      this.reporter.info('[Upload] Upload in progress......');

      const uploader = new FileUploader(
        storage,
        this.settings.storage,
        this.settings.compression,
        this.settings.mimetypes
      );

      for (const [index, asset] of toUpload.entries()) {
        const uploaded = await uploader.uploadAsset(asset);
        this.reporter.progress({
          index,
          total: toUpload.length,
          path: asset.absolutePath,
          compressed: uploaded.compressed,
        });
        counters.uploaded++;
        counters.totalSize += uploaded.size;
      }

      this.transition(SyncState.Completed);
      this.reporter.success('[Upload] Upload completed successfully.');
      return finish(SyncState.Completed);
    } catch (error) {
      this.fail();
      const label = this.history.includes(SyncState.Uploading) ? 'Upload error' : 'Comparison error';
      this.reporter.error(`[Sync] ${label}: ${formatError(error)}`);
      return finish(SyncState.Failed, toError(error));
    }
  }

  /** Deletes every object under the upload folder. */
  async emptyBucket(): Promise<EmptyReport> {
    this.reset();

    let storage: ObjectStorage;
    try {
      storage = this.connect();
    } catch (error) {
      this.fail();
      return { success: false, deleted: 0, error: toError(error) };
    }

    this.reporter.info('[Empty] Emptying in progress...');
    try {
      const deleted = await storage.emptyBucket(this.uploadFolder);
      if (deleted === 0) {
        this.reporter.success(`[Empty] The bucket ${storage.bucket} is already empty.`);
      } else {
        this.reporter.success(`[Empty] The bucket ${storage.bucket} is now empty (${deleted} objects removed).`);
      }
      this.transition(SyncState.Completed);
      return { success: true, deleted };
    } catch (error) {
      this.fail();
      this.reporter.error(`[Empty] Deletion error: ${formatError(error)}`);
      return { success: false, deleted: 0, error: toError(error) };
    }
  }
}
