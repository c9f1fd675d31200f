#!/usr/bin/env node

import { run } from './cli';

export * from './types';
export * from './errors';
export { computeEtag, verifyEtag, candidateChunkSizes, normalizeEtag } from './etag';
export { needsCompression, materialize } from './content-transformer';
export { fetchRemoteInventory } from './remote-inventory';
export { DeltaCalculator, remoteKeyFor } from './delta-calculator';
export { FileUploader } from './file-uploader';
export { AssetSynchronizer } from './asset-synchronizer';
export { UrlResolver, bucketFromMapping } from './url-resolver';
export { AssetScanner } from './asset-scanner';
export { COSClient } from './cos-client';
export { loadConfig, buildSettings, validateRequired } from './config';
export { ConsoleReporter, SilentReporter } from './reporter';
export type { Reporter, ProgressEvent } from './reporter';

if (require.main === module) {
  run().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
