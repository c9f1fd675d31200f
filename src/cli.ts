import { Command } from 'commander';
import { AssetScanner } from './asset-scanner';
import { AssetSynchronizer } from './asset-synchronizer';
import { loadConfig } from './config';
import { COSClient } from './cos-client';
import { computeEtag, verifyEtag } from './etag';
import { formatError } from './errors';
import { ConsoleReporter, Reporter } from './reporter';
import { SyncSettings, SyncState } from './types';
import { UrlResolver } from './url-resolver';
import { formatSize } from './utils';

interface GlobalOptions {
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
}

interface EtagOptions {
  chunkSize: string;
  expect?: string;
  guess: boolean;
}

function parseChunkSize(value: string): number {
  const chunkSize = Number(value);
  if (!Number.isFinite(chunkSize) || chunkSize <= 0) {
    throw new Error(`Invalid chunk size: ${value}`);
  }
  return chunkSize;
}

export function createProgram(): Command {
  const program = new Command();

  // 配置命令行参数
  program
    .name('asset-sync')
    .description('Upload changed static assets to a COS bucket and build their public URLs')
    .version('1.0.0')
    .option('-c, --config <file>', 'configuration file', 'asset-sync.config.json')
    .option('-q, --quiet', 'only print errors')
    .option('-v, --verbose', 'print comparison progress');

  const reporterFor = (): Reporter => {
    const options = program.opts<GlobalOptions>();
    return new ConsoleReporter({ quiet: options.quiet, verbose: options.verbose });
  };

  const settingsFor = (): Promise<SyncSettings> => loadConfig(program.opts<GlobalOptions>().config);

  const synchronizerFor = (settings: SyncSettings, reporter: Reporter): AssetSynchronizer =>
    new AssetSynchronizer(settings, () => COSClient.connect(settings.storage), reporter);

  program
    .command('push')
    .description('upload every local asset that differs from the bucket')
    .action(async () => {
      const reporter = reporterFor();
      const settings = await settingsFor();
      const scanner = new AssetScanner(settings.source);
      const assets = await scanner.scan();
      reporter.info(`[Sync] Start sync: local=${scanner.sourceRoot} -> bucket=${settings.storage.bucket}`);

      const report = await synchronizerFor(settings, reporter).upload(assets);
      if (report.state === SyncState.Failed) {
        process.exitCode = 1;
        return;
      }

      reporter.info(`[Sync] Scanned local files: ${report.scannedLocal}`);
      reporter.info(`[Sync] Scanned remote objects: ${report.scannedRemote}`);
      reporter.info(`[Sync] Uploaded: ${report.uploaded} (${formatSize(report.totalSize)})`);
      reporter.info(`[Sync] Completed in ${report.elapsedTime.toFixed(2)}s`);
    });

  program
    .command('plan')
    .description('list the assets a push would upload, without uploading')
    .action(async () => {
      const reporter = reporterFor();
      const settings = await settingsFor();
      const assets = await new AssetScanner(settings.source).scan();
      const synchronizer = synchronizerFor(settings, reporter);
      const { toUpload } = await synchronizer.plan(assets);

      const uploadFolder = settings.storage.uploadFolder;
      for (const asset of toUpload) {
        console.log(uploadFolder ? `${uploadFolder.replace(/\/?$/, '/')}${asset.relativePath}` : asset.relativePath);
      }
      reporter.info(`[Sync] ${toUpload.length} of ${assets.length} files would be uploaded`);
    });

  program
    .command('empty')
    .description('delete every object under the upload folder')
    .action(async () => {
      const settings = await settingsFor();
      const report = await synchronizerFor(settings, reporterFor()).emptyBucket();
      if (!report.success) {
        process.exitCode = 1;
      }
    });

  program
    .command('url')
    .description('print the public URL of an asset')
    .argument('<path>', 'asset path relative to the upload folder root')
    .action(async (assetPath: string) => {
      const settings = await settingsFor();
      console.log(new UrlResolver(settings.addressing).resolve(assetPath));
    });

  program
    .command('etag')
    .description('compute or verify the integrity tag of a local file')
    .argument('<file>', 'local file')
    .option('-s, --chunk-size <mb>', 'multipart chunk size in megabytes', '8')
    .option('-e, --expect <etag>', 'verify against this tag instead of printing one')
    .option('--no-guess', 'do not scan other chunk sizes when verifying')
    .action(async (file: string, options: EtagOptions) => {
      const chunkSize = parseChunkSize(options.chunkSize);
      if (options.expect === undefined) {
        console.log(await computeEtag(file, chunkSize));
        return;
      }
      const matches = await verifyEtag(file, chunkSize, options.expect, { guessChunkSize: options.guess });
      console.log(matches ? 'match' : 'mismatch');
      if (!matches) {
        process.exitCode = 1;
      }
    });

  return program;
}

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  // 如果没有提供命令，显示帮助信息
  if (argv.length <= 2) {
    program.help();
  }
  try {
    await program.parseAsync(argv);
  } catch (error) {
    new ConsoleReporter().error(formatError(error));
    process.exitCode = 1;
  }
}
