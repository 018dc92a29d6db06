#!/usr/bin/env node
import 'dotenv/config';
import { hideBin } from 'yargs/helpers';
import log, { configureLogging } from './logger.js';
import { parseCliArgs } from './cli.js';
import { loadConfig } from './config/env.js';
import type { AppConfig } from './config/env.js';
import { ensureAppDirectories, getAppPaths } from './config/app-paths.js';
import { PipelineRunner } from './pipeline/pipeline-runner.js';
import { FsRemoteStore, R2RemoteStore, ReadOnlyRemoteStore } from './services/remote-store.js';
import type { RemoteTier } from './services/remote-store.js';
import { LocalStore } from './services/local-store.js';
import { DirectorySource } from './services/source-service.js';
import { FfmpegEncoder } from './services/encoder-service.js';
import { describeError } from './errors.js';

const createRemote = (config: AppConfig, upload: boolean): RemoteTier => {
  const remote =
    config.remote.backend === 'r2'
      ? new R2RemoteStore({
          endpoint: config.remote.endpoint,
          accessKeyId: config.remote.accessKeyId,
          secretAccessKey: config.remote.secretAccessKey,
          bucket: config.remote.bucket
        })
      : new FsRemoteStore(config.remote.rootDir);
  return upload ? remote : new ReadOnlyRemoteStore(remote);
};

const main = async (): Promise<void> => {
  const args = parseCliArgs(hideBin(process.argv));
  const config = loadConfig();
  const paths = getAppPaths(config.outputDir);
  await ensureAppDirectories(paths);
  configureLogging({ logDir: paths.logDir, level: config.logLevel });

  const runner = new PipelineRunner(
    {
      sourceRoot: config.sourceRoot,
      folderPrefix: config.folderPrefix,
      paths,
      remotePrefix: config.remotePrefix,
      downloadWorkers: config.downloadWorkers,
      buildConcurrency: config.buildConcurrency,
      retentionDays: config.retentionDays,
      evictTiers: config.evictTiers,
      eventsFile: config.eventsFile
    },
    {
      source: new DirectorySource(),
      local: new LocalStore(paths.tempDir),
      remote: createRemote(config, args.upload),
      encoder: new FfmpegEncoder({
        tempDir: paths.tempDir,
        video: config.video,
        full: config.full,
        ffmpegPath: config.ffmpegPath
      })
    }
  );

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => runner.cancel(`received ${signal}`));
  }

  log.info('Starting timelapse run (backend %s, upload %s)', config.remote.backend, args.upload ? 'on' : 'off');
  const report = await runner.runIncrementalBuild(args.run, (event) => {
    if (event.type === 'phase') {
      log.info('Phase: %s', event.phase);
    } else if (event.type === 'stats' && event.stats) {
      const { stage, built, skipped, failed, weeksBuilt } = event.stats;
      log.verbose('[%s] built %d, skipped %d, failed %d, weeks built %d', stage, built, skipped, failed, weeksBuilt);
    }
  });

  log.info(
    'Run %s finished in %dms: %d built, %d skipped, %d evicted, %d errors%s',
    report.runId,
    report.durationMs,
    report.built.length,
    report.skipped.length,
    report.evicted.length,
    report.errors.length,
    report.cancelled ? ' (cancelled)' : ''
  );
  if (report.planned.length) {
    log.info('Planned: %s', report.planned.join(', '));
  }
  if (report.reportPath) {
    log.info('Report written to %s', report.reportPath);
  }
};

main().catch((error: unknown) => {
  log.error('Run failed: %s', describeError(error));
  process.exitCode = 1;
});
