import { DateTime } from 'luxon';
import PQueue from 'p-queue';
import { v4 as uuid } from 'uuid';
import { ensureAppDirectories } from '../config/app-paths.js';
import type { AppPaths } from '../config/app-paths.js';
import { CacheResolver } from '../services/cache-resolver.js';
import { BuildScheduler, createDailyArtifacts, discoverPartitions, selectPartitions, transitionDailyState, weekIdOf } from '../services/build-scheduler.js';
import { WeeklyAggregator, createWeeklyArtifacts, groupIntoWeeks, isAvailable, planWeekly } from '../services/weekly-aggregator.js';
import { StateStore } from '../services/state-store.js';
import { SyncService } from '../services/sync-service.js';
import { RetentionService } from '../services/retention-service.js';
import { PublishService, buildManifest, hasWeeklyVideo } from '../services/publish-service.js';
import { ReportService } from '../services/report-service.js';
import { loadEvents } from '../services/events-service.js';
import type { LocalTier } from '../services/local-store.js';
import type { RemoteTier } from '../services/remote-store.js';
import type { MediaEncoder } from '../services/encoder-service.js';
import type { RawInputSource } from '../services/source-service.js';
import { PipelineError, StateStoreError, describeError } from '../errors.js';
import { artifactSubject } from '../utils/naming.js';
import { safeRemove } from '../utils/files.js';
import { KeyLock } from './key-lock.js';
import { PipelineControl } from './pipeline-control.js';
import log from '../logger.js';
import type {
  DailyArtifact,
  ErrorKind,
  EvictTiers,
  PartitionListing,
  RunOptions,
  RunReport,
  SourcePartition,
  WeeklyArtifact
} from '../../shared/types/artifact.js';
import type { RunStatsPayload } from '../../shared/types/run-stats.js';
import type { ProgressCallback } from '../types.js';

export interface RunnerSettings {
  sourceRoot: string;
  folderPrefix: string;
  paths: AppPaths;
  remotePrefix: string;
  downloadWorkers: number;
  buildConcurrency: number;
  retentionDays: number;
  evictTiers: EvictTiers;
  /** YAML milestone list for the manifest; read on every publish when set. */
  eventsFile?: string;
}

export interface RunnerDeps {
  source: RawInputSource;
  local: LocalTier;
  remote: RemoteTier;
  encoder: MediaEncoder;
  clock?: () => DateTime;
}

interface RunContext {
  report: RunReport;
  progress: ProgressCallback;
  sync: SyncService;
  fatal?: StateStoreError;
}

const noop: ProgressCallback = () => undefined;

export class PipelineRunner {
  private readonly control = new PipelineControl();
  private readonly clock: () => DateTime;
  private isRunning = false;

  constructor(
    private readonly settings: RunnerSettings,
    private readonly deps: RunnerDeps
  ) {
    this.clock = deps.clock ?? (() => DateTime.utc());
  }

  /**
   * One reconciliation pass: discover partitions, resolve and rebuild dailies, re-aggregate
   * weeks, publish, evict and report. Per-key failures land in the report; only a
   * processing-state failure rejects.
   */
  async runIncrementalBuild(options: RunOptions, progress: ProgressCallback = noop): Promise<RunReport> {
    if (this.isRunning) {
      throw new Error('A build is already running.');
    }
    this.isRunning = true;
    this.control.reset();
    const { source, local, remote, encoder } = this.deps;
    const { paths, remotePrefix } = this.settings;
    const startedAt = this.clock();
    await ensureAppDirectories(paths);

    const fetchQueue = new PQueue({ concurrency: this.settings.downloadWorkers });
    const buildQueue = new PQueue({ concurrency: this.settings.buildConcurrency });
    const resolver = new CacheResolver({ outputDir: paths.outputDir, remotePrefix }, local, remote);
    const stateStore = new StateStore(remote);
    const sync = new SyncService(local, remote, resolver, stateStore);
    const scheduler = new BuildScheduler({ source, encoder, local, resolver, fetchQueue, tempDir: paths.tempDir });
    const aggregator = new WeeklyAggregator({ resolver, encoder, local, fetchQueue, tempDir: paths.tempDir });
    const ctx: RunContext = {
      report: {
        runId: uuid(),
        startedAt: startedAt.toUTC().toISO() ?? '',
        finishedAt: '',
        durationMs: 0,
        partitions: 0,
        built: [],
        planned: [],
        skipped: [],
        pulled: [],
        evicted: [],
        published: [],
        errors: [],
        cancelled: false
      },
      progress,
      sync
    };

    try {
      progress({ type: 'phase', phase: 'load-state' });
      const state = await stateStore.load();
      const processed = new Set(state.processedPartitionNames);

      progress({ type: 'phase', phase: 'discover' });
      const partitions = await this.discover(ctx);
      ctx.report.partitions = partitions.length;
      const dailies = createDailyArtifacts(partitions);
      const weeklies = createWeeklyArtifacts(groupIntoWeeks(dailies));
      const currentDaily = dailies.find((daily) => daily.isCurrent);
      const currentWeekly = weeklies.find((weekly) => weekly.isCurrentWeek);
      ctx.report.currentPartition = currentDaily?.partitionName;
      ctx.report.currentWeek = currentWeekly?.key.id;

      const reprocess = new Set(options.reprocess ?? []);
      for (const name of reprocess) {
        if (!dailies.some((daily) => daily.partitionName === name)) {
          log.warn('Reprocess target %s is not a known partition', name);
        }
      }
      const reprocessWeeks = new Set(
        dailies.filter((daily) => reprocess.has(daily.partitionName)).map((daily) => weekIdOf(daily.date))
      );

      progress({ type: 'phase', phase: 'resolve' });
      await aggregator.resolve(weeklies);
      const weekId = (weekly: WeeklyArtifact) => artifactSubject(weekly.key);
      const durableWeeks = new Set(
        weeklies
          .filter((weekly) => !weekly.isCurrentWeek && weekly.existsRemote && !reprocessWeeks.has(weekId(weekly)))
          .map(weekId)
      );
      const neededWeeks = new Set(
        weeklies
          .filter((weekly) => weekly.isCurrentWeek || weekly.resolution === 'MISSING' || reprocessWeeks.has(weekId(weekly)))
          .map(weekId)
      );
      const selected = selectPartitions(partitions, {
        recencyBound: options.recencyBound,
        currentMonday: currentWeekly?.mondayDate,
        reprocess: new Set(
          dailies.filter((daily) => reprocessWeeks.has(weekIdOf(daily.date))).map((daily) => daily.partitionName)
        )
      });

      progress({ type: 'phase', phase: 'plan' });
      await scheduler.plan(dailies, {
        selected: new Set(selected.map((partition) => partition.name)),
        neededWeeks,
        durableWeeks,
        reprocess,
        processed
      });
      this.emitStats('plan', dailies, weeklies, selected.length, progress);

      if (options.dryRun) {
        ctx.report.planned = [
          ...dailies.filter((daily) => daily.state === 'rebuild').map((daily) => daily.key.id),
          ...weeklies.filter((weekly) => neededWeeks.has(weekId(weekly))).map((weekly) => weekly.key.id)
        ];
        return await this.finish(ctx, dailies, weeklies, startedAt);
      }

      progress({ type: 'phase', phase: 'build-daily' });
      const dailyLock = new KeyLock<void>();
      await Promise.all(
        dailies
          .filter((daily) => daily.state === 'rebuild')
          .map((daily) =>
            buildQueue.add(() => dailyLock.run(daily.key.id, () => this.buildDaily(daily, scheduler, ctx)), {
              throwOnTimeout: true
            })
          )
      );
      this.emitStats('build-daily', dailies, weeklies, selected.length, progress);
      if (ctx.fatal) {
        throw ctx.fatal;
      }

      progress({ type: 'phase', phase: 'build-weekly' });
      const weeklyLock = new KeyLock<void>();
      const weeklyTasks: Array<Promise<void>> = [];
      for (const weekly of weeklies) {
        if (this.control.cancelled) {
          weekly.state = 'skip';
          weekly.skipReason = 'cancelled';
          continue;
        }
        const decision = planWeekly(weekly, {
          reprocess: reprocessWeeks.has(weekId(weekly)),
          forceFullWeekSet: options.forceFullWeekSet
        });
        if (weekly.state === 'rebuild') {
          weeklyTasks.push(
            buildQueue.add(() => weeklyLock.run(weekly.key.id, () => this.buildWeekly(weekly, aggregator, ctx)), {
              throwOnTimeout: true
            })
          );
        } else if (decision.pull) {
          weeklyTasks.push(fetchQueue.add(() => this.pullWeekly(weekly, aggregator, ctx), { throwOnTimeout: true }));
        }
      }
      await Promise.all(weeklyTasks);
      this.emitStats('build-weekly', dailies, weeklies, selected.length, progress);

      if (!this.control.cancelled) {
        progress({ type: 'phase', phase: 'publish' });
        await this.publish(ctx, options, { partitions, dailies, weeklies, processed, resolver });

        progress({ type: 'phase', phase: 'evict' });
        const retention = new RetentionService(
          {
            retentionDays: this.settings.retentionDays,
            tiers: this.settings.evictTiers,
            remotePrefix,
            dailyDir: paths.dailyDir
          },
          local,
          remote,
          resolver
        );
        await this.attempt(ctx, 'retention', 'tier', async () => {
          ctx.report.evicted = await retention.evict(this.clock(), currentWeekly ? weekId(currentWeekly) : undefined);
        });
      }

      return await this.finish(ctx, dailies, weeklies, startedAt);
    } finally {
      await safeRemove(paths.tempDir, 'run cleanup');
      this.control.reset();
      this.isRunning = false;
    }
  }

  getStatus(): { running: boolean; cancelled: boolean } {
    return { running: this.isRunning, cancelled: this.control.cancelled };
  }

  cancel(reason?: string): void {
    if (!this.isRunning) {
      return;
    }
    log.warn('Cancelling run: %s', reason ?? 'requested');
    this.control.cancel();
  }

  private async discover(ctx: RunContext): Promise<SourcePartition[]> {
    let listing: PartitionListing[];
    try {
      listing = await this.deps.source.listPartitions(this.settings.sourceRoot);
    } catch (error) {
      this.recordError(ctx, 'source', error, 'fetch');
      return [];
    }
    const { partitions, parseErrors } = discoverPartitions(listing, this.settings.folderPrefix);
    for (const parseError of parseErrors) {
      this.recordError(ctx, parseError.key, parseError, 'parse');
    }
    log.info('Discovered %d partitions (%d unparsable)', partitions.length, parseErrors.length);
    return partitions;
  }

  private async buildDaily(daily: DailyArtifact, scheduler: BuildScheduler, ctx: RunContext): Promise<void> {
    if (this.control.cancelled) {
      transitionDailyState(daily, 'unresolved');
      daily.skipReason = 'cancelled';
      return;
    }
    let output: string | undefined;
    try {
      output = await scheduler.build(daily);
    } catch (error) {
      transitionDailyState(daily, 'unresolved');
      daily.skipReason = 'failed';
      daily.errors = [...(daily.errors ?? []), describeError(error)];
      this.recordError(ctx, daily.key.id, error, 'encode');
      return;
    }
    if (!output) {
      transitionDailyState(daily, 'unresolved');
      daily.skipReason = 'empty';
      return;
    }
    daily.localPath = output;
    transitionDailyState(daily, 'built');
    ctx.report.built.push(daily.key.id);
    ctx.progress({ type: 'artifact', key: daily.key, message: 'built' });

    try {
      await ctx.sync.promote(daily.key, output);
    } catch (error) {
      this.recordError(ctx, daily.key.id, error, 'tier');
      return;
    }
    transitionDailyState(daily, 'uploaded');

    try {
      await ctx.sync.recordProcessed(daily.partitionName, daily.date);
    } catch (error) {
      const fatal =
        error instanceof StateStoreError
          ? error
          : new StateStoreError(daily.key.id, `Recording ${daily.partitionName} failed: ${describeError(error)}`, {
              cause: error
            });
      log.error('Processing state could not be saved, stopping the run: %s', fatal.message);
      ctx.fatal ??= fatal;
      this.control.cancel();
    }
  }

  private async buildWeekly(weekly: WeeklyArtifact, aggregator: WeeklyAggregator, ctx: RunContext): Promise<void> {
    if (this.control.cancelled) {
      weekly.state = 'skip';
      weekly.skipReason = 'cancelled';
      return;
    }
    let output: string;
    try {
      output = await aggregator.build(weekly);
    } catch (error) {
      weekly.state = 'failed';
      this.recordError(ctx, weekly.key.id, error, 'encode');
      return;
    }
    weekly.localPath = output;
    weekly.state = 'built';
    ctx.report.built.push(weekly.key.id);
    ctx.progress({ type: 'artifact', key: weekly.key, message: 'built' });
    try {
      await ctx.sync.promote(weekly.key, output);
      weekly.state = 'uploaded';
    } catch (error) {
      this.recordError(ctx, weekly.key.id, error, 'tier');
    }
  }

  private async pullWeekly(weekly: WeeklyArtifact, aggregator: WeeklyAggregator, ctx: RunContext): Promise<void> {
    if (this.control.cancelled) {
      return;
    }
    await this.attempt(ctx, weekly.key.id, 'tier', async () => {
      await aggregator.pull(weekly);
      ctx.report.pulled.push(weekly.key.id);
    });
  }

  private async publish(
    ctx: RunContext,
    options: RunOptions,
    run: {
      partitions: SourcePartition[];
      dailies: DailyArtifact[];
      weeklies: WeeklyArtifact[];
      processed: ReadonlySet<string>;
      resolver: CacheResolver;
    }
  ): Promise<void> {
    const { paths, remotePrefix } = this.settings;
    const publisher = new PublishService(
      { outputDir: paths.outputDir, remotePrefix, tempDir: paths.tempDir },
      { source: this.deps.source, local: this.deps.local, resolver: run.resolver, encoder: this.deps.encoder, sync: ctx.sync }
    );
    const { report } = ctx;

    const currentDaily = run.dailies.find((daily) => daily.isCurrent);
    const dayVideo = currentDaily?.localPath;
    if (currentDaily && dayVideo && isAvailable(currentDaily)) {
      await this.attempt(ctx, 'alias/day', 'tier', async () => {
        report.published.push(await publisher.publishAlias('day', dayVideo));
      });
    }
    const currentWeekly = run.weeklies.find((weekly) => weekly.isCurrentWeek);
    const weekVideo = currentWeekly?.localPath;
    if (weekVideo && currentWeekly && hasWeeklyVideo(currentWeekly)) {
      await this.attempt(ctx, 'alias/week', 'tier', async () => {
        report.published.push(await publisher.publishAlias('week', weekVideo));
      });
    }

    let latestImage: string | undefined;
    await this.attempt(ctx, 'alias/latest', 'fetch', async () => {
      const latest = await publisher.publishLatestImage(run.partitions);
      if (latest) {
        latestImage = latest.frame;
        report.published.push(latest.remoteKey);
      }
    });

    if (options.buildFull) {
      await this.attempt(ctx, 'alias/full', 'encode', async () => {
        const remoteKey = await publisher.buildFull(run.weeklies);
        if (remoteKey) {
          report.published.push(remoteKey);
        }
      });
    }

    const withVideo = run.weeklies.filter(hasWeeklyVideo);
    const manifest = buildManifest({
      now: this.clock(),
      remotePrefix,
      dailyDates: run.dailies
        .filter((daily) => isAvailable(daily) || run.processed.has(daily.partitionName))
        .map((daily) => daily.date),
      weekMondays: withVideo.map((weekly) => weekly.mondayDate),
      currentMonday: withVideo.find((weekly) => weekly.isCurrentWeek)?.mondayDate,
      latestImage,
      events: this.settings.eventsFile ? await loadEvents(this.settings.eventsFile) : []
    });
    await this.attempt(ctx, 'alias/metadata', 'tier', async () => {
      report.published.push(await publisher.publishManifest(manifest));
    });
  }

  private async attempt(ctx: RunContext, key: string, kind: ErrorKind, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      this.recordError(ctx, key, error, kind);
    }
  }

  private recordError(ctx: RunContext, key: string, error: unknown, fallbackKind: ErrorKind): void {
    const kind = error instanceof PipelineError ? error.kind : fallbackKind;
    const message = describeError(error);
    log.warn('%s failed (%s): %s', key, kind, message);
    ctx.report.errors.push({ key, kind, message });
    ctx.progress({ type: 'error', message: `${key}: ${message}`, error: error instanceof Error ? error : new Error(message) });
  }

  private async finish(
    ctx: RunContext,
    dailies: DailyArtifact[],
    weeklies: WeeklyArtifact[],
    startedAt: DateTime
  ): Promise<RunReport> {
    const { report } = ctx;
    for (const artifact of [...dailies, ...weeklies]) {
      if (artifact.skipReason && (artifact.state === 'skip' || artifact.state === 'unresolved')) {
        report.skipped.push({ key: artifact.key.id, reason: artifact.skipReason });
      }
    }
    report.built.sort();
    report.cancelled = this.control.cancelled;
    const finishedAt = this.clock();
    report.finishedAt = finishedAt.toUTC().toISO() ?? '';
    report.durationMs = Math.max(0, finishedAt.toMillis() - startedAt.toMillis());

    try {
      report.reportPath = await new ReportService(this.settings.paths.reportDir).create(report);
    } catch (error) {
      log.warn('Failed to write run report: %s', describeError(error));
    }
    ctx.progress({ type: 'phase', phase: 'complete' });
    return report;
  }

  private emitStats(
    stage: string,
    dailies: DailyArtifact[],
    weeklies: WeeklyArtifact[],
    selected: number,
    progress: ProgressCallback
  ): void {
    const payload: RunStatsPayload = {
      stage,
      partitions: dailies.length,
      selected,
      built: dailies.filter((daily) => daily.state === 'built' || daily.state === 'uploaded').length,
      skipped: dailies.filter((daily) => daily.state === 'skip').length,
      failed: dailies.filter((daily) => daily.skipReason === 'failed').length,
      weeks: weeklies.length,
      weeksBuilt: weeklies.filter((weekly) => weekly.state === 'built' || weekly.state === 'uploaded').length
    };
    progress({ type: 'stats', stats: payload });
  }
}
