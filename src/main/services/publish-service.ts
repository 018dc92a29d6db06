import path from 'node:path';
import type { DateTime } from 'luxon';
import type { ItemRef, SourcePartition, WeeklyArtifact } from '../../shared/types/artifact.js';
import { EncodeError, describeError } from '../errors.js';
import { formatDateToken, toIsoDate } from '../utils/date.js';
import { aliasFilename, aliasKey, compareFrames, remoteArtifactKey, weeklyKey } from '../utils/naming.js';
import { safeRemove, tempPath } from '../utils/files.js';
import type { CacheResolver } from './cache-resolver.js';
import type { TimelapseEvent } from './events-service.js';
import type { LocalTier } from './local-store.js';
import type { MediaEncoder } from './encoder-service.js';
import type { RawInputSource } from './source-service.js';
import type { SyncService } from './sync-service.js';
import log from '../logger.js';

/** `metadata.json` as the web viewer reads it. */
export interface TimelapseManifest {
  last_updated: string;
  total_days: number;
  latest_image: { date: string; filename: string } | null;
  latest_day: string | null;
  current_week: { start: string; end: string; monday_date: string } | null;
  weekly_videos: Array<{ filename: string; monday_date: string; start: string; end: string; r2_path: string }>;
  date_range: { start: string | null; end: string | null };
  events: TimelapseEvent[];
}

export interface ManifestInput {
  now: DateTime;
  remotePrefix: string;
  dailyDates: DateTime[];
  weekMondays: DateTime[];
  currentMonday?: DateTime;
  latestImage?: string;
  events?: TimelapseEvent[];
}

const isoMidnight = (date: DateTime): string => `${toIsoDate(date)}T00:00:00`;

const weekSpan = (monday: DateTime) => ({
  start: isoMidnight(monday),
  end: isoMidnight(monday.plus({ days: 6 })),
  monday_date: formatDateToken(monday)
});

export const buildManifest = (input: ManifestInput): TimelapseManifest => {
  const dates = [...input.dailyDates].sort((a, b) => a.toMillis() - b.toMillis());
  const first = dates[0];
  const last = dates[dates.length - 1];
  const latestDay = last ? isoMidnight(last) : null;
  const weeks = [...new Map(input.weekMondays.map((monday) => [formatDateToken(monday), monday])).values()].sort(
    (a, b) => a.toMillis() - b.toMillis()
  );

  return {
    last_updated: input.now.toUTC().toISO() ?? '',
    total_days: dates.length,
    latest_image: input.latestImage && latestDay ? { date: latestDay, filename: input.latestImage } : null,
    latest_day: latestDay,
    current_week: input.currentMonday ? weekSpan(input.currentMonday) : null,
    weekly_videos: weeks.map((monday) => {
      const remotePath = remoteArtifactKey(input.remotePrefix, weeklyKey(monday));
      const { monday_date, start, end } = weekSpan(monday);
      return { filename: path.posix.basename(remotePath), monday_date, start, end, r2_path: remotePath };
    }),
    date_range: { start: first ? isoMidnight(first) : null, end: latestDay },
    events: input.events ?? []
  };
};

/** Weeklies with a video somewhere: built this run or already durable. */
export const hasWeeklyVideo = (weekly: WeeklyArtifact): boolean =>
  weekly.state === 'built' ||
  weekly.state === 'uploaded' ||
  (weekly.state === 'skip' && weekly.skipReason === 'fresh');

export interface PublishOptions {
  outputDir: string;
  remotePrefix: string;
  tempDir: string;
}

export interface PublishDeps {
  source: RawInputSource;
  local: LocalTier;
  resolver: CacheResolver;
  encoder: MediaEncoder;
  sync: SyncService;
}

/** Viewer-facing files: the day/week/full aliases, the newest still and the manifest. */
export class PublishService {
  constructor(
    private readonly options: PublishOptions,
    private readonly deps: PublishDeps
  ) {}

  async publishAlias(alias: 'day' | 'week', localPath: string): Promise<string> {
    const remoteKey = aliasKey(this.options.remotePrefix, alias);
    await this.deps.sync.publishFile(remoteKey, localPath);
    return remoteKey;
  }

  /** Saves the last frame of the newest partition that has any. Resolves the frame name. */
  async publishLatestImage(partitions: SourcePartition[]): Promise<{ remoteKey: string; frame: string } | undefined> {
    const { source, local, sync } = this.deps;
    for (const partition of [...partitions].reverse()) {
      const items = await source.listItems(partition.id);
      const newest = items.reduce<ItemRef | undefined>(
        (best, item) => (!best || compareFrames(item.name, best.name) > 0 ? item : best),
        undefined
      );
      if (!newest) {
        continue;
      }
      const target = path.join(this.options.outputDir, aliasFilename('latest'));
      await local.write(target, await source.fetchItem(newest));
      const remoteKey = aliasKey(this.options.remotePrefix, 'latest');
      await sync.publishFile(remoteKey, target);
      log.info('Latest image is %s from %s', newest.name, partition.name);
      return { remoteKey, frame: newest.name };
    }
    return undefined;
  }

  /** Re-encodes every available week, oldest first, into the full-history timelapse. */
  async buildFull(weeklies: WeeklyArtifact[]): Promise<string | undefined> {
    const { resolver, encoder, local, sync } = this.deps;
    const weeks = weeklies.filter(hasWeeklyVideo).sort((a, b) => a.mondayDate.toMillis() - b.mondayDate.toMillis());
    if (!weeks.length) {
      log.info('No weekly videos yet, skipping the full timelapse.');
      return undefined;
    }
    const inputs: string[] = [];
    for (const weekly of weeks) {
      inputs.push(weekly.localPath ?? (await resolver.materialize(weekly.key)));
    }

    const output = path.join(this.options.outputDir, aliasFilename('full'));
    const staging = tempPath(this.options.tempDir, aliasFilename('full'));
    try {
      await encoder.concatenate(inputs, staging, 'reencode');
    } catch (error) {
      await safeRemove(staging, 'failed full timelapse');
      if (error instanceof EncodeError) {
        throw error;
      }
      throw new EncodeError('full', `Full timelapse failed: ${describeError(error)}`, { cause: error });
    }
    await local.rename(staging, output);
    const remoteKey = aliasKey(this.options.remotePrefix, 'full');
    await sync.publishFile(remoteKey, output);
    log.info('Full timelapse covers %d weeks', weeks.length);
    return remoteKey;
  }

  async publishManifest(manifest: TimelapseManifest): Promise<string> {
    const target = path.join(this.options.outputDir, aliasFilename('metadata'));
    const body = Buffer.from(JSON.stringify(manifest, null, 2));
    await this.deps.local.write(target, body);
    const remoteKey = aliasKey(this.options.remotePrefix, 'metadata');
    await this.deps.sync.publishBuffer(remoteKey, body, 'application/json');
    return remoteKey;
  }
}
