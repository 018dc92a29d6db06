import path from 'node:path';
import type PQueue from 'p-queue';
import type { DailyArtifact, WeekBucket, WeeklyArtifact } from '../../shared/types/artifact.js';
import { EncodeError, describeError } from '../errors.js';
import { formatDateToken, weekAnchor } from '../utils/date.js';
import { compareNames, weeklyKey } from '../utils/naming.js';
import { safeRemove, tempPath } from '../utils/files.js';
import type { CacheResolver } from './cache-resolver.js';
import type { LocalTier } from './local-store.js';
import type { MediaEncoder } from './encoder-service.js';
import log from '../logger.js';

const compareDailies = (a: DailyArtifact, b: DailyArtifact): number =>
  a.date.toMillis() - b.date.toMillis() || compareNames(a.partitionName, b.partitionName);

/** Buckets ascending by Monday; members ascending by date then partition name, whatever the input order. */
export const groupIntoWeeks = (dailies: DailyArtifact[]): WeekBucket[] => {
  const buckets = new Map<string, WeekBucket>();
  for (const daily of dailies) {
    const mondayDate = weekAnchor(daily.date);
    const id = formatDateToken(mondayDate);
    const bucket = buckets.get(id) ?? { id, mondayDate, members: [] };
    bucket.members.push(daily);
    buckets.set(id, bucket);
  }
  const ordered = [...buckets.values()].sort((a, b) => a.mondayDate.toMillis() - b.mondayDate.toMillis());
  for (const bucket of ordered) {
    bucket.members.sort(compareDailies);
  }
  return ordered;
};

/** A daily whose video exists in some tier, or was produced this run. */
export const isAvailable = (daily: DailyArtifact): boolean =>
  daily.state === 'built' || daily.state === 'uploaded' || (daily.state === 'skip' && daily.skipReason === 'fresh');

export const createWeeklyArtifacts = (buckets: WeekBucket[]): WeeklyArtifact[] => {
  const currentId = buckets.reduce<string | undefined>((max, bucket) => (!max || bucket.id > max ? bucket.id : max), undefined);
  return buckets.map((bucket) => ({
    key: weeklyKey(bucket.mondayDate),
    mondayDate: bucket.mondayDate,
    existsLocal: false,
    existsRemote: false,
    isCurrentWeek: bucket.id === currentId,
    state: 'unresolved',
    members: bucket.members
  }));
};

export interface WeeklyPlanContext {
  reprocess: boolean;
  forceFullWeekSet: boolean;
}

export interface WeeklyDecision {
  /** The remote copy should be pulled to local storage. */
  pull: boolean;
}

/** A day folder without frames has no video and never holds its week back. */
const isEmptyDay = (daily: DailyArtifact): boolean => daily.skipReason === 'empty';

/**
 * Current week: always rebuilt from the members that are available. Past week: rebuilt
 * only when its weekly is missing (or reprocessed), and only when no member is still
 * pending (failed, out of window, unresolved); otherwise the partial week is left alone.
 */
export const planWeekly = (weekly: WeeklyArtifact, context: WeeklyPlanContext): WeeklyDecision => {
  const mustBuild = weekly.isCurrentWeek || context.reprocess || weekly.resolution === 'MISSING' || !weekly.resolution;
  if (mustBuild) {
    const available = weekly.members.filter(isAvailable).length;
    const pending = weekly.members.filter((member) => !isAvailable(member) && !isEmptyDay(member)).length;
    if (available === 0) {
      weekly.state = 'skip';
      weekly.skipReason = pending > 0 ? 'incomplete' : 'empty';
    } else if (pending > 0 && !weekly.isCurrentWeek) {
      weekly.state = 'skip';
      weekly.skipReason = 'incomplete';
    } else {
      weekly.state = 'rebuild';
    }
    return { pull: false };
  }
  weekly.state = 'skip';
  weekly.skipReason = 'fresh';
  return { pull: context.forceFullWeekSet && weekly.resolution === 'REMOTE_FRESH' };
};

export interface WeeklyAggregatorDeps {
  resolver: CacheResolver;
  encoder: MediaEncoder;
  local: LocalTier;
  fetchQueue: PQueue;
  tempDir: string;
}

export class WeeklyAggregator {
  constructor(private readonly deps: WeeklyAggregatorDeps) {}

  async resolve(weeklies: WeeklyArtifact[]): Promise<void> {
    await Promise.all(
      weeklies.map((weekly) =>
        this.deps.fetchQueue.add(
          async () => {
            const resolution = await this.deps.resolver.resolve(weekly.key, { current: weekly.isCurrentWeek });
            weekly.resolution = resolution.state;
            weekly.existsLocal = resolution.existsLocal;
            weekly.existsRemote = resolution.existsRemote ?? false;
          },
          { throwOnTimeout: true }
        )
      )
    );
  }

  /** Concatenates the available members, in playback order, without re-encoding. */
  async build(weekly: WeeklyArtifact): Promise<string> {
    const { resolver, encoder, local, fetchQueue, tempDir } = this.deps;
    const members = weekly.members.filter(isAvailable);
    const memberPaths = await Promise.all(
      members.map((member) =>
        fetchQueue.add(() => member.localPath ? Promise.resolve(member.localPath) : resolver.materialize(member.key), {
          throwOnTimeout: true
        })
      )
    );
    members.forEach((member, index) => {
      member.localPath = memberPaths[index];
    });

    const output = resolver.localPath(weekly.key);
    const staging = tempPath(tempDir, path.basename(output));
    try {
      await encoder.concatenate(memberPaths, staging, 'copy');
    } catch (error) {
      await safeRemove(staging, 'failed concatenation');
      if (error instanceof EncodeError) {
        throw error;
      }
      throw new EncodeError(weekly.key.id, `Concatenation failed: ${describeError(error)}`, { cause: error });
    }
    await local.rename(staging, output);
    resolver.invalidate(weekly.key);
    log.info('Built %s from %d days', weekly.key.id, members.length);
    return output;
  }

  async pull(weekly: WeeklyArtifact): Promise<string> {
    const localPath = await this.deps.resolver.materialize(weekly.key);
    weekly.pulled = true;
    weekly.localPath = localPath;
    return localPath;
  }
}
