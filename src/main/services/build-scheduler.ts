import path from 'node:path';
import fs from 'fs-extra';
import type PQueue from 'p-queue';
import type { DateTime } from 'luxon';
import { v4 as uuid } from 'uuid';
import type {
  DailyArtifact,
  DailyState,
  ItemRef,
  PartitionListing,
  ResolveResult,
  SourcePartition
} from '../../shared/types/artifact.js';
import { EncodeError, FetchError, ParseError, describeError } from '../errors.js';
import { formatDateToken, parseDate, weekAnchor } from '../utils/date.js';
import { compareFrames, compareNames, dailyKey } from '../utils/naming.js';
import { safeRemove, tempPath } from '../utils/files.js';
import type { CacheResolver } from './cache-resolver.js';
import type { LocalTier } from './local-store.js';
import type { MediaEncoder } from './encoder-service.js';
import type { RawInputSource } from './source-service.js';
import log from '../logger.js';

export interface DiscoveredPartitions {
  partitions: SourcePartition[];
  parseErrors: ParseError[];
}

export const comparePartitions = (a: SourcePartition, b: SourcePartition): number =>
  a.date.toMillis() - b.date.toMillis() || compareNames(a.name, b.name);

/**
 * Turns a raw listing into dated partitions, ascending. Names without `prefix` are not
 * partitions; prefixed names that fail to parse come back as errors.
 */
export const discoverPartitions = (listing: PartitionListing[], prefix: string): DiscoveredPartitions => {
  const partitions: SourcePartition[] = [];
  const parseErrors: ParseError[] = [];
  for (const entry of listing) {
    if (!entry.name.startsWith(prefix)) {
      log.debug('Ignoring %s: missing prefix %s', entry.name, prefix);
      continue;
    }
    try {
      partitions.push({ ...entry, date: parseDate(entry.name) });
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      log.warn('Skipping partition %s: %s', entry.name, error.message);
      parseErrors.push(error);
    }
  }
  partitions.sort(comparePartitions);
  return { partitions, parseErrors };
};

export const weekIdOf = (date: DateTime): string => formatDateToken(weekAnchor(date));

export interface SelectionOptions {
  recencyBound?: number;
  currentMonday?: DateTime;
  reprocess?: ReadonlySet<string>;
}

/**
 * The last `recencyBound` partitions, widened to the whole current week and to explicitly
 * reprocessed names. Input and output are ascending.
 */
export const selectPartitions = (partitions: SourcePartition[], options: SelectionOptions): SourcePartition[] => {
  const { recencyBound, currentMonday, reprocess } = options;
  if (recencyBound === undefined) {
    return [...partitions];
  }
  const recentFrom = Math.max(0, partitions.length - Math.max(0, recencyBound));
  const currentWeekId = currentMonday ? formatDateToken(currentMonday) : undefined;
  return partitions.filter(
    (partition, index) =>
      index >= recentFrom || weekIdOf(partition.date) === currentWeekId || (reprocess?.has(partition.name) ?? false)
  );
};

export const createDailyArtifacts = (partitions: SourcePartition[]): DailyArtifact[] => {
  const current = partitions[partitions.length - 1];
  return partitions.map((partition) => ({
    key: dailyKey(partition.name),
    partitionId: partition.id,
    partitionName: partition.name,
    date: partition.date,
    existsLocal: false,
    existsRemote: false,
    isCurrent: partition === current,
    state: 'unresolved'
  }));
};

const DAILY_TRANSITIONS: Record<DailyState, readonly DailyState[]> = {
  unresolved: ['skip', 'rebuild'],
  skip: [],
  rebuild: ['built', 'unresolved'],
  built: ['uploaded'],
  uploaded: []
};

export const canTransitionDaily = (from: DailyState, to: DailyState): boolean => DAILY_TRANSITIONS[from].includes(to);

export const transitionDailyState = (artifact: DailyArtifact, to: DailyState): void => {
  if (!canTransitionDaily(artifact.state, to)) {
    throw new Error(`Illegal transition ${artifact.state} -> ${to} for ${artifact.key.id}`);
  }
  artifact.state = to;
};

export interface DailyPlanContext {
  selected: boolean;
  reprocess: boolean;
  processed: boolean;
  /** The week's aggregate is in the remote tier and the week is not current. */
  weekDurable: boolean;
}

export const planDaily = (artifact: DailyArtifact, resolution: ResolveResult, context: DailyPlanContext): void => {
  artifact.resolution = resolution.state;
  artifact.existsLocal = resolution.existsLocal;
  artifact.existsRemote = resolution.existsRemote ?? false;
  if (context.reprocess || artifact.isCurrent || resolution.forced) {
    transitionDailyState(artifact, 'rebuild');
    return;
  }
  if (resolution.state !== 'MISSING') {
    transitionDailyState(artifact, 'skip');
    artifact.skipReason = 'fresh';
    return;
  }
  if (context.processed && context.weekDurable) {
    transitionDailyState(artifact, 'skip');
    artifact.skipReason = 'retired';
    return;
  }
  if (!context.selected) {
    transitionDailyState(artifact, 'skip');
    artifact.skipReason = 'out-of-window';
    return;
  }
  transitionDailyState(artifact, 'rebuild');
};

export interface PlanInputs {
  selected: ReadonlySet<string>;
  /** Week ids whose members must be resolved even outside the selection. */
  neededWeeks: ReadonlySet<string>;
  durableWeeks: ReadonlySet<string>;
  reprocess: ReadonlySet<string>;
  processed: ReadonlySet<string>;
}

export interface BuildSchedulerDeps {
  source: RawInputSource;
  encoder: MediaEncoder;
  local: LocalTier;
  resolver: CacheResolver;
  fetchQueue: PQueue;
  tempDir: string;
}

export class BuildScheduler {
  constructor(private readonly deps: BuildSchedulerDeps) {}

  /**
   * Resolves every daily that is selected or whose week needs its members, and moves it to
   * skip or rebuild. Dailies outside both sets stay unresolved.
   */
  async plan(dailies: DailyArtifact[], inputs: PlanInputs): Promise<DailyArtifact[]> {
    const pending: Array<Promise<void>> = [];
    for (const artifact of dailies) {
      const weekId = weekIdOf(artifact.date);
      const selected = inputs.selected.has(artifact.partitionName);
      if (!selected && !inputs.neededWeeks.has(weekId)) {
        continue;
      }
      pending.push(
        this.deps.fetchQueue.add(
          async () => {
            const resolution = await this.deps.resolver.resolve(artifact.key, { current: artifact.isCurrent });
            planDaily(artifact, resolution, {
              selected,
              reprocess: inputs.reprocess.has(artifact.partitionName),
              processed: inputs.processed.has(artifact.partitionName),
              weekDurable: inputs.durableWeeks.has(weekId)
            });
          },
          { throwOnTimeout: true }
        )
      );
    }
    await Promise.all(pending);
    return dailies;
  }

  /**
   * Fetches the partition's frames, encodes them and publishes the video to its local path.
   * Resolves undefined when the partition has no frames yet.
   */
  async build(artifact: DailyArtifact): Promise<string | undefined> {
    const { source, encoder, local, resolver, fetchQueue, tempDir } = this.deps;
    let items: ItemRef[];
    try {
      items = await source.listItems(artifact.partitionId);
    } catch (error) {
      throw new FetchError(artifact.key.id, `Listing frames failed: ${describeError(error)}`, { cause: error });
    }
    if (!items.length) {
      log.info('No frames in %s yet', artifact.partitionName);
      return undefined;
    }

    const ordered = [...items].sort((a, b) => compareFrames(a.name, b.name));
    const frameDir = path.join(tempDir, `frames-${uuid()}`);
    await fs.ensureDir(frameDir);
    try {
      const settled = await Promise.allSettled(
        ordered.map((item, index) =>
          fetchQueue.add(
            async () => {
              let bytes: Buffer;
              try {
                bytes = await source.fetchItem(item);
              } catch (error) {
                throw new FetchError(artifact.key.id, `Fetching ${item.name} failed: ${describeError(error)}`, { cause: error });
              }
              const target = path.join(frameDir, `${index.toString().padStart(6, '0')}${path.extname(item.name) || '.jpg'}`);
              await fs.writeFile(target, bytes);
              return target;
            },
            { throwOnTimeout: true }
          )
        )
      );
      const framePaths: string[] = [];
      for (const result of settled) {
        if (result.status === 'rejected') {
          throw result.reason;
        }
        framePaths.push(result.value);
      }

      const output = resolver.localPath(artifact.key);
      const staging = tempPath(tempDir, path.basename(output));
      try {
        await encoder.encodeSequence(framePaths, staging);
      } catch (error) {
        await safeRemove(staging, 'failed encode');
        if (error instanceof EncodeError) {
          throw error;
        }
        throw new EncodeError(artifact.key.id, `Encoding failed: ${describeError(error)}`, { cause: error });
      }
      await local.rename(staging, output);
      resolver.invalidate(artifact.key);
      log.info('Built %s from %d frames', artifact.key.id, framePaths.length);
      return output;
    } finally {
      await safeRemove(frameDir, 'frame cleanup');
    }
  }
}
