import path from 'node:path';
import fs from 'fs-extra';
import PQueue from 'p-queue';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createDailyArtifacts, discoverPartitions } from '../services/build-scheduler.js';
import { CacheResolver } from '../services/cache-resolver.js';
import { LocalStore } from '../services/local-store.js';
import { WeeklyAggregator, createWeeklyArtifacts, groupIntoWeeks, planWeekly } from '../services/weekly-aggregator.js';
import { toIsoDate } from '../utils/date.js';
import type { DailyArtifact, WeeklyArtifact } from '../../shared/types/artifact.js';
import { FakeEncoder, InMemoryRemoteStore, PREFIX, makeTempDir, partitionName } from './helpers/fakes.js';

const dailiesOf = (tokens: string[]): DailyArtifact[] =>
  createDailyArtifacts(
    discoverPartitions(
      tokens.map((token) => ({ id: partitionName(token), name: partitionName(token) })),
      PREFIX
    ).partitions
  );

const markFresh = (daily: DailyArtifact): void => {
  daily.state = 'skip';
  daily.skipReason = 'fresh';
};

describe('groupIntoWeeks', () => {
  it('anchors Monday to Sunday on the same Monday', () => {
    const buckets = groupIntoWeeks(dailiesOf(['250714', '250715', '250716', '250717', '250718', '250719', '250720', '250721']));

    expect(buckets.map((bucket) => bucket.id)).toEqual(['250714', '250721']);
    expect(toIsoDate(buckets[0].mondayDate)).toBe('2025-07-14');
    expect(buckets[0].members).toHaveLength(7);
    expect(buckets[1].members.map((member) => member.partitionName)).toEqual([partitionName('250721')]);
  });

  it('orders members by date whatever the discovery order', () => {
    const dailies = dailiesOf(['250716', '250714', '250715']);
    const shuffled = [dailies[2], dailies[0], dailies[1]];

    const [bucket] = groupIntoWeeks(shuffled);

    expect(bucket.members.map((member) => member.partitionName)).toEqual(
      ['250714', '250715', '250716'].map(partitionName)
    );
  });

  it('flags only the latest week as current', () => {
    const weeklies = createWeeklyArtifacts(groupIntoWeeks(dailiesOf(['250707', '250714', '250721'])));
    expect(weeklies.map((weekly) => [weekly.key.id, weekly.isCurrentWeek])).toEqual([
      ['weekly/250707', false],
      ['weekly/250714', false],
      ['weekly/250721', true]
    ]);
  });
});

describe('planWeekly', () => {
  const weekOf = (tokens: string[], overrides: Partial<WeeklyArtifact> = {}): WeeklyArtifact => {
    const [weekly] = createWeeklyArtifacts(groupIntoWeeks(dailiesOf(tokens)));
    return { ...weekly, isCurrentWeek: false, ...overrides };
  };
  const context = { reprocess: false, forceFullWeekSet: false };

  it('skips a durable past week', () => {
    const weekly = weekOf(['250714'], { resolution: 'REMOTE_FRESH' });
    expect(planWeekly(weekly, context)).toEqual({ pull: false });
    expect(weekly).toMatchObject({ state: 'skip', skipReason: 'fresh' });
  });

  it('pulls a remote-only week when the full set is requested', () => {
    const weekly = weekOf(['250714'], { resolution: 'REMOTE_FRESH' });
    expect(planWeekly(weekly, { ...context, forceFullWeekSet: true })).toEqual({ pull: true });
  });

  it('does not pull a week that is already local', () => {
    const weekly = weekOf(['250714'], { resolution: 'LOCAL_FRESH' });
    expect(planWeekly(weekly, { ...context, forceFullWeekSet: true })).toEqual({ pull: false });
  });

  it('rebuilds a missing past week when every day is available', () => {
    const weekly = weekOf(['250714', '250715'], { resolution: 'MISSING' });
    weekly.members.forEach(markFresh);
    planWeekly(weekly, context);
    expect(weekly.state).toBe('rebuild');
  });

  it('refuses to freeze a past week with a failed day', () => {
    const weekly = weekOf(['250714', '250715'], { resolution: 'MISSING' });
    markFresh(weekly.members[0]);
    weekly.members[1].skipReason = 'failed';
    planWeekly(weekly, context);
    expect(weekly).toMatchObject({ state: 'skip', skipReason: 'incomplete' });
  });

  it('builds a past week around a day without frames', () => {
    const weekly = weekOf(['250714', '250715', '250716'], { resolution: 'MISSING' });
    markFresh(weekly.members[0]);
    markFresh(weekly.members[2]);
    weekly.members[1].skipReason = 'empty';
    planWeekly(weekly, context);
    expect(weekly.state).toBe('rebuild');
  });

  it('skips a past week whose days are all empty', () => {
    const weekly = weekOf(['250714', '250715'], { resolution: 'MISSING' });
    weekly.members.forEach((member) => {
      member.skipReason = 'empty';
    });
    planWeekly(weekly, context);
    expect(weekly).toMatchObject({ state: 'skip', skipReason: 'empty' });
  });

  it('builds the current week from whatever is available', () => {
    const weekly = weekOf(['250714', '250715'], { isCurrentWeek: true, resolution: 'MISSING' });
    markFresh(weekly.members[0]);
    planWeekly(weekly, context);
    expect(weekly.state).toBe('rebuild');
  });

  it('skips a current week with nothing to show', () => {
    const weekly = weekOf(['250714'], { isCurrentWeek: true, resolution: 'MISSING' });
    planWeekly(weekly, context);
    expect(weekly).toMatchObject({ state: 'skip', skipReason: 'incomplete' });
  });

  it('rebuilds a durable week when reprocessing', () => {
    const weekly = weekOf(['250714'], { resolution: 'REMOTE_FRESH' });
    markFresh(weekly.members[0]);
    planWeekly(weekly, { ...context, reprocess: true });
    expect(weekly.state).toBe('rebuild');
  });
});

describe('WeeklyAggregator', () => {
  let root: string;
  let remote: InMemoryRemoteStore;
  let encoder: FakeEncoder;
  let resolver: CacheResolver;
  let aggregator: WeeklyAggregator;

  beforeEach(async () => {
    root = await makeTempDir();
    remote = new InMemoryRemoteStore();
    encoder = new FakeEncoder();
    const tempDir = path.join(root, '.tmp');
    const local = new LocalStore(tempDir);
    resolver = new CacheResolver({ outputDir: root, remotePrefix: 'timelapse' }, local, remote);
    aggregator = new WeeklyAggregator({ resolver, encoder, local, fetchQueue: new PQueue({ concurrency: 2 }), tempDir });
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('concatenates members in date order, pulling remote-only days', async () => {
    const [weekly] = createWeeklyArtifacts(groupIntoWeeks(dailiesOf(['250716', '250714', '250715'])));
    const [monday, tuesday, wednesday] = weekly.members;
    weekly.members.forEach(markFresh);
    await fs.outputFile(resolver.localPath(monday.key), 'mon');
    remote.seed(`timelapse/daily/${tuesday.partitionName}.mp4`, 'tue');
    await fs.outputFile(resolver.localPath(wednesday.key), 'wed');

    const output = await aggregator.build(weekly);

    expect(output).toBe(path.join(root, 'weekly', '250714.mp4'));
    expect(await fs.readFile(output, 'utf8')).toBe('copy(mon+tue+wed)');
    expect(encoder.concatCalls.map((call) => call.mode)).toEqual(['copy']);
  });

  it('leaves out days that are not available', async () => {
    const [weekly] = createWeeklyArtifacts(groupIntoWeeks(dailiesOf(['250714', '250715'])));
    markFresh(weekly.members[0]);
    weekly.members[1].skipReason = 'failed';
    await fs.outputFile(resolver.localPath(weekly.members[0].key), 'mon');

    await aggregator.build(weekly);

    expect(encoder.concatCalls[0].inputs).toEqual(['mon']);
  });

  it('records resolution on each weekly', async () => {
    const weeklies = createWeeklyArtifacts(groupIntoWeeks(dailiesOf(['250707', '250714'])));
    remote.seed('timelapse/weekly/250707.mp4', 'w');

    await aggregator.resolve(weeklies);

    expect(weeklies.map((weekly) => [weekly.resolution, weekly.existsRemote])).toEqual([
      ['REMOTE_FRESH', true],
      ['MISSING', false]
    ]);
  });

  it('pulls a weekly to local storage', async () => {
    const [weekly] = createWeeklyArtifacts(groupIntoWeeks(dailiesOf(['250707'])));
    remote.seed('timelapse/weekly/250707.mp4', 'week-bytes');

    const localPath = await aggregator.pull(weekly);

    expect(weekly.pulled).toBe(true);
    expect(await fs.readFile(localPath, 'utf8')).toBe('week-bytes');
  });
});
