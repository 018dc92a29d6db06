import path from 'node:path';
import fs from 'fs-extra';
import { DateTime } from 'luxon';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { CacheResolver } from '../services/cache-resolver.js';
import { LocalStore } from '../services/local-store.js';
import { RetentionService, isEvictable } from '../services/retention-service.js';
import type { EvictTiers } from '../../shared/types/artifact.js';
import { InMemoryRemoteStore, makeTempDir, partitionName } from './helpers/fakes.js';

/** mulberry32, so failures reproduce. */
const seeded = (seed: number) => () => {
  seed = (seed + 0x6d2b79f5) | 0;
  let t = seed;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
};

describe('isEvictable', () => {
  it('never evicts when the weekly is not durable', () => {
    const random = seeded(20250714);
    for (let i = 0; i < 2000; i += 1) {
      const input = {
        ageDays: Math.floor(random() * 400),
        retentionDays: Math.floor(random() * 60),
        weeklyDurable: false,
        currentWeek: random() < 0.5
      };
      expect(isEvictable(input)).toBe(false);
    }
  });

  it('evicts only past the window, outside the current week', () => {
    expect(isEvictable({ ageDays: 29, retentionDays: 28, weeklyDurable: true, currentWeek: false })).toBe(true);
    expect(isEvictable({ ageDays: 28, retentionDays: 28, weeklyDurable: true, currentWeek: false })).toBe(false);
    expect(isEvictable({ ageDays: 90, retentionDays: 28, weeklyDurable: true, currentWeek: true })).toBe(false);
    expect(isEvictable({ ageDays: 90, retentionDays: 0, weeklyDurable: true, currentWeek: false })).toBe(false);
  });
});

class RemoveFailingStore extends LocalStore {
  constructor(
    tempDir: string,
    private readonly failing: string
  ) {
    super(tempDir);
  }

  async remove(filePath: string): Promise<void> {
    if (filePath.includes(this.failing)) {
      throw new Error('EACCES');
    }
    await super.remove(filePath);
  }
}

describe('RetentionService', () => {
  let root: string;
  let remote: InMemoryRemoteStore;
  let resolver: CacheResolver;
  let local: LocalStore;
  const now = DateTime.utc(2025, 9, 1, 6);

  beforeEach(async () => {
    root = await makeTempDir();
    remote = new InMemoryRemoteStore();
    local = new LocalStore(path.join(root, '.tmp'));
    resolver = new CacheResolver({ outputDir: root, remotePrefix: 'timelapse' }, local, remote);
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  const service = (tiers: EvictTiers = 'both', retentionDays = 28) =>
    new RetentionService({ retentionDays, tiers, remotePrefix: 'timelapse', dailyDir: path.join(root, 'daily') }, local, remote, resolver);

  const storeDaily = async (token: string, where: { local?: boolean; remote?: boolean } = { local: true, remote: true }) => {
    if (where.local) {
      await fs.outputFile(path.join(root, 'daily', `${partitionName(token)}.mp4`), token);
    }
    if (where.remote) {
      remote.seed(`timelapse/daily/${partitionName(token)}.mp4`, token);
    }
  };

  it('evicts old days of durable weeks from both tiers', async () => {
    await storeDaily('250707');
    await storeDaily('250708', { remote: true });
    await storeDaily('250825');
    remote.seed('timelapse/weekly/250707.mp4', 'w');
    remote.seed('timelapse/weekly/250825.mp4', 'w');

    const evicted = await service().evict(now, '250901');

    expect(evicted).toEqual([`daily/${partitionName('250707')}`, `daily/${partitionName('250708')}`]);
    expect(await fs.pathExists(path.join(root, 'daily', `${partitionName('250707')}.mp4`))).toBe(false);
    expect(remote.objects.has(`timelapse/daily/${partitionName('250707')}.mp4`)).toBe(false);
    expect(remote.objects.has(`timelapse/daily/${partitionName('250825')}.mp4`)).toBe(true);
    expect(remote.objects.has('timelapse/weekly/250707.mp4')).toBe(true);
  });

  it('keeps days whose weekly is absent', async () => {
    await storeDaily('250707');

    await expect(service().evict(now, '250901')).resolves.toEqual([]);
    expect(remote.objects.has(`timelapse/daily/${partitionName('250707')}.mp4`)).toBe(true);
  });

  it('keeps days when the weekly lookup fails', async () => {
    await storeDaily('250707');
    remote.seed('timelapse/weekly/250707.mp4', 'w');
    remote.failWhen('exists', (key) => key.includes('/weekly/'));

    await expect(service().evict(now, '250901')).resolves.toEqual([]);
    expect(remote.calls.delete).toEqual([]);
  });

  it('never touches the current week', async () => {
    await storeDaily('250707');
    remote.seed('timelapse/weekly/250707.mp4', 'w');

    await expect(service().evict(now, '250707')).resolves.toEqual([]);
  });

  it('limits eviction to the configured tier', async () => {
    await storeDaily('250707');
    remote.seed('timelapse/weekly/250707.mp4', 'w');

    await service('local').evict(now, '250901');

    expect(await fs.pathExists(path.join(root, 'daily', `${partitionName('250707')}.mp4`))).toBe(false);
    expect(remote.objects.has(`timelapse/daily/${partitionName('250707')}.mp4`)).toBe(true);
    expect(remote.calls.list).toEqual([]);
  });

  it('carries on past a local removal failure and reports what was removed', async () => {
    await storeDaily('250707');
    await storeDaily('250708');
    remote.seed('timelapse/weekly/250707.mp4', 'w');
    local = new RemoveFailingStore(path.join(root, '.tmp'), partitionName('250707'));

    const evicted = await service().evict(now, '250901');

    expect(evicted).toEqual([`daily/${partitionName('250707')}`, `daily/${partitionName('250708')}`]);
    expect(await fs.pathExists(path.join(root, 'daily', `${partitionName('250707')}.mp4`))).toBe(true);
    expect(await fs.pathExists(path.join(root, 'daily', `${partitionName('250708')}.mp4`))).toBe(false);
    expect(remote.objects.has(`timelapse/daily/${partitionName('250707')}.mp4`)).toBe(false);
  });

  it('does not report a local-only eviction that failed', async () => {
    await storeDaily('250707');
    await storeDaily('250708');
    remote.seed('timelapse/weekly/250707.mp4', 'w');
    local = new RemoveFailingStore(path.join(root, '.tmp'), partitionName('250707'));

    await expect(service('local').evict(now, '250901')).resolves.toEqual([`daily/${partitionName('250708')}`]);
  });

  it('does nothing with a zero window', async () => {
    await storeDaily('250707');
    remote.seed('timelapse/weekly/250707.mp4', 'w');

    await expect(service('both', 0).evict(now, '250901')).resolves.toEqual([]);
    expect(remote.calls.list).toEqual([]);
  });

  it('holds the safety invariant across random tier states', async () => {
    const random = seeded(7);
    const tokens = ['250602', '250610', '250618', '250626', '250704', '250712', '250720', '250728'];
    for (const token of tokens) {
      await storeDaily(token, { local: random() < 0.7, remote: random() < 0.7 });
    }
    const mondays = ['250602', '250609', '250616', '250623', '250630', '250707', '250714', '250728'];
    const durable = new Set(mondays.filter(() => random() < 0.5));
    for (const monday of durable) {
      remote.seed(`timelapse/weekly/${monday}.mp4`, 'w');
    }

    const evicted = await service().evict(now, '250901');

    const weekOf: Record<string, string> = {
      '250602': '250602',
      '250610': '250609',
      '250618': '250616',
      '250626': '250623',
      '250704': '250630',
      '250712': '250707',
      '250720': '250714',
      '250728': '250728'
    };
    for (const id of evicted) {
      const token = /_(\d{6})070000$/.exec(id)?.[1] ?? '';
      expect(durable.has(weekOf[token])).toBe(true);
    }
  });
});
