import path from 'node:path';
import type { DateTime } from 'luxon';
import type { EvictTiers } from '../../shared/types/artifact.js';
import { ParseError, describeError } from '../errors.js';
import { daysBetween, formatDateToken, parseDate, weekAnchor } from '../utils/date.js';
import { ARTIFACT_EXT, artifactIdFromRemoteKey, artifactSubject, dailyKey, remoteKindPrefix, weeklyKey } from '../utils/naming.js';
import type { CacheResolver } from './cache-resolver.js';
import type { LocalTier } from './local-store.js';
import type { RemoteTier } from './remote-store.js';
import log from '../logger.js';

export interface EvictionInput {
  ageDays: number;
  retentionDays: number;
  /** The enclosing week's aggregate exists in the remote tier. */
  weeklyDurable: boolean;
  currentWeek: boolean;
}

/** A retention of 0 disables eviction. */
export const isEvictable = ({ ageDays, retentionDays, weeklyDurable, currentWeek }: EvictionInput): boolean =>
  retentionDays > 0 && ageDays > retentionDays && weeklyDurable && !currentWeek;

export interface EvictionCandidate {
  partitionName: string;
  date: DateTime;
  inLocal: boolean;
  inRemote: boolean;
}

export interface RetentionOptions {
  retentionDays: number;
  tiers: EvictTiers;
  remotePrefix: string;
  dailyDir: string;
}

export class RetentionService {
  constructor(
    private readonly options: RetentionOptions,
    private readonly local: LocalTier,
    private readonly remote: RemoteTier,
    private readonly resolver: CacheResolver
  ) {}

  /** Every stored daily whose name parses to a date, with the tiers that hold it. */
  async collectCandidates(): Promise<EvictionCandidate[]> {
    const byName = new Map<string, { inLocal: boolean; inRemote: boolean }>();
    const { remotePrefix, dailyDir, tiers } = this.options;

    if (tiers !== 'local') {
      try {
        for (const remoteKey of await this.remote.list(remoteKindPrefix(remotePrefix, 'daily'))) {
          const id = artifactIdFromRemoteKey(remotePrefix, remoteKey);
          if (id) {
            const name = artifactSubject({ kind: 'daily', id });
            byName.set(name, { inLocal: false, inRemote: true });
          }
        }
      } catch (error) {
        log.warn('Listing remote dailies failed, skipping remote eviction: %s', describeError(error));
      }
    }
    if (tiers !== 'remote') {
      for (const filePath of await this.local.list(dailyDir)) {
        if (path.extname(filePath) !== ARTIFACT_EXT) {
          continue;
        }
        const name = path.basename(filePath, ARTIFACT_EXT);
        const entry = byName.get(name) ?? { inLocal: false, inRemote: false };
        entry.inLocal = true;
        byName.set(name, entry);
      }
    }

    const candidates: EvictionCandidate[] = [];
    for (const [partitionName, presence] of byName) {
      try {
        candidates.push({ partitionName, date: parseDate(partitionName), ...presence });
      } catch (error) {
        if (!(error instanceof ParseError)) {
          throw error;
        }
        log.debug('Not evicting %s: %s', partitionName, error.message);
      }
    }
    return candidates;
  }

  /** Removes old dailies whose week is safely aggregated. Resolves the evicted artifact ids. */
  async evict(now: DateTime, currentWeekId: string | undefined): Promise<string[]> {
    const { retentionDays, tiers } = this.options;
    if (retentionDays <= 0) {
      return [];
    }
    const durable = new Map<string, Promise<boolean>>();
    const weeklyDurable = (monday: DateTime): Promise<boolean> => {
      const id = formatDateToken(monday);
      const cached = durable.get(id);
      if (cached) {
        return cached;
      }
      const pending = this.remote.exists(this.resolver.remoteKey(weeklyKey(monday))).catch((error: unknown) => {
        log.warn('Weekly %s could not be checked, keeping its dailies: %s', id, describeError(error));
        return false;
      });
      durable.set(id, pending);
      return pending;
    };

    const evicted: string[] = [];
    for (const candidate of await this.collectCandidates()) {
      const monday = weekAnchor(candidate.date);
      const currentWeek = formatDateToken(monday) === currentWeekId;
      const ageDays = daysBetween(now, candidate.date);
      if (!isEvictable({ ageDays, retentionDays, weeklyDurable: !currentWeek && (await weeklyDurable(monday)), currentWeek })) {
        continue;
      }
      const key = dailyKey(candidate.partitionName);
      let removed = false;
      if (candidate.inLocal && tiers !== 'remote') {
        try {
          await this.local.remove(this.resolver.localPath(key));
          removed = true;
        } catch (error) {
          log.warn('Evicting %s from the local tier failed: %s', key.id, describeError(error));
        }
      }
      if (candidate.inRemote && tiers !== 'local') {
        try {
          await this.remote.delete(this.resolver.remoteKey(key));
          removed = true;
        } catch (error) {
          log.warn('Evicting %s from the remote tier failed: %s', key.id, describeError(error));
        }
      }
      if (removed) {
        this.resolver.invalidate(key);
        evicted.push(key.id);
        log.info('Evicted %s (%d days old)', key.id, ageDays);
      }
    }
    return evicted.sort();
  }
}
