import type { ArtifactKey, ResolveResult } from '../../shared/types/artifact.js';
import { TierUnavailableError, describeError } from '../errors.js';
import { localArtifactPath, remoteArtifactKey } from '../utils/naming.js';
import type { LocalTier } from './local-store.js';
import type { RemoteTier } from './remote-store.js';
import log from '../logger.js';

export interface CacheResolverOptions {
  outputDir: string;
  remotePrefix: string;
}

const FORCED: ResolveResult = { state: 'MISSING', existsLocal: false, forced: true };

/**
 * Reports where an artifact lives across the local and remote tiers.
 *
 * Daily artifacts trust a local copy without asking the remote tier. Weekly artifacts are
 * fresh only once promoted: a local-only weekly resolves MISSING so it is regenerated and
 * promoted instead of drifting from the remote copy. Artifacts of the current partition or
 * week always resolve MISSING. A lookup that throws counts as "absent" for that tier only.
 */
export class CacheResolver {
  private readonly memo = new Map<string, Promise<ResolveResult>>();

  constructor(
    private readonly options: CacheResolverOptions,
    private readonly local: LocalTier,
    private readonly remote: RemoteTier
  ) {}

  resolve(key: ArtifactKey, context: { current: boolean }): Promise<ResolveResult> {
    if (context.current) {
      return Promise.resolve({ ...FORCED });
    }
    const cached = this.memo.get(key.id);
    if (cached) {
      return cached;
    }
    const pending = this.inspect(key);
    this.memo.set(key.id, pending);
    return pending;
  }

  invalidate(key: ArtifactKey): void {
    this.memo.delete(key.id);
  }

  localPath(key: ArtifactKey): string {
    return localArtifactPath(this.options.outputDir, key);
  }

  remoteKey(key: ArtifactKey): string {
    return remoteArtifactKey(this.options.remotePrefix, key);
  }

  /** Ensures a local copy exists, pulling it from the remote tier when needed. */
  async materialize(key: ArtifactKey): Promise<string> {
    const target = this.localPath(key);
    if (await this.existsLocally(key)) {
      return target;
    }
    const remoteKey = this.remoteKey(key);
    const body = await this.remote.get(remoteKey);
    if (!body) {
      throw new TierUnavailableError(key.id, `Remote copy ${remoteKey} disappeared before it could be pulled.`);
    }
    await this.local.write(target, body);
    this.invalidate(key);
    log.debug('Pulled %s from %s', key.id, remoteKey);
    return target;
  }

  private async inspect(key: ArtifactKey): Promise<ResolveResult> {
    const existsLocal = await this.existsLocally(key);
    if (existsLocal && key.kind === 'daily') {
      return { state: 'LOCAL_FRESH', existsLocal, forced: false };
    }
    const existsRemote = await this.existsRemotely(key);
    if (existsRemote) {
      return { state: existsLocal ? 'LOCAL_FRESH' : 'REMOTE_FRESH', existsLocal, existsRemote, forced: false };
    }
    return { state: 'MISSING', existsLocal, existsRemote, forced: false };
  }

  private async existsLocally(key: ArtifactKey): Promise<boolean> {
    try {
      return await this.local.exists(this.localPath(key));
    } catch (error) {
      log.warn('Local existence check failed for %s: %s', key.id, describeError(error));
      return false;
    }
  }

  private async existsRemotely(key: ArtifactKey): Promise<boolean> {
    try {
      return await this.remote.exists(this.remoteKey(key));
    } catch (error) {
      log.warn('Remote existence check failed for %s, treating as absent: %s', key.id, describeError(error));
      return false;
    }
  }
}
