import path from 'node:path';
import mime from 'mime-types';
import type { DateTime } from 'luxon';
import type { ArtifactKey } from '../../shared/types/artifact.js';
import type { CacheResolver } from './cache-resolver.js';
import type { LocalTier } from './local-store.js';
import type { RemoteTier } from './remote-store.js';
import type { ProcessingState, StateStore } from './state-store.js';
import log from '../logger.js';

const contentTypeFor = (filePath: string): string => mime.lookup(path.extname(filePath)) || 'application/octet-stream';

/** Copies local artifacts into the durable tier and records finished partitions. */
export class SyncService {
  constructor(
    private readonly local: LocalTier,
    private readonly remote: RemoteTier,
    private readonly resolver: CacheResolver,
    private readonly stateStore: StateStore
  ) {}

  async promote(key: ArtifactKey, localPath: string): Promise<string> {
    const remoteKey = this.resolver.remoteKey(key);
    await this.publishFile(remoteKey, localPath);
    this.resolver.invalidate(key);
    return remoteKey;
  }

  async publishFile(remoteKey: string, localPath: string): Promise<void> {
    const body = await this.local.read(localPath);
    await this.remote.put(remoteKey, body, contentTypeFor(localPath));
    log.info('Uploaded %s (%d bytes)', remoteKey, body.length);
  }

  async publishBuffer(remoteKey: string, body: Buffer, contentType: string): Promise<void> {
    await this.remote.put(remoteKey, body, contentType);
    log.info('Uploaded %s (%d bytes)', remoteKey, body.length);
  }

  recordProcessed(partitionName: string, date: DateTime): Promise<ProcessingState> {
    return this.stateStore.markProcessed(partitionName, date);
  }
}
