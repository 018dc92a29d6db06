import PQueue from 'p-queue';
import { z } from 'zod';
import type { DateTime } from 'luxon';
import { StateStoreError, describeError } from '../errors.js';
import { toIsoDate } from '../utils/date.js';
import { STATE_KEY } from '../utils/naming.js';
import type { RemoteTier } from './remote-store.js';
import log from '../logger.js';

export const ProcessingStateSchema = z.object({
  processedPartitionNames: z.array(z.string()),
  lastProcessedDate: z.string().nullable().default(null),
  updatedAt: z.string().optional()
});

const LegacyStateSchema = z.object({
  processed_folders: z.array(z.string()),
  last_processed_date: z.string().nullable().optional()
});

export type ProcessingState = z.infer<typeof ProcessingStateSchema>;

export const emptyState = (): ProcessingState => ({ processedPartitionNames: [], lastProcessedDate: null });

/**
 * ProcessingState lives in the remote tier so stateless runs share it. Writes go through a
 * single-writer queue and re-read the stored record first; entries are only ever added.
 */
export class StateStore {
  private readonly writer = new PQueue({ concurrency: 1 });

  constructor(
    private readonly remote: RemoteTier,
    private readonly key: string = STATE_KEY
  ) {}

  async load(): Promise<ProcessingState> {
    let raw: Buffer | null;
    try {
      raw = await this.remote.get(this.key);
    } catch (error) {
      throw new StateStoreError(this.key, `Unable to load processing state: ${describeError(error)}`, { cause: error });
    }
    if (!raw) {
      log.info('No processing state at %s, starting fresh.', this.key);
      return emptyState();
    }
    return this.parse(raw.toString('utf8'));
  }

  async markProcessed(partitionName: string, date: DateTime): Promise<ProcessingState> {
    return this.writer.add(
      async () => {
        const current = await this.load();
        const names = new Set(current.processedPartitionNames);
        names.add(partitionName);
        const isoDate = toIsoDate(date);
        const next: ProcessingState = {
          processedPartitionNames: [...names].sort(),
          lastProcessedDate:
            current.lastProcessedDate && current.lastProcessedDate > isoDate ? current.lastProcessedDate : isoDate,
          updatedAt: new Date().toISOString()
        };
        await this.save(next);
        return next;
      },
      { throwOnTimeout: true }
    );
  }

  private async save(state: ProcessingState): Promise<void> {
    try {
      await this.remote.put(this.key, Buffer.from(JSON.stringify(state, null, 2)), 'application/json');
    } catch (error) {
      throw new StateStoreError(this.key, `Unable to persist processing state: ${describeError(error)}`, { cause: error });
    }
  }

  private parse(text: string): ProcessingState {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new StateStoreError(this.key, `Processing state is not valid JSON: ${describeError(error)}`, { cause: error });
    }
    const current = ProcessingStateSchema.safeParse(data);
    if (current.success) {
      return current.data;
    }
    const legacy = LegacyStateSchema.safeParse(data);
    if (legacy.success) {
      log.info('Migrating legacy processing state with %d partitions.', legacy.data.processed_folders.length);
      return {
        processedPartitionNames: [...new Set(legacy.data.processed_folders)].sort(),
        lastProcessedDate: legacy.data.last_processed_date ?? null
      };
    }
    throw new StateStoreError(this.key, `Processing state has an unexpected shape: ${current.error.message}`);
  }
}
