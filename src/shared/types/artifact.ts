import type { DateTime } from 'luxon';

export type ArtifactKind = 'daily' | 'weekly';

export type ErrorKind = 'parse' | 'fetch' | 'encode' | 'tier' | 'state';

export interface ArtifactKey {
  kind: ArtifactKind;
  /** Canonical id, `daily/{partitionName}` or `weekly/{YYMMDD}`. */
  id: string;
}

export type Resolution = 'LOCAL_FRESH' | 'REMOTE_FRESH' | 'MISSING';

export interface ResolveResult {
  state: Resolution;
  existsLocal: boolean;
  /** Undefined when a fresh local copy made the remote lookup unnecessary. */
  existsRemote?: boolean;
  /** True when the currency flag overrode tier inspection. */
  forced: boolean;
}

export interface PartitionListing {
  id: string;
  name: string;
}

export interface SourcePartition extends PartitionListing {
  date: DateTime;
}

export interface ItemRef {
  id: string;
  name: string;
  partitionId: string;
}

export type DailyState = 'unresolved' | 'skip' | 'rebuild' | 'built' | 'uploaded';

export type WeeklyState = 'unresolved' | 'skip' | 'rebuild' | 'built' | 'uploaded' | 'failed';

export type SkipReason =
  | 'fresh'
  | 'retired'
  | 'empty'
  | 'out-of-window'
  | 'incomplete'
  | 'cancelled'
  | 'failed';

export interface DailyArtifact {
  key: ArtifactKey;
  partitionId: string;
  partitionName: string;
  date: DateTime;
  existsLocal: boolean;
  existsRemote: boolean;
  isCurrent: boolean;
  state: DailyState;
  resolution?: Resolution;
  skipReason?: SkipReason;
  localPath?: string;
  errors?: string[];
}

export interface WeekBucket {
  /** YYMMDD token of the Monday. */
  id: string;
  mondayDate: DateTime;
  /** Every daily of the week, ascending by date then name. */
  members: DailyArtifact[];
}

export interface WeeklyArtifact {
  key: ArtifactKey;
  mondayDate: DateTime;
  existsLocal: boolean;
  existsRemote: boolean;
  isCurrentWeek: boolean;
  state: WeeklyState;
  resolution?: Resolution;
  skipReason?: SkipReason;
  /** Set when the remote copy was pulled to local storage this run. */
  pulled?: boolean;
  localPath?: string;
  members: DailyArtifact[];
}

export type EvictTiers = 'local' | 'remote' | 'both';

export interface RunOptions {
  /** Only the last N partitions are scheduled, plus the current week and explicit reprocess names. */
  recencyBound?: number;
  /** Pull every durable past weekly to local storage. */
  forceFullWeekSet: boolean;
  buildFull?: boolean;
  reprocess?: string[];
  dryRun?: boolean;
}

export interface RunError {
  key: string;
  kind: ErrorKind;
  message: string;
}

export interface SkippedKey {
  key: string;
  reason: SkipReason;
}

export interface RunReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  partitions: number;
  built: string[];
  planned: string[];
  skipped: SkippedKey[];
  pulled: string[];
  evicted: string[];
  published: string[];
  errors: RunError[];
  cancelled: boolean;
  currentPartition?: string;
  currentWeek?: string;
  reportPath?: string;
}
