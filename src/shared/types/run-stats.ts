export interface RunStatsPayload {
  stage: string;
  partitions: number;
  selected: number;
  built: number;
  skipped: number;
  failed: number;
  weeks: number;
  weeksBuilt: number;
}
