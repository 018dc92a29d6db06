import type { ArtifactKey } from '../shared/types/artifact.js';
import type { RunStatsPayload } from '../shared/types/run-stats.js';

export type ProgressCallback = (event: {
  type: 'phase' | 'artifact' | 'error' | 'stats';
  phase?: string;
  key?: ArtifactKey;
  message?: string;
  error?: Error;
  stats?: RunStatsPayload;
}) => void;
