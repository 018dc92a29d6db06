import path from 'node:path';
import type { DateTime } from 'luxon';
import type { ArtifactKey } from '../../shared/types/artifact.js';
import { formatDateToken } from './date.js';

export const ARTIFACT_EXT = '.mp4';
export const STATE_KEY = 'state/state.json';

export type AliasName = 'day' | 'week' | 'full' | 'latest' | 'metadata';

const ALIAS_FILES: Record<AliasName, string> = {
  day: 'day.mp4',
  week: 'week.mp4',
  full: 'full.mp4',
  latest: 'latest.jpg',
  metadata: 'metadata.json'
};

export const dailyKey = (partitionName: string): ArtifactKey => ({ kind: 'daily', id: `daily/${partitionName}` });

export const weeklyKey = (monday: DateTime): ArtifactKey => ({ kind: 'weekly', id: `weekly/${formatDateToken(monday)}` });

export const parseArtifactId = (id: string): ArtifactKey | undefined => {
  const slash = id.indexOf('/');
  if (slash <= 0 || slash === id.length - 1) {
    return undefined;
  }
  const kind = id.slice(0, slash);
  const rest = id.slice(slash + 1);
  if (rest.includes('/')) {
    return undefined;
  }
  if (kind === 'daily') {
    return { kind, id };
  }
  if (kind === 'weekly' && /^\d{6}$/.test(rest)) {
    return { kind, id };
  }
  return undefined;
};

/** Partition name of a daily key, or the YYMMDD token of a weekly key. */
export const artifactSubject = (key: ArtifactKey): string => key.id.slice(key.id.indexOf('/') + 1);

export const joinRemote = (prefix: string, ...segments: string[]): string =>
  [prefix, ...segments].filter((segment) => segment.length > 0).join('/');

export const localArtifactPath = (outputDir: string, key: ArtifactKey): string =>
  path.join(outputDir, ...key.id.split('/')) + ARTIFACT_EXT;

export const remoteArtifactKey = (prefix: string, key: ArtifactKey): string => joinRemote(prefix, `${key.id}${ARTIFACT_EXT}`);

export const remoteKindPrefix = (prefix: string, kind: ArtifactKey['kind']): string => `${joinRemote(prefix, kind)}/`;

/** Inverse of remoteArtifactKey for listings; undefined for keys outside the artifact space. */
export const artifactIdFromRemoteKey = (prefix: string, remoteKey: string): string | undefined => {
  const root = prefix ? `${prefix}/` : '';
  if (!remoteKey.startsWith(root) || !remoteKey.endsWith(ARTIFACT_EXT)) {
    return undefined;
  }
  const id = remoteKey.slice(root.length, remoteKey.length - ARTIFACT_EXT.length);
  return parseArtifactId(id)?.id;
};

export const aliasKey = (prefix: string, alias: AliasName): string => joinRemote(prefix, ALIAS_FILES[alias]);

export const aliasFilename = (alias: AliasName): string => ALIAS_FILES[alias];

export const compareNames = (a: string, b: string): number => {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
};

/** Frames are named `TLS_{sequence}...`; order by that sequence number, then by name. */
export const frameSequence = (name: string): number => {
  const segment = path.parse(name).name.split('_')[1];
  if (!segment) {
    return 0;
  }
  const digits = (segment.split(/\s/)[0] ?? '').replace(/\D/g, '');
  return digits ? Number(digits) : 0;
};

export const compareFrames = (a: string, b: string): number => frameSequence(a) - frameSequence(b) || compareNames(a, b);
