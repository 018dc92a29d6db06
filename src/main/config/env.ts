import { z } from 'zod';
import type { EvictTiers } from '../../shared/types/artifact.js';
import type { LogLevelName } from '../logger.js';
import type { VideoProfile } from '../services/encoder-service.js';

type Env = Record<string, string | undefined>;

const RemoteBackendSchema = z.enum(['r2', 'fs']);
const EvictTiersSchema = z.enum(['local', 'remote', 'both']);
const LogLevelSchema = z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']);

export type RemoteBackend = z.infer<typeof RemoteBackendSchema>;

export type RemoteSettings =
  | { backend: 'r2'; endpoint: string; accessKeyId: string; secretAccessKey: string; bucket: string }
  | { backend: 'fs'; rootDir: string };

export interface AppConfig {
  sourceRoot: string;
  folderPrefix: string;
  outputDir: string;
  remote: RemoteSettings;
  remotePrefix: string;
  video: VideoProfile;
  full: { crf: number; maxWidth: number; fps: number };
  ffmpegPath?: string;
  downloadWorkers: number;
  buildConcurrency: number;
  retentionDays: number;
  evictTiers: EvictTiers;
  logLevel: LogLevelName;
  eventsFile: string;
}

const readers = (source: Env) => {
  const env = (key: string, fallback?: string): string => {
    const val = source[key]?.trim() || fallback;
    if (val === undefined) {
      throw new Error(`Missing required env var: ${key}`);
    }
    return val;
  };

  const envNum = (key: string, fallback: number, { min = 0 }: { min?: number } = {}): number => {
    const raw = source[key]?.trim();
    if (!raw) {
      return fallback;
    }
    const val = Number(raw);
    if (!Number.isFinite(val) || val < min) {
      throw new Error(`Env var ${key} must be a number >= ${min}, got "${raw}"`);
    }
    return val;
  };

  const envEnum = <T extends string>(key: string, schema: z.ZodType<T>, fallback: T): T => {
    const raw = source[key]?.trim();
    if (!raw) {
      return fallback;
    }
    const parsed = schema.safeParse(raw.toLowerCase());
    if (!parsed.success) {
      throw new Error(`Env var ${key} has unsupported value "${raw}"`);
    }
    return parsed.data;
  };

  return { env, envNum, envEnum };
};

/** Reads the job's settings. Throws on the first missing or malformed value, before any I/O. */
export const loadConfig = (source: Env = process.env): AppConfig => {
  const { env, envNum, envEnum } = readers(source);
  const backend = envEnum('REMOTE_BACKEND', RemoteBackendSchema, 'r2');
  const remote: RemoteSettings =
    backend === 'r2'
      ? {
          backend,
          endpoint: env('R2_ENDPOINT_URL'),
          accessKeyId: env('R2_ACCESS_KEY_ID'),
          secretAccessKey: env('R2_SECRET_ACCESS_KEY'),
          bucket: env('R2_BUCKET_NAME')
        }
      : { backend, rootDir: env('REMOTE_FS_ROOT') };

  const maxWidth = envNum('VIDEO_MAX_WIDTH', 1920);
  const ffmpegPath = source.FFMPEG_PATH?.trim();

  return {
    sourceRoot: env('SOURCE_ROOT'),
    folderPrefix: env('FOLDER_PATTERN_PREFIX', 'TLST04A00879_'),
    outputDir: env('OUTPUT_DIR', './videos'),
    remote,
    remotePrefix: env('REMOTE_PREFIX', 'timelapse').replace(/^\/+|\/+$/g, ''),
    video: {
      fps: envNum('VIDEO_FPS', 30, { min: 1 }),
      codec: env('VIDEO_CODEC', 'libx264'),
      preset: env('VIDEO_PRESET', 'slow'),
      crf: envNum('VIDEO_CRF', 28),
      maxWidth: maxWidth > 0 ? maxWidth : undefined
    },
    full: {
      crf: envNum('FULL_VIDEO_CRF', 32),
      maxWidth: envNum('FULL_VIDEO_MAX_WIDTH', 1280),
      fps: envNum('FULL_VIDEO_FPS', 20)
    },
    ffmpegPath: ffmpegPath || undefined,
    downloadWorkers: envNum('DOWNLOAD_WORKERS', 10, { min: 1 }),
    buildConcurrency: envNum('BUILD_CONCURRENCY', 2, { min: 1 }),
    retentionDays: envNum('RETENTION_DAYS', 28),
    evictTiers: envEnum('EVICT_TIERS', EvictTiersSchema, 'both'),
    logLevel: envEnum('LOG_LEVEL', LogLevelSchema, 'info'),
    eventsFile: env('EVENTS_FILE', 'events.yaml')
  };
};
