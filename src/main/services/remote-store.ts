/**
 * Remote durable tier.
 *
 * Backends:
 *   - R2RemoteStore       → Cloudflare R2 (S3-compatible) for production
 *   - FsRemoteStore       → a local directory standing in for the bucket during development
 *   - ReadOnlyRemoteStore → wraps either one for `--no-upload` runs
 *
 * `get` returns null only when the key does not exist. Every other failure surfaces as
 * TierUnavailableError so callers can degrade per key.
 */

import path from 'node:path';
import fs from 'fs-extra';
import {
  S3Client,
  S3ServiceException,
  HeadObjectCommand,
  GetObjectCommand,
  PutObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command
} from '@aws-sdk/client-s3';
import { TierUnavailableError, describeError } from '../errors.js';
import { tempPath } from '../utils/files.js';
import log from '../logger.js';

export interface RemoteTier {
  readonly backend: 'r2' | 'fs' | 'read-only';
  exists(key: string): Promise<boolean>;
  get(key: string): Promise<Buffer | null>;
  put(key: string, body: Buffer, contentType?: string): Promise<void>;
  delete(key: string): Promise<void>;
  list(prefix: string): Promise<string[]>;
}

export interface R2Options {
  endpoint: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
}

const isNotFound = (error: unknown): boolean =>
  error instanceof S3ServiceException &&
  (error.name === 'NoSuchKey' || error.name === 'NotFound' || error.$metadata.httpStatusCode === 404);

const unavailable = (key: string, action: string, error: unknown): TierUnavailableError =>
  new TierUnavailableError(key, `Remote ${action} failed for ${key}: ${describeError(error)}`, { cause: error });

export class R2RemoteStore implements RemoteTier {
  readonly backend = 'r2' as const;
  private readonly client: S3Client;

  constructor(private readonly options: R2Options, client?: S3Client) {
    this.client =
      client ??
      new S3Client({
        region: 'auto',
        endpoint: options.endpoint,
        credentials: { accessKeyId: options.accessKeyId, secretAccessKey: options.secretAccessKey },
        maxAttempts: 2
      });
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.options.bucket, Key: key }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw unavailable(key, 'existence check', error);
    }
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.options.bucket, Key: key }));
      if (!response.Body) {
        return null;
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw unavailable(key, 'read', error);
    }
  }

  async put(key: string, body: Buffer, contentType?: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({ Bucket: this.options.bucket, Key: key, Body: body, ContentType: contentType })
      );
    } catch (error) {
      throw unavailable(key, 'write', error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.options.bucket, Key: key }));
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw unavailable(key, 'delete', error);
    }
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;
    try {
      do {
        const response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.options.bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
            MaxKeys: 1000
          })
        );
        for (const object of response.Contents ?? []) {
          if (object.Key) {
            keys.push(object.Key);
          }
        }
        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw unavailable(prefix, 'listing', error);
    }
    return keys;
  }
}

export class FsRemoteStore implements RemoteTier {
  readonly backend = 'fs' as const;

  constructor(private readonly rootDir: string) {}

  async exists(key: string): Promise<boolean> {
    return this.guard(key, 'existence check', () => fs.pathExists(this.resolve(key)));
  }

  async get(key: string): Promise<Buffer | null> {
    return this.guard(key, 'read', async () => {
      const file = this.resolve(key);
      if (!(await fs.pathExists(file))) {
        return null;
      }
      return fs.readFile(file);
    });
  }

  async put(key: string, body: Buffer): Promise<void> {
    await this.guard(key, 'write', async () => {
      const file = this.resolve(key);
      await fs.ensureDir(path.dirname(file));
      const staging = tempPath(path.dirname(file), path.basename(file));
      await fs.writeFile(staging, body);
      await fs.move(staging, file, { overwrite: true });
    });
  }

  async delete(key: string): Promise<void> {
    await this.guard(key, 'delete', () => fs.remove(this.resolve(key)));
  }

  async list(prefix: string): Promise<string[]> {
    return this.guard(prefix, 'listing', async () => {
      const keys: string[] = [];
      await this.walk(this.rootDir, keys);
      return keys.filter((key) => key.startsWith(prefix)).sort();
    });
  }

  private resolve(key: string): string {
    return path.join(this.rootDir, ...key.split('/'));
  }

  private async walk(dir: string, keys: string[]): Promise<void> {
    if (!(await fs.pathExists(dir))) {
      return;
    }
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(fullPath, keys);
      } else if (!entry.name.includes('.part')) {
        keys.push(path.relative(this.rootDir, fullPath).split(path.sep).join('/'));
      }
    }
  }

  private async guard<T>(key: string, action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw unavailable(key, action, error);
    }
  }
}

/** Reads pass through; writes and deletes are logged and dropped. */
export class ReadOnlyRemoteStore implements RemoteTier {
  readonly backend = 'read-only' as const;

  constructor(private readonly inner: RemoteTier) {}

  exists(key: string): Promise<boolean> {
    return this.inner.exists(key);
  }

  get(key: string): Promise<Buffer | null> {
    return this.inner.get(key);
  }

  async put(key: string): Promise<void> {
    log.info('Upload disabled: would upload %s', key);
  }

  async delete(key: string): Promise<void> {
    log.info('Upload disabled: would delete %s', key);
  }

  list(prefix: string): Promise<string[]> {
    return this.inner.list(prefix);
  }
}
