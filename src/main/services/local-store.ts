import path from 'node:path';
import fs from 'fs-extra';
import { tempPath } from '../utils/files.js';

export interface LocalTier {
  exists(filePath: string): Promise<boolean>;
  read(filePath: string): Promise<Buffer>;
  /** Writes through a staging file and renames it into place. */
  write(filePath: string, data: Buffer): Promise<void>;
  remove(filePath: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  /** Files directly under `dir`, as absolute paths. Empty when `dir` does not exist. */
  list(dir: string): Promise<string[]>;
}

export class LocalStore implements LocalTier {
  constructor(private readonly tempDir: string) {}

  async exists(filePath: string): Promise<boolean> {
    return fs.pathExists(filePath);
  }

  async read(filePath: string): Promise<Buffer> {
    return fs.readFile(filePath);
  }

  async write(filePath: string, data: Buffer): Promise<void> {
    await fs.ensureDir(this.tempDir);
    const staging = tempPath(this.tempDir, path.basename(filePath));
    try {
      await fs.writeFile(staging, data);
      await this.rename(staging, filePath);
    } finally {
      await fs.remove(staging);
    }
  }

  async remove(filePath: string): Promise<void> {
    await fs.remove(filePath);
  }

  async rename(from: string, to: string): Promise<void> {
    await fs.ensureDir(path.dirname(to));
    await fs.move(from, to, { overwrite: true });
  }

  async list(dir: string): Promise<string[]> {
    if (!(await fs.pathExists(dir))) {
      return [];
    }
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => path.join(dir, entry.name));
  }
}
