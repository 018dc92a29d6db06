import path from 'node:path';
import fs from 'fs-extra';
import type { ItemRef, PartitionListing } from '../../shared/types/artifact.js';

export interface RawInputSource {
  listPartitions(rootId: string): Promise<PartitionListing[]>;
  listItems(partitionId: string): Promise<ItemRef[]>;
  fetchItem(item: ItemRef): Promise<Buffer>;
}

export interface DirectorySourceOptions {
  /** Frames must start with this prefix. */
  itemPrefix: string;
  extensions: string[];
}

const DEFAULT_OPTIONS: DirectorySourceOptions = {
  itemPrefix: 'TLS_',
  extensions: ['.jpg', '.jpeg']
};

/** Camera uploads mirrored to disk: one folder per day, frames inside. */
export class DirectorySource implements RawInputSource {
  private readonly options: DirectorySourceOptions;

  constructor(options: Partial<DirectorySourceOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async listPartitions(rootId: string): Promise<PartitionListing[]> {
    const entries = await fs.readdir(rootId, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => ({ id: path.join(rootId, entry.name), name: entry.name }));
  }

  async listItems(partitionId: string): Promise<ItemRef[]> {
    const entries = await fs.readdir(partitionId, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && this.isFrame(entry.name))
      .map((entry) => ({ id: path.join(partitionId, entry.name), name: entry.name, partitionId }));
  }

  async fetchItem(item: ItemRef): Promise<Buffer> {
    return fs.readFile(item.id);
  }

  private isFrame(name: string): boolean {
    const ext = path.extname(name).toLowerCase();
    return name.startsWith(this.options.itemPrefix) && this.options.extensions.includes(ext);
  }
}
