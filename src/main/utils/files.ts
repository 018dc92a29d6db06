import path from 'node:path';
import fs from 'fs-extra';
import { v4 as uuid } from 'uuid';
import { describeError } from '../errors.js';
import log from '../logger.js';

/** Unique staging file in `dir` that keeps the target's extension. */
export const tempPath = (dir: string, filename: string): string => {
  const { name, ext } = path.parse(filename);
  return path.join(dir, `${name}.${uuid()}.part${ext}`);
};

export const safeRemove = async (target: string, context: string): Promise<void> => {
  try {
    await fs.remove(target);
  } catch (error) {
    log.warn('Failed to remove %s (%s): %s', target, context, describeError(error));
  }
};
