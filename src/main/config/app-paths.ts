import path from 'node:path';
import fs from 'fs-extra';

export interface AppPaths {
  outputDir: string;
  dailyDir: string;
  weeklyDir: string;
  tempDir: string;
  logDir: string;
  reportDir: string;
}

/** Artifact directories mirror the key space: `{outputDir}/daily` and `{outputDir}/weekly`. */
export const getAppPaths = (outputDir: string): AppPaths => {
  const root = path.resolve(outputDir);
  return {
    outputDir: root,
    dailyDir: path.join(root, 'daily'),
    weeklyDir: path.join(root, 'weekly'),
    tempDir: path.join(root, '.tmp'),
    logDir: path.join(root, 'logs'),
    reportDir: path.join(root, 'reports')
  };
};

export const ensureAppDirectories = async (paths: AppPaths): Promise<void> => {
  await fs.ensureDir(paths.outputDir);
  await fs.ensureDir(paths.dailyDir);
  await fs.ensureDir(paths.weeklyDir);
  await fs.ensureDir(paths.tempDir);
  await fs.ensureDir(paths.logDir);
  await fs.ensureDir(paths.reportDir);
};
