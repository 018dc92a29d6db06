import yargs from 'yargs';
import type { RunOptions } from '../shared/types/artifact.js';

export interface CliArgs {
  run: RunOptions;
  upload: boolean;
}

const splitList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

/** Under `exitProcess`, `--help` and invalid input end the process the way yargs does by default. */
export const parseCliArgs = (args: string[], { exitProcess = true }: { exitProcess?: boolean } = {}): CliArgs => {
  const argv = yargs(args)
    .scriptName('timelapse-builder')
    .option('days', {
      type: 'number',
      describe: 'Only schedule the most recent N partitions (the current week is always included)'
    })
    .option('upload-all-weeks', {
      type: 'boolean',
      default: false,
      describe: 'Pull every durable weekly video to local storage'
    })
    .option('build-full', {
      type: 'boolean',
      default: false,
      describe: 'Re-encode all weekly videos into full.mp4'
    })
    .option('upload', {
      type: 'boolean',
      default: true,
      describe: 'Write to the remote store (use --no-upload for a local-only run)'
    })
    .option('reprocess', {
      type: 'string',
      describe: 'Comma-separated partition names to rebuild along with their weeks'
    })
    .option('dry-run', {
      type: 'boolean',
      default: false,
      describe: 'Resolve and report what would be built without building anything'
    })
    .check((parsed) => {
      if (parsed.days !== undefined && (!Number.isInteger(parsed.days) || parsed.days < 0)) {
        throw new Error('--days must be a non-negative integer');
      }
      return true;
    })
    .help()
    .strict()
    .exitProcess(exitProcess)
    .parseSync();

  const reprocess = splitList(argv.reprocess);
  return {
    upload: argv.upload,
    run: {
      recencyBound: argv.days,
      forceFullWeekSet: argv['upload-all-weeks'],
      buildFull: argv['build-full'],
      reprocess: reprocess.length ? reprocess : undefined,
      dryRun: argv['dry-run']
    }
  };
};
