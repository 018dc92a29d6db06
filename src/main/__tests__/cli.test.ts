import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../cli.js';

const parse = (args: string[]) => parseCliArgs(args, { exitProcess: false });

describe('parseCliArgs', () => {
  it('defaults to a full incremental run with uploads', () => {
    expect(parse([])).toEqual({
      upload: true,
      run: {
        recencyBound: undefined,
        forceFullWeekSet: false,
        buildFull: false,
        reprocess: undefined,
        dryRun: false
      }
    });
  });

  it('maps every flag', () => {
    expect(
      parse(['--days', '3', '--upload-all-weeks', '--build-full', '--no-upload', '--reprocess', 'a, b,,c', '--dry-run'])
    ).toEqual({
      upload: false,
      run: {
        recencyBound: 3,
        forceFullWeekSet: true,
        buildFull: true,
        reprocess: ['a', 'b', 'c'],
        dryRun: true
      }
    });
  });
});
