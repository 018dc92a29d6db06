import path from 'node:path';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import { EncodeError, describeError } from '../errors.js';
import { tempPath } from '../utils/files.js';
import log from '../logger.js';

export type ConcatMode = 'copy' | 'reencode';

export interface MediaEncoder {
  /** Encodes still frames, in the given order, into one video at `outputPath`. */
  encodeSequence(framePaths: string[], outputPath: string): Promise<string>;
  /** Joins videos in the given order. `copy` remuxes without re-encoding. */
  concatenate(artifactPaths: string[], outputPath: string, mode: ConcatMode): Promise<string>;
}

export interface VideoProfile {
  fps: number;
  codec: string;
  preset: string;
  crf: number;
  maxWidth?: number;
}

export interface EncoderOptions {
  tempDir: string;
  video: VideoProfile;
  /** Heavier compression used for the full-history timelapse. */
  full: Pick<VideoProfile, 'crf' | 'maxWidth' | 'fps'>;
  ffmpegPath?: string;
}

const quoteConcatPath = (filePath: string): string => `'${path.resolve(filePath).replace(/'/g, "'\\''")}'`;

export const buildFrameList = (framePaths: string[], fps: number): string => {
  const duration = (1 / fps).toFixed(3);
  const lines = framePaths.flatMap((frame) => [`file ${quoteConcatPath(frame)}`, `duration ${duration}`]);
  // the concat demuxer ignores the duration of the final entry unless the frame is listed again
  lines.push(`file ${quoteConcatPath(framePaths[framePaths.length - 1])}`);
  return `${lines.join('\n')}\n`;
};

export const buildConcatList = (artifactPaths: string[]): string =>
  `${artifactPaths.map((artifact) => `file ${quoteConcatPath(artifact)}`).join('\n')}\n`;

export class FfmpegEncoder implements MediaEncoder {
  constructor(private readonly options: EncoderOptions) {
    if (options.ffmpegPath) {
      ffmpeg.setFfmpegPath(options.ffmpegPath);
    }
  }

  async encodeSequence(framePaths: string[], outputPath: string): Promise<string> {
    if (!framePaths.length) {
      throw new EncodeError(outputPath, 'No frames to encode.');
    }
    const { video } = this.options;
    return this.runConcat(outputPath, buildFrameList(framePaths, video.fps), [
      '-c:v',
      video.codec,
      '-preset',
      video.preset,
      '-crf',
      video.crf.toString(),
      '-pix_fmt',
      'yuv420p',
      '-movflags',
      '+faststart',
      ...this.scaleOptions(video.maxWidth)
    ]);
  }

  async concatenate(artifactPaths: string[], outputPath: string, mode: ConcatMode): Promise<string> {
    if (!artifactPaths.length) {
      throw new EncodeError(outputPath, 'No videos to concatenate.');
    }
    const list = buildConcatList(artifactPaths);
    if (mode === 'copy') {
      return this.runConcat(outputPath, list, ['-c', 'copy']);
    }
    const { video, full } = this.options;
    return this.runConcat(outputPath, list, [
      '-c:v',
      video.codec,
      '-preset',
      video.preset,
      '-crf',
      full.crf.toString(),
      '-pix_fmt',
      'yuv420p',
      '-movflags',
      '+faststart',
      ...this.scaleOptions(full.maxWidth),
      ...(full.fps ? ['-r', full.fps.toString()] : [])
    ]);
  }

  private scaleOptions(maxWidth?: number): string[] {
    return maxWidth ? ['-vf', `scale=${maxWidth}:-2:flags=lanczos`] : [];
  }

  private async runConcat(outputPath: string, listContents: string, outputOptions: string[]): Promise<string> {
    await fs.ensureDir(this.options.tempDir);
    await fs.ensureDir(path.dirname(outputPath));
    const listFile = tempPath(this.options.tempDir, 'concat.txt');
    await fs.writeFile(listFile, listContents);
    try {
      await new Promise<void>((resolve, reject) => {
        ffmpeg(listFile)
          .inputOptions(['-f', 'concat', '-safe', '0'])
          .outputOptions(['-y', ...outputOptions])
          .save(outputPath)
          .on('end', () => resolve())
          .on('error', (err: Error) => reject(err));
      });
      return outputPath;
    } catch (error) {
      log.error('ffmpeg failed for %s: %s', outputPath, describeError(error));
      throw new EncodeError(outputPath, `ffmpeg failed: ${describeError(error)}`, { cause: error });
    } finally {
      await fs.remove(listFile);
    }
  }
}
