import { spawn } from 'node:child_process';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { logger } from '../logger.js';
import { FFmpegError } from '../errors.js';

export interface FFmpegResult {
  stdout: string;
  stderr: string;
}

export type FFmpegRunner = (args: string[]) => Promise<FFmpegResult>;

const STDERR_TAIL_CHARS = 4000;

/**
 * Runs the ffmpeg binary and collects its output. Rejects with an
 * {@link FFmpegError} on a non-zero exit, a spawn failure or the timeout.
 */
export function createFFmpegRunner(ffmpegPath = 'ffmpeg', timeoutMs = 30 * 60 * 1000): FFmpegRunner {
  return (args) =>
    new Promise((resolvePromise, rejectPromise) => {
      logger.debug({ ffmpegPath, args }, 'Running ffmpeg');
      const child = spawn(ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (error: FFmpegError | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        if (error) {
          rejectPromise(error);
        } else {
          resolvePromise({ stdout, stderr });
        }
      };

      const timeoutId = setTimeout(() => {
        child.kill('SIGKILL');
        finish(new FFmpegError(`ffmpeg timed out after ${timeoutMs}ms`, null, stderr.slice(-STDERR_TAIL_CHARS)));
      }, timeoutMs);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error) => {
        finish(new FFmpegError(`Failed to start ffmpeg: ${error.message}`, null, stderr.slice(-STDERR_TAIL_CHARS)));
      });

      child.on('close', (code) => {
        if (code === 0) {
          finish(null);
          return;
        }
        const tail = stderr.slice(-STDERR_TAIL_CHARS);
        logger.error({ code, stderr: tail }, 'ffmpeg failed');
        finish(new FFmpegError(`ffmpeg exited with code ${code}`, code, tail));
      });
    });
}

/** Escapes a path for a line of ffmpeg's concat demuxer list. */
export function concatListEntry(path: string): string {
  return `file '${path.replace(/\\/g, '/').replace(/'/g, "'\\''")}'`;
}

export interface ConcatOptions {
  workDir: string;
  reencode?: boolean;
}

export class VideoEditor {
  constructor(private readonly run: FFmpegRunner) {}

  /** Joins clips in the given order into one file, with no transition between them. */
  async concatenate(clipPaths: string[], outputPath: string, options: ConcatOptions): Promise<string> {
    const listPath = join(options.workDir, 'concat_list.txt');
    await writeFile(listPath, clipPaths.map(concatListEntry).join('\n') + '\n', 'utf-8');

    const codecArgs = options.reencode
      ? ['-c:v', 'libx264', '-preset', 'medium', '-crf', '18', '-pix_fmt', 'yuv420p', '-c:a', 'aac']
      : ['-c', 'copy'];

    await this.run([
      '-y',
      '-f',
      'concat',
      '-safe',
      '0',
      '-i',
      listPath,
      ...codecArgs,
      '-fflags',
      '+genpts',
      '-avoid_negative_ts',
      'make_zero',
      '-movflags',
      '+faststart',
      outputPath
    ]);

    logger.info({ clipCount: clipPaths.length, outputPath, reencode: Boolean(options.reencode) }, 'Clips concatenated');
    return outputPath;
  }

  /** Saves the final frame of a clip as a still image. */
  async extractLastFrame(videoPath: string, imagePath: string): Promise<string> {
    await this.run(['-y', '-sseof', '-1', '-i', videoPath, '-update', '1', '-q:v', '1', imagePath]);
    return imagePath;
  }
}
