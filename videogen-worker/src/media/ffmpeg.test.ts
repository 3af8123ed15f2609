import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { FFmpegError } from '../errors.js';
import { VideoEditor, concatListEntry, createFFmpegRunner, type FFmpegRunner } from './ffmpeg.js';

describe('concatListEntry', () => {
  it('quotes plain paths', () => {
    expect(concatListEntry('/tmp/work/clip_000.mp4')).toBe("file '/tmp/work/clip_000.mp4'");
  });

  it('escapes single quotes and normalises backslashes', () => {
    expect(concatListEntry("C:\\clips\\director's cut.mp4")).toBe("file 'C:/clips/director'\\''s cut.mp4'");
  });
});

describe('VideoEditor', () => {
  let workDir: string;
  let run: Mock<FFmpegRunner>;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'editor-test-'));
    run = vi.fn<FFmpegRunner>(async () => ({ stdout: '', stderr: '' }));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('writes the concat list in the given order and stream-copies by default', async () => {
    const editor = new VideoEditor(run);
    const output = join(workDir, 'final.mp4');

    const result = await editor.concatenate(['/clips/b.mp4', '/clips/a.mp4', '/clips/c.mp4'], output, { workDir });

    const listPath = join(workDir, 'concat_list.txt');
    expect(result).toBe(output);
    expect(await readFile(listPath, 'utf-8')).toBe(
      "file '/clips/b.mp4'\nfile '/clips/a.mp4'\nfile '/clips/c.mp4'\n"
    );
    expect(run).toHaveBeenCalledWith([
      '-y',
      '-f',
      'concat',
      '-safe',
      '0',
      '-i',
      listPath,
      '-c',
      'copy',
      '-fflags',
      '+genpts',
      '-avoid_negative_ts',
      'make_zero',
      '-movflags',
      '+faststart',
      output
    ]);
  });

  it('re-encodes to H.264 when asked', async () => {
    const editor = new VideoEditor(run);

    await editor.concatenate(['/clips/a.mp4'], join(workDir, 'final.mp4'), { workDir, reencode: true });

    const args = run.mock.calls[0][0];
    expect(args.slice(7, 17)).toEqual(['-c:v', 'libx264', '-preset', 'medium', '-crf', '18', '-pix_fmt', 'yuv420p', '-c:a', 'aac']);
    expect(args).not.toContain('copy');
  });

  it('seeks to the last second to grab the final frame', async () => {
    const editor = new VideoEditor(run);

    await expect(editor.extractLastFrame('/clips/a.mp4', '/tmp/a.png')).resolves.toBe('/tmp/a.png');
    expect(run).toHaveBeenCalledWith(['-y', '-sseof', '-1', '-i', '/clips/a.mp4', '-update', '1', '-q:v', '1', '/tmp/a.png']);
  });

  it('propagates runner failures', async () => {
    run.mockRejectedValueOnce(new FFmpegError('ffmpeg exited with code 1', 1, 'Invalid data found'));
    const editor = new VideoEditor(run);

    await expect(editor.concatenate(['/clips/a.mp4'], join(workDir, 'final.mp4'), { workDir })).rejects.toThrow(
      'ffmpeg exited with code 1'
    );
  });
});

describe('createFFmpegRunner', () => {
  // The node binary stands in for ffmpeg so the process handling can be exercised.
  const fakeFfmpeg = createFFmpegRunner(process.execPath, 10_000);

  it('collects output from a successful run', async () => {
    const result = await fakeFfmpeg(['-e', "process.stdout.write('ok'); process.stderr.write('progress')"]);

    expect(result).toEqual({ stdout: 'ok', stderr: 'progress' });
  });

  it('rejects with the exit code and stderr tail on failure', async () => {
    const error = await fakeFfmpeg(['-e', "process.stderr.write('bad input'); process.exit(3)"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FFmpegError);
    expect(error).toMatchObject({ message: 'ffmpeg exited with code 3', exitCode: 3, stderr: 'bad input' });
  });

  it('rejects when the binary cannot be started', async () => {
    const missing = createFFmpegRunner(join(tmpdir(), 'no-such-ffmpeg-binary'));

    await expect(missing(['-version'])).rejects.toThrow(/^Failed to start ffmpeg: /);
  });

  it('kills a run that exceeds the timeout', async () => {
    const slow = createFFmpegRunner(process.execPath, 200);

    await expect(slow(['-e', 'setTimeout(() => {}, 5000)'])).rejects.toThrow('ffmpeg timed out after 200ms');
  });
});
