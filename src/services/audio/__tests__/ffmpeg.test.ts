import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FfmpegToolkit } from '../ffmpeg';
import { makeTempDir, removeTempDir } from '@/testing/fakes';

describe('FfmpegToolkit.probe', () => {
  let dir: string;

  // Stand-in ffprobe binary
  const writeFfprobe = async (body: string): Promise<string> => {
    const scriptPath = path.join(dir, 'ffprobe');
    await fs.promises.writeFile(scriptPath, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return scriptPath;
  };

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('reads the container duration from ffprobe json', async () => {
    const toolkit = new FfmpegToolkit({
      customFfprobePath: await writeFfprobe(`echo '{"format":{"duration":"4200.500000"}}'`),
    });

    expect(await toolkit.probe('/media/lecture.m4a')).toBe(4200.5);
  });

  it('reports NaN when ffprobe prints no duration', async () => {
    const toolkit = new FfmpegToolkit({
      customFfprobePath: await writeFfprobe(`echo '{"format":{}}'`),
    });

    expect(await toolkit.probe('/media/lecture.m4a')).toBeNaN();
  });

  it('rejects with stderr when ffprobe fails', async () => {
    const toolkit = new FfmpegToolkit({
      customFfprobePath: await writeFfprobe(`echo 'lecture.m4a: Invalid data' >&2\nexit 1`),
    });

    await expect(toolkit.probe('/media/lecture.m4a')).rejects.toThrow(
      'FFprobe exited with code 1: lecture.m4a: Invalid data'
    );
  });

  it('kills ffprobe when the signal aborts', async () => {
    const toolkit = new FfmpegToolkit({ customFfprobePath: await writeFfprobe('exec sleep 30') });
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(new Error('job cancelled')), 50);

    await expect(toolkit.probe('/media/lecture.m4a', controller.signal)).rejects.toThrow(
      'job cancelled'
    );
    expect(Date.now() - startedAt).toBeLessThan(5000);
  });

  it('does not start ffprobe for an aborted signal', async () => {
    const marker = path.join(dir, 'started');
    const toolkit = new FfmpegToolkit({
      customFfprobePath: await writeFfprobe(`touch '${marker}'`),
    });
    const controller = new AbortController();
    controller.abort(new Error('job cancelled'));

    await expect(toolkit.probe('/media/lecture.m4a', controller.signal)).rejects.toThrow(
      'job cancelled'
    );
    expect(fs.existsSync(marker)).toBe(false);
  });
});
