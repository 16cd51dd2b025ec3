import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MediaProbeError } from '@/services/utils/errors';
import { probeDuration, statMediaFile } from '../prober';
import { FakeMediaToolkit, makeTempDir, removeTempDir, writeMediaFile } from '@/testing/fakes';

describe('prober', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('stats an existing file', async () => {
    const filePath = await writeMediaFile(dir, 'memo.mp3', 2048);
    expect(await statMediaFile(filePath)).toEqual({ path: filePath, byteSize: 2048 });
  });

  it('rejects a directory or missing path', async () => {
    await expect(statMediaFile(dir)).rejects.toBeInstanceOf(MediaProbeError);
    await expect(statMediaFile(path.join(dir, 'missing.mp3'))).rejects.toThrow(
      `Media file not found: ${path.join(dir, 'missing.mp3')}`
    );
  });

  it('rejects non-positive and non-finite durations', async () => {
    for (const duration of [0, -5, Number.NaN, Number.POSITIVE_INFINITY]) {
      await expect(
        probeDuration('memo.mp3', new FakeMediaToolkit({ duration }))
      ).rejects.toBeInstanceOf(MediaProbeError);
    }
  });

  it('passes an abort through instead of reporting a probe failure', async () => {
    const controller = new AbortController();
    const toolkit = new FakeMediaToolkit({ duration: 60, hangProbe: true });
    const probing = probeDuration('memo.mp3', toolkit, controller.signal);
    controller.abort(new Error('job cancelled'));

    await expect(probing).rejects.toThrow('job cancelled');
    await expect(probing).rejects.not.toBeInstanceOf(MediaProbeError);
  });
});
