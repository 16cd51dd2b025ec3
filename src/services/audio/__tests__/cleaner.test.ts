import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { cleanupChunks, removeFileQuietly, withChunkFiles } from '../cleaner';
import { makeTempDir, removeTempDir } from '@/testing/fakes';

describe('cleaner', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('treats an already missing file as removed', async () => {
    expect(await removeFileQuietly(path.join(dir, 'missing.mp3'))).toBe(true);
  });

  it('counts files it could not delete', async () => {
    const existing = path.join(dir, 'chunk_000.mp3');
    await fs.promises.writeFile(existing, 'x');
    // A non-empty directory cannot be unlinked
    const stubborn = path.join(dir, 'chunk_001.mp3');
    await fs.promises.mkdir(stubborn);
    await fs.promises.writeFile(path.join(stubborn, 'inner'), 'x');

    const failed = await cleanupChunks([{ filePath: existing }, { filePath: stubborn }]);

    expect(failed).toBe(1);
    expect(fs.existsSync(existing)).toBe(false);
  });

  it('removes registered files and the directory after success', async () => {
    const chunkDir = path.join(dir, 'chunks-job');
    let cleanups = 0;

    const result = await withChunkFiles(
      chunkDir,
      async (registry) => {
        const filePath = path.join(chunkDir, 'chunk_000.mp3');
        await fs.promises.writeFile(filePath, 'audio');
        registry.register({ filePath });
        return registry.size;
      },
      () => cleanups++
    );

    expect(result).toBe(1);
    expect(cleanups).toBe(1);
    expect(fs.existsSync(chunkDir)).toBe(false);
  });

  it('removes registered files and the directory when the scope throws', async () => {
    const chunkDir = path.join(dir, 'chunks-job');

    await expect(
      withChunkFiles(chunkDir, async (registry) => {
        for (const name of ['chunk_000.mp3', 'chunk_001.mp3']) {
          const filePath = path.join(chunkDir, name);
          await fs.promises.writeFile(filePath, 'audio');
          registry.register({ filePath });
        }
        throw new Error('transcription exploded');
      })
    ).rejects.toThrow('transcription exploded');

    expect(fs.existsSync(chunkDir)).toBe(false);
  });
});
