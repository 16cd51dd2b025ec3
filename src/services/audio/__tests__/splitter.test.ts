import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { type ChunkSpec } from '@/types/transcription';
import { SplitError } from '@/services/utils/errors';
import { ChunkFileRegistry } from '../cleaner';
import { chunkFileName, planChunks, splitMedia, validateChunkCoverage } from '../splitter';
import { FakeMediaToolkit, makeTempDir, removeTempDir, seededRandom } from '@/testing/fakes';

const toSpecs = (total: number, d: number): ChunkSpec[] =>
  planChunks(total, d).map((p) => ({
    ...p,
    filePath: chunkFileName(p.index, 'mp3'),
    byteSize: 1,
  }));

describe('planChunks', () => {
  it('plans ceil(total / d) chunks for exact multiples', () => {
    const plan = planChunks(4200, 600);
    expect(plan).toHaveLength(7);
    expect(plan.map((c) => c.startOffset)).toEqual([0, 600, 1200, 1800, 2400, 3000, 3600]);
    expect(plan[6]).toEqual({ index: 6, startOffset: 3600, plannedDuration: 600 });
  });

  it('gives the last chunk the remainder', () => {
    const plan = planChunks(4250, 600);
    expect(plan).toHaveLength(8);
    expect(plan[7]).toEqual({ index: 7, startOffset: 4200, plannedDuration: 50 });
  });

  it('holds the chunk count property for a range of durations', () => {
    for (const [total, d] of [
      [1, 600],
      [599.5, 600],
      [600, 600],
      [600.25, 600],
      [3601, 60],
      [10, 3],
    ]) {
      const plan = planChunks(total, d);
      expect(plan).toHaveLength(Math.ceil(total / d));
      const covered = plan.reduce((sum, c) => sum + c.plannedDuration, 0);
      expect(covered).toBeCloseTo(total, 6);
    }
  });

  it('covers [0, total) exactly for random durations', () => {
    const random = seededRandom(20240611);
    for (let run = 0; run < 200; run++) {
      const d = 1 + Math.floor(random() * 900);
      const total = 0.5 + random() * 20000;
      const plan = planChunks(total, d);

      expect(plan).toHaveLength(Math.ceil(total / d));
      plan.forEach((chunk, i) => {
        expect(chunk.index).toBe(i);
        expect(chunk.startOffset).toBe(i * d);
        expect(chunk.plannedDuration).toBeGreaterThan(0);
        expect(chunk.plannedDuration).toBeLessThanOrEqual(d);
      });
      const last = plan[plan.length - 1];
      expect(last.startOffset + last.plannedDuration).toBeCloseTo(total, 6);
      expect(() => validateChunkCoverage(toSpecs(total, d), total, d)).not.toThrow();
    }
  });

  it('rejects non-positive durations', () => {
    expect(() => planChunks(0, 600)).toThrow(SplitError);
    expect(() => planChunks(100, 0)).toThrow(SplitError);
    expect(() => planChunks(Number.NaN, 600)).toThrow(SplitError);
  });
});

describe('chunkFileName', () => {
  it('zero-pads the index to three digits', () => {
    expect(chunkFileName(0, 'mp3')).toBe('chunk_000.mp3');
    expect(chunkFileName(42, 'wav')).toBe('chunk_042.wav');
    expect(chunkFileName(1234, 'mp3')).toBe('chunk_1234.mp3');
  });
});

describe('validateChunkCoverage', () => {
  it('accepts a planned timeline', () => {
    expect(() => validateChunkCoverage(toSpecs(4250, 600), 4250, 600)).not.toThrow();
  });

  it('accepts gaps left by dropped chunks', () => {
    const specs = toSpecs(1800, 600).filter((c) => c.index !== 1);
    expect(() => validateChunkCoverage(specs, 1800, 600)).not.toThrow();
  });

  it('rejects a shifted offset', () => {
    const specs = toSpecs(1800, 600).map((c) => (c.index === 1 ? { ...c, startOffset: 550 } : c));
    expect(() => validateChunkCoverage(specs, 1800, 600)).toThrow(
      'Chunk timeline is malformed: chunk 1 starts at 550s, expected 600s'
    );
  });

  it('rejects duplicate or unordered indices', () => {
    const [first, second] = toSpecs(1200, 600);
    expect(() => validateChunkCoverage([first, first], 1200, 600)).toThrow(SplitError);
    expect(() => validateChunkCoverage([second, first], 1200, 600)).toThrow(SplitError);
  });

  it('rejects a chunk running past the end', () => {
    const specs = toSpecs(1000, 600).map((c) => ({ ...c, plannedDuration: 600 }));
    expect(() => validateChunkCoverage(specs, 1000, 600)).toThrow(
      'Chunk timeline is malformed: chunk 1 lasts 600s, expected 400s'
    );
  });

  it('rejects indices outside the plan', () => {
    const stray: ChunkSpec = {
      index: 5,
      filePath: 'chunk_005.mp3',
      startOffset: 3000,
      plannedDuration: 600,
      byteSize: 1,
    };
    expect(() => validateChunkCoverage([stray], 1200, 600)).toThrow(SplitError);
  });
});

describe('splitMedia', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('extracts every planned chunk and registers the files', async () => {
    const toolkit = new FakeMediaToolkit({ duration: 1500, chunkBytes: 128 });
    const registry = new ChunkFileRegistry(dir);

    const result = await splitMedia('input.m4a', 1500, 600, dir, toolkit, { registry });

    expect(result.planned).toBe(3);
    expect(result.dropped).toEqual([]);
    expect(result.chunks.map((c) => [c.index, c.startOffset, c.plannedDuration])).toEqual([
      [0, 0, 600],
      [1, 600, 600],
      [2, 1200, 300],
    ]);
    expect(result.chunks.map((c) => c.filePath)).toEqual([
      path.join(dir, 'chunk_000.mp3'),
      path.join(dir, 'chunk_001.mp3'),
      path.join(dir, 'chunk_002.mp3'),
    ]);
    expect(result.chunks.every((c) => c.byteSize === 128)).toBe(true);
    expect(Object.isFrozen(result.chunks[0])).toBe(true);
    expect(registry.size).toBe(3);
    expect(toolkit.extractions.map((e) => [e.start, e.duration])).toEqual([
      [0, 600],
      [600, 600],
      [1200, 300],
    ]);
  });

  it('drops a chunk that fails to extract and removes its partial output', async () => {
    const toolkit = new FakeMediaToolkit({ duration: 1800, failExtractions: [1] });
    const updates: string[] = [];

    const result = await splitMedia('input.m4a', 1800, 600, dir, toolkit, {
      onProgress: (u) => updates.push(`${u.id}:${u.status}`),
    });

    expect(result.chunks.map((c) => c.index)).toEqual([0, 2]);
    expect(result.dropped).toEqual([1]);
    expect(fs.existsSync(path.join(dir, 'chunk_001.mp3'))).toBe(false);
    expect(updates).toEqual(['0:processing', '1:processing', '1:error', '2:processing']);
  });

  it('throws SplitError when no chunk survives', async () => {
    const toolkit = new FakeMediaToolkit({ duration: 1200, failExtractions: [0, 1] });

    await expect(splitMedia('input.m4a', 1200, 600, dir, toolkit)).rejects.toThrow(
      'No chunks created successfully (2 planned)'
    );
    expect(await fs.promises.readdir(dir)).toEqual([]);
  });

  it('stops when the signal aborts', async () => {
    const toolkit = new FakeMediaToolkit({ duration: 1200 });
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await expect(
      splitMedia('input.m4a', 1200, 600, dir, toolkit, { signal: controller.signal })
    ).rejects.toThrow('stop');
    expect(toolkit.extractions).toHaveLength(0);
  });
});
