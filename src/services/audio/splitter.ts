/**
 * Chunk Splitter
 *
 * Cuts a recording into fixed-duration, re-encoded audio files. Splitting is
 * best-effort: a chunk that fails to extract is dropped, and only an empty
 * result is fatal.
 */

import fs from 'fs';
import path from 'path';
import { type ChunkSpec, type ChunkStatus, type MediaToolkit } from '@/types/transcription';
import { SplitError, getReadableErrorMessage } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';
import { bytesToMegabytes, formatDuration } from '@/services/utils/time';
import { removeFileQuietly, type ChunkFileRegistry } from './cleaner';
import { t } from '@/i18n';

/** Tolerance for floating point offsets, in seconds */
const TIME_EPSILON = 1e-6;

export interface PlannedChunk {
  index: number;
  startOffset: number;
  plannedDuration: number;
}

export interface SplitOptions {
  signal?: AbortSignal;
  registry?: ChunkFileRegistry;
  onProgress?: (update: ChunkStatus) => void;
}

export interface SplitResult {
  chunks: ChunkSpec[];
  /** Planned indices that could not be extracted */
  dropped: number[];
  planned: number;
}

/**
 * Plan `ceil(total / chunkDuration)` contiguous chunks covering [0, total).
 * The last chunk gets the remainder.
 */
export function planChunks(totalDuration: number, chunkDuration: number): PlannedChunk[] {
  if (!(totalDuration > 0) || !(chunkDuration > 0)) {
    throw new SplitError(
      t('errors.split.coverage', {
        reason: `cannot plan chunks for duration ${totalDuration}s / ${chunkDuration}s`,
      })
    );
  }

  const numChunks = Math.ceil(totalDuration / chunkDuration);
  const plan: PlannedChunk[] = [];
  for (let index = 0; index < numChunks; index++) {
    const startOffset = index * chunkDuration;
    plan.push({
      index,
      startOffset,
      plannedDuration: Math.min(chunkDuration, totalDuration - startOffset),
    });
  }
  return plan;
}

/** chunk_000.mp3, chunk_001.mp3, ... */
export function chunkFileName(index: number, extension: string): string {
  return `chunk_${String(index).padStart(3, '0')}.${extension}`;
}

export async function splitMedia(
  filePath: string,
  totalDuration: number,
  chunkDuration: number,
  outDir: string,
  toolkit: MediaToolkit,
  options: SplitOptions = {}
): Promise<SplitResult> {
  const { signal, registry, onProgress } = options;
  const plan = planChunks(totalDuration, chunkDuration);

  logger.info(
    `Splitting ${formatDuration(totalDuration)} into ${plan.length} chunks of ${formatDuration(chunkDuration)}`
  );

  const chunks: ChunkSpec[] = [];
  const dropped: number[] = [];

  for (const planned of plan) {
    if (signal?.aborted) throw signal.reason;

    const outPath = path.join(outDir, chunkFileName(planned.index, toolkit.chunkExtension));
    onProgress?.({
      id: planned.index,
      total: plan.length,
      status: 'processing',
      stage: 'splitting',
      message: t('status.splitting', { current: planned.index + 1, total: plan.length }),
    });

    try {
      await toolkit.extractSegment(
        filePath,
        planned.startOffset,
        planned.plannedDuration,
        outPath,
        signal
      );
      const { size } = await fs.promises.stat(outPath);
      const chunk: ChunkSpec = Object.freeze({
        index: planned.index,
        filePath: outPath,
        startOffset: planned.startOffset,
        plannedDuration: planned.plannedDuration,
        byteSize: size,
      });
      registry?.register(chunk);
      chunks.push(chunk);
      logger.info(
        `[Chunk ${planned.index}] Extracted ${planned.index + 1}/${plan.length}: ${bytesToMegabytes(size).toFixed(1)} MB`
      );
    } catch (error) {
      await removeFileQuietly(outPath);
      if (signal?.aborted) throw signal.reason;

      dropped.push(planned.index);
      logger.error(`[Chunk ${planned.index}] Failed to create chunk, dropping it`, {
        error: getReadableErrorMessage(error),
      });
      onProgress?.({
        id: planned.index,
        total: plan.length,
        status: 'error',
        stage: 'splitting',
        message: t('errors.split.extractFailed', { reason: getReadableErrorMessage(error) }),
      });
    }
  }

  if (chunks.length === 0) {
    throw new SplitError(t('errors.split.noChunks', { planned: plan.length }));
  }

  return { chunks, dropped, planned: plan.length };
}

/**
 * Checks that surviving chunks sit exactly where the plan put them: unique,
 * increasing indices, offsets of `index × chunkDuration`, no overlap, nothing
 * past the end. Gaps are legal only where a chunk was dropped.
 */
export function validateChunkCoverage(
  chunks: readonly ChunkSpec[],
  totalDuration: number,
  chunkDuration: number
): void {
  const fail = (reason: string): never => {
    throw new SplitError(t('errors.split.coverage', { reason }));
  };

  const numChunks = Math.ceil(totalDuration / chunkDuration);
  let previousEnd = 0;
  let previousIndex = -1;

  for (const chunk of chunks) {
    if (!Number.isInteger(chunk.index) || chunk.index < 0 || chunk.index >= numChunks) {
      fail(`chunk index ${chunk.index} outside 0..${numChunks - 1}`);
    }
    if (chunk.index <= previousIndex) {
      fail(`chunk index ${chunk.index} is not after ${previousIndex}`);
    }

    const expectedStart = chunk.index * chunkDuration;
    if (Math.abs(chunk.startOffset - expectedStart) > TIME_EPSILON) {
      fail(`chunk ${chunk.index} starts at ${chunk.startOffset}s, expected ${expectedStart}s`);
    }

    const expectedDuration = Math.min(chunkDuration, totalDuration - expectedStart);
    if (Math.abs(chunk.plannedDuration - expectedDuration) > TIME_EPSILON) {
      fail(
        `chunk ${chunk.index} lasts ${chunk.plannedDuration}s, expected ${expectedDuration}s`
      );
    }

    if (chunk.startOffset < previousEnd - TIME_EPSILON) {
      fail(`chunk ${chunk.index} overlaps the previous chunk`);
    }

    const end = chunk.startOffset + chunk.plannedDuration;
    if (end > totalDuration + TIME_EPSILON) {
      fail(`chunk ${chunk.index} ends at ${end}s, past ${totalDuration}s`);
    }

    previousEnd = end;
    previousIndex = chunk.index;
  }
}
