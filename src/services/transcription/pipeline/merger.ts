/**
 * Result Merger
 *
 * Reassembles chunk outcomes into one transcript on the full recording's
 * time axis. Order comes from the chunk index only, never from completion.
 */

import {
  type ChunkDetail,
  type ChunkFailureSummary,
  type ChunkOutcome,
  type ChunkSpec,
  type Segment,
  type TranscriptionMethod,
  type TranscriptionResult,
} from '@/types/transcription';
import { PipelineInvariantError } from '@/services/utils/errors';
import { t } from '@/i18n';

export interface MergeOptions {
  method: TranscriptionMethod;
  totalDurationSeconds: number;
  chunkDurationSeconds: number;
  audioFile: string;
  droppedChunks?: number[];
}

type ChunkOffsets = Pick<ChunkSpec, 'index' | 'startOffset'>;

/**
 * Shift chunk-relative segments onto the full recording's time axis.
 */
export function offsetSegments(
  outcome: Extract<ChunkOutcome, { status: 'success' }>,
  startOffset: number
): Omit<Segment, 'id'>[] {
  return [...outcome.segments]
    .sort((a, b) => a.start - b.start)
    .map((seg) => ({
      start: seg.start + startOffset,
      end: seg.end + startOffset,
      text: seg.text,
    }));
}

export function mergeChunkOutcomes(
  chunks: readonly ChunkOffsets[],
  outcomes: readonly ChunkOutcome[],
  options: MergeOptions
): TranscriptionResult {
  const offsetsByIndex = new Map<number, number>();
  for (const chunk of chunks) {
    offsetsByIndex.set(chunk.index, chunk.startOffset);
  }

  const seen = new Set<number>();
  for (const outcome of outcomes) {
    if (!offsetsByIndex.has(outcome.index) || seen.has(outcome.index)) {
      throw new PipelineInvariantError(t('errors.merge.mismatch', { index: outcome.index }));
    }
    seen.add(outcome.index);
  }
  for (const chunk of chunks) {
    if (!seen.has(chunk.index)) {
      throw new PipelineInvariantError(t('errors.merge.mismatch', { index: chunk.index }));
    }
  }

  const ordered = [...outcomes].sort((a, b) => a.index - b.index);

  const segments: Segment[] = [];
  const texts: string[] = [];
  const chunkDetails: ChunkDetail[] = [];
  const failures: ChunkFailureSummary[] = [];
  let wordCount = 0;

  for (const outcome of ordered) {
    switch (outcome.status) {
      case 'success': {
        const startOffset = offsetsByIndex.get(outcome.index) ?? 0;
        for (const seg of offsetSegments(outcome, startOffset)) {
          segments.push({ id: segments.length, ...seg });
        }
        const text = outcome.text.trim();
        if (text) texts.push(text);
        wordCount += outcome.wordCount;
        chunkDetails.push({
          index: outcome.index,
          words: outcome.wordCount,
          durationSeconds: outcome.durationSeconds,
        });
        break;
      }
      case 'failure':
        failures.push({ index: outcome.index, kind: outcome.kind, message: outcome.message });
        chunkDetails.push({ index: outcome.index, error: outcome.message });
        break;
    }
  }

  const successfulChunks = ordered.length - failures.length;
  const droppedChunks = options.droppedChunks ?? [];

  return {
    fullTranscript: texts.join(' '),
    segments,
    durationSeconds: options.totalDurationSeconds,
    wordCount,
    audioFile: options.audioFile,
    partial: failures.length > 0 || droppedChunks.length > 0,
    chunkingStats: {
      totalChunks: ordered.length,
      successfulChunks,
      failedChunks: failures.length,
      method: options.method,
      chunkDurationMinutes: options.chunkDurationSeconds / 60,
      droppedChunks,
      chunkDetails,
      failures,
    },
  };
}
