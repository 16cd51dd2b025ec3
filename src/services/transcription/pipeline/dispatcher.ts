/**
 * Transcription Dispatcher
 *
 * Fans chunk transcription out to at most `maxConcurrency` workers. Each
 * worker retries transient failures with exponential backoff and always
 * resolves to a ChunkOutcome, so one bad chunk never stops its siblings.
 */

import {
  type ChunkFailure,
  type ChunkOutcome,
  type ChunkSpec,
  type ChunkStatus,
  type MediaFile,
  type TranscriptionService,
} from '@/types/transcription';
import {
  AllChunksFailedError,
  JobCancelledError,
  TranscriptionError,
  getReadableErrorMessage,
  isTransientError,
} from '@/services/utils/errors';
import { mapInParallel, sleep as defaultSleep } from '@/services/utils/concurrency';
import { logger } from '@/services/utils/logger';
import { countWords } from '@/services/utils/text';
import { t } from '@/i18n';

export interface RetryPolicy {
  /** Total attempts per chunk, first one included */
  maxRetries: number;
  backoffBaseSeconds: number;
}

export interface DispatchOptions extends RetryPolicy {
  maxConcurrency: number;
  signal?: AbortSignal;
  onProgress?: (update: ChunkStatus) => void;
  /** Backoff timer; replaceable so tests can observe delays */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

interface WorkerTask {
  index: number;
  total: number;
  filePath: string;
}

/** Seconds to wait after failed attempt number `attempt` (1-based) */
export const backoffDelaySeconds = (base: number, attempt: number): number =>
  Math.pow(base, attempt);

export function toTranscriptionError(error: unknown): TranscriptionError {
  if (error instanceof TranscriptionError) return error;
  const message = getReadableErrorMessage(error);
  if (isTransientError(error)) {
    return new TranscriptionError(message, 'server_error', { cause: error });
  }
  return new TranscriptionError(message, 'unknown', { cause: error });
}

const cancelled = (index: number, attempts: number): ChunkFailure => ({
  status: 'failure',
  index,
  kind: 'cancelled',
  message: t('errors.cancelled'),
  attempts,
});

/**
 * Transcribe one file with retry. Never throws: the result is a tagged outcome.
 */
export async function transcribeWithRetry(
  task: WorkerTask,
  service: TranscriptionService,
  options: Omit<DispatchOptions, 'maxConcurrency'>
): Promise<ChunkOutcome> {
  const { index, total, filePath } = task;
  const { maxRetries, backoffBaseSeconds, signal, onProgress } = options;
  const wait = options.sleep ?? defaultSleep;

  let attempt = 0;
  let lastError: TranscriptionError | undefined;

  onProgress?.({
    id: index,
    total,
    status: 'processing',
    stage: 'transcribing',
    message: t('status.transcribing'),
  });

  while (attempt < maxRetries) {
    if (signal?.aborted) return cancelled(index, attempt);
    attempt++;

    try {
      const raw = await service.transcribe(filePath, signal);
      const wordCount = countWords(raw.text);
      logger.info(`[Chunk ${index}] Transcribed (${wordCount} words, attempt ${attempt})`);
      onProgress?.({
        id: index,
        total,
        status: 'completed',
        message: t('status.completed', { words: wordCount }),
      });
      return {
        status: 'success',
        index,
        text: raw.text,
        segments: raw.segments,
        wordCount,
        attempts: attempt,
        durationSeconds: raw.durationSeconds,
      };
    } catch (e) {
      if (signal?.aborted) return cancelled(index, attempt);

      const error = toTranscriptionError(e);
      lastError = error;
      logger.warn(`[Chunk ${index}] Transcription attempt ${attempt}/${maxRetries} failed`, {
        kind: error.kind,
        status: error.status,
        retryable: error.retryable,
        error: error.message,
      });

      // Auth and malformed input won't resolve by retrying
      if (!error.retryable) break;

      if (attempt < maxRetries) {
        const delay = backoffDelaySeconds(backoffBaseSeconds, attempt);
        onProgress?.({
          id: index,
          total,
          status: 'processing',
          stage: 'retrying',
          message: t('status.retrying', { delay, attempt: attempt + 1, max: maxRetries }),
        });
        try {
          await wait(delay * 1000, signal);
        } catch (sleepError) {
          if (signal?.aborted) return cancelled(index, attempt);
          throw sleepError;
        }
      }
    }
  }

  const failure: ChunkFailure = {
    status: 'failure',
    index,
    kind: lastError?.kind ?? 'unknown',
    message: lastError?.message ?? '',
    attempts: attempt,
  };
  logger.error(`[Chunk ${index}] Giving up after ${attempt} attempt(s)`, {
    kind: failure.kind,
    error: failure.message,
  });
  onProgress?.({
    id: index,
    total,
    status: 'error',
    message: t('status.failed', { message: failure.message }),
  });
  return failure;
}

function assertUsable(outcomes: ChunkOutcome[], signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new JobCancelledError(signal.reason);
  }
  if (!outcomes.some((outcome) => outcome.status === 'success')) {
    throw new AllChunksFailedError(outcomes.length);
  }
}

/**
 * Transcribe every chunk under the concurrency cap. Outcomes come back in
 * chunk order regardless of completion order.
 */
export async function dispatchChunks(
  chunks: readonly ChunkSpec[],
  service: TranscriptionService,
  options: DispatchOptions
): Promise<ChunkOutcome[]> {
  const { maxConcurrency, ...retryOptions } = options;
  const total = chunks.length;

  logger.info(`Dispatching ${total} chunks (concurrency ${maxConcurrency})`);

  const outcomes = await mapInParallel(chunks, maxConcurrency, (chunk) =>
    transcribeWithRetry(
      { index: chunk.index, total, filePath: chunk.filePath },
      service,
      retryOptions
    )
  );

  const failed = outcomes.filter((outcome) => outcome.status === 'failure').length;
  if (failed > 0) {
    logger.warn(`${failed}/${total} chunks failed`);
  }

  assertUsable(outcomes, options.signal);
  return outcomes;
}

/**
 * Send the whole file in a single request. Same retry policy as a chunk.
 */
export async function transcribeDirect(
  media: MediaFile,
  service: TranscriptionService,
  options: Omit<DispatchOptions, 'maxConcurrency'>
): Promise<ChunkOutcome> {
  const outcome = await transcribeWithRetry(
    { index: 0, total: 1, filePath: media.path },
    service,
    options
  );
  assertUsable([outcome], options.signal);
  return outcome;
}
