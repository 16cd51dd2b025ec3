import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  type ChunkStatus,
  type JobState,
  type MediaFile,
  type MediaToolkit,
  type TranscriptionResult,
  type TranscriptionService,
} from '@/types/transcription';
import {
  resolveTranscriptionConfig,
  type TranscriptionConfig,
  type TranscriptionConfigInput,
} from '@/config';
import { probeDuration, statMediaFile } from '@/services/audio/prober';
import { splitMedia, validateChunkCoverage } from '@/services/audio/splitter';
import { withChunkFiles } from '@/services/audio/cleaner';
import {
  JobCancelledError,
  getReadableErrorMessage,
  reportUnexpectedError,
} from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';
import { bytesToMegabytes, formatDuration } from '@/services/utils/time';
import { JobStateMachine } from './jobState';
import { dispatchChunks, transcribeDirect, type DispatchOptions } from './dispatcher';
import { mergeChunkOutcomes } from './merger';

export interface TranscriptionDependencies {
  service: TranscriptionService;
  toolkit: MediaToolkit;
  /** Backoff timer override */
  sleep?: DispatchOptions['sleep'];
}

export interface TranscriptionJobRequest {
  filePath: string;
  config?: TranscriptionConfigInput;
  signal?: AbortSignal;
  onProgress?: (update: ChunkStatus) => void;
  onStateChange?: (state: JobState, previous: JobState) => void;
}

interface JobContext {
  jobId: string;
  job: JobStateMachine;
  config: TranscriptionConfig;
  request: TranscriptionJobRequest;
  deps: TranscriptionDependencies;
  dispatchOptions: DispatchOptions;
}

/**
 * Transcribe a media file of any size.
 *
 * Files at or below `sizeThresholdBytes` go to the service in one request.
 * Larger files are probed, split into `chunkDurationSeconds` chunks,
 * transcribed with at most `maxConcurrency` requests in flight and merged back
 * onto one time axis. Chunk files never outlive the call.
 *
 * Throws MediaProbeError, SplitError, AllChunksFailedError or
 * JobCancelledError; a job where only some chunks failed resolves with
 * `partial: true`.
 */
export async function transcribeMedia(
  request: TranscriptionJobRequest,
  deps: TranscriptionDependencies
): Promise<TranscriptionResult> {
  const config = resolveTranscriptionConfig(request.config);
  const jobId = uuidv4();
  const job = new JobStateMachine(jobId, request.onStateChange);
  const { signal } = request;

  const ctx: JobContext = {
    jobId,
    job,
    config,
    request,
    deps,
    dispatchOptions: {
      maxConcurrency: config.maxConcurrency,
      maxRetries: config.maxRetries,
      backoffBaseSeconds: config.backoffBaseSeconds,
      signal,
      onProgress: request.onProgress,
      sleep: deps.sleep,
    },
  };

  try {
    if (signal?.aborted) throw new JobCancelledError(signal.reason);

    const media = await statMediaFile(request.filePath);
    logger.info(
      `[Job ${jobId}] ${path.basename(media.path)}: ${bytesToMegabytes(media.byteSize).toFixed(2)} MB`
    );

    const result =
      media.byteSize <= config.sizeThresholdBytes
        ? await runDirect(media, ctx)
        : await runChunked(media, ctx);

    job.transition('done');
    logger.info(
      `[Job ${jobId}] Done: ${result.wordCount} words, ${result.chunkingStats.successfulChunks}/${result.chunkingStats.totalChunks} chunks`
    );
    return result;
  } catch (error) {
    job.fail();

    const failure =
      signal?.aborted && !(error instanceof JobCancelledError)
        ? new JobCancelledError(error)
        : error;

    logger.error(`[Job ${jobId}] Failed: ${getReadableErrorMessage(failure)}`);
    reportUnexpectedError(failure, { jobId, filePath: request.filePath });
    throw failure;
  }
}

async function runDirect(media: MediaFile, ctx: JobContext): Promise<TranscriptionResult> {
  const { job, config, deps, dispatchOptions } = ctx;
  logger.info(
    `[Job ${ctx.jobId}] Within ${bytesToMegabytes(config.sizeThresholdBytes).toFixed(0)} MB limit, using a single request`
  );

  job.transition('dispatching');
  const outcome = await transcribeDirect(media, deps.service, dispatchOptions);

  job.transition('merging');
  const lastSegmentEnd = outcome.status === 'success' ? outcome.segments.at(-1)?.end : undefined;
  const durationSeconds =
    (outcome.status === 'success' ? outcome.durationSeconds : undefined) ?? lastSegmentEnd ?? 0;

  return mergeChunkOutcomes([{ index: 0, startOffset: 0 }], [outcome], {
    method: 'single',
    totalDurationSeconds: durationSeconds,
    chunkDurationSeconds: durationSeconds,
    audioFile: path.basename(media.path),
  });
}

async function runChunked(media: MediaFile, ctx: JobContext): Promise<TranscriptionResult> {
  const { jobId, job, config, request, deps, dispatchOptions } = ctx;
  const { signal } = request;

  const totalDuration = await probeDuration(media.path, deps.toolkit, signal);
  logger.info(
    `[Job ${jobId}] Over ${bytesToMegabytes(config.sizeThresholdBytes).toFixed(0)} MB limit, chunking ${formatDuration(totalDuration)}`
  );

  job.transition('splitting');
  const chunkDir = path.join(config.workDir ?? os.tmpdir(), `chunks-${jobId}`);

  return withChunkFiles(
    chunkDir,
    async (registry) => {
      const split = await splitMedia(
        media.path,
        totalDuration,
        config.chunkDurationSeconds,
        chunkDir,
        deps.toolkit,
        { signal, registry, onProgress: request.onProgress }
      );
      validateChunkCoverage(split.chunks, totalDuration, config.chunkDurationSeconds);

      job.transition('dispatching');
      const outcomes = await dispatchChunks(split.chunks, deps.service, dispatchOptions);

      job.transition('merging');
      return mergeChunkOutcomes(split.chunks, outcomes, {
        method: 'parallel',
        totalDurationSeconds: totalDuration,
        chunkDurationSeconds: config.chunkDurationSeconds,
        audioFile: path.basename(media.path),
        droppedChunks: split.dropped,
      });
    },
    () => job.transition('cleanup')
  );
}
