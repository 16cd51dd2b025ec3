import { ENV, resolveTranscriptionConfig, type TranscriptionConfigInput } from '@/config';
import { FfmpegToolkit } from '@/services/audio/ffmpeg';
import { WhisperTranscriptionService } from '@/services/transcribe/openai/whisper';
import {
  transcribeMedia,
  type TranscriptionDependencies,
  type TranscriptionJobRequest,
} from '@/services/transcription/pipeline';
import { initErrorReporting } from '@/services/utils/errors';
import { type TranscriptionResult } from '@/types/transcription';

export * from '@/types/transcription';
export {
  ENV,
  DEFAULT_SIZE_THRESHOLD_BYTES,
  TranscriptionConfigSchema,
  resolveTranscriptionConfig,
  type TranscriptionConfig,
  type TranscriptionConfigInput,
} from '@/config';
export {
  TranscriberError,
  MediaProbeError,
  SplitError,
  TranscriptionError,
  AllChunksFailedError,
  CleanupWarning,
  JobCancelledError,
  ConfigError,
  PipelineInvariantError,
  initErrorReporting,
  type TranscriberErrorCode,
} from '@/services/utils/errors';
export { Logger, LogLevel, logger, type LogEntry } from '@/services/utils/logger';
export {
  FfmpegToolkit,
  DEFAULT_CHUNK_ENCODING,
  type ChunkEncodingOptions,
} from '@/services/audio/ffmpeg';
export { planChunks, splitMedia, validateChunkCoverage } from '@/services/audio/splitter';
export {
  WhisperTranscriptionService,
  type WhisperServiceConfig,
} from '@/services/transcribe/openai/whisper';
export { mergeChunkOutcomes } from '@/services/transcription/pipeline/merger';
export { JobStateMachine } from '@/services/transcription/pipeline/jobState';
export { changeLanguage } from '@/i18n';
export { transcribeMedia, type TranscriptionDependencies, type TranscriptionJobRequest };

/**
 * Whisper over the OpenAI API plus bundled ffmpeg, configured from the environment
 */
export function createDefaultDependencies(
  config: TranscriptionConfigInput = {}
): TranscriptionDependencies {
  const { model, requestTimeoutSeconds } = resolveTranscriptionConfig(config);
  return {
    service: new WhisperTranscriptionService({
      apiKey: ENV.OPENAI_API_KEY,
      baseUrl: ENV.OPENAI_BASE_URL,
      model,
      timeout: requestTimeoutSeconds * 1000,
    }),
    toolkit: new FfmpegToolkit({
      customFfmpegPath: ENV.FFMPEG_PATH,
      customFfprobePath: ENV.FFPROBE_PATH,
    }),
  };
}

/**
 * Transcribe a file with the default dependencies. Reports unexpected
 * failures to Sentry when `SENTRY_DSN` is set.
 */
export function transcribe(
  filePath: string,
  options: Omit<TranscriptionJobRequest, 'filePath'> = {}
): Promise<TranscriptionResult> {
  initErrorReporting(ENV.SENTRY_DSN);
  return transcribeMedia({ ...options, filePath }, createDefaultDependencies(options.config));
}
