import fs from 'fs';
import OpenAI from 'openai';
import { z } from 'zod';
import {
  type RawTranscription,
  type TranscriptionErrorKind,
  type TranscriptionService,
} from '@/types/transcription';
import { TranscriptionError, getReadableErrorMessage } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';
import { t } from '@/i18n';

export interface WhisperServiceConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
}

const WhisperSegmentSchema = z.object({
  id: z.number().optional(),
  start: z.number(),
  end: z.number(),
  text: z.string(),
});

const WhisperVerboseResponseSchema = z.object({
  text: z.string(),
  duration: z.number().optional(),
  segments: z.array(WhisperSegmentSchema).optional(),
});

/**
 * Validate a `verbose_json` response and keep only what the pipeline needs.
 */
export function parseVerboseTranscription(response: unknown): RawTranscription {
  const parsed = WhisperVerboseResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new TranscriptionError(
      t('errors.whisper.unexpectedResponse', { reason: parsed.error.issues[0]?.message }),
      'invalid_input'
    );
  }

  const { text, duration, segments = [] } = parsed.data;
  return {
    text,
    durationSeconds: duration,
    segments: segments.map((seg) => ({
      id: seg.id,
      start: seg.start,
      end: seg.end,
      text: seg.text.trim(),
    })),
  };
}

/**
 * Maps an OpenAI SDK error onto the pipeline's failure kinds.
 *
 * Error structure (from official SDK):
 * - status: HTTP status (400, 401, 403, 404, 408, 413, 429, 5xx)
 * - code: string like "invalid_api_key", "insufficient_quota"
 * - type: string like "invalid_request_error"
 */
export function classifyWhisperError(error: unknown): TranscriptionError {
  if (error instanceof TranscriptionError) return error;

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new TranscriptionError(t('errors.whisper.timeout'), 'timeout', { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new TranscriptionError(t('errors.whisper.connectionFailed'), 'server_error', {
      cause: error,
    });
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const code = typeof error.code === 'string' ? error.code : '';
    const kind = kindForStatus(status, code);
    return new TranscriptionError(messageForKind(kind, status, error), kind, {
      status,
      cause: error,
    });
  }

  return new TranscriptionError(getReadableErrorMessage(error), 'unknown', { cause: error });
}

function kindForStatus(status: number | undefined, code: string): TranscriptionErrorKind {
  if (status === 401 || status === 403) return 'auth_error';
  // Exhausted quota will not recover by waiting
  if (status === 429) {
    return code === 'insufficient_quota' || code === 'billing_hard_limit_reached'
      ? 'auth_error'
      : 'rate_limited';
  }
  if (status === 408) return 'timeout';
  if (status !== undefined && status >= 500) return 'server_error';
  if (status !== undefined && status >= 400) return 'invalid_input';
  return 'unknown';
}

function messageForKind(
  kind: TranscriptionErrorKind,
  status: number | undefined,
  error: Error
): string {
  switch (kind) {
    case 'auth_error':
      if (status === 401) return t('errors.whisper.invalidKey');
      if (status === 403) return t('errors.whisper.permissionDenied');
      return t('errors.whisper.billing');
    case 'rate_limited':
      return t('errors.whisper.rateLimited');
    case 'timeout':
      return t('errors.whisper.timeout');
    case 'server_error':
      return t('errors.whisper.serverError', { status: status ?? 'unknown' });
    case 'invalid_input':
      return t('errors.whisper.invalidInput', { reason: getReadableErrorMessage(error) });
    default:
      return getReadableErrorMessage(error);
  }
}

/**
 * TranscriptionService backed by the OpenAI audio transcription endpoint.
 * SDK retries are disabled; the dispatcher owns retry and backoff.
 */
export class WhisperTranscriptionService implements TranscriptionService {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: WhisperServiceConfig) {
    if (!config.apiKey) {
      throw new Error(t('errors.whisper.missingKey'));
    }
    this.model = config.model || 'whisper-1';
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl || 'https://api.openai.com/v1',
      timeout: config.timeout ?? 600000, // Default 10 minutes
      maxRetries: 0,
    });
  }

  async transcribe(filePath: string, signal?: AbortSignal): Promise<RawTranscription> {
    logger.debug(`Calling Whisper API (${this.model}) for ${filePath}`);

    let response: unknown;
    try {
      response = await this.client.audio.transcriptions.create(
        {
          file: fs.createReadStream(filePath),
          model: this.model,
          response_format: 'verbose_json',
          timestamp_granularities: ['segment'],
        },
        { signal }
      );
    } catch (error) {
      // Cancellation propagates unclassified
      if (signal?.aborted || error instanceof OpenAI.APIUserAbortError) throw error;
      throw classifyWhisperError(error);
    }

    return parseVerboseTranscription(response);
  }
}
