/**
 * Custom error classes for the transcription pipeline
 */
import * as Sentry from '@sentry/node';
import { type TranscriptionErrorKind } from '@/types/transcription';
import { t } from '@/i18n';

export type TranscriberErrorCode =
  | 'MEDIA_PROBE_FAILED'
  | 'SPLIT_FAILED'
  | 'TRANSCRIPTION_FAILED'
  | 'ALL_CHUNKS_FAILED'
  | 'CLEANUP_FAILED'
  | 'JOB_CANCELLED'
  | 'INVALID_CONFIG'
  | 'ILLEGAL_STATE';

/**
 * Base class for every error the pipeline raises on purpose.
 *
 * `isExpected` marks errors caused by the input, the caller or an external
 * service rather than by a bug; those are never reported to Sentry.
 */
export class TranscriberError extends Error {
  readonly code: TranscriberErrorCode;
  readonly isExpected: boolean;

  constructor(
    message: string,
    code: TranscriberErrorCode,
    options: { cause?: unknown; isExpected?: boolean } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TranscriberError';
    this.code = code;
    this.isExpected = options.isExpected ?? true;
  }
}

/** The input cannot be inspected. Fatal, never retried. */
export class MediaProbeError extends TranscriberError {
  constructor(message: string, cause?: unknown) {
    super(message, 'MEDIA_PROBE_FAILED', { cause });
    this.name = 'MediaProbeError';
  }
}

/** No chunk survived splitting, or the chunk timeline is malformed. */
export class SplitError extends TranscriberError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SPLIT_FAILED', { cause });
    this.name = 'SplitError';
  }
}

const RETRYABLE_KINDS: ReadonlySet<TranscriptionErrorKind> = new Set([
  'rate_limited',
  'timeout',
  'server_error',
]);

export const isRetryableKind = (kind: TranscriptionErrorKind): boolean =>
  RETRYABLE_KINDS.has(kind);

/** Failure of a single transcription request. Scoped to one chunk. */
export class TranscriptionError extends TranscriberError {
  readonly kind: TranscriptionErrorKind;
  readonly status?: number;

  constructor(
    message: string,
    kind: TranscriptionErrorKind,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, 'TRANSCRIPTION_FAILED', { cause: options.cause });
    this.name = 'TranscriptionError';
    this.kind = kind;
    this.status = options.status;
  }

  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }
}

export class AllChunksFailedError extends TranscriberError {
  readonly totalChunks: number;

  constructor(totalChunks: number) {
    super(t('errors.dispatch.allFailed', { total: totalChunks }), 'ALL_CHUNKS_FAILED');
    this.name = 'AllChunksFailedError';
    this.totalChunks = totalChunks;
  }
}

/** Non-fatal: only ever logged */
export class CleanupWarning extends TranscriberError {
  readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    super(
      t('errors.cleanup.failed', { path: filePath, reason: getReadableErrorMessage(cause) }),
      'CLEANUP_FAILED',
      { cause }
    );
    this.name = 'CleanupWarning';
    this.filePath = filePath;
  }
}

export class JobCancelledError extends TranscriberError {
  constructor(cause?: unknown) {
    super(t('errors.cancelled'), 'JOB_CANCELLED', { cause });
    this.name = 'JobCancelledError';
  }
}

export class ConfigError extends TranscriberError {
  constructor(issues: string) {
    super(t('errors.config.invalid', { issues }), 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

/** Thrown for programming errors inside the pipeline; reported to Sentry */
export class PipelineInvariantError extends TranscriberError {
  constructor(message: string) {
    super(message, 'ILLEGAL_STATE', { isExpected: false });
    this.name = 'PipelineInvariantError';
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Detects aborts coming from an AbortSignal, the OpenAI SDK or our own cancellation.
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof JobCancelledError) return true;
  if (!isRecord(error)) return false;
  const name = typeof error.name === 'string' ? error.name : '';
  return name === 'AbortError' || name === 'APIUserAbortError';
}

/**
 * Detects transient network and server errors worth retrying.
 * Covers: socket failures, timeouts, server errors (500/502/503/504) and
 * HTML error pages from API proxies.
 */
export function isTransientError(error: unknown): boolean {
  if (!isRecord(error)) return false;

  const errorCode = typeof error.code === 'string' ? error.code.toUpperCase() : '';
  if (
    errorCode === 'ECONNRESET' ||
    errorCode === 'ETIMEDOUT' ||
    errorCode === 'ENOTFOUND' ||
    errorCode === 'ECONNREFUSED' ||
    errorCode === 'EPIPE'
  )
    return true;

  const msg = (typeof error.message === 'string' ? error.message : '').toLowerCase();
  if (
    msg.includes('network error') ||
    msg.includes('socket hang up') ||
    msg.includes('fetch failed') ||
    msg.includes('internal server error') ||
    msg.includes('service unavailable') ||
    msg.includes('bad gateway') ||
    msg.includes('gateway timeout')
  )
    return true;

  // HTML error page instead of JSON (API proxy/CDN errors)
  if (msg.includes('<!doctype') || msg.includes('<html')) return true;

  return false;
}

/**
 * Extracts a human-readable error message from any error object.
 * Handles API errors whose message embeds raw JSON like:
 *   {"error":{"code":503,"message":"...human text...","status":"UNAVAILABLE"}}
 */
export function getReadableErrorMessage(error: unknown): string {
  if (typeof error === 'string') return error;
  if (!isRecord(error)) return String(error);
  const raw = typeof error.message === 'string' ? error.message : '';
  const match = raw.match(/\{.*\}/s);
  if (match) {
    try {
      const parsed: unknown = JSON.parse(match[0]);
      if (isRecord(parsed) && isRecord(parsed.error) && typeof parsed.error.message === 'string') {
        return parsed.error.message;
      }
    } catch {
      // not JSON, use raw
    }
  }
  return raw;
}

/**
 * Report an error to Sentry unless it is expected.
 * A no-op when Sentry was never initialised.
 */
export function reportUnexpectedError(error: unknown, extra: Record<string, unknown> = {}): void {
  if (error instanceof TranscriberError && error.isExpected) return;
  if (isAbortError(error)) return;

  Sentry.captureException(error, {
    level: 'error',
    tags: { source: 'transcription_pipeline' },
    extra,
  });
}

/**
 * Enable Sentry reporting. Without a DSN, reporting stays disabled.
 */
let reportingEnabled = false;

export function initErrorReporting(dsn: string | undefined): boolean {
  if (reportingEnabled) return true;
  if (!dsn) return false;
  reportingEnabled = true;
  Sentry.init({
    dsn,
    initialScope: { tags: { source: 'chunked-media-transcriber' } },
  });
  return true;
}
