import { z } from 'zod';
import { getEnvVariable } from '@/services/utils/env';
import { ConfigError } from '@/services/utils/errors';

// Centralized environment variable access
export const ENV = {
  OPENAI_API_KEY: getEnvVariable('OPENAI_API_KEY') || '',
  OPENAI_BASE_URL: getEnvVariable('OPENAI_BASE_URL'),
  LOG_LEVEL: getEnvVariable('LOG_LEVEL'),
  SENTRY_DSN: getEnvVariable('SENTRY_DSN'),
  FFMPEG_PATH: getEnvVariable('FFMPEG_PATH'),
  FFPROBE_PATH: getEnvVariable('FFPROBE_PATH'),
} as const;

/** Whisper API rejects uploads over 25 MB; keep a safety margin */
export const DEFAULT_SIZE_THRESHOLD_BYTES = 24 * 1024 * 1024;

export const TranscriptionConfigSchema = z.object({
  /** Files at or below this size go to the service in one request */
  sizeThresholdBytes: z.number().int().positive().default(DEFAULT_SIZE_THRESHOLD_BYTES),
  chunkDurationSeconds: z.number().positive().default(600),
  maxConcurrency: z.number().int().min(1).default(8),
  /** Total attempts per chunk, first one included */
  maxRetries: z.number().int().min(1).default(3),
  backoffBaseSeconds: z.number().min(0).default(2),
  model: z.string().min(1).default('whisper-1'),
  requestTimeoutSeconds: z.number().positive().default(600),
  /** Parent directory for per-job chunk directories (OS temp dir when unset) */
  workDir: z.string().min(1).optional(),
});

export type TranscriptionConfig = z.infer<typeof TranscriptionConfigSchema>;
export type TranscriptionConfigInput = z.input<typeof TranscriptionConfigSchema>;

export function resolveTranscriptionConfig(
  input: TranscriptionConfigInput = {}
): TranscriptionConfig {
  const parsed = TranscriptionConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(issues);
  }
  return parsed.data;
}
