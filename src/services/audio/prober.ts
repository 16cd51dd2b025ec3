/**
 * Duration Prober
 *
 * Reads the total duration of a media file. A failure here means the input
 * itself is unusable, so nothing is retried.
 */

import fs from 'fs';
import { type MediaFile, type MediaToolkit } from '@/types/transcription';
import { MediaProbeError, getReadableErrorMessage } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';
import { formatDuration } from '@/services/utils/time';
import { t } from '@/i18n';

/**
 * Stat the file without probing it. Used for the size-based routing decision.
 */
export async function statMediaFile(filePath: string): Promise<MediaFile> {
  try {
    const stats = await fs.promises.stat(filePath);
    if (!stats.isFile()) {
      throw new Error('not a regular file');
    }
    return { path: filePath, byteSize: stats.size };
  } catch (error) {
    throw new MediaProbeError(t('errors.probe.notFound', { path: filePath }), error);
  }
}

export async function probeDuration(
  filePath: string,
  toolkit: MediaToolkit,
  signal?: AbortSignal
): Promise<number> {
  let duration: number;
  try {
    duration = await toolkit.probe(filePath, signal);
  } catch (error) {
    if (signal?.aborted) throw signal.reason;
    throw new MediaProbeError(
      t('errors.probe.failed', { reason: getReadableErrorMessage(error) }),
      error
    );
  }

  if (!Number.isFinite(duration) || duration <= 0) {
    throw new MediaProbeError(t('errors.probe.invalidDuration', { value: String(duration) }));
  }

  logger.info(`Media duration: ${formatDuration(duration)}`, { path: filePath, duration });
  return duration;
}
