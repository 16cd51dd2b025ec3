/**
 * Resource Cleaner
 *
 * Chunk files are owned by the job that created them and are released on
 * every exit path. Deletion is best-effort: failures are logged, never thrown.
 */

import fs from 'fs';
import { type ChunkSpec } from '@/types/transcription';
import { CleanupWarning } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';

export async function removeFileQuietly(filePath: string): Promise<boolean> {
  try {
    await fs.promises.unlink(filePath);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) return true;
    const warning = new CleanupWarning(filePath, error);
    logger.warn(warning.message, { path: filePath });
    return false;
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}

/**
 * Delete every chunk file. Returns the number of files that could not be removed.
 */
export async function cleanupChunks(
  chunks: readonly Pick<ChunkSpec, 'filePath'>[]
): Promise<number> {
  let failed = 0;
  for (const chunk of chunks) {
    const removed = await removeFileQuietly(chunk.filePath);
    if (!removed) failed++;
  }
  if (chunks.length > 0) {
    logger.debug(`Cleaned up ${chunks.length - failed}/${chunks.length} chunk files`);
  }
  return failed;
}

/**
 * Set of chunk files created inside one `withChunkFiles` scope
 */
export class ChunkFileRegistry {
  private readonly files = new Map<string, Pick<ChunkSpec, 'filePath'>>();

  constructor(readonly directory: string) {}

  register(chunk: Pick<ChunkSpec, 'filePath'>): void {
    this.files.set(chunk.filePath, chunk);
  }

  get size(): number {
    return this.files.size;
  }

  list(): Pick<ChunkSpec, 'filePath'>[] {
    return [...this.files.values()];
  }
}

/**
 * Scoped acquisition of a chunk directory: creates it, runs `fn`, then deletes
 * every registered chunk file and the directory whatever `fn` did.
 */
export async function withChunkFiles<T>(
  directory: string,
  fn: (registry: ChunkFileRegistry) => Promise<T>,
  onCleanup?: () => void
): Promise<T> {
  await fs.promises.mkdir(directory, { recursive: true });
  const registry = new ChunkFileRegistry(directory);

  try {
    return await fn(registry);
  } finally {
    try {
      onCleanup?.();
    } finally {
      await releaseChunkDirectory(registry);
    }
  }
}

async function releaseChunkDirectory(registry: ChunkFileRegistry): Promise<void> {
  await cleanupChunks(registry.list());
  try {
    await fs.promises.rmdir(registry.directory);
  } catch (error) {
    logger.warn(`Failed to remove chunk directory ${registry.directory}`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
