/**
 * Concurrency Utilities
 * Uses p-map for parallel mapping
 */
import pMap from 'p-map';

/**
 * Map over items with limited concurrency.
 * Results keep the input order regardless of completion order.
 */
export async function mapInParallel<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  return pMap(items, fn, { concurrency });
}

/**
 * Resolve after `ms` milliseconds, or reject with the signal's reason once it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
