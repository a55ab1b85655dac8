import type { ReconnectConfig } from '@uas-bridge/domain';

/**
 * Exponential backoff with "equal jitter": the delay for attempt n is drawn
 * from [ceiling / 2, ceiling), where ceiling = min(max, initial * 2^(n-1)).
 */
export function backoffDelay(
  attempt: number,
  config: ReconnectConfig,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, attempt - 1);
  const ceiling = Math.min(config.maxDelayMs, config.initialDelayMs * 2 ** exponent);
  const half = ceiling / 2;
  return Math.round(half + random() * half);
}

/**
 * Resolves `true` after `ms`, or `false` as soon as `signal` aborts.
 * Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
