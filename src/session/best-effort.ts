import type { SessionLogger } from '../logging/index.js';

/**
 * Runs an operation whose failure must not affect the session. The error is
 * logged at debug level and dropped.
 */
export async function bestEffort(
  operation: string,
  logger: SessionLogger,
  action: () => unknown,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    logger.logSuppressed(operation, error instanceof Error ? error : new Error(String(error)));
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
