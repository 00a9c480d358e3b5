/**
 * Resolves with `fallback` when `promise` has not settled within `timeoutMs`.
 * A rejection of `promise` before the deadline still rejects.
 */
export const withTimeout = async <T>(
  promise: Promise<T>,
  timeoutMs: number,
  fallback: T,
): Promise<T> => {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;

  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((resolve) => {
        timer = setTimeout(() => resolve(fallback), timeoutMs);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
