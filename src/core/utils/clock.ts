/**
 * Time source used by polling and retry loops, injectable so tests can run
 * without real timers
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) =>
    new Promise<void>((resolve) => setTimeout(resolve, Math.max(0, ms))),
};

/**
 * Rejects with the error built by `onTimeout` when `operation` does not settle
 * within `ms`. The timer is always cleared.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return operation;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
