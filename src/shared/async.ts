/**
 * Async utilities for timeout and sleep operations
 */

export const sleep = (ms: number): Promise<void> => new Promise<void>((r) => setTimeout(r, ms));

export class TimeoutExceededError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = 'TimeoutExceededError';
  }
}

/**
 * Race `fn` against a wall-clock bound. The underlying work is not
 * cancelled; the timer is always cleared once either side settles.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  message = 'Operation timed out',
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutExceededError(message, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
