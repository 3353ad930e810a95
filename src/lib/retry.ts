export interface RetryOptions {
  maxRetries: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export interface RetryDecision {
  shouldRetry: boolean;
  delayMs: number;
}

// Transient lock contention from SQLite and the filesystem.
const RETRYABLE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'EBUSY', 'EMFILE']);

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

export function defaultRetryDecision(
  error: unknown,
  attempt: number,
  options: RetryOptions
): RetryDecision {
  const baseDelayMs = options.baseDelayMs ?? 500;
  const maxDelayMs = options.maxDelayMs ?? 10_000;
  const code = errorCode(error);

  if (code !== undefined && RETRYABLE_CODES.has(code)) {
    const expBackoff = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
    const jitter = Math.round(Math.random() * 200);
    return { shouldRetry: true, delayMs: expBackoff + jitter };
  }

  return { shouldRetry: false, delayMs: 0 };
}

export async function retryAsync<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  decideRetry: (error: unknown, attempt: number, options: RetryOptions) => RetryDecision =
    defaultRetryDecision,
  sleep: (ms: number) => Promise<void> = (ms) => new Promise((resolve) => setTimeout(resolve, ms))
): Promise<T> {
  let attempt = 0;

  while (true) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= options.maxRetries) {
        throw error;
      }
      const decision = decideRetry(error, attempt, options);
      if (!decision.shouldRetry) {
        throw error;
      }
      await sleep(decision.delayMs);
      attempt += 1;
    }
  }
}
