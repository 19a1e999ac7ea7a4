const BACKOFF_MS = [500, 1000, 2000, 4000];

export interface RetryOptions {
  maxRetries?: number;
  backoffMs?: readonly number[];
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void;
}

export function isRateLimit(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'status' in err && err.status === 429;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  { maxRetries = 3, backoffMs = BACKOFF_MS, onRetry }: RetryOptions = {},
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;
      if (attempt < maxRetries) {
        const delay = backoffMs[attempt] ?? backoffMs[backoffMs.length - 1] ?? 4000;
        onRetry?.(attempt + 1, delay, err);
        await new Promise((r) => setTimeout(r, delay));
      }
    }
  }
  throw lastError;
}
