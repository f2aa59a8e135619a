import { HttpStatusError } from "./errors.js";

export const DEFAULT_BACKOFF_MS = [250, 750, 1500] as const;

export type RetryOptions = {
  /** Total attempts, default backoff length + 1 */
  attempts?: number | undefined;
  backoffMs?: readonly number[] | undefined;
  isRetryable?: ((error: unknown) => boolean) | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  onRetry?: ((error: unknown, attempt: number, delayMs: number) => void) | undefined;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Timeouts, dropped connections, rate limiting and 5xx responses are worth
 * another attempt; other HTTP statuses are permanent.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  if (!(error instanceof Error)) return false;
  if (error.name === "TimeoutError" || error.name === "AbortError") return true;

  // undici wraps socket failures as TypeError("fetch failed") with a cause
  const text = `${error.message} ${error.cause instanceof Error ? error.cause.message : ""}`.toLowerCase();
  return (
    text.includes("fetch failed") ||
    text.includes("timeout") ||
    text.includes("timed out") ||
    text.includes("econnreset") ||
    text.includes("econnrefused") ||
    text.includes("enotfound") ||
    text.includes("socket hang up")
  );
}

export class RetriesExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`gave up after ${attempts} attempts: ${reason}`, { cause: lastError });
    this.name = "RetriesExhaustedError";
    this.attempts = attempts;
  }
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const backoff =
    options.backoffMs && options.backoffMs.length > 0
      ? options.backoffMs
      : DEFAULT_BACKOFF_MS;
  const attempts = Math.max(1, Math.trunc(options.attempts ?? backoff.length + 1));
  const isRetryable = options.isRetryable ?? isTransientError;
  const wait = options.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt === attempts) break;

      const delay = backoff[Math.min(attempt - 1, backoff.length - 1)] ?? 0;
      options.onRetry?.(error, attempt, delay);
      if (delay > 0) {
        await wait(delay);
      }
    }
  }

  throw new RetriesExhaustedError(attempts, lastError);
}
