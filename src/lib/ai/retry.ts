import { PermanentProviderError, TransientProviderError, errorMessage } from "@/lib/errors";

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  label: string;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `operation`, retrying only on `TransientProviderError` with exponential
 * backoff (base, 2x base, 4x base...). Exhausting the attempts escalates to a
 * `PermanentProviderError`. Anything else that is not a permanent provider
 * error is wrapped as one.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof PermanentProviderError) {
        throw error;
      }
      if (!(error instanceof TransientProviderError)) {
        throw new PermanentProviderError("request_failed", `${options.label}: ${errorMessage(error)}`, { cause: error });
      }
      if (attempt >= maxAttempts) {
        throw new PermanentProviderError(
          "retries_exhausted",
          `${options.label} failed after ${attempt} attempts: ${error.message}`,
          { cause: error },
        );
      }

      const delayMs = options.baseDelayMs * 2 ** (attempt - 1);
      console.warn(`[${options.label}] transient failure, retrying`, {
        attempt,
        delayMs,
        code: error.code,
      });
      await sleep(delayMs);
    }
  }
}

/**
 * Races `run` against a timer. The signal handed to `run` is aborted when the
 * timer fires so an in-flight fetch is released. A timeout is permanent.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  timeoutMessage: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // settle first: an abort listener may reject `run` synchronously
      reject(new PermanentProviderError("timeout", timeoutMessage));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeoutPromise]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

/** Wraps a thrown fetch failure (DNS, reset, abort) as a transient provider error. */
export async function fetchProvider(url: string, init: RequestInit, label: string): Promise<Response> {
  try {
    return await fetch(url, init);
  } catch (error) {
    if (init.signal?.aborted) {
      throw new PermanentProviderError("timeout", `${label} request aborted`, { cause: error });
    }
    throw new TransientProviderError("network", `${label} network error: ${errorMessage(error)}`);
  }
}
