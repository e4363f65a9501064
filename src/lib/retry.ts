// src/lib/retry.ts

import { StorageUnavailableError } from "./errors";

export interface RetryOptions {
  attempts: number; // total tries, first one included
  baseDelayMs: number;
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

// Only StorageUnavailableError is retried; everything else propagates at once.
export async function withStorageRetry<T>(
  task: () => Promise<T>,
  options: RetryOptions,
  onRetry?: (attempt: number, error: StorageUnavailableError) => void,
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await task();
    } catch (error) {
      if (!(error instanceof StorageUnavailableError) || attempt >= attempts) {
        throw error;
      }
      onRetry?.(attempt, error);
      await sleep(options.baseDelayMs * 2 ** (attempt - 1));
    }
  }
}
