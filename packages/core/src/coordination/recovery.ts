/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Race `promise` against a timer. The timer is always cleared so a settled
 * step never keeps the event loop alive.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number = 60_000): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Operation timeout after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Run `fn` up to `max + 1` times, waiting `delayMs` between attempts.
 * Non-Error rejections are converted so callers always see an Error.
 */
export async function withRetries<T>(
  fn: () => Promise<T>,
  max: number,
  delayMs: number = 0,
): Promise<T> {
  let lastError: Error = new Error('withRetries: no attempt made');
  for (let attempt = 0; attempt <= max; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt < max && delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
    }
  }
  throw lastError;
}
