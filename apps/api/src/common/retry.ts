import { Logger } from "@nestjs/common";
import { sleep } from "./sleep";

export interface FixedRetryOptions {
  delayMs: number;
  /** Total attempts before the last error is rethrown. Unbounded when omitted. */
  maxAttempts?: number;
  logger?: Logger;
  label?: string;
  /** Errors for which this returns false are rethrown at once. */
  retryIf?: (error: unknown) => boolean;
}

/**
 * Retry a function with a fixed delay between attempts.
 */
export async function withFixedRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: FixedRetryOptions
): Promise<T> {
  const { delayMs, maxAttempts, logger, label = "operation", retryIf = () => true } = opts;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!retryIf(error) || (maxAttempts !== undefined && attempt >= maxAttempts)) {
        throw error;
      }
      logger?.warn(
        `${label} attempt ${attempt} failed: ${(error as Error).message}. Retrying in ${delayMs}ms.`
      );
      await sleep(delayMs);
    }
  }
}
