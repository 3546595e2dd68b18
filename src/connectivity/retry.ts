import type { Logger } from "../config/logger";

export type RetryOptions = {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
};

export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

// Backends (postgres, redis, minio) get a few slow attempts at startup.
export function normalizeRetryOptions(input: RetryOptions | undefined): RetryPolicy {
  return {
    attempts: Math.max(1, Math.min(input?.attempts ?? 3, 10)),
    baseDelayMs: Math.max(20, input?.baseDelayMs ?? 250),
    maxDelayMs: Math.max(100, input?.maxDelayMs ?? 5_000),
    jitterMs: Math.max(0, input?.jitterMs ?? 100),
  };
}

export function retryDelayMs(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  return exponential + Math.floor(random() * (policy.jitterMs + 1));
}

export const PLUGIN_RESTART_BACKOFF = normalizeRetryOptions({ baseDelayMs: 100, maxDelayMs: 5_000, jitterMs: 50 });

/**
 * Delay before spawning a replacement plugin process, given the deaths
 * counted in the current restart window. The first death is replaced at once.
 */
export function restartDelayMs(
  recentDeaths: number,
  policy: RetryPolicy = PLUGIN_RESTART_BACKOFF,
  random: () => number = Math.random
): number {
  return recentDeaths <= 1 ? 0 : retryDelayMs(policy, recentDeaths - 1, random);
}

/** Runs a backing-service operation (connect, ping, bucket check) with exponential backoff. */
export async function withRetry<T>(
  operationName: string,
  operation: () => Promise<T>,
  logger: Logger,
  options: RetryOptions = {}
): Promise<T> {
  const policy = normalizeRetryOptions(options);
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.attempts; attempt += 1) {
    try {
      if (attempt > 1) {
        logger.debug("backend_retry_attempt", { operation: operationName, attempt });
      }
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt >= policy.attempts) break;
      const delayMs = retryDelayMs(policy, attempt);
      logger.warn("backend_retry_delay", {
        operation: operationName,
        attempt,
        delayMs,
        message: error instanceof Error ? error.message : String(error),
      });
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError instanceof Error ? lastError : new Error(`operation ${operationName} failed`);
}

export function withDeadline<T>(label: string, timeoutMs: number, task: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | null = null;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([task(), deadline]).finally(() => {
    if (timer) {
      clearTimeout(timer);
    }
  });
}
