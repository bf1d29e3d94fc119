import type { Logger } from "../config/logger";

export type RetryOptions = {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
  /** Return false to give up immediately on errors that will not heal. */
  retryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

export function normalizeRetryOptions(input: RetryOptions | undefined): RetryPolicy {
  return {
    attempts: Math.max(1, Math.min(input?.attempts ?? 3, 10)),
    baseDelayMs: Math.max(0, input?.baseDelayMs ?? 100),
    maxDelayMs: Math.max(0, input?.maxDelayMs ?? 1_500),
    jitterMs: Math.max(0, input?.jitterMs ?? 50),
  };
}

export function retryDelayMs(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  return exponential + Math.floor(random() * (policy.jitterMs + 1));
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(
  operationName: string,
  operation: () => Promise<T>,
  logger: Logger,
  options: RetryOptions = {}
): Promise<T> {
  const policy = normalizeRetryOptions(options);
  const sleep = options.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.attempts; attempt += 1) {
    try {
      if (attempt > 1) {
        logger.debug("dependency_retry_attempt", { operation: operationName, attempt });
      }
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt >= policy.attempts) break;
      if (options.retryable && !options.retryable(error)) break;
      const delayMs = retryDelayMs(policy, attempt);
      logger.warn("dependency_retry_delay", {
        operation: operationName,
        attempt,
        delayMs,
        message: error instanceof Error ? error.message : String(error),
      });
      await sleep(delayMs);
    }
  }

  throw lastError instanceof Error ? lastError : new Error(`operation ${operationName} failed`);
}
