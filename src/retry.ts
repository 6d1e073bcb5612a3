/**
 * AWS Retry Runner
 *
 * Throttling-aware retries for the SDK adapters (EC2 and Bedrock runtime).
 * The prompt pipeline itself never retries; only the provider-facing
 * adapters wrap their `send` calls with this runner.
 */

import { formatErrorMessage } from "./errors.js";
import type { AgentLogger } from "./logging/index.js";

export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

export const AWS_RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function resolveRetryConfig(overrides?: RetryConfig): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? AWS_RETRY_DEFAULTS.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? AWS_RETRY_DEFAULTS.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? AWS_RETRY_DEFAULTS.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? AWS_RETRY_DEFAULTS.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

/**
 * Exponential backoff for the given (1-based) attempt, capped and jittered
 */
export function computeBackoffDelay(attempt: number, config: Required<RetryConfig>, retryAfterMs?: number): number {
  const base = retryAfterMs !== undefined
    ? Math.max(retryAfterMs, config.minDelayMs)
    : config.minDelayMs * 2 ** (attempt - 1);
  let delay = Math.min(base, config.maxDelayMs);
  if (config.jitter > 0) {
    const offset = (Math.random() * 2 - 1) * config.jitter;
    delay = Math.max(0, Math.round(delay * (1 + offset)));
  }
  return Math.min(Math.max(delay, config.minDelayMs), config.maxDelayMs);
}

// =============================================================================
// AWS error classification
// =============================================================================

const AWS_RETRY_PATTERN =
  /throttl|rate exceeded|503|504|timeout|ECONNRESET|ETIMEDOUT|TooManyRequestsException|ServiceUnavailable|RequestLimitExceeded|SlowDown/i;

const AWS_RETRYABLE_CODES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "InternalError",
  "InternalServerError",
  "InternalServerException",
  "ModelNotReadyException",
  "EC2ThrottledException",
  "RequestThrottled",
  "RequestTimeout",
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
]);

type AwsLikeError = {
  name?: unknown;
  code?: unknown;
  $metadata?: { httpStatusCode?: number };
  $response?: { headers?: Record<string, string | undefined> };
};

function asAwsLike(err: unknown): AwsLikeError | undefined {
  return typeof err === "object" && err !== null ? err : undefined;
}

export function extractErrorCode(err: unknown): string | undefined {
  const code = asAwsLike(err)?.code;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

/**
 * Retry-After delay from a throttled SDK v3 response, in milliseconds
 */
export function getAWSRetryAfterMs(err: unknown): number | undefined {
  const aws = asAwsLike(err);
  const status = aws?.$metadata?.httpStatusCode;
  if (status !== 429 && status !== 503) return undefined;
  const header = aws?.$response?.headers?.["retry-after"];
  if (typeof header !== "string") return undefined;
  const seconds = Number.parseInt(header, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

export function shouldRetryAWSError(err: unknown): boolean {
  const aws = asAwsLike(err);
  if (!aws) return false;
  // Aborted calls (timeouts, caller cancellation) are final.
  if (aws.name === "AbortError" || aws.name === "OracleTimeoutError") return false;

  const code = extractErrorCode(err);
  if (code && AWS_RETRYABLE_CODES.has(code)) return true;
  if (typeof aws.name === "string" && AWS_RETRYABLE_CODES.has(aws.name)) return true;

  const status = aws.$metadata?.httpStatusCode;
  if (status === 429 || status === 500 || status === 502 || status === 503 || status === 504) {
    return true;
  }

  return AWS_RETRY_PATTERN.test(formatErrorMessage(err));
}

// =============================================================================
// Runner
// =============================================================================

export type AWSRetryOptions = {
  retry?: RetryConfig;
  logger?: AgentLogger;
  onRetry?: (info: RetryInfo) => void;
};

export type RetryRunner = <T>(fn: () => Promise<T>, label?: string) => Promise<T>;

/**
 * Create an AWS retry runner function
 */
export function createAWSRetryRunner(options: AWSRetryOptions = {}): RetryRunner {
  const config = resolveRetryConfig(options.retry);

  return async function awsRetry<T>(fn: () => Promise<T>, label?: string): Promise<T> {
    let lastErr: unknown;

    for (let attempt = 1; attempt <= config.attempts; attempt += 1) {
      try {
        return await fn();
      } catch (err) {
        lastErr = err;
        if (attempt >= config.attempts || !shouldRetryAWSError(err)) break;

        const delayMs = computeBackoffDelay(attempt, config, getAWSRetryAfterMs(err));
        const info: RetryInfo = { attempt, maxAttempts: config.attempts, delayMs, err, label };
        options.logger?.warn(`${label ?? "operation"} throttled, retry ${attempt}/${config.attempts} in ${delayMs}ms`, {
          error: formatErrorMessage(err),
        });
        options.onRetry?.(info);
        await sleep(delayMs);
      }
    }

    throw lastErr ?? new Error("Retry failed");
  };
}
