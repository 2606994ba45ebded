import { APIConnectionError } from "openai";

export type ReviewRetryReason =
  | "initial"
  | "json_parse"
  | "rate_limit"
  | "connection";

export interface ReviewRetryAttemptContext {
  attemptIndex: number;
  reason: ReviewRetryReason;
  delayMs: number;
}

export type ReviewRetryConfig<TResult> = {
  run: (context: ReviewRetryAttemptContext) => Promise<TResult>;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

export type ReviewRetryResult<TResult> = {
  result: TResult;
  attempts: number;
  attemptHistory: ReviewRetryAttemptContext[];
};

const DEFAULT_ATTEMPTS = 2;
const DEFAULT_BASE_DELAY_MS = 1_000;
const DEFAULT_MAX_DELAY_MS = 6_000;

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object";

export const isRateLimitError = (error: unknown): boolean => {
  if (!isRecord(error)) return false;
  if (error.code === 429 || error.status === 429) return true;
  const inner = error.error;
  if (isRecord(inner)) {
    if (inner.type === "rate_limit_error") return true;
    const message = inner.message;
    if (typeof message === "string" && message.toLowerCase().includes("rate limit")) {
      return true;
    }
  }
  return false;
};

const classify = (error: unknown): ReviewRetryReason | null => {
  if (error instanceof SyntaxError) return "json_parse";
  if (isRateLimitError(error)) return "rate_limit";
  if (error instanceof APIConnectionError) return "connection";
  return null;
};

/**
 * Runs one review request with exponential backoff on rate limits, dropped
 * connections and unparseable model output. Any other error is thrown on
 * the first attempt.
 */
export async function runReviewWithRetry<TResult>(
  config: ReviewRetryConfig<TResult>,
): Promise<ReviewRetryResult<TResult>> {
  const {
    run,
    maxAttempts = DEFAULT_ATTEMPTS,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    maxDelayMs = DEFAULT_MAX_DELAY_MS,
    sleep = defaultSleep,
  } = config;

  const attemptHistory: ReviewRetryAttemptContext[] = [];
  let reason: ReviewRetryReason = "initial";
  let lastError: unknown = null;

  for (let attemptIndex = 0; attemptIndex < Math.max(1, maxAttempts); attemptIndex += 1) {
    const delayMs =
      attemptIndex === 0
        ? 0
        : Math.min(maxDelayMs, baseDelayMs * 2 ** (attemptIndex - 1));
    const context: ReviewRetryAttemptContext = { attemptIndex, reason, delayMs };
    attemptHistory.push(context);

    if (delayMs > 0) {
      await sleep(delayMs);
    }

    try {
      const result = await run(context);
      return {
        result,
        attempts: attemptIndex + 1,
        attemptHistory,
      } satisfies ReviewRetryResult<TResult>;
    } catch (error) {
      const retryReason = classify(error);
      if (!retryReason) {
        throw error;
      }
      reason = retryReason;
      lastError = error;
    }
  }

  throw lastError ?? new Error("Review request failed after retries");
}
