import {
  APIConnectionError,
  AuthenticationError,
  BadRequestError,
  RateLimitError,
  type OpenAI,
} from "openai";
import { z } from "zod";

import type { CheckLogger, Issue, SegmentPair } from "../checks/types";
import { truncateSnippet } from "../../utils/textNormalize";
import {
  REVIEW_ISSUE_TYPES,
  REVIEW_SYSTEM_PROMPT,
  buildReviewPrompt,
  reviewFindingsSchema,
} from "./prompts";
import { collectOutputText, parseJsonObjectLoose } from "./responseParsing";
import { runReviewWithRetry } from "./reviewRetry";

export interface ReviewRequest {
  model: string;
  system: string;
  prompt: string;
}

/** Sends one batch to the model and returns its raw text answer. */
export interface ReviewTransport {
  requestFindings(request: ReviewRequest): Promise<string>;
}

export class ReviewRequestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReviewRequestError";
  }
}

const ReviewFindingSchema = z.object({
  segment: z.coerce.number().int(),
  type: z.string().default("other"),
  severity: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(["high", "medium", "low"]))
    .catch("low"),
  evidence: z.string().default(""),
  suggestion: z.string().nullable().optional(),
});

const ReviewEnvelopeSchema = z.object({
  issues: z.array(z.unknown()).default([]),
});

export type ReviewFinding = z.infer<typeof ReviewFindingSchema>;

export function createOpenAIReviewTransport(client: OpenAI): ReviewTransport {
  return {
    async requestFindings({ model, system, prompt }) {
      const response = await client.responses.create({
        model,
        input: [
          {
            role: "system",
            content: [{ type: "input_text", text: system }],
          },
          {
            role: "user",
            content: [{ type: "input_text", text: prompt }],
          },
        ],
        text: {
          format: {
            type: "json_schema",
            name: reviewFindingsSchema.name,
            schema: reviewFindingsSchema.schema,
            strict: true,
          },
        },
      });
      return collectOutputText(response) ?? "";
    },
  };
}

/**
 * Validates the model's answer item by item. Items that do not fit the
 * finding shape are dropped; text that is not JSON throws SyntaxError.
 */
export function parseReviewFindings(text: string): ReviewFinding[] {
  const parsed = parseJsonObjectLoose(text);
  if (parsed === null) return [];
  const envelope = ReviewEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) return [];

  const findings: ReviewFinding[] = [];
  for (const item of envelope.data.issues) {
    const result = ReviewFindingSchema.safeParse(item);
    if (result.success) findings.push(result.data);
  }
  return findings;
}

const normalizeKind = (value: string): string => {
  const kind = value.trim().toLowerCase().replace(/[\s-]+/g, "_");
  return REVIEW_ISSUE_TYPES.some((allowed) => allowed === kind) ? kind : "other";
};

export function findingsToIssues(
  findings: ReviewFinding[],
  pairs: SegmentPair[],
  snippetLength: number,
): Issue[] {
  const byIndex = new Map(pairs.map((pair) => [pair.index, pair]));
  return findings.map((finding) => {
    const pair = byIndex.get(finding.segment);
    const suggestion = finding.suggestion?.trim();
    return {
      type: `llm_${normalizeKind(finding.type)}`,
      severity: finding.severity,
      segment: finding.segment,
      src: pair ? truncateSnippet(pair.source, snippetLength) : "",
      tgt: pair ? truncateSnippet(pair.target, snippetLength) : "",
      detail: {
        evidence: finding.evidence,
        ...(suggestion ? { suggestion } : {}),
      },
    };
  });
}

export function toReviewRequestError(error: unknown): ReviewRequestError {
  if (error instanceof ReviewRequestError) return error;
  if (error instanceof AuthenticationError) {
    return new ReviewRequestError(
      "Review mode: Authentication failed. Check your API key.",
      { cause: error },
    );
  }
  if (error instanceof RateLimitError) {
    return new ReviewRequestError(
      "Review mode: Rate limit reached. Try again later.",
      { cause: error },
    );
  }
  if (error instanceof APIConnectionError) {
    return new ReviewRequestError(
      "Review mode: Network connection error. Check internet/firewall.",
      { cause: error },
    );
  }
  if (error instanceof BadRequestError) {
    return new ReviewRequestError(
      `Review mode: Bad request to API (possibly model not enabled). ${error.message}`,
      { cause: error },
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ReviewRequestError(`Review mode: Unexpected error: ${message}`, {
    cause: error,
  });
}

export interface ReviewOptions {
  transport: ReviewTransport;
  model: string;
  batchSize: number;
  logger: CheckLogger;
  snippetLength: number;
  context?: string | null;
  maxAttempts?: number;
  retryDelayMs?: number;
  onBatchReviewed?: (reviewed: number, total: number) => void;
}

export async function runReview(
  pairs: SegmentPair[],
  options: ReviewOptions,
): Promise<Issue[]> {
  const { transport, model, logger } = options;
  const batchSize = Math.max(1, options.batchSize);
  const batches: SegmentPair[][] = [];
  for (let start = 0; start < pairs.length; start += batchSize) {
    batches.push(pairs.slice(start, start + batchSize));
  }

  const findings: ReviewFinding[] = [];
  for (const [position, batch] of batches.entries()) {
    const prompt = buildReviewPrompt(batch, options.context);
    try {
      const { result, attempts } = await runReviewWithRetry({
        maxAttempts: options.maxAttempts,
        baseDelayMs: options.retryDelayMs,
        run: async () =>
          parseReviewFindings(
            await transport.requestFindings({
              model,
              system: REVIEW_SYSTEM_PROMPT,
              prompt,
            }),
          ),
      });
      if (attempts > 1) {
        logger.info(
          { batch: position + 1, attempts },
          "[review] batch succeeded after retry",
        );
      }
      findings.push(...result);
    } catch (error) {
      if (error instanceof SyntaxError) {
        logger.warn(
          { err: error, batch: position + 1 },
          "[review] model output was not valid JSON; batch skipped",
        );
      } else {
        throw toReviewRequestError(error);
      }
    }
    options.onBatchReviewed?.(position + 1, batches.length);
  }

  return findingsToIssues(findings, pairs, options.snippetLength);
}
