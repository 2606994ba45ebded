import { describe, test } from "node:test";
import assert from "node:assert/strict";

import { APIConnectionError } from "openai";

import type { CheckLogger, SegmentPair } from "../../checks/types";
import { ReviewConfigurationError, resolveReviewApiKey } from "../openaiClient";
import { REVIEW_SYSTEM_PROMPT } from "../prompts";
import {
  ReviewRequestError,
  findingsToIssues,
  parseReviewFindings,
  runReview,
  toReviewRequestError,
  type ReviewRequest,
  type ReviewTransport,
} from "../reviewAgent";
import { runReviewWithRetry } from "../reviewRetry";

const recordingLogger = () => {
  const warnings: unknown[][] = [];
  const logger: CheckLogger = {
    info: () => undefined,
    warn: (...args: unknown[]) => {
      warnings.push(args);
    },
    error: () => undefined,
  };
  return { logger, warnings };
};

const scriptedTransport = (answers: Array<string | Error>) => {
  const requests: ReviewRequest[] = [];
  const transport: ReviewTransport = {
    async requestFindings(request) {
      requests.push(request);
      const answer = answers[Math.min(requests.length - 1, answers.length - 1)];
      if (answer instanceof Error) throw answer;
      return answer;
    },
  };
  return { transport, requests };
};

const pairs: SegmentPair[] = [
  { index: 1, source: "The cat sleeps.", target: "El perro duerme." },
  { index: 2, source: "Two apples.", target: "Dos manzanas." },
  { index: 3, source: "Three.", target: "Tres." },
];

describe("resolveReviewApiKey", () => {
  test("prefers the key sent with the upload", () => {
    assert.equal(resolveReviewApiKey(" test-key ", "test-fallback"), "test-key");
    assert.equal(resolveReviewApiKey(null, "test-fallback"), "test-fallback");
  });

  test("rejects a missing or multi-line key", () => {
    assert.throws(() => resolveReviewApiKey("", ""), ReviewConfigurationError);
    assert.throws(() => resolveReviewApiKey("test key", ""), ReviewConfigurationError);
  });
});

describe("parseReviewFindings", () => {
  test("keeps valid items and normalizes severity", () => {
    const findings = parseReviewFindings(
      JSON.stringify({
        issues: [
          {
            segment: "2",
            type: "omission",
            severity: "HIGH",
            evidence: "missing clause",
            suggestion: null,
          },
          { type: "other" },
          { segment: 3, type: "punctuation", severity: "critical", evidence: "x" },
        ],
      }),
    );
    assert.deepEqual(findings, [
      {
        segment: 2,
        type: "omission",
        severity: "high",
        evidence: "missing clause",
        suggestion: null,
      },
      { segment: 3, type: "punctuation", severity: "low", evidence: "x" },
    ]);
  });

  test("empty output yields no findings", () => {
    assert.deepEqual(parseReviewFindings(""), []);
  });
});

describe("findingsToIssues", () => {
  test("prefixes types and fills snippets from the pairs", () => {
    const issues = findingsToIssues(
      [
        {
          segment: 1,
          type: "Mistranslation",
          severity: "high",
          evidence: "cat became dog",
          suggestion: " El gato duerme. ",
        },
        { segment: 9, type: "weird kind", severity: "low", evidence: "?" },
      ],
      pairs,
      300,
    );
    assert.deepEqual(issues, [
      {
        type: "llm_mistranslation",
        severity: "high",
        segment: 1,
        src: "The cat sleeps.",
        tgt: "El perro duerme.",
        detail: { evidence: "cat became dog", suggestion: "El gato duerme." },
      },
      {
        type: "llm_other",
        severity: "low",
        segment: 9,
        src: "",
        tgt: "",
        detail: { evidence: "?" },
      },
    ]);
  });
});

describe("runReview", () => {
  test("sends batches and maps findings", async () => {
    const { transport, requests } = scriptedTransport([
      JSON.stringify({
        issues: [
          {
            segment: 1,
            type: "mistranslation",
            severity: "high",
            evidence: "cat became dog",
            suggestion: "El gato duerme.",
          },
        ],
      }),
      JSON.stringify({ issues: [] }),
    ]);
    const { logger } = recordingLogger();
    const progress: Array<[number, number]> = [];

    const issues = await runReview(pairs, {
      transport,
      model: "test-model",
      batchSize: 2,
      logger,
      snippetLength: 300,
      onBatchReviewed: (reviewed, total) => progress.push([reviewed, total]),
    });

    assert.equal(requests.length, 2);
    assert.equal(requests[0].model, "test-model");
    assert.equal(requests[0].system, REVIEW_SYSTEM_PROMPT);
    assert.ok(requests[0].prompt.includes("[1] SRC: The cat sleeps."));
    assert.ok(requests[0].prompt.includes("[2] TGT: Dos manzanas."));
    assert.ok(requests[1].prompt.includes("[3] SRC: Three."));
    assert.deepEqual(progress, [
      [1, 2],
      [2, 2],
    ]);
    assert.deepEqual(issues, [
      {
        type: "llm_mistranslation",
        severity: "high",
        segment: 1,
        src: "The cat sleeps.",
        tgt: "El perro duerme.",
        detail: { evidence: "cat became dog", suggestion: "El gato duerme." },
      },
    ]);
  });

  test("skips a batch whose output never parses", async () => {
    const { transport, requests } = scriptedTransport(["not json at all"]);
    const { logger, warnings } = recordingLogger();

    const issues = await runReview(pairs.slice(0, 1), {
      transport,
      model: "test-model",
      batchSize: 8,
      logger,
      snippetLength: 300,
      retryDelayMs: 0,
    });

    assert.deepEqual(issues, []);
    assert.equal(requests.length, 2);
    assert.equal(warnings.length, 1);
  });

  test("maps connection failures to a readable reason", async () => {
    const { transport, requests } = scriptedTransport([
      new APIConnectionError({ message: "socket hang up" }),
    ]);
    const { logger } = recordingLogger();

    await assert.rejects(
      runReview(pairs.slice(0, 1), {
        transport,
        model: "test-model",
        batchSize: 8,
        logger,
        snippetLength: 300,
        retryDelayMs: 0,
      }),
      {
        name: "ReviewRequestError",
        message: "Review mode: Network connection error. Check internet/firewall.",
      },
    );
    assert.equal(requests.length, 2);
  });
});

describe("toReviewRequestError", () => {
  test("wraps unknown failures", () => {
    const error = toReviewRequestError(new Error("boom"));
    assert.ok(error instanceof ReviewRequestError);
    assert.equal(error.message, "Review mode: Unexpected error: boom");
  });
});

describe("runReviewWithRetry", () => {
  test("backs off exponentially on rate limits", async () => {
    const delays: number[] = [];
    let calls = 0;
    const { result, attempts, attemptHistory } = await runReviewWithRetry({
      maxAttempts: 3,
      baseDelayMs: 100,
      sleep: async (ms) => {
        delays.push(ms);
      },
      run: async () => {
        calls += 1;
        if (calls < 3) throw Object.assign(new Error("slow down"), { status: 429 });
        return "ok";
      },
    });
    assert.equal(result, "ok");
    assert.equal(attempts, 3);
    assert.deepEqual(delays, [100, 200]);
    assert.deepEqual(
      attemptHistory.map((attempt) => attempt.reason),
      ["initial", "rate_limit", "rate_limit"],
    );
  });

  test("does not retry other errors", async () => {
    let calls = 0;
    await assert.rejects(
      runReviewWithRetry({
        run: async () => {
          calls += 1;
          throw new TypeError("bad input");
        },
      }),
      TypeError,
    );
    assert.equal(calls, 1);
  });
});
