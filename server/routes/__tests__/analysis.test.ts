import { afterEach, describe, test } from "node:test";
import assert from "node:assert/strict";

import type { FastifyInstance } from "fastify";

import { buildApp, type BuildAppOptions } from "../../app";
import type { ReviewTransport } from "../../services/review/reviewAgent";
import { MemoryRunStore } from "../../services/runs/runStore";

const BOUNDARY = "----qa-test-boundary";

interface FormPart {
  name: string;
  content: string | Buffer;
  filename?: string;
  contentType?: string;
}

const multipart = (parts: FormPart[]) => {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    const disposition = part.filename
      ? `form-data; name="${part.name}"; filename="${part.filename}"`
      : `form-data; name="${part.name}"`;
    chunks.push(Buffer.from(`--${BOUNDARY}\r\nContent-Disposition: ${disposition}\r\n`));
    if (part.filename) {
      chunks.push(Buffer.from(`Content-Type: ${part.contentType ?? "text/plain"}\r\n`));
    }
    chunks.push(Buffer.from("\r\n"));
    chunks.push(typeof part.content === "string" ? Buffer.from(part.content) : part.content);
    chunks.push(Buffer.from("\r\n"));
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));
  return {
    payload: Buffer.concat(chunks),
    headers: { "content-type": `multipart/form-data; boundary=${BOUNDARY}` },
  };
};

const documents = (original: string, translation: string): FormPart[] => [
  { name: "original", filename: "original.txt", content: original },
  { name: "translation", filename: "translation.txt", content: translation },
];

const findingsTransport: ReviewTransport = {
  async requestFindings() {
    return JSON.stringify({
      issues: [
        {
          segment: 1,
          type: "terminology",
          severity: "medium",
          evidence: "inconsistent term",
          suggestion: "contrato",
        },
      ],
    });
  },
};

let app: FastifyInstance | null = null;

const startApp = async (options: BuildAppOptions = {}) => {
  let counter = 0;
  const store = new MemoryRunStore();
  app = await buildApp({
    logger: false,
    store,
    fallbackApiKey: "",
    reviewRetryDelayMs: 0,
    createReviewTransport: () => findingsTransport,
    createRunId: () => `run-${++counter}`,
    ...options,
  });
  return { server: app, store };
};

afterEach(async () => {
  await app?.close();
  app = null;
});

describe("GET /health", () => {
  test("reports ok", async () => {
    const { server } = await startApp();
    const res = await server.inject({ method: "GET", url: "/health" });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { ok: true });
  });
});

describe("POST /analyze", () => {
  test("price example has no issues", async () => {
    const { server } = await startApp();
    const res = await server.inject({
      method: "POST",
      url: "/analyze",
      ...multipart(
        documents("The price is 1,250.50 dollars.", "El precio es 1.250,50 dólares."),
      ),
    });
    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.equal(body.run_id, "run-1");
    assert.deepEqual(body.summary, { segments: 1, high: 0, medium: 0, low: 0 });
    assert.deepEqual(body.issues, []);
    assert.equal(body.coverage.truncated, false);
  });

  test("identical text gives one medium untranslated issue", async () => {
    const { server } = await startApp();
    const res = await server.inject({
      method: "POST",
      url: "/analyze",
      ...multipart(documents("Paris is beautiful.", "Paris is beautiful.")),
    });
    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.deepEqual(body.summary, { segments: 1, high: 0, medium: 1, low: 0 });
    assert.equal(body.issues[0].type, "possibly_untranslated");
  });

  test("applies an uploaded glossary", async () => {
    const { server } = await startApp();
    const res = await server.inject({
      method: "POST",
      url: "/analyze",
      ...multipart([
        ...documents("Sign the contract.", "Firme el acuerdo."),
        { name: "glossary", filename: "terms.csv", content: "contract,contrato\n" },
      ]),
    });
    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.deepEqual(
      body.issues.map((issue: { type: string }) => issue.type),
      ["glossary_mismatch"],
    );
  });

  test("review mode uses the model transport", async () => {
    const { server } = await startApp();
    const res = await server.inject({
      method: "POST",
      url: "/analyze",
      ...multipart([
        ...documents("Sign the contract.", "Firme el acuerdo."),
        { name: "mode", content: "review" },
        { name: "apiKey", content: "test-key" },
      ]),
    });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json().issues, [
      {
        type: "llm_terminology",
        severity: "medium",
        segment: 1,
        src: "Sign the contract.",
        tgt: "Firme el acuerdo.",
        detail: { evidence: "inconsistent term", suggestion: "contrato" },
      },
    ]);
  });

  test("review mode passes the context field to the reviewer", async () => {
    const prompts: string[] = [];
    const { server } = await startApp({
      createReviewTransport: () => ({
        async requestFindings(request) {
          prompts.push(request.prompt);
          return JSON.stringify({ issues: [] });
        },
      }),
    });
    const res = await server.inject({
      method: "POST",
      url: "/analyze",
      ...multipart([
        ...documents("Sign the contract.", "Firme el acuerdo."),
        { name: "mode", content: "review" },
        { name: "apiKey", content: "test-key" },
        { name: "context", content: "  Legal notice for a Spanish client  " },
      ]),
    });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json().issues, []);
    assert.equal(prompts.length, 1);
    assert.ok(prompts[0].includes("\nContext: Legal notice for a Spanish client\n"));
  });

  test("review mode without any key is a bad request", async () => {
    const { server } = await startApp();
    const res = await server.inject({
      method: "POST",
      url: "/analyze",
      ...multipart([
        ...documents("Hello.", "Hola."),
        { name: "mode", content: "review" },
      ]),
    });
    assert.equal(res.statusCode, 400);
    assert.match(res.json().error, /^Review mode: no API key/);
  });
});

describe("upload validation", () => {
  test("both documents are required", async () => {
    const { server } = await startApp();
    const res = await server.inject({
      method: "POST",
      url: "/start",
      ...multipart([{ name: "original", filename: "original.txt", content: "Hello." }]),
    });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json(), {
      error: "Both 'original' and 'translation' files are required",
    });
  });

  test("unsupported formats are rejected", async () => {
    const { server } = await startApp();
    const res = await server.inject({
      method: "POST",
      url: "/start",
      ...multipart([
        { name: "original", filename: "original.xlsx", content: "Hello." },
        { name: "translation", filename: "translation.txt", content: "Hola." },
      ]),
    });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json(), { error: "Unsupported file type: .xlsx" });
  });

  test("unknown modes are rejected", async () => {
    const { server } = await startApp();
    const res = await server.inject({
      method: "POST",
      url: "/start",
      ...multipart([...documents("Hello.", "Hola."), { name: "mode", content: "fast" }]),
    });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json(), {
      error: "Unknown mode 'fast'; expected one of checks, review",
    });
  });

  test("a malformed glossary is rejected", async () => {
    const { server } = await startApp();
    const res = await server.inject({
      method: "POST",
      url: "/start",
      ...multipart([
        ...documents("Hello.", "Hola."),
        { name: "glossary", filename: "terms.csv", content: "orphan\n" },
      ]),
    });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json(), {
      error: "Glossary line 1 needs a term and a translation",
    });
  });

  test("more files than the upload allows are rejected", async () => {
    const { server } = await startApp();
    const res = await server.inject({
      method: "POST",
      url: "/start",
      ...multipart([
        ...documents("Hello.", "Hola."),
        { name: "glossary", filename: "terms.csv", content: "hello,hola\n" },
        { name: "extra", filename: "extra.txt", content: "More." },
      ]),
    });
    assert.equal(res.statusCode, 413);
    assert.equal(typeof res.json().error, "string");
  });

  test("oversized files are rejected with 413", async () => {
    const { server } = await startApp({ sizeLimitBytes: 16 });
    const res = await server.inject({
      method: "POST",
      url: "/start",
      ...multipart(documents("A".repeat(64), "B")),
    });
    assert.equal(res.statusCode, 413);
  });
});

describe("background runs", () => {
  test("start, poll, fetch the result, report and downloads", async () => {
    const { server } = await startApp();
    const started = await server.inject({
      method: "POST",
      url: "/start",
      ...multipart(documents("Paris is beautiful. We have 3 cats.", "Paris is beautiful. Tenemos 4 gatos.")),
    });
    assert.equal(started.statusCode, 202);
    assert.deepEqual(started.json(), { run_id: "run-1" });

    await server.runs.waitFor("run-1");

    const progress = await server.inject({ method: "GET", url: "/progress/run-1" });
    assert.deepEqual(progress.json(), { percent: 100, status: "done" });

    const result = await server.inject({ method: "GET", url: "/result/run-1" });
    assert.equal(result.statusCode, 200);
    const body = result.json();
    assert.equal(body.download, "/download/run-1");
    assert.equal(body.report_url, "/report/run-1");
    assert.deepEqual(body.summary, { segments: 2, high: 1, medium: 1, low: 0 });

    const report = await server.inject({ method: "GET", url: "/report/run-1" });
    assert.equal(report.statusCode, 200);
    assert.match(String(report.headers["content-type"]), /^text\/html/);
    assert.ok(report.body.includes("<h1>Translation QA report</h1>"));

    const annotated = await server.inject({ method: "GET", url: "/download/run-1" });
    assert.equal(annotated.statusCode, 200);
    assert.equal(
      annotated.headers["content-type"],
      "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
    );
    assert.equal(
      annotated.headers["content-disposition"],
      'attachment; filename="translation_annotated_run-1.docx"',
    );
    assert.equal(annotated.rawPayload.subarray(0, 2).toString("latin1"), "PK");

    const clean = await server.inject({
      method: "GET",
      url: "/download/run-1?variant=clean",
    });
    assert.equal(
      clean.headers["content-disposition"],
      'attachment; filename="translation_fixed_run-1.docx"',
    );
  });

  test("a failed run reports its reason", async () => {
    const { server } = await startApp();
    await server.inject({
      method: "POST",
      url: "/start",
      ...multipart(documents("Hello.", "   ")),
    });
    await server.runs.waitFor("run-1");

    const progress = await server.inject({ method: "GET", url: "/progress/run-1" });
    assert.deepEqual(progress.json(), {
      percent: 100,
      status: "error: No textual content was extracted from the file",
    });

    const result = await server.inject({ method: "GET", url: "/result/run-1" });
    assert.equal(result.statusCode, 409);
    assert.deepEqual(result.json(), {
      error: "No textual content was extracted from the file",
      status: "error: No textual content was extracted from the file",
    });
  });

  test("an unfinished run is not ready", async () => {
    const { server, store } = await startApp();
    await store.create({
      id: "pending",
      mode: "checks",
      status: "checking",
      percent: 40,
      model: null,
      files: [],
      glossary: [],
      glossaryTerms: 0,
      pairs: [],
      coverage: null,
      summary: null,
      issues: [],
      createdAt: "2024-01-01T00:00:00.000Z",
      updatedAt: "2024-01-01T00:00:00.000Z",
      error: null,
    });

    const result = await server.inject({ method: "GET", url: "/result/pending" });
    assert.equal(result.statusCode, 409);
    assert.deepEqual(result.json(), {
      error: "Run is not finished",
      status: "checking",
      percent: 40,
    });

    const download = await server.inject({ method: "GET", url: "/download/pending" });
    assert.equal(download.statusCode, 409);
  });

  test("unknown runs are 404", async () => {
    const { server } = await startApp();
    for (const url of ["/progress/nope", "/result/nope", "/download/nope"]) {
      const res = await server.inject({ method: "GET", url });
      assert.equal(res.statusCode, 404, url);
      assert.deepEqual(res.json(), { error: "Run not found" });
    }
    const report = await server.inject({ method: "GET", url: "/report/nope" });
    assert.equal(report.statusCode, 404);
    assert.ok(report.body.includes("Report not found"));
  });
});

describe("PATCH /result/:runId/segments", () => {
  test("edits a target and re-checks the run", async () => {
    const { server } = await startApp();
    await server.inject({
      method: "POST",
      url: "/analyze",
      ...multipart(documents("Paris is beautiful.", "Paris is beautiful.")),
    });

    const res = await server.inject({
      method: "PATCH",
      url: "/result/run-1/segments",
      payload: { segments: [{ index: 1, target: "París es hermosa." }] },
    });
    assert.equal(res.statusCode, 200);
    const body = res.json();
    assert.deepEqual(body.issues, []);
    assert.deepEqual(body.pairs, [
      { index: 1, source: "Paris is beautiful.", target: "París es hermosa." },
    ]);
  });

  test("rejects a malformed body and unknown segments", async () => {
    const { server } = await startApp();
    await server.inject({
      method: "POST",
      url: "/analyze",
      ...multipart(documents("Hello.", "Hola.")),
    });

    const malformed = await server.inject({
      method: "PATCH",
      url: "/result/run-1/segments",
      payload: { segments: [] },
    });
    assert.equal(malformed.statusCode, 400);

    const unknown = await server.inject({
      method: "PATCH",
      url: "/result/run-1/segments",
      payload: { segments: [{ index: 7, target: "x" }] },
    });
    assert.equal(unknown.statusCode, 400);
    assert.deepEqual(unknown.json(), { error: "Unknown segment index: 7" });
  });
});
