import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import { GlossaryFormatError } from "../services/checks/glossary";
import {
  DocumentTooLargeError,
  EmptyDocumentError,
  UnsupportedDocumentError,
} from "../services/documents/extractor";
import {
  DOCX_MIME_TYPE,
  buildAnnotatedDocx,
  buildCleanDocx,
} from "../services/report/annotatedDocx";
import { renderReportHtml, renderReportNotFound } from "../services/report/reportHtml";
import { ReviewConfigurationError } from "../services/review/openaiClient";
import { ReviewRequestError } from "../services/review/reviewAgent";
import { RunNotReadyError, SegmentEditError } from "../services/runs/runService";
import { RunNotFoundError } from "../services/runs/runStore";
import { isRunFailed, type RunRecord } from "../services/runs/types";
import { readAnalysisUpload, UploadValidationError } from "./uploads";

export interface AnalysisRouteOptions {
  sizeLimitBytes: number;
}

interface RunParams {
  runId: string;
}

const SegmentEditSchema = z.object({
  segments: z
    .array(
      z.object({
        index: z.number().int().positive(),
        target: z.string(),
      }),
    )
    .min(1),
});

const BAD_REQUEST_ERRORS = [
  UploadValidationError,
  UnsupportedDocumentError,
  EmptyDocumentError,
  GlossaryFormatError,
  ReviewConfigurationError,
  SegmentEditError,
];

// multipart limit and parsing errors, e.g. FST_REQ_FILE_TOO_LARGE or FST_FILES_LIMIT
const clientErrorStatus = (error: unknown): number | null => {
  if (error instanceof DocumentTooLargeError) return 413;
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("FST_") &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return error.statusCode;
  }
  return null;
};

const links = (runId: string) => ({
  download: `/download/${runId}`,
  clean: `/download/${runId}?variant=clean`,
  report: `/report/${runId}`,
  result: `/result/${runId}`,
});

const sendError = (
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown,
) => {
  const message = error instanceof Error ? error.message : String(error);
  const clientStatus = clientErrorStatus(error);
  if (clientStatus) {
    return reply.status(clientStatus).send({ error: message });
  }
  if (BAD_REQUEST_ERRORS.some((ErrorType) => error instanceof ErrorType)) {
    return reply.status(400).send({ error: message });
  }
  if (error instanceof RunNotFoundError) {
    return reply.status(404).send({ error: "Run not found" });
  }
  if (error instanceof RunNotReadyError) {
    return reply.status(409).send({ error: message });
  }
  if (error instanceof ReviewRequestError) {
    return reply.status(502).send({ error: message });
  }
  request.log.error({ err: error }, "[analysis] request failed");
  return reply.status(500).send({ error: message || "Internal server error" });
};

const resultPayload = (run: RunRecord) => ({
  run_id: run.id,
  status: run.status,
  mode: run.mode,
  summary: run.summary,
  issues: run.issues,
  coverage: run.coverage,
  download: links(run.id).download,
  report_url: links(run.id).report,
});

const analysisRoutes: FastifyPluginAsync<AnalysisRouteOptions> = async (
  fastify,
  options,
) => {
  const { runs } = fastify;

  fastify.get("/health", async () => ({ ok: true }));

  fastify.post("/start", async (request, reply) => {
    try {
      const input = await readAnalysisUpload(request, options.sizeLimitBytes);
      const run = await runs.start(input);
      request.log.info({ runId: run.id, mode: run.mode }, "[analysis] run queued");
      return reply.status(202).send({ run_id: run.id });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.post("/analyze", async (request, reply) => {
    try {
      const input = await readAnalysisUpload(request, options.sizeLimitBytes);
      const run = await runs.execute(input);
      return reply.send({
        run_id: run.id,
        summary: run.summary,
        issues: run.issues,
        coverage: run.coverage,
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.get<{ Params: RunParams }>("/progress/:runId", async (request, reply) => {
    const run = await runs.getRun(request.params.runId);
    if (!run) {
      return reply.status(404).send({ error: "Run not found" });
    }
    return reply.send({ percent: run.percent, status: run.status });
  });

  fastify.get<{ Params: RunParams }>("/result/:runId", async (request, reply) => {
    const run = await runs.getRun(request.params.runId);
    if (!run) {
      return reply.status(404).send({ error: "Run not found" });
    }
    if (isRunFailed(run.status)) {
      return reply.status(409).send({ error: run.error ?? run.status, status: run.status });
    }
    if (run.status !== "done") {
      return reply.status(409).send({
        error: "Run is not finished",
        status: run.status,
        percent: run.percent,
      });
    }
    return reply.send(resultPayload(run));
  });

  fastify.patch<{ Params: RunParams; Body: unknown }>(
    "/result/:runId/segments",
    async (request, reply) => {
      const parsed = SegmentEditSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: "Body must be { segments: [{ index, target }] }",
          issues: parsed.error.issues,
        });
      }
      try {
        const run = await runs.editSegments(request.params.runId, parsed.data.segments);
        request.log.info(
          { runId: run.id, edited: parsed.data.segments.length },
          "[analysis] segments edited",
        );
        return reply.send({ ...resultPayload(run), pairs: run.pairs });
      } catch (error) {
        return sendError(request, reply, error);
      }
    },
  );

  fastify.get<{ Params: RunParams }>("/report/:runId", async (request, reply) => {
    const run = await runs.getRun(request.params.runId);
    reply.type("text/html; charset=utf-8");
    if (!run) {
      return reply.status(404).send(renderReportNotFound());
    }
    const runLinks = links(run.id);
    return reply.send(
      renderReportHtml(run, {
        annotated: runLinks.download,
        clean: runLinks.clean,
        result: runLinks.result,
      }),
    );
  });

  fastify.get<{ Params: RunParams; Querystring: { variant?: string } }>(
    "/download/:runId",
    async (request, reply) => {
      const run = await runs.getRun(request.params.runId);
      if (!run) {
        return reply.status(404).send({ error: "Run not found" });
      }
      if (run.status !== "done") {
        return reply.status(409).send({ error: "Run is not finished", status: run.status });
      }
      const clean = request.query.variant === "clean";
      const bytes = clean
        ? await buildCleanDocx(run.pairs)
        : await buildAnnotatedDocx(run.pairs, run.issues);
      const filename = clean
        ? `translation_fixed_${run.id}.docx`
        : `translation_annotated_${run.id}.docx`;
      return reply
        .type(DOCX_MIME_TYPE)
        .header("Content-Disposition", `attachment; filename="${filename}"`)
        .send(Buffer.from(bytes));
    },
  );
};

export default analysisRoutes;
