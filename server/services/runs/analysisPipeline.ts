import type { CheckSettings } from "../../config/checkDefaults";
import { alignTexts, type AlignmentCoverage } from "../alignment/alignedPairs";
import { runChecks, summarizeIssues } from "../checks/runChecks";
import type {
  CheckLogger,
  GlossaryEntry,
  Issue,
  IssueSummary,
  SegmentPair,
} from "../checks/types";
import { extractDocumentText } from "../documents/extractor";
import { resolveReviewApiKey } from "../review/openaiClient";
import { runReview, type ReviewTransport } from "../review/reviewAgent";
import type { ProgressUpdate, RunFileInfo, RunFileRole, RunMode } from "./types";

export interface UploadedDocument {
  buffer: Buffer;
  filename: string;
  mimeType?: string | null;
}

export interface AnalysisInput {
  mode: RunMode;
  original: UploadedDocument;
  translation: UploadedDocument;
  glossary: GlossaryEntry[];
  apiKey?: string | null;
  model?: string | null;
  /** free-text notes for the reviewer, e.g. audience or register */
  context?: string | null;
}

export interface ReviewDependencies {
  createTransport: (apiKey: string) => ReviewTransport;
  defaultModel: string;
  batchSize: number;
  fallbackApiKey?: string;
  retryDelayMs?: number;
}

export interface PipelineDependencies {
  settings: CheckSettings;
  logger: CheckLogger;
  sizeLimitBytes: number;
  review: ReviewDependencies;
}

export interface AnalysisResult {
  files: RunFileInfo[];
  pairs: SegmentPair[];
  coverage: AlignmentCoverage;
  issues: Issue[];
  summary: IssueSummary;
  model: string | null;
}

export const PROGRESS = {
  extracting: 5,
  aligning: 20,
  analysisStart: 25,
  analysisEnd: 95,
  done: 100,
} as const;

const scaleProgress = (completed: number, total: number): number => {
  if (total <= 0) return PROGRESS.analysisEnd;
  const span = PROGRESS.analysisEnd - PROGRESS.analysisStart;
  return Math.round(PROGRESS.analysisStart + (span * completed) / total);
};

async function extractUpload(
  role: RunFileRole,
  upload: UploadedDocument,
  sizeLimitBytes: number,
): Promise<{ text: string; file: RunFileInfo }> {
  const { text, metadata } = await extractDocumentText({
    buffer: upload.buffer,
    filename: upload.filename,
    mimeType: upload.mimeType,
    sizeLimitBytes,
  });
  return {
    text,
    file: {
      role,
      name: metadata.originalName,
      extension: metadata.extension,
      extractor: metadata.extractor,
      size: metadata.fileSize,
      characters: metadata.characterCount,
    },
  };
}

/**
 * Extract, align, then check or review one upload. Progress is reported
 * synchronously; the caller decides how to persist it.
 */
export async function runAnalysis(
  input: AnalysisInput,
  deps: PipelineDependencies,
  onProgress: (update: ProgressUpdate) => void = () => undefined,
): Promise<AnalysisResult> {
  const { settings, logger } = deps;

  const apiKey =
    input.mode === "review"
      ? resolveReviewApiKey(input.apiKey, deps.review.fallbackApiKey)
      : null;

  onProgress({ percent: PROGRESS.extracting, status: "extracting" });
  const original = await extractUpload("original", input.original, deps.sizeLimitBytes);
  const translation = await extractUpload(
    "translation",
    input.translation,
    deps.sizeLimitBytes,
  );

  onProgress({ percent: PROGRESS.aligning, status: "aligning" });
  const { pairs, coverage } = alignTexts(original.text, translation.text);
  if (coverage.truncated) {
    logger.warn({ coverage }, "[analysis] segment counts differ; alignment truncated");
  }

  let issues: Issue[];
  let model: string | null = null;
  if (apiKey) {
    model = input.model?.trim() || deps.review.defaultModel;
    onProgress({ percent: PROGRESS.analysisStart, status: "reviewing" });
    issues = await runReview(pairs, {
      transport: deps.review.createTransport(apiKey),
      model,
      batchSize: deps.review.batchSize,
      logger,
      snippetLength: settings.snippetLength,
      context: input.context,
      retryDelayMs: deps.review.retryDelayMs,
      onBatchReviewed: (reviewed, total) =>
        onProgress({ percent: scaleProgress(reviewed, total), status: "reviewing" }),
    });
  } else {
    onProgress({ percent: PROGRESS.analysisStart, status: "checking" });
    issues = runChecks(pairs, {
      settings,
      logger,
      glossary: input.glossary,
      onSegmentChecked: (checked, total) =>
        onProgress({ percent: scaleProgress(checked, total), status: "checking" }),
    });
  }

  const summary = summarizeIssues(issues, pairs.length);
  logger.info(
    { mode: input.mode, ...summary },
    "[analysis] completed",
  );

  return {
    files: [original.file, translation.file],
    pairs,
    coverage,
    issues,
    summary,
    model,
  };
}

/**
 * Re-runs the deterministic checks after targets were edited. Review-mode
 * issues on edited segments are dropped since the model saw the old text.
 */
export function reanalyzeEditedPairs(params: {
  mode: RunMode;
  pairs: SegmentPair[];
  issues: Issue[];
  editedSegments: ReadonlySet<number>;
  glossary: GlossaryEntry[];
  settings: CheckSettings;
  logger: CheckLogger;
}): { issues: Issue[]; summary: IssueSummary } {
  const issues =
    params.mode === "review"
      ? params.issues.filter((issue) => !params.editedSegments.has(issue.segment))
      : runChecks(params.pairs, {
          settings: params.settings,
          logger: params.logger,
          glossary: params.glossary,
        });
  return { issues, summary: summarizeIssues(issues, params.pairs.length) };
}
