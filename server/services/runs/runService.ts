import { v4 as uuidv4 } from "uuid";

import type { CheckLogger } from "../checks/types";
import {
  PROGRESS,
  reanalyzeEditedPairs,
  runAnalysis,
  type AnalysisInput,
  type PipelineDependencies,
} from "./analysisPipeline";
import { RunNotFoundError, type RunStore } from "./runStore";
import {
  failedStatus,
  type ProgressUpdate,
  type RunFileInfo,
  type RunRecord,
} from "./types";

export class RunNotReadyError extends Error {
  constructor(runId: string, status: string) {
    super(`Run ${runId} is not finished (status: ${status})`);
    this.name = "RunNotReadyError";
  }
}

export class SegmentEditError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SegmentEditError";
  }
}

export interface StartRunInput extends AnalysisInput {
  glossaryFile?: RunFileInfo | null;
}

export interface SegmentEdit {
  index: number;
  target: string;
}

export interface RunServiceOptions {
  store: RunStore;
  pipeline: PipelineDependencies;
  logger: CheckLogger;
  createId?: () => string;
}

export class RunService {
  private readonly active = new Map<string, Promise<RunRecord>>();
  private readonly createId: () => string;

  constructor(private readonly options: RunServiceOptions) {
    this.createId = options.createId ?? uuidv4;
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    return this.options.store.get(runId);
  }

  /** Creates the run and processes it in the background. */
  async start(input: StartRunInput): Promise<RunRecord> {
    const run = await this.createRun(input);
    this.launch(run, input);
    return run;
  }

  /** Creates the run and resolves once processing finished; failures reject. */
  async execute(input: StartRunInput): Promise<RunRecord> {
    const run = await this.createRun(input);
    return this.launch(run, input).processing;
  }

  async waitFor(runId: string): Promise<RunRecord | null> {
    const pending = this.active.get(runId);
    if (pending) return pending;
    return this.options.store.get(runId);
  }

  async whenIdle(): Promise<void> {
    await Promise.all([...this.active.values()]);
  }

  get activeRuns(): number {
    return this.active.size;
  }

  async editSegments(runId: string, edits: SegmentEdit[]): Promise<RunRecord> {
    const run = await this.options.store.get(runId);
    if (!run) throw new RunNotFoundError(runId);
    if (run.status !== "done") throw new RunNotReadyError(runId, run.status);
    if (!edits.length) throw new SegmentEditError("No segments to update");

    const byIndex = new Map(run.pairs.map((pair) => [pair.index, pair]));
    for (const edit of edits) {
      if (!byIndex.has(edit.index)) {
        throw new SegmentEditError(`Unknown segment index: ${edit.index}`);
      }
    }

    const editedSegments = new Set(edits.map((edit) => edit.index));
    const targets = new Map(edits.map((edit) => [edit.index, edit.target]));
    return this.options.store.update(runId, (current) => {
      const pairs = current.pairs.map((pair) => ({
        ...pair,
        target: targets.get(pair.index) ?? pair.target,
      }));
      const { issues, summary } = reanalyzeEditedPairs({
        mode: current.mode,
        pairs,
        issues: current.issues,
        editedSegments,
        glossary: current.glossary,
        settings: this.options.pipeline.settings,
        logger: this.options.logger,
      });
      return { pairs, issues, summary };
    });
  }

  private async createRun(input: StartRunInput): Promise<RunRecord> {
    const now = new Date().toISOString();
    return this.options.store.create({
      id: this.createId(),
      mode: input.mode,
      status: "queued",
      percent: 0,
      model: null,
      files: input.glossaryFile ? [input.glossaryFile] : [],
      glossary: input.glossary,
      glossaryTerms: input.glossary.length,
      pairs: [],
      coverage: null,
      summary: null,
      issues: [],
      createdAt: now,
      updatedAt: now,
      error: null,
    });
  }

  /**
   * `settled` never rejects and is what shutdown waits on; `processing`
   * carries the failure for callers that wait on the result.
   */
  private launch(
    run: RunRecord,
    input: StartRunInput,
  ): { processing: Promise<RunRecord>; settled: Promise<RunRecord> } {
    const processing = this.process(run.id, input);
    const settled = processing
      .then(
        (record) => record,
        async () => (await this.options.store.get(run.id)) ?? run,
      )
      .finally(() => {
        this.active.delete(run.id);
      });
    this.active.set(run.id, settled);
    return { processing, settled };
  }

  private async process(runId: string, input: StartRunInput): Promise<RunRecord> {
    const { store, logger } = this.options;

    let progressWrites: Promise<void> = Promise.resolve();
    const onProgress = (update: ProgressUpdate) => {
      progressWrites = progressWrites
        .then(async () => {
          await store.update(runId, (current) => ({
            status: update.status,
            percent: Math.max(current.percent, update.percent),
          }));
        })
        .catch((err) => {
          logger.warn({ err, runId }, "[runs] failed to record progress");
        });
    };

    try {
      const result = await runAnalysis(input, this.options.pipeline, onProgress);
      await progressWrites;
      return await store.update(runId, (current) => ({
        status: "done",
        percent: PROGRESS.done,
        model: result.model,
        files: [...result.files, ...current.files],
        pairs: result.pairs,
        coverage: result.coverage,
        summary: result.summary,
        issues: result.issues,
        error: null,
      }));
    } catch (error) {
      await progressWrites;
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ err: error, runId }, "[runs] analysis failed");
      await store.update(runId, {
        status: failedStatus(reason),
        percent: PROGRESS.done,
        error: reason,
      });
      throw error;
    }
  }
}
