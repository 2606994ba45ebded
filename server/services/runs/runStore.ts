import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { CHECK_ISSUE_TYPES, type IssueType } from "../checks/types";
import {
  RUN_MODES,
  isRunFinished,
  type RunPatch,
  type RunRecord,
  type RunStatus,
} from "./types";

export class RunNotFoundError extends Error {
  constructor(runId: string) {
    super(`Run not found: ${runId}`);
    this.name = "RunNotFoundError";
  }
}

export type RunPatchInput = RunPatch | ((current: RunRecord) => RunPatch);

export interface RunStore {
  create(run: RunRecord): Promise<RunRecord>;
  get(runId: string): Promise<RunRecord | null>;
  /** Applies the patch to the latest stored record and returns the result. */
  update(runId: string, patch: RunPatchInput): Promise<RunRecord>;
}

const RUN_ID_RE = /^[A-Za-z0-9_-]{1,64}$/;

export const isValidRunId = (runId: string): boolean => RUN_ID_RE.test(runId);

const applyPatch = (current: RunRecord, patch: RunPatchInput): RunRecord => {
  const changes = typeof patch === "function" ? patch(current) : patch;
  return {
    ...current,
    ...structuredClone(changes),
    id: current.id,
    createdAt: current.createdAt,
    updatedAt: new Date().toISOString(),
  };
};

export class MemoryRunStore implements RunStore {
  private readonly runs = new Map<string, RunRecord>();

  async create(run: RunRecord): Promise<RunRecord> {
    this.runs.set(run.id, structuredClone(run));
    return structuredClone(run);
  }

  async get(runId: string): Promise<RunRecord | null> {
    const run = this.runs.get(runId);
    return run ? structuredClone(run) : null;
  }

  async update(runId: string, patch: RunPatchInput): Promise<RunRecord> {
    const current = this.runs.get(runId);
    if (!current) throw new RunNotFoundError(runId);
    const next = applyPatch(current, patch);
    this.runs.set(runId, next);
    return structuredClone(next);
  }
}

const isIssueType = (value: unknown): value is IssueType =>
  typeof value === "string" &&
  (value.startsWith("llm_") || CHECK_ISSUE_TYPES.some((type) => type === value));

const isRunStatus = (value: unknown): value is RunStatus =>
  typeof value === "string" &&
  (value.startsWith("error: ") ||
    ["queued", "extracting", "aligning", "checking", "reviewing", "done"].includes(
      value,
    ));

const SeveritySchema = z.enum(["high", "medium", "low"]);

const StoredRunSchema = z.object({
  id: z.string(),
  mode: z.enum(["checks", "review"]).default(RUN_MODES[0]),
  status: z.custom<RunStatus>(isRunStatus, "invalid run status"),
  percent: z.number(),
  model: z.string().nullable().default(null),
  files: z.array(
    z.object({
      role: z.enum(["original", "translation", "glossary"]),
      name: z.string(),
      extension: z.string(),
      extractor: z.string(),
      size: z.number(),
      characters: z.number(),
    }),
  ),
  glossary: z.array(z.object({ term: z.string(), translation: z.string() })),
  glossaryTerms: z.number(),
  pairs: z.array(
    z.object({ index: z.number(), source: z.string(), target: z.string() }),
  ),
  coverage: z
    .object({
      sourceSegments: z.number(),
      targetSegments: z.number(),
      aligned: z.number(),
      truncated: z.boolean(),
      caveat: z.string().nullable(),
    })
    .nullable(),
  summary: z
    .object({
      segments: z.number(),
      high: z.number(),
      medium: z.number(),
      low: z.number(),
    })
    .nullable(),
  issues: z.array(
    z.object({
      type: z.custom<IssueType>(isIssueType, "invalid issue type"),
      severity: SeveritySchema,
      segment: z.number(),
      src: z.string(),
      tgt: z.string(),
      detail: z.record(z.unknown()).optional(),
    }),
  ),
  createdAt: z.string(),
  updatedAt: z.string(),
  error: z.string().nullable().default(null),
});

/**
 * Keeps each run as `<rootDir>/<runId>/run.json`. A run stays cached in
 * memory while it is in progress; a finished run leaves the cache once no
 * call on it is pending and is read from disk again on the next access.
 * Writes for one run are applied in call order and land through a temp
 * file plus rename.
 */
export class FileRunStore implements RunStore {
  private readonly cache = new Map<string, RunRecord>();
  private readonly writes = new Map<string, Promise<void>>();
  private readonly pending = new Map<string, number>();

  constructor(private readonly rootDir: string) {}

  get cachedRuns(): number {
    return this.cache.size;
  }

  private runPath(runId: string): string {
    return path.join(this.rootDir, runId, "run.json");
  }

  private async withRun<T>(runId: string, work: () => Promise<T>): Promise<T> {
    this.pending.set(runId, (this.pending.get(runId) ?? 0) + 1);
    try {
      return await work();
    } finally {
      const left = (this.pending.get(runId) ?? 1) - 1;
      if (left > 0) {
        this.pending.set(runId, left);
      } else {
        this.pending.delete(runId);
        const cached = this.cache.get(runId);
        if (cached && isRunFinished(cached.status)) {
          this.cache.delete(runId);
        }
      }
    }
  }

  private async persist(run: RunRecord): Promise<void> {
    const file = this.runPath(run.id);
    const body = JSON.stringify(run, null, 2);
    const write = async () => {
      await mkdir(path.dirname(file), { recursive: true });
      const temp = `${file}.tmp`;
      await writeFile(temp, body, "utf8");
      await rename(temp, file);
    };

    const previous = this.writes.get(run.id) ?? Promise.resolve();
    const next = previous.then(write, write);
    this.writes.set(run.id, next);
    try {
      await next;
    } finally {
      if (this.writes.get(run.id) === next) {
        this.writes.delete(run.id);
      }
    }
  }

  private async load(runId: string): Promise<RunRecord | null> {
    const cached = this.cache.get(runId);
    if (cached) return cached;
    if (!isValidRunId(runId)) return null;

    let raw: string;
    try {
      raw = await readFile(this.runPath(runId), "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    const parsed: RunRecord = StoredRunSchema.parse(JSON.parse(raw));
    // another caller may have loaded and modified it while we were reading
    const raced = this.cache.get(runId);
    if (raced) return raced;
    this.cache.set(runId, parsed);
    return parsed;
  }

  async create(run: RunRecord): Promise<RunRecord> {
    if (!isValidRunId(run.id)) {
      throw new Error(`Invalid run id: ${run.id}`);
    }
    return this.withRun(run.id, async () => {
      const stored = structuredClone(run);
      this.cache.set(run.id, stored);
      await this.persist(stored);
      return structuredClone(stored);
    });
  }

  async get(runId: string): Promise<RunRecord | null> {
    return this.withRun(runId, async () => {
      const run = await this.load(runId);
      return run ? structuredClone(run) : null;
    });
  }

  async update(runId: string, patch: RunPatchInput): Promise<RunRecord> {
    return this.withRun(runId, async () => {
      if (!this.cache.has(runId)) await this.load(runId);
      // latest record, including updates applied while this one was loading
      const current = this.cache.get(runId);
      if (!current) throw new RunNotFoundError(runId);
      const next = applyPatch(current, patch);
      this.cache.set(runId, next);
      await this.persist(next);
      return structuredClone(next);
    });
  }
}
