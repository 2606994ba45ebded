import type { AlignmentCoverage } from "../alignment/alignedPairs";
import type {
  GlossaryEntry,
  Issue,
  IssueSummary,
  SegmentPair,
} from "../checks/types";

export type RunMode = "checks" | "review";

export const RUN_MODES: readonly RunMode[] = ["checks", "review"];

export type RunStage =
  | "queued"
  | "extracting"
  | "aligning"
  | "checking"
  | "reviewing"
  | "done";

export type RunStatus = RunStage | `error: ${string}`;

export type RunFileRole = "original" | "translation" | "glossary";

export interface RunFileInfo {
  role: RunFileRole;
  name: string;
  extension: string;
  extractor: string;
  size: number;
  characters: number;
}

export interface RunRecord {
  id: string;
  mode: RunMode;
  status: RunStatus;
  percent: number;
  model: string | null;
  files: RunFileInfo[];
  glossary: GlossaryEntry[];
  glossaryTerms: number;
  pairs: SegmentPair[];
  coverage: AlignmentCoverage | null;
  summary: IssueSummary | null;
  issues: Issue[];
  createdAt: string;
  updatedAt: string;
  error: string | null;
}

export type RunPatch = Partial<Omit<RunRecord, "id" | "createdAt">>;

export const isRunFailed = (status: RunStatus): boolean =>
  status.startsWith("error:");

export const isRunFinished = (status: RunStatus): boolean =>
  status === "done" || isRunFailed(status);

export const failedStatus = (reason: string): RunStatus =>
  `error: ${reason.trim() || "unknown failure"}`;

export interface ProgressUpdate {
  percent: number;
  status: RunStatus;
}
