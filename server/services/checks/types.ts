import type { FastifyBaseLogger } from "fastify";

export type Severity = "high" | "medium" | "low";

export const SEVERITIES: readonly Severity[] = ["high", "medium", "low"];

export type CheckIssueType =
  | "number_mismatch"
  | "date_mismatch"
  | "possibly_untranslated"
  | "length_ratio"
  | "orthography_extra_spaces"
  | "orthography_double_punctuation"
  | "name_possible_typo"
  | "glossary_mismatch";

export const CHECK_ISSUE_TYPES: readonly CheckIssueType[] = [
  "number_mismatch",
  "date_mismatch",
  "possibly_untranslated",
  "length_ratio",
  "orthography_extra_spaces",
  "orthography_double_punctuation",
  "name_possible_typo",
  "glossary_mismatch",
];

export type ReviewIssueType = `llm_${string}`;

export type IssueType = CheckIssueType | ReviewIssueType;

export type IssueDetail = Record<string, unknown>;

export interface Issue {
  type: IssueType;
  severity: Severity;
  /** 1-based segment index */
  segment: number;
  src: string;
  tgt: string;
  detail?: IssueDetail;
}

export interface SegmentPair {
  index: number;
  source: string;
  target: string;
}

export interface IssueSummary {
  segments: number;
  high: number;
  medium: number;
  low: number;
}

export interface GlossaryEntry {
  term: string;
  translation: string;
}

export type CheckLogger = Pick<FastifyBaseLogger, "info" | "warn" | "error">;

/** What a single check reports for one segment before it becomes an Issue. */
export interface Finding {
  type: CheckIssueType;
  severity: Severity;
  detail?: IssueDetail;
}
