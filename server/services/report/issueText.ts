import type { Issue, Severity } from "../checks/types";

const SEVERITY_RANK: Record<Severity, number> = { high: 3, medium: 2, low: 1 };

const formatValue = (value: unknown): string => {
  if (Array.isArray(value)) return `[${value.map(formatValue).join(", ")}]`;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (value === null || value === undefined) return "";
  return JSON.stringify(value);
};

export interface IssueDescription {
  evidence: string;
  suggestion: string | null;
}

/**
 * Review issues carry `evidence`/`suggestion`; check issues carry raw
 * measurements, which are listed as `key=value` pairs.
 */
export function describeIssue(issue: Issue): IssueDescription {
  const detail = issue.detail ?? {};
  const suggestion =
    typeof detail.suggestion === "string" && detail.suggestion.trim()
      ? detail.suggestion.trim()
      : null;
  if (typeof detail.evidence === "string") {
    return { evidence: detail.evidence, suggestion };
  }
  const evidence = Object.entries(detail)
    .filter(([key]) => key !== "suggestion")
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join("; ");
  return { evidence, suggestion };
}

export function highestSeverity(issues: Issue[]): Severity | null {
  let top: Severity | null = null;
  for (const issue of issues) {
    if (!top || SEVERITY_RANK[issue.severity] > SEVERITY_RANK[top]) {
      top = issue.severity;
    }
  }
  return top;
}

export function groupIssuesBySegment(issues: Issue[]): Map<number, Issue[]> {
  const grouped = new Map<number, Issue[]>();
  for (const issue of issues) {
    const bucket = grouped.get(issue.segment);
    if (bucket) bucket.push(issue);
    else grouped.set(issue.segment, [issue]);
  }
  return grouped;
}
