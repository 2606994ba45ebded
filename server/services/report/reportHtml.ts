import type { Issue } from "../checks/types";
import { isRunFailed, type RunRecord } from "../runs/types";
import { describeIssue } from "./issueText";

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export interface ReportLinks {
  annotated: string;
  clean: string;
  result: string;
}

const STYLES = `
body { font-family: system-ui, sans-serif; margin: 2rem; color: #1f2933; }
table { border-collapse: collapse; width: 100%; margin-top: 1rem; }
th, td { border: 1px solid #d2d6dc; padding: 0.4rem 0.6rem; text-align: left; vertical-align: top; }
th { background: #f4f5f7; }
.sev-high { background: #fff3b0; }
.sev-medium { background: #d9f7be; }
.sev-low { background: #eef0f3; }
.caveat { color: #9a3412; }
`;

const renderIssueRow = (issue: Issue, position: number): string => {
  const { evidence, suggestion } = describeIssue(issue);
  const detail = suggestion ? `${evidence} | Suggestion: ${suggestion}` : evidence;
  return [
    `<tr class="sev-${issue.severity}">`,
    `<td>${position}</td>`,
    `<td>${issue.segment}</td>`,
    `<td>${escapeHtml(issue.type)}</td>`,
    `<td>${issue.severity}</td>`,
    `<td>${escapeHtml(issue.src)}</td>`,
    `<td>${escapeHtml(issue.tgt)}</td>`,
    `<td>${escapeHtml(detail)}</td>`,
    "</tr>",
  ].join("");
};

const renderBody = (run: RunRecord, links: ReportLinks): string => {
  if (isRunFailed(run.status)) {
    return `<p>Run failed: ${escapeHtml(run.error ?? run.status)}</p>`;
  }
  if (run.status !== "done" || !run.summary) {
    return `<p>Run is still in progress: ${escapeHtml(run.status)} (${run.percent}%)</p>`;
  }

  const { summary, coverage } = run;
  const parts = [
    "<h2>Summary</h2>",
    "<table><tr><th>Segments</th><th>High</th><th>Medium</th><th>Low</th></tr>",
    `<tr><td>${summary.segments}</td><td>${summary.high}</td><td>${summary.medium}</td><td>${summary.low}</td></tr></table>`,
  ];
  if (coverage?.caveat) {
    parts.push(`<p class="caveat">Alignment: ${escapeHtml(coverage.caveat)}</p>`);
  }
  parts.push(
    `<p><a href="${escapeHtml(links.annotated)}">Annotated translation (DOCX)</a> · ` +
      `<a href="${escapeHtml(links.clean)}">Clean translation (DOCX)</a> · ` +
      `<a href="${escapeHtml(links.result)}">JSON</a></p>`,
  );

  parts.push("<h2>Issues</h2>");
  if (!run.issues.length) {
    parts.push("<p>No issues found.</p>");
  } else {
    parts.push(
      "<table><tr><th>#</th><th>Segment</th><th>Type</th><th>Severity</th><th>Source</th><th>Target</th><th>Detail</th></tr>",
      ...run.issues.map((issue, index) => renderIssueRow(issue, index + 1)),
      "</table>",
    );
  }
  return parts.join("\n");
};

export function renderReportHtml(run: RunRecord, links: ReportLinks): string {
  const modeLabel = run.mode === "review" ? "Review" : "Checks";
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>Translation QA report ${escapeHtml(run.id)}</title>`,
    `<style>${STYLES}</style>`,
    "</head>",
    "<body>",
    `<h1>Translation QA report</h1>`,
    `<p>Run ${escapeHtml(run.id)} · ${modeLabel} mode${run.model ? ` · ${escapeHtml(run.model)}` : ""}</p>`,
    renderBody(run, links),
    "</body>",
    "</html>",
  ].join("\n");
}

export function renderReportNotFound(): string {
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    '<head><meta charset="utf-8"><title>Report not found</title></head>',
    "<body><h1>Report not found</h1></body>",
    "</html>",
  ].join("\n");
}
