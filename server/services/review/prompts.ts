import type { SegmentPair } from "../checks/types";

export const REVIEW_ISSUE_TYPES = [
  "number_error",
  "date_error",
  "name_error",
  "terminology",
  "omission",
  "addition",
  "mistranslation",
  "orthography",
  "punctuation",
  "formatting",
  "other",
] as const;

export type ReviewIssueKind = (typeof REVIEW_ISSUE_TYPES)[number];

export const reviewFindingsSchema = {
  name: "translation_review_findings_v1",
  schema: {
    type: "object",
    additionalProperties: false,
    properties: {
      issues: {
        type: "array",
        items: {
          type: "object",
          additionalProperties: false,
          properties: {
            segment: { type: "integer" },
            type: { type: "string", enum: [...REVIEW_ISSUE_TYPES] },
            severity: { type: "string", enum: ["high", "medium", "low"] },
            evidence: { type: "string" },
            suggestion: { type: ["string", "null"] },
          },
          required: ["segment", "type", "severity", "evidence", "suggestion"],
        },
      },
    },
    required: ["issues"],
  },
} as const;

export const REVIEW_SYSTEM_PROMPT = [
  "You are a meticulous bilingual translation QA engine.",
  "Compare source and target segments and report translation issues.",
  "Be strict with numbers, dates, names and terminology; do not invent issues.",
  'Return ONLY JSON of the shape {"issues": [{"segment": <int>, "type": "<kind>", "severity": "high|medium|low", "evidence": "<string>", "suggestion": "<string or null>"}]}.',
  `Allowed kinds: ${REVIEW_ISSUE_TYPES.join(", ")}.`,
].join(" ");

export function buildReviewPrompt(
  batch: SegmentPair[],
  context?: string | null,
): string {
  const lines = [
    "Evaluate the following aligned segments.",
    "If a segment is fine, do not add an issue for it.",
  ];
  if (context?.trim()) {
    lines.push("", `Context: ${context.trim()}`);
  }
  lines.push("", "Segments:");
  for (const pair of batch) {
    lines.push(`[${pair.index}] SRC: ${pair.source.trim()}`);
    lines.push(`[${pair.index}] TGT: ${pair.target.trim()}`);
  }
  return lines.join("\n");
}
