import type { CheckSettings } from "../../config/checkDefaults";
import { truncateSnippet } from "../../utils/textNormalize";
import { checkGlossary } from "./glossary";
import {
  checkLengthRatio,
  checkNameTypos,
  checkNumbersAndDates,
  checkOrthography,
  checkUntranslated,
  computeExpectedLengthRatio,
} from "./segmentChecks";
import type {
  CheckLogger,
  Finding,
  GlossaryEntry,
  Issue,
  IssueSummary,
  SegmentPair,
} from "./types";

interface CheckContext {
  settings: CheckSettings;
  glossary: GlossaryEntry[];
  expectedLengthRatio: number;
}

interface SegmentCheck {
  name: string;
  run: (pair: SegmentPair, context: CheckContext) => Finding[];
}

const SEGMENT_CHECKS: SegmentCheck[] = [
  {
    name: "numbers",
    run: (pair, { settings }) => checkNumbersAndDates(pair, settings),
  },
  {
    name: "untranslated",
    run: (pair, { settings }) => checkUntranslated(pair, settings),
  },
  {
    name: "length_ratio",
    run: (pair, { settings, expectedLengthRatio }) =>
      checkLengthRatio(pair, expectedLengthRatio, settings),
  },
  {
    name: "orthography",
    run: (pair) => checkOrthography(pair),
  },
  {
    name: "names",
    run: (pair, { settings }) => checkNameTypos(pair, settings),
  },
  {
    name: "glossary",
    run: (pair, { glossary }) =>
      glossary.length ? checkGlossary(pair, glossary) : [],
  },
];

export interface RunChecksOptions {
  settings: CheckSettings;
  logger: CheckLogger;
  glossary?: GlossaryEntry[];
  /** called after every segment with (checked, total) */
  onSegmentChecked?: (checked: number, total: number) => void;
}

export function toIssue(
  pair: SegmentPair,
  finding: Finding,
  snippetLength: number,
): Issue {
  return {
    type: finding.type,
    severity: finding.severity,
    segment: pair.index,
    src: truncateSnippet(pair.source, snippetLength),
    tgt: truncateSnippet(pair.target, snippetLength),
    ...(finding.detail ? { detail: finding.detail } : {}),
  };
}

export function runChecks(
  pairs: SegmentPair[],
  options: RunChecksOptions,
): Issue[] {
  const { settings, logger, onSegmentChecked } = options;
  const context: CheckContext = {
    settings,
    glossary: options.glossary ?? [],
    expectedLengthRatio: computeExpectedLengthRatio(pairs, settings),
  };

  const issues: Issue[] = [];
  pairs.forEach((pair, position) => {
    for (const check of SEGMENT_CHECKS) {
      let findings: Finding[];
      try {
        findings = check.run(pair, context);
      } catch (err) {
        logger.warn(
          { err, check: check.name, segment: pair.index },
          "[checks] check failed for segment; skipping",
        );
        continue;
      }
      for (const finding of findings) {
        issues.push(toIssue(pair, finding, settings.snippetLength));
      }
    }
    onSegmentChecked?.(position + 1, pairs.length);
  });

  return issues;
}

export function summarizeIssues(
  issues: Issue[],
  segments: number,
): IssueSummary {
  return {
    segments,
    high: issues.filter((issue) => issue.severity === "high").length,
    medium: issues.filter((issue) => issue.severity === "medium").length,
    low: issues.filter((issue) => issue.severity === "low").length,
  };
}
