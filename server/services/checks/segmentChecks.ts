import type { CheckSettings } from "../../config/checkDefaults";
import type { Finding, SegmentPair } from "./types";
import { extractNumbersAndDates, sameMultiset } from "./numbers";
import { partialRatio, ratio, roundScore } from "./similarity";

const DOUBLE_PUNCT_RE = /([!?.,:;！？。，：；])\1+/gu;
const EXTRA_SPACE_RE = /[^\S\r\n]{2,}/gu;
const NAME_TOKEN_RE = /\p{L}[\p{L}'-]*/gu;
const TITLE_TOKEN_RE = /^\p{Lu}(?:\p{Ll}|['-]\p{Lu}?)*\p{Ll}$/u;

const charLength = (value: string): number => Array.from(value).length;

export function checkNumbersAndDates(
  pair: SegmentPair,
  settings: CheckSettings,
): Finding[] {
  const source = extractNumbersAndDates(pair.source, settings);
  const target = extractNumbersAndDates(pair.target, settings);
  const findings: Finding[] = [];

  if (!sameMultiset(source.numbers, target.numbers)) {
    findings.push({
      type: "number_mismatch",
      severity: "high",
      detail: { src: source.numbers, tgt: target.numbers },
    });
  }
  if (!sameMultiset(source.dates, target.dates)) {
    findings.push({
      type: "date_mismatch",
      severity: "high",
      detail: { src: source.dates, tgt: target.dates },
    });
  }
  return findings;
}

export function checkUntranslated(
  pair: SegmentPair,
  settings: CheckSettings,
): Finding[] {
  const source = pair.source.trim();
  const target = pair.target.trim();
  if (!source || !target) return [];

  const similarity = partialRatio(source, target);
  if (similarity < settings.untranslated.threshold) return [];

  return [
    {
      type: "possibly_untranslated",
      severity: "medium",
      detail: { similarity: roundScore(similarity) },
    },
  ];
}

/**
 * Median target/source character ratio across pairs where both sides have
 * text. Small documents fall back to 1.0.
 */
export function computeExpectedLengthRatio(
  pairs: SegmentPair[],
  settings: CheckSettings,
): number {
  const ratios = pairs
    .filter((pair) => pair.source.trim() && pair.target.trim())
    .map((pair) => charLength(pair.target) / charLength(pair.source))
    .sort((a, b) => a - b);

  if (ratios.length < settings.lengthRatio.minSegmentsForCorpus) {
    return 1;
  }
  const middle = Math.floor(ratios.length / 2);
  return ratios.length % 2
    ? ratios[middle]
    : (ratios[middle - 1] + ratios[middle]) / 2;
}

export function checkLengthRatio(
  pair: SegmentPair,
  expectedRatio: number,
  settings: CheckSettings,
): Finding[] {
  if (!pair.source) return [];

  const lengthRatio = charLength(pair.target) / Math.max(1, charLength(pair.source));
  const lower = expectedRatio * settings.lengthRatio.lowerFactor;
  const upper = expectedRatio * settings.lengthRatio.upperFactor;
  if (lengthRatio >= lower && lengthRatio <= upper) return [];

  return [
    {
      type: "length_ratio",
      severity: "low",
      detail: {
        ratio: roundScore(lengthRatio),
        expected: roundScore(expectedRatio),
        band: [roundScore(lower), roundScore(upper)],
      },
    },
  ];
}

export function checkOrthography(pair: SegmentPair): Finding[] {
  const target = pair.target;
  if (!target) return [];
  const findings: Finding[] = [];

  const spaceRuns = target.match(EXTRA_SPACE_RE) ?? [];
  if (spaceRuns.length) {
    findings.push({
      type: "orthography_extra_spaces",
      severity: "low",
      detail: { count: spaceRuns.length },
    });
  }

  const repeats = new Map<string, string[]>();
  for (const match of target.matchAll(DOUBLE_PUNCT_RE)) {
    if (match[0] === "...") continue;
    const mark = match[1];
    repeats.set(mark, [...(repeats.get(mark) ?? []), match[0]]);
  }
  repeats.forEach((occurrences, mark) => {
    findings.push({
      type: "orthography_double_punctuation",
      severity: "low",
      detail: { mark, occurrences },
    });
  });

  return findings;
}

/** Runs of two or more Title-case tokens, e.g. "Marie Curie". */
export function extractNameSpans(text: string): string[] {
  const spans: string[] = [];
  let current: string[] = [];

  const flush = () => {
    if (current.length >= 2) spans.push(current.join(" "));
    current = [];
  };

  for (const [token] of (text ?? "").matchAll(NAME_TOKEN_RE)) {
    if (TITLE_TOKEN_RE.test(token)) {
      current.push(token);
    } else {
      flush();
    }
  }
  flush();
  return spans;
}

export function checkNameTypos(
  pair: SegmentPair,
  settings: CheckSettings,
): Finding[] {
  const targetNames = extractNameSpans(pair.target);
  if (!targetNames.length) return [];

  const findings: Finding[] = [];
  for (const sourceName of extractNameSpans(pair.source)) {
    if (pair.target.includes(sourceName)) continue;

    let best: string | null = null;
    let bestScore = 0;
    for (const candidate of targetNames) {
      const score = ratio(sourceName, candidate);
      if (score > bestScore) {
        best = candidate;
        bestScore = score;
      }
    }
    if (!best || bestScore < settings.names.threshold) continue;

    findings.push({
      type: "name_possible_typo",
      severity: bestScore >= settings.names.mediumThreshold ? "medium" : "low",
      detail: {
        sourceName,
        targetNear: best,
        score: roundScore(bestScore),
      },
    });
  }
  return findings;
}
