import type { SegmentPair } from "../checks/types";
import { normalizePlainText } from "../../utils/textNormalize";

export interface AlignmentCoverage {
  sourceSegments: number;
  targetSegments: number;
  aligned: number;
  truncated: boolean;
  caveat: string | null;
}

export interface AlignedPairSet {
  pairs: SegmentPair[];
  coverage: AlignmentCoverage;
}

const SENTENCE_BREAK_RE = /(?<=[.!?。؟…])\s+|\n{2,}/u;

export function splitSentences(text: string): string[] {
  const normalized = normalizePlainText(text ?? "");
  if (!normalized) return [];
  return normalized
    .split(SENTENCE_BREAK_RE)
    .map((part) => part.trim())
    .filter(Boolean);
}

/**
 * Pairs segments 1:1 by position. When the counts differ, the longer side is
 * cut to the shorter one and the coverage record says so.
 */
export function alignSegments(
  sourceSegments: string[],
  targetSegments: string[],
): AlignedPairSet {
  const aligned = Math.min(sourceSegments.length, targetSegments.length);
  const pairs: SegmentPair[] = [];
  for (let position = 0; position < aligned; position += 1) {
    pairs.push({
      index: position + 1,
      source: sourceSegments[position],
      target: targetSegments[position],
    });
  }

  const truncated = sourceSegments.length !== targetSegments.length;
  return {
    pairs,
    coverage: {
      sourceSegments: sourceSegments.length,
      targetSegments: targetSegments.length,
      aligned,
      truncated,
      caveat: truncated
        ? `${sourceSegments.length} source / ${targetSegments.length} target segments; aligned first ${aligned}`
        : null,
    },
  };
}

export function alignTexts(source: string, target: string): AlignedPairSet {
  return alignSegments(splitSentences(source), splitSentences(target));
}
