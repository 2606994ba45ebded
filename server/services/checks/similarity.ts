/**
 * Fuzzy string similarity on a 0-100 scale, based on the Indel distance
 * (insertions and deletions only), so `ratio = 2 * LCS / (|a| + |b|)`.
 */

function longestCommonSubsequence(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  if (!left.length || !right.length) return 0;

  let previous = new Array<number>(right.length + 1).fill(0);
  let current = new Array<number>(right.length + 1).fill(0);

  for (let i = 1; i <= left.length; i += 1) {
    for (let j = 1; j <= right.length; j += 1) {
      current[j] =
        left[i - 1] === right[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
    current.fill(0);
  }

  return previous[right.length];
}

export function ratio(a: string, b: string): number {
  const lengthA = Array.from(a).length;
  const lengthB = Array.from(b).length;
  if (lengthA === 0 && lengthB === 0) return 100;
  if (lengthA === 0 || lengthB === 0) return 0;
  return (200 * longestCommonSubsequence(a, b)) / (lengthA + lengthB);
}

const toCodePoints = (value: string): Int32Array =>
  Int32Array.from(Array.from(value), (char) => char.codePointAt(0) ?? 0);

/**
 * LCS of `needle` against every `needle.length` window of `haystack`, in
 * one O(|needle| * |haystack|) pass (seaweed combing). Entry `s` is the LCS
 * with the window starting at `s`.
 */
export function windowedLcs(needle: string, haystack: string): number[] {
  const short = toCodePoints(needle);
  const long = toCodePoints(haystack);
  const m = short.length;
  const total = long.length;
  if (!m || m > total) return [];

  // strands entering from the left are 0..m-1, from the top m..m+total-1
  const horizontal = Int32Array.from({ length: m }, (_, i) => i);
  const vertical = Int32Array.from({ length: total }, (_, j) => j + m);
  for (let i = 0; i < m; i += 1) {
    const char = short[i];
    for (let j = 0; j < total; j += 1) {
      const h = horizontal[i];
      const v = vertical[j];
      if (char === long[j] || h > v) {
        horizontal[i] = v;
        vertical[j] = h;
      }
    }
  }

  // bottom exit column of each top strand; `total` when it leaves on the right
  const exitColumn = new Int32Array(total).fill(total);
  for (let column = 0; column < total; column += 1) {
    const strand = vertical[column];
    if (strand >= m) exitColumn[strand - m] = column;
  }
  const enteringByExit: number[][] = Array.from({ length: total }, () => []);
  exitColumn.forEach((exit, start) => {
    if (exit < total) enteringByExit[exit].push(start);
  });

  // a top strand that also exits at the bottom within the window is an
  // unmatched column of that window
  let unmatched = 0;
  for (let j = 0; j < m; j += 1) {
    if (exitColumn[j] < m) unmatched += 1;
  }
  const result = [m - unmatched];
  for (let start = 1; start + m <= total; start += 1) {
    const end = start + m;
    if (exitColumn[start - 1] < end - 1) unmatched -= 1;
    for (const entering of enteringByExit[end - 1]) {
      if (entering >= start) unmatched += 1;
    }
    result.push(m - unmatched);
  }
  return result;
}

/**
 * Best `ratio` between the shorter string and every same-length window of
 * the longer one.
 */
export function partialRatio(a: string, b: string): number {
  const lengthA = Array.from(a).length;
  const lengthB = Array.from(b).length;
  if (!lengthA || !lengthB) return 0;
  if (lengthA === lengthB) return ratio(a, b);

  const [shorter, longer, size] =
    lengthA < lengthB ? [a, b, lengthA] : [b, a, lengthB];
  const best = windowedLcs(shorter, longer).reduce(
    (max, value) => Math.max(max, value),
    0,
  );
  return (100 * best) / size;
}

export const roundScore = (score: number): number =>
  Math.round(score * 100) / 100;
