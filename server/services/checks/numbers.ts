import monthNames from "../../config/monthNames.json";
import type {
  DateOrder,
  DateSettings,
  NumberSettings,
} from "../../config/checkDefaults";
import { foldDigits } from "../../utils/textNormalize";

export interface ParsedNumber {
  raw: string;
  value: number;
  /** decimal string without grouping, leading integer zeros or trailing fraction zeros */
  canonical: string;
}

export interface DateMatch {
  raw: string;
  start: number;
  end: number;
  /** YYYY-MM-DD */
  iso: string;
}

export interface NumbersAndDates {
  numbers: string[];
  dates: string[];
}

const MONTH_LOOKUP = new Map<string, number>();
for (const [month, names] of Object.entries(monthNames)) {
  for (const name of names) {
    MONTH_LOOKUP.set(name.normalize("NFC").toLowerCase(), Number(month));
  }
}

const MONTH_ALTERNATION = [...MONTH_LOOKUP.keys()]
  .sort((a, b) => b.length - a.length)
  .map((name) => name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"))
  .join("|");

const NUMERIC_DATE_RE =
  /(?<![\p{L}\p{N}])(\d{1,2})([\/.-])(\d{1,2})\2(\d{4})(?![\p{L}\p{N}])/gu;
const ISO_DATE_RE =
  /(?<![\p{L}\p{N}])(\d{4})([\/.-])(\d{1,2})\2(\d{1,2})(?![\p{L}\p{N}])/gu;
const DAY_MONTH_YEAR_RE = new RegExp(
  `(?<![\\p{L}\\p{N}])(\\d{1,2})(?:st|nd|rd|th|er|º|°)?\\.?\\s+(?:de\\s+|of\\s+)?(${MONTH_ALTERNATION})\\.?,?\\s+(?:de\\s+)?(\\d{4})(?![\\p{L}\\p{N}])`,
  "giu",
);
const MONTH_DAY_YEAR_RE = new RegExp(
  `(?<![\\p{L}\\p{N}])(${MONTH_ALTERNATION})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})(?![\\p{L}\\p{N}])`,
  "giu",
);

const NUMBER_WITH_SPACE_GROUPING_RE =
  /(?<![\p{L}\p{N}_])[+-]?(?:\d{1,3}(?:[.,\u0020\u00A0]\d{3})*(?:[.,]\d+)?|\d+(?:[.,]\d+)?)(?![\p{L}\p{N}_])/gu;
const NUMBER_RE =
  /(?<![\p{L}\p{N}_])[+-]?(?:\d{1,3}(?:[.,]\d{3})*(?:[.,]\d+)?|\d+(?:[.,]\d+)?)(?![\p{L}\p{N}_])/gu;

const pad2 = (value: number): string => String(value).padStart(2, "0");

function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return `${String(year).padStart(4, "0")}-${pad2(month)}-${pad2(day)}`;
}

function resolveNumericDate(
  first: number,
  second: number,
  year: number,
  order: DateOrder,
): string | null {
  const [day, month] = order === "DMY" ? [first, second] : [second, first];
  return toIsoDate(year, month, day) ?? toIsoDate(year, day, month);
}

const monthFromName = (name: string): number | undefined =>
  MONTH_LOOKUP.get(name.normalize("NFC").toLowerCase());

/**
 * Finds dates in the text and returns them ordered by position, without
 * overlaps. Input is digit-folded first, so spans refer to the folded text,
 * which has the same length as the original for BMP digits.
 */
export function findDates(
  text: string,
  settings: DateSettings,
): DateMatch[] {
  const folded = foldDigits(text ?? "");
  const candidates: DateMatch[] = [];

  const push = (match: RegExpMatchArray, iso: string | null) => {
    if (!iso || match.index === undefined) return;
    candidates.push({
      raw: match[0],
      start: match.index,
      end: match.index + match[0].length,
      iso,
    });
  };

  for (const match of folded.matchAll(NUMERIC_DATE_RE)) {
    push(
      match,
      resolveNumericDate(
        Number(match[1]),
        Number(match[3]),
        Number(match[4]),
        settings.order,
      ),
    );
  }

  for (const match of folded.matchAll(ISO_DATE_RE)) {
    push(
      match,
      toIsoDate(Number(match[1]), Number(match[3]), Number(match[4])),
    );
  }

  for (const match of folded.matchAll(DAY_MONTH_YEAR_RE)) {
    const month = monthFromName(match[2]);
    if (month === undefined) continue;
    push(match, toIsoDate(Number(match[3]), month, Number(match[1])));
  }

  for (const match of folded.matchAll(MONTH_DAY_YEAR_RE)) {
    const month = monthFromName(match[1]);
    if (month === undefined) continue;
    push(match, toIsoDate(Number(match[3]), month, Number(match[2])));
  }

  candidates.sort((a, b) => a.start - b.start || b.end - a.end);

  const accepted: DateMatch[] = [];
  for (const candidate of candidates) {
    const last = accepted[accepted.length - 1];
    if (last && candidate.start < last.end) continue;
    accepted.push(candidate);
  }
  return accepted;
}

/**
 * Reads a number written with either `.` or `,` as the decimal mark.
 * Returns null when the token is not a number.
 */
export function parseLocaleNumber(
  raw: string,
  settings: NumberSettings,
): ParsedNumber | null {
  const unsigned = foldDigits(raw ?? "").trim().replace(/^[+-]/, "");
  const compact = settings.allowSpaceGrouping
    ? unsigned.replace(/[\u0020\u00A0]/g, "")
    : unsigned;
  if (!/^\d(?:[\d.,]*\d)?$/.test(compact)) {
    return null;
  }

  const lastDot = compact.lastIndexOf(".");
  const lastComma = compact.lastIndexOf(",");
  let decimalIndex = -1;

  if (lastDot !== -1 && lastComma !== -1) {
    decimalIndex = Math.max(lastDot, lastComma);
  } else if (lastDot !== -1 || lastComma !== -1) {
    const separator = lastDot !== -1 ? "." : ",";
    const index = Math.max(lastDot, lastComma);
    const occurrences = compact.split(separator).length - 1;
    if (occurrences === 1) {
      const integerPart = compact.slice(0, index);
      const fraction = compact.slice(index + 1);
      const readsAsGrouping =
        settings.groupingOnly === "thousands" &&
        fraction.length === 3 &&
        integerPart.length <= 3 &&
        integerPart !== "0";
      decimalIndex = readsAsGrouping ? -1 : index;
    }
  }

  const integerDigits = (
    decimalIndex === -1 ? compact : compact.slice(0, decimalIndex)
  ).replace(/[.,]/g, "");
  const fractionDigits =
    decimalIndex === -1 ? "" : compact.slice(decimalIndex + 1).replace(/[.,]/g, "");

  const integer = integerDigits.replace(/^0+(?=\d)/, "");
  const fraction = fractionDigits.replace(/0+$/, "");
  const canonical = fraction ? `${integer}.${fraction}` : integer;

  return { raw, value: Number(canonical), canonical };
}

/** Canonical numbers (outside date spans) and ISO dates found in the text. */
export function extractNumbersAndDates(
  text: string,
  settings: { numbers: NumberSettings; dates: DateSettings },
): NumbersAndDates {
  const folded = foldDigits(text ?? "");
  const dates = findDates(folded, settings.dates);
  const numberRe = settings.numbers.allowSpaceGrouping
    ? NUMBER_WITH_SPACE_GROUPING_RE
    : NUMBER_RE;

  const insideDate = (start: number, end: number) =>
    dates.some((date) => start < date.end && end > date.start);

  const numbers: string[] = [];
  for (const match of folded.matchAll(numberRe)) {
    if (match.index === undefined) continue;
    if (insideDate(match.index, match.index + match[0].length)) continue;
    const parsed = parseLocaleNumber(match[0], settings.numbers);
    if (parsed) numbers.push(parsed.canonical);
  }

  return { numbers, dates: dates.map((date) => date.iso) };
}

/** Multiset equality over string values. */
export function sameMultiset(a: string[], b: string[]): boolean {
  if (a.length !== b.length) return false;
  const left = [...a].sort();
  const right = [...b].sort();
  return left.every((value, index) => value === right[index]);
}
