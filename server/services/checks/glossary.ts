import path from "node:path";
import { z } from "zod";

import type { Finding, GlossaryEntry, SegmentPair } from "./types";
import { normalizeForMatch } from "../../utils/textNormalize";

export class GlossaryFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GlossaryFormatError";
  }
}

export const GLOSSARY_EXTENSIONS = [".csv", ".tsv", ".txt", ".json", ""];

const HEADER_TERMS = new Set(["term", "source", "source term", "original"]);
const HEADER_TRANSLATIONS = new Set([
  "translation",
  "target",
  "preferred",
  "preferred translation",
]);

// Scripts written without spaces between words; whole-word matching does not apply.
const UNSPACED_SCRIPT_RE =
  /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}\p{Script=Thai}]/u;

const GlossaryObjectSchema = z.record(z.string());
const GlossaryArraySchema = z.array(
  z.union([
    z.object({ term: z.string(), translation: z.string() }),
    z.object({ source: z.string(), target: z.string() }),
  ]),
);

function parseDelimitedLine(line: string, delimiter: string): string[] {
  const cells: string[] = [];
  let cell = "";
  let quoted = false;

  for (let i = 0; i < line.length; i += 1) {
    const char = line[i];
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        cell += '"';
        i += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        cell += char;
      }
      continue;
    }
    if (char === '"' && cell.trim() === "") {
      quoted = true;
      cell = "";
    } else if (char === delimiter) {
      cells.push(cell.trim());
      cell = "";
    } else {
      cell += char;
    }
  }
  cells.push(cell.trim());
  return cells;
}

function detectDelimiter(line: string): string {
  if (line.includes("\t")) return "\t";
  if (line.includes(",")) return ",";
  if (line.includes(";")) return ";";
  return ",";
}

function parseDelimitedGlossary(text: string): GlossaryEntry[] {
  const lines = text
    .replace(/^\uFEFF/, "")
    .split(/\r\n?|\n/)
    .map((line, index) => ({ line, lineNumber: index + 1 }))
    .filter(({ line }) => line.trim() && !line.trim().startsWith("#"));

  if (!lines.length) return [];

  const delimiter = detectDelimiter(lines[0].line);
  const entries: GlossaryEntry[] = [];

  lines.forEach(({ line, lineNumber }, position) => {
    const [term = "", translation = ""] = parseDelimitedLine(line, delimiter);
    if (
      position === 0 &&
      HEADER_TERMS.has(term.toLowerCase()) &&
      HEADER_TRANSLATIONS.has(translation.toLowerCase())
    ) {
      return;
    }
    if (!term || !translation) {
      throw new GlossaryFormatError(
        `Glossary line ${lineNumber} needs a term and a translation`,
      );
    }
    entries.push({ term, translation });
  });

  return entries;
}

function parseJsonGlossary(text: string): GlossaryEntry[] {
  let data: unknown;
  try {
    data = JSON.parse(text.replace(/^\uFEFF/, ""));
  } catch {
    throw new GlossaryFormatError("Glossary JSON could not be parsed");
  }

  const asArray = GlossaryArraySchema.safeParse(data);
  if (asArray.success) {
    return asArray.data.map((item) =>
      "term" in item
        ? { term: item.term.trim(), translation: item.translation.trim() }
        : { term: item.source.trim(), translation: item.target.trim() },
    );
  }

  const asObject = GlossaryObjectSchema.safeParse(data);
  if (asObject.success) {
    return Object.entries(asObject.data).map(([term, translation]) => ({
      term: term.trim(),
      translation: translation.trim(),
    }));
  }

  throw new GlossaryFormatError(
    "Glossary JSON must be an object of term → translation or an array of { term, translation }",
  );
}

export function parseGlossary(text: string, filename: string): GlossaryEntry[] {
  const extension = path.extname(filename || "").toLowerCase();
  if (!GLOSSARY_EXTENSIONS.includes(extension)) {
    throw new GlossaryFormatError(
      `Unsupported glossary type: ${extension || "unknown"}`,
    );
  }

  const entries =
    extension === ".json"
      ? parseJsonGlossary(text)
      : parseDelimitedGlossary(text);

  const usable = entries.filter((entry) => entry.term && entry.translation);
  if (!usable.length) {
    throw new GlossaryFormatError("Glossary file has no entries");
  }
  return usable;
}

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Case- and spacing-insensitive containment. Spaced scripts need a word
 * boundary before the needle, and after it too when `wholeWord` is set.
 */
export function containsTerm(
  haystack: string,
  needle: string,
  wholeWord: boolean,
): boolean {
  const normalizedHaystack = normalizeForMatch(haystack);
  const normalizedNeedle = normalizeForMatch(needle);
  if (!normalizedHaystack || !normalizedNeedle) return false;
  if (UNSPACED_SCRIPT_RE.test(normalizedNeedle)) {
    return normalizedHaystack.includes(normalizedNeedle);
  }
  const tail = wholeWord ? "(?![\\p{L}\\p{N}])" : "";
  return new RegExp(
    `(?<![\\p{L}\\p{N}])${escapeRegExp(normalizedNeedle)}${tail}`,
    "u",
  ).test(normalizedHaystack);
}

export function checkGlossary(
  pair: SegmentPair,
  glossary: GlossaryEntry[],
): Finding[] {
  const findings: Finding[] = [];
  for (const entry of glossary) {
    if (!containsTerm(pair.source, entry.term, true)) continue;
    if (containsTerm(pair.target, entry.translation, false)) continue;
    findings.push({
      type: "glossary_mismatch",
      severity: "medium",
      detail: { term: entry.term, expected: entry.translation },
    });
  }
  return findings;
}
