const ZERO_WIDTH_CHARS = new Set([
  "\u{FEFF}",
  "\u{200B}",
  "\u{200C}",
  "\u{200D}",
  "\u{2060}",
  "\u{180E}",
  "\u{034F}",
]);

const WIDE_SPACE_REPLACEMENTS = new Map<string, string>([
  ["\u{00A0}", " "],
  ["\u{1680}", " "],
  ["\u{2000}", " "],
  ["\u{2001}", " "],
  ["\u{2002}", " "],
  ["\u{2003}", " "],
  ["\u{2004}", " "],
  ["\u{2005}", " "],
  ["\u{2006}", " "],
  ["\u{2007}", " "],
  ["\u{2008}", " "],
  ["\u{2009}", " "],
  ["\u{200A}", " "],
  ["\u{202F}", " "],
  ["\u{205F}", " "],
  ["\u{3000}", " "],
]);

// Code points of "0" for the decimal digit blocks seen in uploaded documents.
const DIGIT_ZEROES = [
  0x0660, // Arabic-Indic
  0x06f0, // Extended Arabic-Indic (Persian, Urdu)
  0x07c0, // NKo
  0x0966, // Devanagari
  0x09e6, // Bengali
  0x0a66, // Gurmukhi
  0x0ae6, // Gujarati
  0x0b66, // Oriya
  0x0be6, // Tamil
  0x0c66, // Telugu
  0x0ce6, // Kannada
  0x0d66, // Malayalam
  0x0e50, // Thai
  0x0ed0, // Lao
  0x0f20, // Tibetan
  0x1040, // Myanmar
  0x17e0, // Khmer
  0x1810, // Mongolian
  0xff10, // Fullwidth
];

const WORD_NORMALIZER = /[^\p{L}\p{N}\s'-]/gu;

const isDisallowedControlChar = (code: number): boolean =>
  (code >= 0x00 && code <= 0x08) ||
  code === 0x0b ||
  code === 0x0c ||
  (code >= 0x0e && code <= 0x1f) ||
  (code >= 0x7f && code <= 0x9f);

const scrubSpecialCharacters = (input: string): string => {
  if (!input) return "";
  let output = "";
  for (const char of input) {
    if (ZERO_WIDTH_CHARS.has(char)) {
      continue;
    }
    const replacement = WIDE_SPACE_REPLACEMENTS.get(char);
    if (replacement !== undefined) {
      output += replacement;
      continue;
    }
    if (isDisallowedControlChar(char.charCodeAt(0))) {
      continue;
    }
    output += char;
  }
  return output;
};

/**
 * Light normalization for extracted document text: unified line endings,
 * no zero-width or control characters, wide spaces folded to ASCII space,
 * trailing line whitespace removed, NFC. Runs of spaces inside a line are
 * left untouched so the orthography check still sees them.
 */
export function normalizePlainText(raw: string): string {
  if (!raw) return "";

  return scrubSpecialCharacters(raw.replace(/\r\n?/g, "\n"))
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim()
    .normalize("NFC");
}

/** Replaces decimal digits from other scripts with their ASCII value. */
export function foldDigits(text: string): string {
  if (!text) return "";
  let out = "";
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    const zero = DIGIT_ZEROES.find((start) => code >= start && code <= start + 9);
    out += zero === undefined ? char : String(code - zero);
  }
  return out;
}

export function normalizeForMatch(value: string): string {
  return value
    .normalize("NFC")
    .toLowerCase()
    .replace(WORD_NORMALIZER, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function truncateSnippet(value: string, maxLength: number): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, Math.max(0, maxLength - 1))}…`;
}
