const JSON_CONTROL_CHAR_REGEX =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export interface ResponseLike {
  output_text?: unknown;
  output?: unknown;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object";

/** Text of a Responses API result, from `output_text` or the message parts. */
export const collectOutputText = (resp: ResponseLike): string | undefined => {
  const direct = resp.output_text;
  if (typeof direct === "string" && direct.trim()) return direct.trim();

  const items = Array.isArray(resp.output) ? resp.output : [];
  let buf = "";
  for (const item of items) {
    if (!isRecord(item) || item.type !== "message") continue;
    const contents = Array.isArray(item.content) ? item.content : [];
    for (const c of contents) {
      if (isRecord(c) && typeof c.text === "string") buf += c.text;
    }
  }
  const trimmed = buf.trim();
  return trimmed ? trimmed : undefined;
};

const CLOSERS: Record<string, string> = { "{": "}", "[": "]" };

/** Closers still owed at the end of `value`, innermost first. */
const pendingClosers = (value: string): { closers: string; openString: boolean } => {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;
  for (const char of value) {
    if (inString) {
      if (escaped) escaped = false;
      else if (char === "\\") escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === "{" || char === "[") stack.push(CLOSERS[char]);
    else if ((char === "}" || char === "]") && stack[stack.length - 1] === char) {
      stack.pop();
    }
  }
  return { closers: stack.reverse().join(""), openString: inString };
};

/** Drops control characters and closes strings, objects and arrays a cut-off answer left open. */
export const repairJsonString = (
  raw: string,
): { value: string; applied: boolean } => {
  let value = raw.trim();
  let applied = false;

  const sanitized = value.replace(JSON_CONTROL_CHAR_REGEX, "");
  if (sanitized !== value) {
    value = sanitized;
    applied = true;
  }

  const { closers, openString } = pendingClosers(value);
  if (openString) {
    value += '"';
    applied = true;
  }
  if (closers) {
    value += closers;
    applied = true;
  }

  return { value, applied };
};

/**
 * Parses model output that should be a JSON object: the raw text first,
 * then the outermost `{…}` span, then a structurally repaired copy.
 * Empty text yields null; text that never parses throws the last
 * SyntaxError.
 */
export function parseJsonObjectLoose(text: string | undefined): unknown {
  const trimmed = (text ?? "").trim();
  if (!trimmed) return null;

  const candidates = [trimmed];
  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start !== -1 && end > start) {
    candidates.push(trimmed.slice(start, end + 1));
  }
  if (start !== -1) {
    const repaired = repairJsonString(trimmed.slice(start));
    if (repaired.applied) candidates.push(repaired.value);
  }

  let lastError: unknown = null;
  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch (error) {
      lastError = error;
    }
  }
  throw lastError instanceof SyntaxError
    ? lastError
    : new SyntaxError("Model output is not valid JSON");
}
