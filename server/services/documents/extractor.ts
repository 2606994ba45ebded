import path from "node:path";

import iconv from "iconv-lite";
import mammoth from "mammoth";

import { normalizePlainText } from "../../utils/textNormalize";

const SUPPORTED_EXTENSIONS = [".txt", ".docx", ".pdf", ""];

const DEFAULT_FILE_SIZE_LIMIT = 10 * 1024 * 1024; // 10MB

type PdfParseFn = (buffer: Buffer) => Promise<{ text: string }>;

let pdfParseFn: PdfParseFn | null = null;

export interface DocumentExtractionInput {
  buffer: Buffer;
  filename: string;
  mimeType?: string | null;
  sizeLimitBytes?: number;
}

export interface DocumentMetadata {
  originalName: string;
  mimeType: string | null;
  extension: string;
  fileSize: number;
  extractor: string;
  characterCount: number;
  wordCount: number;
}

export interface DocumentExtractionResult {
  text: string;
  metadata: DocumentMetadata;
}

export class UnsupportedDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedDocumentError";
  }
}

export class DocumentTooLargeError extends Error {
  constructor(limitBytes: number) {
    super(
      `File exceeds maximum allowed size of ${Math.round(limitBytes / (1024 * 1024))}MB.`,
    );
    this.name = "DocumentTooLargeError";
  }
}

export class EmptyDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmptyDocumentError";
  }
}

/**
 * Rejects an upload before any parsing happens. Returns the lowercased
 * extension the extractor will dispatch on.
 */
export function assertUploadAcceptable(
  input: DocumentExtractionInput,
  allowedExtensions: readonly string[] = SUPPORTED_EXTENSIONS,
): string {
  const { buffer, filename } = input;
  const extension = path.extname(filename || "").toLowerCase();
  const sizeLimit = input.sizeLimitBytes ?? DEFAULT_FILE_SIZE_LIMIT;

  if (!buffer || buffer.length === 0) {
    throw new EmptyDocumentError(`Uploaded file is empty: ${filename || "unnamed"}`);
  }

  if (buffer.length > sizeLimit) {
    throw new DocumentTooLargeError(sizeLimit);
  }

  if (!allowedExtensions.includes(extension)) {
    throw new UnsupportedDocumentError(
      `Unsupported file type: ${extension || "unknown"}`,
    );
  }
  return extension;
}

export async function extractDocumentText(
  input: DocumentExtractionInput,
): Promise<DocumentExtractionResult> {
  const { buffer, filename } = input;
  const extension = assertUploadAcceptable(input);

  let extractor = "";
  let text = "";

  switch (extension) {
    case ".txt":
    case "":
      extractor = "plain";
      text = decodePlainText(buffer);
      break;
    case ".docx":
      extractor = "mammoth";
      text = await extractDocx(buffer);
      break;
    case ".pdf":
      extractor = "pdf-parse";
      text = await extractPdf(buffer);
      break;
    default:
      throw new UnsupportedDocumentError(
        `Unsupported file type: ${extension || "unknown"}`,
      );
  }

  const normalized = normalizePlainText(text);
  if (!normalized) {
    throw new EmptyDocumentError(
      "No textual content was extracted from the file",
    );
  }

  return {
    text: normalized,
    metadata: {
      originalName: filename,
      mimeType: input.mimeType ?? null,
      extension,
      fileSize: buffer.length,
      extractor,
      characterCount: normalized.length,
      wordCount: normalized.split(/\s+/).filter(Boolean).length,
    },
  };
}

/**
 * UTF-16 with a BOM, then strict UTF-8, then windows-1252 for legacy
 * single-byte exports.
 */
export function decodePlainText(buffer: Buffer): string {
  if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
    return iconv.decode(buffer, "utf-16le");
  }
  if (buffer.length >= 2 && buffer[0] === 0xfe && buffer[1] === 0xff) {
    return iconv.decode(buffer, "utf-16be");
  }

  const utf8 = buffer.toString("utf8");
  if (!utf8.includes("\uFFFD")) {
    return utf8.replace(/^\uFEFF/, "");
  }
  return iconv.decode(buffer, "win1252");
}

async function extractDocx(buffer: Buffer): Promise<string> {
  const { value } = await mammoth.extractRawText({ buffer });
  return value;
}

async function extractPdf(buffer: Buffer): Promise<string> {
  if (!pdfParseFn) {
    const loaded = await import("pdf-parse");
    pdfParseFn = loaded.default;
  }
  const result = await pdfParseFn(buffer);
  return result.text ?? "";
}
