import path from "node:path";

import type { FastifyRequest } from "fastify";

import { GlossaryFormatError, parseGlossary } from "../services/checks/glossary";
import {
  assertUploadAcceptable,
  decodePlainText,
} from "../services/documents/extractor";
import type { UploadedDocument } from "../services/runs/analysisPipeline";
import type { StartRunInput } from "../services/runs/runService";
import { RUN_MODES, type RunMode } from "../services/runs/types";

export class UploadValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UploadValidationError";
  }
}

const isRunMode = (value: string): value is RunMode =>
  RUN_MODES.some((mode) => mode === value);

interface CollectedUpload {
  files: Map<string, UploadedDocument>;
  fields: Map<string, string>;
}

async function collectParts(request: FastifyRequest): Promise<CollectedUpload> {
  const files = new Map<string, UploadedDocument>();
  const fields = new Map<string, string>();
  for await (const part of request.parts()) {
    if (part.type === "file") {
      const buffer = await part.toBuffer();
      files.set(part.fieldname, {
        buffer,
        filename: part.filename,
        mimeType: part.mimetype,
      });
    } else if (typeof part.value === "string") {
      fields.set(part.fieldname, part.value);
    }
  }
  return { files, fields };
}

function readGlossary(
  upload: UploadedDocument | undefined,
): Pick<StartRunInput, "glossary" | "glossaryFile"> {
  if (!upload || !upload.buffer.length) {
    return { glossary: [], glossaryFile: null };
  }
  const text = decodePlainText(upload.buffer);
  const glossary = parseGlossary(text, upload.filename);
  return {
    glossary,
    glossaryFile: {
      role: "glossary",
      name: upload.filename,
      extension: path.extname(upload.filename).toLowerCase(),
      extractor: "glossary",
      size: upload.buffer.length,
      characters: text.length,
    },
  };
}

/**
 * Reads the multipart upload for `/start` and `/analyze` and rejects it
 * before a run exists when a file or field is unusable.
 */
export async function readAnalysisUpload(
  request: FastifyRequest,
  sizeLimitBytes: number,
): Promise<StartRunInput> {
  if (!request.isMultipart()) {
    throw new UploadValidationError("Expected a multipart/form-data upload");
  }
  const { files, fields } = await collectParts(request);

  const original = files.get("original");
  const translation = files.get("translation");
  if (!original || !translation) {
    throw new UploadValidationError(
      "Both 'original' and 'translation' files are required",
    );
  }
  assertUploadAcceptable({ ...original, sizeLimitBytes });
  assertUploadAcceptable({ ...translation, sizeLimitBytes });

  const rawMode = (fields.get("mode") ?? "checks").trim().toLowerCase() || "checks";
  if (!isRunMode(rawMode)) {
    throw new UploadValidationError(
      `Unknown mode '${rawMode}'; expected one of ${RUN_MODES.join(", ")}`,
    );
  }

  let glossaryPart: Pick<StartRunInput, "glossary" | "glossaryFile">;
  try {
    glossaryPart = readGlossary(files.get("glossary"));
  } catch (error) {
    if (error instanceof GlossaryFormatError) throw error;
    throw new GlossaryFormatError(
      `Could not read glossary: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return {
    mode: rawMode,
    original,
    translation,
    ...glossaryPart,
    apiKey: fields.get("apiKey") ?? null,
    model: fields.get("model")?.trim() || null,
    context: fields.get("context")?.trim() || null,
  };
}
