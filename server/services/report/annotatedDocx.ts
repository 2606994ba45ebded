import { strToU8, zip } from "fflate";

import type { Issue, SegmentPair, Severity } from "../checks/types";
import { describeIssue, groupIssuesBySegment, highestSeverity } from "./issueText";

export const DOCX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export const SEVERITY_HIGHLIGHT: Record<Severity, string> = {
  high: "yellow",
  medium: "green",
  low: "lightGray",
};

const BULLET_NUM_ID = 1;

// characters XML 1.0 does not allow in a document
const XML_INVALID_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

export function escapeXml(text: string): string {
  return text
    .replace(XML_INVALID_CHARS, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

const CONTENT_TYPES = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
<Default Extension="xml" ContentType="application/xml"/>
<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
<Override PartName="/word/numbering.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.numbering+xml"/>
</Types>`;

const PACKAGE_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`;

const DOCUMENT_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/numbering" Target="numbering.xml"/>
</Relationships>`;

const NUMBERING = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:numbering xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">
<w:abstractNum w:abstractNumId="0">
<w:lvl w:ilvl="0"><w:start w:val="1"/><w:numFmt w:val="bullet"/><w:lvlText w:val="•"/><w:lvlJc w:val="left"/><w:pPr><w:ind w:left="720" w:hanging="360"/></w:pPr></w:lvl>
</w:abstractNum>
<w:num w:numId="${BULLET_NUM_ID}"><w:abstractNumId w:val="0"/></w:num>
</w:numbering>`;

const runXml = (text: string, highlight?: string): string => {
  const props = highlight ? `<w:rPr><w:highlight w:val="${highlight}"/></w:rPr>` : "";
  const lines = text.split("\n").map(
    (line) => `<w:t xml:space="preserve">${escapeXml(line)}</w:t>`,
  );
  return `<w:r>${props}${lines.join("<w:br/>")}</w:r>`;
};

const paragraphXml = (runs: string[], bullet = false): string => {
  const props = bullet
    ? `<w:pPr><w:numPr><w:ilvl w:val="0"/><w:numId w:val="${BULLET_NUM_ID}"/></w:numPr></w:pPr>`
    : "";
  return `<w:p>${props}${runs.join("")}</w:p>`;
};

const documentXml = (paragraphs: string[]): string =>
  `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${paragraphs.join("")}<w:sectPr/></w:body></w:document>`;

/** One bullet line per issue: type, severity, evidence and suggestion. */
export function issueBulletText(issue: Issue): string {
  const { evidence, suggestion } = describeIssue(issue);
  let text = `Segment ${issue.segment} - ${issue.type} (${issue.severity}): ${evidence}`;
  if (suggestion) text += ` | Suggestion: ${suggestion}`;
  return text;
}

export function buildAnnotatedDocumentXml(
  pairs: SegmentPair[],
  issues: Issue[],
): string {
  const bySegment = groupIssuesBySegment(issues);
  const paragraphs: string[] = [];
  for (const pair of pairs) {
    const segmentIssues = bySegment.get(pair.index) ?? [];
    const top = highestSeverity(segmentIssues);
    if (!top) {
      paragraphs.push(paragraphXml([runXml(pair.target)]));
      continue;
    }
    const types = segmentIssues.map((issue) => issue.type).join(", ");
    paragraphs.push(
      paragraphXml([
        runXml(pair.target, SEVERITY_HIGHLIGHT[top]),
        runXml(`  [ISSUES: ${types}]`),
      ]),
    );
    for (const issue of segmentIssues) {
      paragraphs.push(paragraphXml([runXml(issueBulletText(issue))], true));
    }
  }
  return documentXml(paragraphs);
}

export function buildCleanDocumentXml(targets: string[]): string {
  return documentXml(targets.map((target) => paragraphXml([runXml(target)])));
}

export async function createDocxBytes(
  files: Record<string, Uint8Array>,
): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    zip(files, (err, result) => {
      if (err) reject(err);
      else resolve(result);
    });
  });
}

const packageDocument = (document: string): Promise<Uint8Array> =>
  createDocxBytes({
    "[Content_Types].xml": strToU8(CONTENT_TYPES),
    "_rels/.rels": strToU8(PACKAGE_RELS),
    "word/_rels/document.xml.rels": strToU8(DOCUMENT_RELS),
    "word/numbering.xml": strToU8(NUMBERING),
    "word/document.xml": strToU8(document),
  });

/**
 * The translation with one paragraph per segment. Segments with issues are
 * highlighted by their worst severity, tagged inline and followed by one
 * bullet per issue.
 */
export function buildAnnotatedDocx(
  pairs: SegmentPair[],
  issues: Issue[],
): Promise<Uint8Array> {
  return packageDocument(buildAnnotatedDocumentXml(pairs, issues));
}

export function buildCleanDocx(pairs: SegmentPair[]): Promise<Uint8Array> {
  return packageDocument(buildCleanDocumentXml(pairs.map((pair) => pair.target)));
}
