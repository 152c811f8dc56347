import * as fs from "fs";
import * as path from "path";
import type { DocumentDescriptor } from "./wiki-document-loader";

const RULE = "=".repeat(80);
const SEPARATOR = "-".repeat(80);
export const CONTENT_UNAVAILABLE = "[Content not available]";

export const REPORT_HEADER = `${RULE}\nLARK WIKI DOCUMENTS - WITH CONTENT\n${RULE}\n\n`;

function formatDocumentBlock(doc: DocumentDescriptor): string {
  const lines = [
    `📄 DOCUMENT ${doc.number}: ${doc.title}`,
    `   Level: ${doc.level}`,
    `   Node Token: ${doc.node_token}`,
  ];
  if (doc.parent && doc.parent !== "ROOT") {
    lines.push(`   Parent: ${doc.parent}`);
  }
  if (doc.path) {
    lines.push(`   Path: ${doc.path}`);
  }
  lines.push(`   Document Token: ${doc.document_token}`, `   URL: ${doc.url}`);

  // Empty text is reported the same as a failed fetch
  const body = doc.content ? `${doc.content}\n\n` : `${CONTENT_UNAVAILABLE}\n\n`;

  return `${lines.join("\n")}\n\n${SEPARATOR}\n\n${body}${SEPARATOR}\n\n`;
}

/**
 * Render the report. Deterministic for a given input: no timestamps.
 */
export function formatWikiReport(documents: DocumentDescriptor[]): string {
  return REPORT_HEADER + documents.map(formatDocumentBlock).join("");
}

function ensureParentDir(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

/**
 * Write the report, replacing any existing file
 */
export function writeWikiReport(outputFile: string, documents: DocumentDescriptor[]): void {
  ensureParentDir(outputFile);
  fs.writeFileSync(outputFile, formatWikiReport(documents), "utf-8");
}

/**
 * Export the annotated descriptors as JSON, `content: null` where absent
 */
export function writeDescriptorsJson(outputFile: string, documents: DocumentDescriptor[]): void {
  ensureParentDir(outputFile);
  const annotated = documents.map((doc) => ({ ...doc, content: doc.content ?? null }));
  fs.writeFileSync(outputFile, JSON.stringify(annotated, null, 2) + "\n", "utf-8");
}
