/**
 * Wiki content retrieval pipeline
 *
 * load descriptors → (token present) fetch each document → write report
 *                  → (no token) list pending documents and stop
 *
 * Returns the process exit code: 0 on dry or live completion, 1 when the
 * input file is missing. Other errors propagate to the caller.
 */

import { fetchHttpClient, type HttpClient } from "./http-client";
import { logger as defaultLogger, type Logger } from "./logger";
import { ACCESS_TOKEN_ENV, type WikiContentConfig } from "./wiki-config";
import { retrieveContents } from "./wiki-content-fetcher";
import { loadDocumentDescriptors, type DocumentDescriptor } from "./wiki-document-loader";
import { MissingCredentialError, MissingInputError } from "./wiki-errors";
import { writeDescriptorsJson, writeWikiReport } from "./wiki-report";

export interface PipelineDeps {
  http?: HttpClient;
  logger?: Logger;
}

const RULE = "=".repeat(80);

function listPendingDocuments(documents: DocumentDescriptor[], log: Logger): void {
  const reason = new MissingCredentialError(ACCESS_TOKEN_ENV);
  log.warn(`⚠️  User access token not found (${reason.message})`);
  log.info("To retrieve content, set the token and run again:");
  log.info(`  export ${ACCESS_TOKEN_ENV}='your_token'`);
  log.info("📋 Document tokens to retrieve:");
  for (const doc of documents) {
    log.info(`  • ${doc.title}: ${doc.document_token}`);
  }
  log.info("💡 To retrieve manually, call docx.v1.document.rawContent with document_id = <document token>");
}

export async function runWikiContentRetrieval(
  config: WikiContentConfig,
  deps: PipelineDeps = {}
): Promise<number> {
  const log = deps.logger ?? defaultLogger;
  const http = deps.http ?? fetchHttpClient;

  let documents: DocumentDescriptor[];
  try {
    documents = loadDocumentDescriptors(config.inputFile);
  } catch (error) {
    if (error instanceof MissingInputError) {
      log.error(`Error: ${error.message}`);
      log.error("Run the wiki enumeration step (get_all_wiki_docs) first to generate the JSON file.");
      return 1;
    }
    throw error;
  }

  log.info(RULE);
  log.info("Lark Wiki Document Content Retrieval");
  log.info(RULE);
  log.info(`Found ${documents.length} documents`);
  log.info(`Input: ${config.inputFile}`);
  log.info(`Output: ${config.outputFile}`);

  if (!config.accessToken) {
    listPendingDocuments(documents, log);
    return 0;
  }

  const { summary } = await retrieveContents(documents, {
    http,
    accessToken: config.accessToken,
    apiBaseUrl: config.apiBaseUrl,
    logger: log,
  });

  writeWikiReport(config.outputFile, documents);
  if (config.jsonOutputFile) {
    writeDescriptorsJson(config.jsonOutputFile, documents);
    log.info(`JSON export saved to: ${config.jsonOutputFile}`);
  }

  log.success(
    "WikiContent",
    `Content retrieval complete: ${summary.retrieved}/${summary.total} retrieved, ${summary.failed} failed`
  );
  log.info(`📁 Output saved to: ${config.outputFile}`);

  return 0;
}
