/**
 * Wiki Content Fetcher
 *
 * Retrieves raw document text from the docx raw_content API with a user
 * access token. Documents are fetched one at a time, in input order; a failed
 * document gets `content: null` and the batch carries on.
 */

import { z } from "zod";
import type { HttpClient } from "./http-client";
import { logger as defaultLogger, type Logger } from "./logger";
import { err, ok, type Result } from "./result";
import type { DocumentDescriptor } from "./wiki-document-loader";
import { FetchError } from "./wiki-errors";

const SUCCESS_CODE = 0;

const rawContentEnvelopeSchema = z.object({
  code: z.number().optional(),
  msg: z.string().optional(),
  data: z
    .object({
      content: z.string().optional(),
    })
    .nullish(),
});

export interface FetchOptions {
  http: HttpClient;
  accessToken: string;
  apiBaseUrl: string;
}

export interface RetrievalOptions extends FetchOptions {
  logger?: Logger;
}

export interface RetrievalSummary {
  total: number;
  retrieved: number;
  failed: number;
}

export function buildRawContentUrl(apiBaseUrl: string, documentToken: string): string {
  return `${apiBaseUrl}/open-apis/docx/v1/documents/${encodeURIComponent(documentToken)}/raw_content`;
}

/**
 * Fetch one document's raw text.
 * Success is decided by the envelope's `code`, not the HTTP status.
 */
export async function fetchRawContent(
  documentToken: string,
  options: FetchOptions
): Promise<Result<string, FetchError>> {
  const url = buildRawContentUrl(options.apiBaseUrl, documentToken);

  let status: number;
  let body: string;
  try {
    ({ status, body } = await options.http.get(url, {
      Authorization: `Bearer ${options.accessToken}`,
    }));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(
      new FetchError(`Request failed: ${reason}`, {
        kind: "transport",
        documentToken,
        cause: error,
      })
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return err(
      new FetchError(`Response is not JSON (HTTP ${status})`, {
        kind: "parse",
        documentToken,
        status,
        cause: error,
      })
    );
  }

  const envelope = rawContentEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return err(
      new FetchError(`Unexpected response shape (HTTP ${status})`, {
        kind: "parse",
        documentToken,
        status,
      })
    );
  }

  const { code, msg, data } = envelope.data;
  if (code !== SUCCESS_CODE) {
    return err(
      new FetchError(msg ? `API error ${code}: ${msg}` : `API error: ${code ?? "missing code"}`, {
        kind: "api",
        documentToken,
        status,
        code,
      })
    );
  }

  return ok(data?.content ?? "");
}

/**
 * Attach `content` to every descriptor, strictly sequentially.
 * Descriptors are mutated in place and returned in the same order.
 */
export async function retrieveContents(
  descriptors: DocumentDescriptor[],
  options: RetrievalOptions
): Promise<{ documents: DocumentDescriptor[]; summary: RetrievalSummary }> {
  const log = options.logger ?? defaultLogger;
  const total = descriptors.length;
  let retrieved = 0;

  for (const [index, doc] of descriptors.entries()) {
    log.pending("WikiContent", `[${index + 1}/${total}] Retrieving: ${doc.title}`);
    log.info(`  Token: ${doc.document_token}`);

    const result = await fetchRawContent(doc.document_token, options);

    if (result.ok) {
      doc.content = result.value;
      retrieved++;
      log.success("WikiContent", `Content retrieved (${result.value.length} characters)`);
    } else {
      doc.content = null;
      log.fail("WikiContent", `Failed to retrieve content: ${result.error.message}`, {
        kind: result.error.kind,
      });
    }
  }

  return {
    documents: descriptors,
    summary: { total, retrieved, failed: total - retrieved },
  };
}
