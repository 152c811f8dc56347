/**
 * Wiki content retrieval configuration
 *
 * Resolved once at startup from the environment and CLI flags, then passed
 * explicitly into the pipeline. Nothing below reads process.env on its own.
 */

import * as lark from "@larksuiteoapi/node-sdk";
import { z } from "zod";
import { ConfigError } from "./wiki-errors";

export const DEFAULT_INPUT_FILE = "temp/wiki_documents.json";
export const DEFAULT_OUTPUT_FILE = "temp/wiki_documents_with_content.txt";
export const ACCESS_TOKEN_ENV = "LARK_USER_ACCESS_TOKEN";

const DOMAIN_ORIGINS: Record<lark.Domain, string> = {
  [lark.Domain.Feishu]: "https://open.feishu.cn",
  [lark.Domain.Lark]: "https://open.larksuite.com",
};

const NAMED_DOMAINS: Record<string, lark.Domain> = {
  feishu: lark.Domain.Feishu,
  lark: lark.Domain.Lark,
};

export interface WikiContentConfig {
  inputFile: string;
  outputFile: string;
  jsonOutputFile?: string;
  /** User access token; undefined selects dry mode */
  accessToken?: string;
  apiBaseUrl: string;
}

export type CliOverrides = {
  jsonInput?: string;
  output?: string;
  jsonOutput?: string;
  domain?: string;
};

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const configSchema = z.object({
  inputFile: optionalString,
  outputFile: optionalString,
  jsonOutputFile: optionalString,
  accessToken: optionalString,
  domain: optionalString,
});

/**
 * Resolve `feishu`, `lark` or an explicit http(s) origin to an API base URL
 */
export function resolveApiBaseUrl(domain: string | undefined): string {
  if (!domain) {
    return DOMAIN_ORIGINS[lark.Domain.Feishu];
  }

  const named = NAMED_DOMAINS[domain.toLowerCase()];
  if (named !== undefined) {
    return DOMAIN_ORIGINS[named];
  }

  const parsed = z.string().url().safeParse(domain);
  if (!parsed.success || !/^https?:\/\//i.test(domain)) {
    throw new ConfigError(
      `Invalid LARK_DOMAIN "${domain}": expected "feishu", "lark" or an http(s) URL`
    );
  }
  return domain.replace(/\/+$/, "");
}

export function loadWikiContentConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: CliOverrides = {}
): WikiContentConfig {
  const parsed = configSchema.safeParse({
    inputFile: overrides.jsonInput ?? env.WIKI_INPUT_FILE,
    outputFile: overrides.output ?? env.WIKI_OUTPUT_FILE,
    jsonOutputFile: overrides.jsonOutput ?? env.WIKI_JSON_OUTPUT_FILE,
    accessToken: env[ACCESS_TOKEN_ENV],
    domain: overrides.domain ?? env.LARK_DOMAIN,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    inputFile: values.inputFile ?? DEFAULT_INPUT_FILE,
    outputFile: values.outputFile ?? DEFAULT_OUTPUT_FILE,
    jsonOutputFile: values.jsonOutputFile,
    accessToken: values.accessToken,
    apiBaseUrl: resolveApiBaseUrl(values.domain),
  };
}
