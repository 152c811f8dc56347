import { Command, CommanderError } from "commander";
import type { HttpClient } from "./http-client";
import { logger as defaultLogger, type Logger } from "./logger";
import { loadWikiContentConfig, type CliOverrides } from "./wiki-config";
import { runWikiContentRetrieval } from "./wiki-content-pipeline";

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  http?: HttpClient;
  logger?: Logger;
}

export function createProgram(): Command {
  return new Command()
    .name("get-wiki-content")
    .description("Retrieve raw content for enumerated Lark wiki documents into a text report")
    .option("--json-input <path>", "descriptor JSON file produced by the wiki enumeration step")
    .option("--output <path>", "report file to write")
    .option("--json-output <path>", "also export the annotated descriptors as JSON")
    .option("--domain <domain>", 'open platform domain: "feishu", "lark" or an https origin')
    .exitOverride();
}

/**
 * Parse args, resolve config and run the pipeline.
 * Resolves to the exit code; unexpected errors are logged and map to 1.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const log = deps.logger ?? defaultLogger;

  try {
    const program = createProgram();
    program.parse(argv, { from: "user" });
    const overrides = program.opts<CliOverrides>();

    const config = loadWikiContentConfig(deps.env ?? process.env, overrides);
    return await runWikiContentRetrieval(config, { http: deps.http, logger: log });
  } catch (error) {
    // commander has already printed help or the usage error
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    log.error("Wiki content retrieval failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return 1;
  }
}
