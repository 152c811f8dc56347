#!/usr/bin/env tsx
/**
 * Retrieve content for the wiki documents listed in temp/wiki_documents.json
 *
 * Usage:
 *   LARK_USER_ACCESS_TOKEN=... npm run wiki:content -- [--json-input file] [--output file]
 */
import "dotenv/config";
import { runCli } from "../lib/wiki-content-cli";

runCli(process.argv.slice(2)).then((code) => {
  process.exitCode = code;
});
