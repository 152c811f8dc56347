/**
 * Error taxonomy for wiki content retrieval
 *
 * Only MissingInputError is surfaced to the user with a clean exit code.
 * FetchError is returned as data from the fetcher and never thrown.
 */

export class WikiContentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingInputError extends WikiContentError {
  constructor(readonly inputFile: string) {
    super(`Input file not found: ${inputFile}`);
  }
}

export class MalformedInputError extends WikiContentError {
  constructor(
    readonly inputFile: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Malformed input file ${inputFile}: ${reason}`, options);
  }
}

/**
 * No user access token configured. Selects dry mode rather than failing.
 */
export class MissingCredentialError extends WikiContentError {
  constructor(readonly envVar: string) {
    super(`${envVar} is not set`);
  }
}

export class ConfigError extends WikiContentError {}

/**
 * transport: the request itself failed (network, DNS, aborted)
 * parse: the response body was not JSON
 * api: the JSON envelope carried a non-zero code
 */
export type FetchErrorKind = "transport" | "parse" | "api";

export class FetchError extends WikiContentError {
  readonly kind: FetchErrorKind;
  readonly documentToken: string;
  readonly status?: number;
  readonly code?: number;

  constructor(
    message: string,
    details: {
      kind: FetchErrorKind;
      documentToken: string;
      status?: number;
      code?: number;
      cause?: unknown;
    }
  ) {
    super(message, { cause: details.cause });
    this.kind = details.kind;
    this.documentToken = details.documentToken;
    this.status = details.status;
    this.code = details.code;
  }
}
