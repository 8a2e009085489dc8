/**
 * Error kinds raised by the fetch, combine and render stages
 */

export type ErrorKind = "authentication" | "network" | "schema" | "missing-input" | "missing-asset" | "write";

/** Base class carrying the error kind so callers can decide fatal vs. recoverable */
export class ManualError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Missing or rejected session cookies. Always fatal. */
export class AuthenticationError extends ManualError {
  constructor(message: string) {
    super("authentication", message);
  }
}

/** Network failure, timeout or non-2xx response */
export class HttpError extends ManualError {
  readonly url: string;
  /** HTTP status, undefined when no response was received */
  readonly status: number | undefined;

  constructor(url: string, status: number | undefined, message: string, options?: { cause?: unknown }) {
    super("network", message, options);
    this.url = url;
    this.status = status;
  }

  /** Whether another attempt could succeed */
  get retryable(): boolean {
    return this.status === undefined || this.status === 429 || this.status >= 500;
  }
}

/** API response that does not have the expected shape */
export class ApiSchemaError extends ManualError {
  constructor(url: string, detail: string) {
    super("schema", `Unexpected API response from ${url}: ${detail}`);
  }
}

/** Topic or index file expected on disk but absent */
export class MissingInputError extends ManualError {
  readonly path: string;

  constructor(path: string, message: string) {
    super("missing-input", message);
    this.path = path;
  }
}

/** Image referenced by a topic but not downloaded */
export class MissingAssetError extends ManualError {
  readonly src: string;
  readonly path: string;

  constructor(src: string, path: string) {
    super("missing-asset", `Image not found: ${path} (referenced as ${src})`);
    this.src = src;
    this.path = path;
  }
}

/** Output file could not be written. Always fatal. */
export class WriteError extends ManualError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("write", `Could not write ${path}: ${errorMessage(cause)}`, { cause });
    this.path = path;
  }
}

/**
 * Extract a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Exit code of a run stopped by a fatal error or an abort */
export const EXIT_FATAL = 1;

/** Exit code of a run that completed with skipped topics or missing assets */
export const EXIT_DEGRADED = 2;
