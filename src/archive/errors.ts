import { errnoCode } from "../lib/fsErrors";

/**
* Filesystem failure while reading or committing a chunk. `code` carries the errno code
* when there is one (`ENOSPC`, `EACCES`, ...) so callers can decide what is fatal.
*/
export class StoreIOError extends Error {
  readonly code: string | undefined;
  readonly path: string;

  constructor(message: string, filePath: string, opts: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "StoreIOError";
    this.code = opts.code ?? errnoCode(opts.cause);
    this.path = filePath;
  }
}

export type FetchErrorKind = "transient" | "fatal";

/**
* Failure reported by a series source. Transient failures are retried by a later run;
* fatal ones (lost session, bad credentials) halt the run.
*/
export class FetchError extends Error {
  readonly kind: FetchErrorKind;

  constructor(kind: FetchErrorKind, message: string, opts: { cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "FetchError";
    this.kind = kind;
  }
}

export class QuotaExceededError extends Error {
  readonly requestedBytes: number;
  readonly maxWindowBytes: number;

  constructor(requestedBytes: number, maxWindowBytes: number) {
    super(`Request of ${requestedBytes} bytes can never fit a rolling budget of ${maxWindowBytes} bytes`);
    this.name = "QuotaExceededError";
    this.requestedBytes = requestedBytes;
    this.maxWindowBytes = maxWindowBytes;
  }
}

export class CancellationError extends Error {
  constructor(message = "Cancelled") {
    super(message);
    this.name = "CancellationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
