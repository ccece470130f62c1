// Request error taxonomy for the LLM access layer

/**
 * - RateLimited: the endpoint asked us to slow down (recoverable, we wait)
 * - Transient:   timeout, 5xx, network failure, empty completion (retried with backoff)
 * - Invalid:     bad credentials or malformed request (never retried)
 * - Exhausted:   retries used up; the call site decides whether to skip or abort
 */
export type RequestErrorKind = "RateLimited" | "Transient" | "Invalid" | "Exhausted";

type RequestErrorOptions = {
  status?: number;
  attempts?: number;
  retryAfterMs?: number;
  cause?: unknown;
};

export class RequestError extends Error {
  readonly kind: RequestErrorKind;
  readonly status?: number;
  readonly attempts: number;
  readonly retryAfterMs?: number;

  constructor(kind: RequestErrorKind, message: string, options: RequestErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "RequestError";
    this.kind = kind;
    this.status = options.status;
    this.attempts = options.attempts ?? 1;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export function isRequestError(error: unknown): error is RequestError {
  return error instanceof RequestError;
}

function readStatus(error: object): number | undefined {
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return undefined;
}

function readRetryAfterMs(error: object): number | undefined {
  if (!("headers" in error)) return undefined;
  const headers = error.headers;

  let value: unknown;
  if (headers instanceof Headers) {
    value = headers.get("retry-after");
  } else if (typeof headers === "object" && headers !== null && "retry-after" in headers) {
    value = headers["retry-after"];
  }

  const seconds = Number(value);
  return value !== null && value !== undefined && Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Map anything thrown by a transport onto the request taxonomy.
 * Failures without an HTTP status count as transient and end up Exhausted
 * once the retry budget is spent.
 */
export function classifyError(error: unknown): RequestError {
  if (error instanceof RequestError) return error;

  const message = error instanceof Error ? error.message : String(error);
  if (typeof error !== "object" || error === null) {
    return new RequestError("Transient", message, { cause: error });
  }

  const status = readStatus(error);
  if (status === 429) {
    return new RequestError("RateLimited", message, { status, retryAfterMs: readRetryAfterMs(error), cause: error });
  }
  if (status === 408 || status === 409 || (status !== undefined && status >= 500)) {
    return new RequestError("Transient", message, { status, cause: error });
  }
  if (status !== undefined && status >= 400) {
    return new RequestError("Invalid", message, { status, cause: error });
  }

  // Network failures, timeouts and SDK connection errors carry no status
  return new RequestError("Transient", message, { cause: error });
}
