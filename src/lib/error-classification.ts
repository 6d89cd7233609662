/**
 * Error Classification
 *
 * Classifies model-endpoint errors so callers can tell a context-length
 * overflow (worth retrying with a smaller prompt) from rate limiting,
 * provider outages, timeouts and transport failures.
 *
 * @module error-classification
 */

import { APICallError, RetryError } from "ai";

export type ErrorCategory =
  | "context_overflow"
  | "rate_limit"
  | "provider_outage"
  | "timeout"
  | "transport"
  | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  message: string;
  statusCode: number | null;
  retriable: boolean;
};

/**
 * Thrown at the model boundary. Every failed invocation surfaces as this,
 * already classified, so downstream code never inspects provider errors.
 */
export class ModelInvocationError extends Error {
  readonly category: ErrorCategory;
  readonly statusCode: number | null;

  constructor(classified: ClassifiedError, options?: { cause?: unknown }) {
    super(classified.message, options);
    this.name = "ModelInvocationError";
    this.category = classified.category;
    this.statusCode = classified.statusCode;
  }
}

/** Phrases providers use when a prompt exceeds the context window */
const CONTEXT_OVERFLOW_PATTERNS = [
  /context.?length/i,
  /maximum context/i,
  /context window/i,
  /too many tokens/i,
  /prompt is too long/i,
  /reduce the length/i,
  /status\s*(?:code\s*)?(?:400|413)\b/i,
];

const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /quota/i,
];

const OUTAGE_PATTERNS = [
  /status\s*(?:code\s*)?(?:500|502|503|529)/i,
  /overloaded/i,
  /api\s*key/i,
  /unauthorized/i,
  /status\s*(?:code\s*)?(?:401|403)/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/i,
];

const TRANSPORT_PATTERNS = [
  /ECONNREFUSED/i,
  /ECONNRESET/i,
  /ENOTFOUND/i,
  /fetch failed/i,
  /socket hang up/i,
  /network/i,
];

/** RetryError wraps the provider error that ended the retries */
function unwrap(error: unknown): unknown {
  if (RetryError.isInstance(error) && error.lastError !== undefined) {
    return error.lastError;
  }
  return error;
}

function categoryForStatus(statusCode: number): ErrorCategory | null {
  if (statusCode === 413 || statusCode === 400) return "context_overflow";
  if (statusCode === 429) return "rate_limit";
  if (statusCode === 401 || statusCode === 403 || statusCode >= 500) return "provider_outage";
  return null;
}

function categoryForMessage(msg: string): ErrorCategory {
  if (CONTEXT_OVERFLOW_PATTERNS.some((p) => p.test(msg))) return "context_overflow";
  if (RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) return "rate_limit";
  if (TIMEOUT_PATTERNS.some((p) => p.test(msg))) return "timeout";
  if (OUTAGE_PATTERNS.some((p) => p.test(msg))) return "provider_outage";
  if (TRANSPORT_PATTERNS.some((p) => p.test(msg))) return "transport";
  return "unknown";
}

/**
 * Classify an error thrown by the AI SDK or by the transport beneath it.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ModelInvocationError) {
    return {
      category: error.category,
      message: error.message,
      statusCode: error.statusCode,
      retriable: error.category === "rate_limit" || error.category === "timeout",
    };
  }

  const inner = unwrap(error);
  const msg = inner instanceof Error ? inner.message : String(inner);
  const name = inner instanceof Error ? inner.name : "";

  let statusCode: number | null = null;
  let category: ErrorCategory | null = null;

  if (APICallError.isInstance(inner)) {
    statusCode = inner.statusCode ?? null;
    // A 400 is only an overflow when nothing says otherwise; the body often names the cause.
    const detail = `${msg} ${inner.responseBody ?? ""}`;
    const fromText = categoryForMessage(detail);
    category = fromText !== "unknown" ? fromText : statusCode !== null ? categoryForStatus(statusCode) : null;
    if (statusCode === 413) category = "context_overflow";
  }

  if (!category && (name === "TimeoutError" || name === "AbortError")) {
    category = "timeout";
  }

  const resolved = category ?? categoryForMessage(msg);
  return {
    category: resolved,
    message: msg,
    statusCode,
    retriable: resolved === "rate_limit" || resolved === "timeout",
  };
}

/**
 * True when the error means the prompt did not fit the model's context.
 * Typed errors are trusted first; untyped ones are matched by message.
 */
export function isContextOverflowError(error: unknown): boolean {
  if (error instanceof ModelInvocationError) {
    return error.category === "context_overflow";
  }
  return classifyError(error).category === "context_overflow";
}
