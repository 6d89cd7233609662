/**
 * Error Classification Tests
 *
 * @module error-classification.test
 */

import { describe, it, expect } from "vitest";
import { APICallError, RetryError } from "ai";
import { classifyError, isContextOverflowError, ModelInvocationError } from "@/lib/error-classification";

function apiError(statusCode: number, message: string, responseBody?: string): APICallError {
  return new APICallError({
    message,
    url: "http://localhost:1234/v1/chat/completions",
    requestBodyValues: {},
    statusCode,
    responseBody,
  });
}

describe("classifyError", () => {
  describe("API call errors", () => {
    it("reads a context length error from the response body", () => {
      const result = classifyError(apiError(400, "Bad Request", '{"error":{"code":"context_length_exceeded"}}'));
      expect(result).toEqual({
        category: "context_overflow",
        message: "Bad Request",
        statusCode: 400,
        retriable: false,
      });
    });

    it("treats a bare 400 as context overflow", () => {
      expect(classifyError(apiError(400, "Bad Request")).category).toBe("context_overflow");
    });

    it("does not treat a 400 naming another cause as overflow", () => {
      expect(classifyError(apiError(400, "Bad Request", "invalid api key")).category).toBe("provider_outage");
    });

    it("always treats 413 as context overflow", () => {
      expect(classifyError(apiError(413, "Payload Too Large")).category).toBe("context_overflow");
    });

    it("classifies 429 as a retriable rate limit", () => {
      const result = classifyError(apiError(429, "Too Many Requests"));
      expect(result.category).toBe("rate_limit");
      expect(result.retriable).toBe(true);
      expect(result.statusCode).toBe(429);
    });

    it("classifies 5xx as a provider outage", () => {
      expect(classifyError(apiError(503, "Service Unavailable")).category).toBe("provider_outage");
    });
  });

  it("unwraps the last error of a RetryError", () => {
    const retry = new RetryError({
      message: "Failed after 3 attempts",
      reason: "maxRetriesExceeded",
      errors: [apiError(503, "Service Unavailable"), apiError(429, "Too Many Requests")],
    });
    const result = classifyError(retry);
    expect(result.category).toBe("rate_limit");
    expect(result.statusCode).toBe(429);
  });

  it("classifies aborts as timeouts", () => {
    const abort = new Error("The operation was aborted");
    abort.name = "AbortError";
    expect(classifyError(abort).category).toBe("timeout");
    expect(classifyError(new Error("Request timed out")).category).toBe("timeout");
  });

  it("classifies transport failures", () => {
    expect(classifyError(new Error("fetch failed")).category).toBe("transport");
    expect(classifyError(new Error("connect ECONNREFUSED 127.0.0.1:1234")).category).toBe("transport");
  });

  it("falls back to unknown", () => {
    expect(classifyError(new Error("something odd"))).toEqual({
      category: "unknown",
      message: "something odd",
      statusCode: null,
      retriable: false,
    });
    expect(classifyError("plain string").category).toBe("unknown");
  });

  it("passes a ModelInvocationError through", () => {
    const error = new ModelInvocationError({
      category: "rate_limit",
      message: "slow down",
      statusCode: 429,
      retriable: true,
    });
    expect(classifyError(error)).toEqual({
      category: "rate_limit",
      message: "slow down",
      statusCode: 429,
      retriable: true,
    });
  });
});

describe("isContextOverflowError", () => {
  it("trusts the category of a typed error", () => {
    const error = new ModelInvocationError({
      category: "timeout",
      message: "maximum context length",
      statusCode: null,
      retriable: true,
    });
    expect(isContextOverflowError(error)).toBe(false);
  });

  it("matches untyped errors by message", () => {
    expect(isContextOverflowError(new Error("prompt is too long: 210000 tokens > 200000 maximum"))).toBe(true);
    expect(isContextOverflowError(new Error("socket hang up"))).toBe(false);
  });
});
