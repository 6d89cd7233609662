/**
 * Tests for recovering JSON objects from model text
 *
 * @module analyzer/json.test
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  closeTruncatedJson,
  extractJsonFromResult,
  MalformedModelOutputError,
  repairTruncatedJson,
  sanitizeJsonSyntax,
  stripCodeFences,
} from "@/lib/analyzer/json";

describe("analyzer/json", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("extractJsonFromResult", () => {
    it("parses a plain object", () => {
      expect(extractJsonFromResult('{"findings": []}')).toEqual({ findings: [] });
    });

    it("finds an object wrapped in prose", () => {
      expect(extractJsonFromResult('Here\'s the result: {"findings": []} thanks')).toEqual({ findings: [] });
    });

    it("keeps every field of a complete nested object followed by prose", () => {
      expect(extractJsonFromResult('x {"a": [1], "b": 2} y')).toEqual({ a: [1], b: 2 });
      expect(extractJsonFromResult('Sure: {"findings": [{"kind": "k"}], "note": "ok"} Hope this helps.')).toEqual({
        findings: [{ kind: "k" }],
        note: "ok",
      });
    });

    it("strips a markdown fence", () => {
      expect(extractJsonFromResult('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
    });

    it("drops trailing commas", () => {
      expect(extractJsonFromResult('{"claims": ["a", "b",],}')).toEqual({ claims: ["a", "b"] });
    });

    it("escapes raw newlines inside strings", () => {
      expect(extractJsonFromResult('{"text": "line one\nline two"}')).toEqual({ text: "line one\nline two" });
    });

    it("drops the backslash of an invalid escape", () => {
      expect(extractJsonFromResult(String.raw`{"text": "it\'s"}`)).toEqual({ text: "it's" });
    });

    it("keeps the partial last string of output cut off mid-value", () => {
      expect(extractJsonFromResult('{"claims": ["First claim. [1]", "Second cl')).toEqual({
        claims: ["First claim. [1]", "Second cl"],
      });
    });

    it("returns an empty object when the text holds no JSON at all", () => {
      expect(extractJsonFromResult("No issues found in this paragraph.")).toEqual({});
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it("returns an empty object for null and undefined", () => {
      expect(extractJsonFromResult(null)).toEqual({});
      expect(extractJsonFromResult(undefined)).toEqual({});
    });

    it("throws when braces hold no JSON", () => {
      expect(() => extractJsonFromResult("{ this is not json at all }")).toThrow(MalformedModelOutputError);
      expect(() => extractJsonFromResult("{ this is not json at all }")).toThrow(
        "Could not extract valid JSON from model output: { this is not json at all }",
      );
    });

    it("rejects a top-level array", () => {
      expect(() => extractJsonFromResult('["a","b"]')).toThrow(MalformedModelOutputError);
    });

    it("keeps only a prefix of the text in the error", () => {
      const text = "{" + "x".repeat(800) + "}";
      let caught: unknown;
      try {
        extractJsonFromResult(text);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(MalformedModelOutputError);
      if (caught instanceof MalformedModelOutputError) {
        expect(caught.preview).toHaveLength(500);
        expect(caught.preview).toBe(text.slice(0, 500));
      }
    });
  });

  describe("repairTruncatedJson", () => {
    it("keeps complete items and drops the cut one", () => {
      const truncated = '{"findings": [{"kind": "a", "strength": 0.5}, {"kind": "b", "stre';
      expect(repairTruncatedJson(truncated)).toEqual({ findings: [{ kind: "a", strength: 0.5 }] });
    });

    it("returns the object unchanged when it is complete", () => {
      expect(repairTruncatedJson('{"a": [1, 2]}')).toEqual({ a: [1, 2] });
    });

    it("returns null when nothing nested was completed", () => {
      expect(repairTruncatedJson('{"a": "unfinished')).toBeNull();
      expect(repairTruncatedJson("no braces")).toBeNull();
    });

    it("returns null for a complete object followed by prose", () => {
      expect(repairTruncatedJson('{"a": [1], "b": 2} y')).toBeNull();
    });
  });

  describe("closeTruncatedJson", () => {
    it("drops a partial literal and gives the key a null value", () => {
      expect(closeTruncatedJson('{"a": 1, "b": tr')).toBe('{"a": 1, "b":null}');
    });

    it("gives a dangling key a null value", () => {
      expect(closeTruncatedJson('{"a": 1, "b"')).toBe('{"a": 1, "b":null}');
    });

    it("removes a trailing comma before closing", () => {
      expect(closeTruncatedJson('{"a": [1, 2,')).toBe('{"a": [1, 2]}');
    });

    it("keeps a complete trailing number", () => {
      expect(closeTruncatedJson('{"n": 12')).toBe('{"n": 12}');
    });

    it("returns null for a complete document", () => {
      expect(closeTruncatedJson('{"a": 1}')).toBeNull();
    });
  });

  describe("sanitizeJsonSyntax", () => {
    it("removes trailing commas outside strings only", () => {
      expect(sanitizeJsonSyntax('{"a": [1, 2, ], }')).toBe('{"a": [1, 2 ] }');
      expect(sanitizeJsonSyntax('{"a": "x, ]"}')).toBe('{"a": "x, ]"}');
    });

    it("escapes tabs inside strings", () => {
      expect(sanitizeJsonSyntax('{"a": "x\ty"}')).toBe('{"a": "x\\ty"}');
    });
  });

  describe("stripCodeFences", () => {
    it("removes an unlabeled fence", () => {
      expect(stripCodeFences("```\n{}\n```")).toBe("{}");
    });

    it("leaves unfenced text alone", () => {
      expect(stripCodeFences('  {"a": 1}  ')).toBe('{"a": 1}');
    });
  });
});
