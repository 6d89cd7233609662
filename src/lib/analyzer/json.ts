/**
 * JSON extraction utilities for recovering structured outputs from LLM text.
 *
 * Model output is unreliable JSON: it may be wrapped in prose or markdown
 * fences, carry raw newlines or stray escapes inside strings, keep trailing
 * commas, or stop mid-stream when the output token limit is hit. Every
 * analyzer goes through `extractJsonFromResult`; none parses model text itself.
 *
 * @module analyzer/json
 */

export type JsonObject = Record<string, unknown>;

const ERROR_PREVIEW_CHARS = 500;

/**
 * Raised when no tier of the extraction policy recovers a JSON object.
 * Carries a truncated prefix of the model text for diagnostics.
 */
export class MalformedModelOutputError extends Error {
  readonly preview: string;

  constructor(rawText: string) {
    const preview = rawText.slice(0, ERROR_PREVIEW_CHARS);
    super(`Could not extract valid JSON from model output: ${preview}`);
    this.name = "MalformedModelOutputError";
    this.preview = preview;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string | null): JsonObject | null {
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Remove a surrounding markdown code fence (```json ... ```)
 */
export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();
}

const VALID_ESCAPES = new Set(["\"", "\\", "/", "b", "f", "n", "r", "t", "u"]);

function escapeControlChar(ch: string): string {
  if (ch === "\n") return "\\n";
  if (ch === "\r") return "\\r";
  if (ch === "\t") return "\\t";
  return "\\u" + ch.charCodeAt(0).toString(16).padStart(4, "0");
}

/**
 * Fix syntax errors that do not change the document's structure:
 * raw control characters and invalid escapes inside strings, and trailing
 * commas before a closing bracket.
 */
export function sanitizeJsonSyntax(text: string): string {
  let out = "";
  let inString = false;
  let escape = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escape) {
        escape = false;
        // "\'" and friends are not JSON; keep the character, drop the backslash
        out += VALID_ESCAPES.has(ch) ? "\\" + ch : ch;
        continue;
      }
      if (ch === "\\") {
        escape = true;
        continue;
      }
      if (ch === "\"") {
        inString = false;
        out += ch;
        continue;
      }
      out += ch < " " ? escapeControlChar(ch) : ch;
      continue;
    }

    if (ch === "\"") {
      inString = true;
      out += ch;
      continue;
    }

    if (ch === ",") {
      let j = i + 1;
      while (j < text.length && /\s/.test(text[j])) j++;
      if (text[j] === "}" || text[j] === "]") continue;
    }

    out += ch;
  }

  return out;
}

/**
 * Attempt to repair truncated JSON by closing unclosed arrays/objects.
 *
 * When output exceeds the model's token limit, the JSON gets cut mid-stream.
 * This finds the last complete nested item in the truncated output, closes
 * the structure from there, and returns whatever parsed successfully.
 *
 * Returns null if the text has no '{', the object closes before the end
 * of the text (not truncated), or repair fails.
 */
export function repairTruncatedJson(text: string): JsonObject | null {
  const raw = String(text ?? "").trim();
  const start = raw.indexOf("{");
  if (start < 0) return null;

  const direct = tryParseObject(raw.slice(start));
  if (direct) return direct;

  // Find the last '}' or ']' that completes a nested structure (depth >= 1)
  let depth = 0;
  let inString = false;
  let escape = false;
  let lastCompleteEnd = -1;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];

    if (inString) {
      if (escape) { escape = false; continue; }
      if (ch === "\\") { escape = true; continue; }
      if (ch === "\"") { inString = false; }
      continue;
    }

    if (ch === "\"") { inString = true; continue; }

    if (ch === "{" || ch === "[") depth++;
    if (ch === "}" || ch === "]") {
      depth--;
      if (depth >= 1) lastCompleteEnd = i;
      // Closed before the end of the text: complete, with trailing prose
      if (depth === 0) return null;
    }
  }

  if (lastCompleteEnd < 0) return null;

  let repaired = raw.slice(start, lastCompleteEnd + 1);

  // Track what is still open up to the cut point
  inString = false;
  escape = false;
  const openBrackets: string[] = [];

  for (const ch of repaired) {
    if (inString) {
      if (escape) { escape = false; continue; }
      if (ch === "\\") { escape = true; continue; }
      if (ch === "\"") { inString = false; }
      continue;
    }

    if (ch === "\"") { inString = true; continue; }

    if (ch === "{") openBrackets.push("}");
    if (ch === "[") openBrackets.push("]");
    if (ch === "}" || ch === "]") openBrackets.pop();
  }

  repaired += openBrackets.reverse().join("");
  return tryParseObject(repaired);
}

type LastToken = "open" | "comma" | "colon" | "key" | "value";

const COMPLETE_LITERAL = /^(?:true|false|null|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)$/;

function tokenFromChar(ch: string | undefined): LastToken {
  if (ch === ":") return "colon";
  if (ch === ",") return "comma";
  if (ch === "{" || ch === "[") return "open";
  return "value";
}

/**
 * Close a document that was cut off mid-value: terminate an open string,
 * drop a partial literal, give a dangling key a null value and append the
 * missing closing brackets. Unlike `repairTruncatedJson` this keeps the
 * partial last item.
 *
 * Returns null when the document is not truncated.
 */
export function closeTruncatedJson(text: string): string | null {
  const start = text.search(/[{[]/);
  if (start < 0) return null;

  const stack: string[] = [];
  let inString = false;
  let escape = false;
  let lastToken: LastToken = "open";

  const stringToken = (): LastToken =>
    stack[stack.length - 1] === "}" && (lastToken === "open" || lastToken === "comma") ? "key" : "value";

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escape) { escape = false; continue; }
      if (ch === "\\") { escape = true; continue; }
      if (ch === "\"") {
        inString = false;
        lastToken = stringToken();
      }
      continue;
    }

    if (ch === "\"") {
      inString = true;
    } else if (ch === "{") {
      stack.push("}");
      lastToken = "open";
    } else if (ch === "[") {
      stack.push("]");
      lastToken = "open";
    } else if (ch === "}" || ch === "]") {
      stack.pop();
      lastToken = "value";
      if (stack.length === 0) return null;
    } else if (ch === "," || ch === ":") {
      lastToken = tokenFromChar(ch);
    } else if (!/\s/.test(ch)) {
      lastToken = "value";
    }
  }

  if (stack.length === 0 && !inString) return null;

  let repaired = text.slice(start);

  if (inString) {
    if (escape) repaired = repaired.slice(0, -1);
    repaired += "\"";
    lastToken = stringToken();
  } else {
    repaired = repaired.trimEnd();
    const bare = /[A-Za-z0-9.+-]+$/.exec(repaired);
    if (bare && !COMPLETE_LITERAL.test(bare[0])) {
      repaired = repaired.slice(0, bare.index).trimEnd();
      lastToken = tokenFromChar(repaired[repaired.length - 1]);
    }
  }

  if (lastToken === "comma") repaired = repaired.replace(/,\s*$/, "");
  if (lastToken === "colon") repaired += "null";
  if (lastToken === "key") repaired += ":null";

  return repaired + stack.reverse().join("");
}

/**
 * Parse text as a JSON object, repairing it if a plain parse fails.
 * Returns null when no repair yields an object.
 */
export function repairAndParseJson(text: string): JsonObject | null {
  const cleaned = stripCodeFences(text);

  const direct = tryParseObject(cleaned);
  if (direct) return direct;

  const sanitized = sanitizeJsonSyntax(cleaned);
  return (
    tryParseObject(sanitized) ??
    repairTruncatedJson(sanitized) ??
    tryParseObject(closeTruncatedJson(sanitized))
  );
}

/**
 * Recover a JSON object from the raw text of a model invocation.
 *
 * 1. No '{' and no '[' at all: the model reported nothing, return `{}`.
 * 2. Repair and parse the whole text.
 * 3. Repair and parse the span from the first '{' to the last '}'.
 * 4. Throw `MalformedModelOutputError`.
 */
export function extractJsonFromResult(result: unknown): JsonObject {
  const text = String(result ?? "").trim();

  if (!text.includes("{") && !text.includes("[")) {
    console.warn(`[JSON] Model returned no JSON, assuming nothing to report: ${text.slice(0, 100)}`);
    return {};
  }

  const whole = repairAndParseJson(text);
  if (whole) return whole;

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start !== -1 && end > start) {
    const inner = repairAndParseJson(text.slice(start, end + 1));
    if (inner) return inner;
  }

  throw new MalformedModelOutputError(text);
}
