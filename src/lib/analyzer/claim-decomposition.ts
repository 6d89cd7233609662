/**
 * citecheck Analyzer - Claim Decomposition
 *
 * Splits a paragraph into claims with their citation markers intact, and
 * reads the markers back out of a claim.
 *
 * @module analyzer/claim-decomposition
 */

import { extractJsonFromResult } from "./json";
import type { ModelClient } from "./llm";
import { getClaimParserBasePrompt } from "./prompts/base/claim-parser-base";

const CITATION_MARKER = /\[([a-zA-Z\d]+)\]/g;

/**
 * Split text after sentence-ending punctuation followed by whitespace.
 * Pieces are trimmed and empty pieces dropped.
 */
export function splitIntoSentences(text: string): string[] {
  return String(text || "")
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Citation keys in the order they appear, duplicates included.
 * "[1]", "[a]" and "[12b]" are markers; "[ ]" and "[1-2]" are not.
 */
export function extractCitationMarkers(claim: string): string[] {
  return Array.from(claim.matchAll(CITATION_MARKER), (m) => m[1]);
}

/**
 * Ask the model to split a paragraph into claims.
 * Falls back to sentence splitting when the call or its output fails.
 */
export async function parseParagraphIntoClaims(model: ModelClient, paragraph: string): Promise<string[]> {
  try {
    const raw = await model.complete({
      task: "claims",
      system: getClaimParserBasePrompt(),
      prompt: `Parse this paragraph into claims:\n\n${paragraph}`,
    });
    const data = extractJsonFromResult(raw);
    const claims = data.claims;
    if (claims === undefined || claims === null) return [];
    if (!Array.isArray(claims)) {
      throw new Error(`"claims" is ${typeof claims}, expected an array`);
    }
    return claims.filter((c): c is string => typeof c === "string");
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    console.warn(`[ClaimParser] Falling back to sentence split: ${msg.slice(0, 100)}`);
    return splitIntoSentences(paragraph);
  }
}
