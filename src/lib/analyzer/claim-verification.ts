/**
 * citecheck Analyzer - Claim Verification
 *
 * Checks a claim against the text of the source it cites: scrape the page,
 * cut it into model-sized chunks, score each chunk, keep the best one.
 * Never throws; every failure becomes a zero-score verification report.
 *
 * @module analyzer/claim-verification
 */

import { DEFAULT_CHUNK_MAX_CHARS, type SourceRetriever } from "../retrieval";
import { debugLog } from "./debug";
import { extractJsonFromResult } from "./json";
import type { ModelClient } from "./llm";
import { getClaimVerificationPrompt } from "./prompts/base/source-analysis-base";
import { ChunkVerificationSchema, formatIssues } from "./report-schemas";
import type { SourceAnalysis, VerificationReport } from "./types";

/** Scores under this are logged as weak sources */
export const WEAK_SOURCE_THRESHOLD = 0.5;

interface ChunkResult {
  chunk: number;
  score: number;
  summary: string;
  explanation: string;
}

function errorMessage(error: unknown, max: number): string {
  return (error instanceof Error ? error.message : String(error)).slice(0, max);
}

function verification(key: string, url: string, report: VerificationReport): SourceAnalysis {
  return {
    source_id: `citation [${key}]: ${url}`,
    analysis_type: "verification",
    report,
  };
}

async function scoreChunk(
  model: ModelClient,
  claim: string,
  url: string,
  key: string,
  chunk: string,
  index: number,
): Promise<ChunkResult | null> {
  try {
    const raw = await model.complete({
      task: "verification",
      system: getClaimVerificationPrompt(),
      prompt: `Claim: ${claim}\n\nSource text from citation [${key}]: ${url}\n\n${chunk}`,
    });
    const parsed = ChunkVerificationSchema.safeParse(extractJsonFromResult(raw));
    if (!parsed.success) {
      throw new Error(formatIssues(parsed.error));
    }
    return {
      chunk: index + 1,
      score: parsed.data.verification_score,
      summary: parsed.data.content_summary,
      explanation: parsed.data.explanation,
    };
  } catch (error) {
    console.warn(`[SourceAnalyzer] Chunk ${index + 1} verification failed: ${errorMessage(error, 100)}`);
    return null;
  }
}

/**
 * Verify `claim` against the content behind `url`, cited as `[key]`
 */
export async function verifyClaimAgainstSource(
  model: ModelClient,
  retriever: SourceRetriever,
  claim: string,
  url: string,
  key: string,
  options: { chunkMaxChars?: number } = {},
): Promise<SourceAnalysis> {
  const { chunkMaxChars = DEFAULT_CHUNK_MAX_CHARS } = options;

  try {
    let paragraphs: string[];
    try {
      debugLog(`[SourceAnalyzer] Scraping ${url}`);
      paragraphs = await retriever.scrape(url);
    } catch (scrapeError) {
      console.warn(`[SourceAnalyzer] Could not scrape ${url}: ${errorMessage(scrapeError, 100)}`);
      return verification(key, url, {
        verification_score: 0,
        explanation: `Failed to access or scrape source: ${errorMessage(scrapeError, 200)}`,
        content_summary: "Source inaccessible - treated as bad source",
      });
    }

    if (paragraphs.length === 0) {
      return verification(key, url, {
        verification_score: 0,
        explanation: "Could not extract meaningful content from the source URL",
        content_summary: "No content found - treated as bad source",
      });
    }

    const chunks = retriever.chunk(paragraphs, chunkMaxChars);
    debugLog(`[SourceAnalyzer] ${paragraphs.length} block(s) from ${url} in ${chunks.length} chunk(s)`);

    // Chunks are scored one at a time; ties keep the earlier chunk
    let best: ChunkResult | null = null;
    for (let i = 0; i < chunks.length; i++) {
      const result = await scoreChunk(model, claim, url, key, chunks[i], i);
      if (result && (best === null || result.score > best.score)) {
        best = result;
      }
    }

    const report: VerificationReport = best
      ? {
          verification_score: best.score,
          explanation: `Analyzed ${chunks.length} content segment(s). Best match (chunk ${best.chunk}, score: ${best.score.toFixed(2)}): ${best.explanation}`,
          content_summary: best.summary,
        }
      : {
          verification_score: 0,
          explanation: "Could not analyze source content",
          content_summary: "Analysis failed",
        };

    if (report.verification_score < WEAK_SOURCE_THRESHOLD) {
      console.warn(
        `[SourceAnalyzer] Weak source for [${key}] ${url}: score ${report.verification_score.toFixed(2)}`,
      );
    }

    return verification(key, url, report);
  } catch (error) {
    console.warn(`[SourceAnalyzer] Verification of [${key}] failed: ${errorMessage(error, 200)}`);
    return verification(key, url, {
      verification_score: 0,
      explanation: `Error during verification: ${errorMessage(error, 200)}`,
      content_summary: "Verification failed due to error",
    });
  }
}
