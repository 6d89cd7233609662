/**
 * citecheck Analyzer - Summaries
 *
 * Paragraph summaries are synthesized from a report card; the page summary
 * from the paragraph summaries. When a report card is too large for the
 * model's context, the paragraph summary is retried once on a lean
 * projection of the card. Summaries never modify the cards they read.
 *
 * @module analyzer/summaries
 */

import { isContextOverflowError } from "../error-classification";
import { extractJsonFromResult } from "./json";
import type { ModelClient } from "./llm";
import { getPageSummaryPrompt, getParagraphSummaryPrompt } from "./prompts/base/summary-base";
import { formatIssues, PageSummarySchema, ParagraphSummarySchema } from "./report-schemas";
import type { PageSummary, ParagraphSummary, ReportCard } from "./types";

/** Report fields that may carry whole source documents */
export const VERBOSE_REPORT_FIELDS: ReadonlySet<string> = new Set([
  "source_text",
  "full_text",
  "content",
  "raw_content",
]);

export interface LeanReportCard {
  paragraph: string;
  article_topic: string;
  text_findings: Array<{ kind: string; strength: number; explanation: string }>;
  claim_reports: Array<{
    claim: string;
    citation_indices: string[];
    source_analyses: Array<{ source_id: string; analysis_type: string; report: Record<string, unknown> }>;
  }>;
  summary: ReportCard["summary"];
}

export function defaultParagraphSummary(summary: string): ParagraphSummary {
  return {
    overall_bias_score: 5,
    overall_factuality_score: 5,
    political_leaning: "Center",
    representative_example: "",
    key_issues: [],
    summary,
  };
}

export function defaultPageSummary(): PageSummary {
  return {
    overall_bias_score: 5,
    overall_factuality_score: 5,
    overall_political_leaning: "Center",
    representative_examples: [],
    summary: "Error generating page summary",
  };
}

/**
 * Copy of a report card without the bulky parts: findings keep only
 * kind, strength and explanation, and verbose report fields are dropped.
 */
export function createLeanReport(card: ReportCard): LeanReportCard {
  return {
    paragraph: card.paragraph,
    article_topic: card.article_topic,
    text_findings: card.text_findings.map((f) => ({
      kind: f.kind,
      strength: f.strength,
      explanation: f.explanation,
    })),
    claim_reports: card.claim_reports.map((cr) => ({
      claim: cr.claim,
      citation_indices: [...cr.citation_indices],
      source_analyses: cr.source_analyses.map((sa) => ({
        source_id: sa.source_id,
        analysis_type: sa.analysis_type,
        report: Object.fromEntries(
          Object.entries(sa.report).filter(([key]) => !VERBOSE_REPORT_FIELDS.has(key)),
        ),
      })),
    })),
    summary: { ...card.summary },
  };
}

function errorMessage(error: unknown): string {
  return (error instanceof Error ? error.message : String(error)).slice(0, 100);
}

async function summarizeCard(model: ModelClient, card: ReportCard | LeanReportCard): Promise<ParagraphSummary> {
  const raw = await model.complete({
    task: "summary",
    system: getParagraphSummaryPrompt(),
    prompt: `Analyze this bias report card and provide a summary:\n\n${JSON.stringify(card, null, 2)}`,
  });
  const parsed = ParagraphSummarySchema.safeParse(extractJsonFromResult(raw));
  if (!parsed.success) {
    throw new Error(`invalid summary (${formatIssues(parsed.error)})`);
  }
  return parsed.data;
}

/**
 * Summarize one report card. Context overflow gets one retry on the lean
 * projection; every other failure yields the default summary.
 */
export async function generateParagraphSummary(model: ModelClient, card: ReportCard): Promise<ParagraphSummary> {
  try {
    return await summarizeCard(model, card);
  } catch (error) {
    if (!isContextOverflowError(error)) {
      console.warn(`[Summary] Failed to generate summary: ${errorMessage(error)}`);
      return defaultParagraphSummary("Error generating summary");
    }
  }

  console.warn("[Summary] Report too large for context window, retrying with lean report");
  try {
    return await summarizeCard(model, createLeanReport(card));
  } catch (retryError) {
    console.warn(`[Summary] Lean report failed too: ${errorMessage(retryError)}`);
    return defaultParagraphSummary("Error generating summary - report too large");
  }
}

/**
 * Summarize the whole page from its paragraph summaries
 */
export async function generatePageSummary(
  model: ModelClient,
  paragraphSummaries: readonly ParagraphSummary[],
): Promise<PageSummary> {
  try {
    const raw = await model.complete({
      task: "summary",
      system: getPageSummaryPrompt(),
      prompt: `Summarize these paragraph analyses:\n\n${JSON.stringify(paragraphSummaries, null, 2)}`,
    });
    const parsed = PageSummarySchema.safeParse(extractJsonFromResult(raw));
    if (!parsed.success) {
      throw new Error(`invalid page summary (${formatIssues(parsed.error)})`);
    }
    return parsed.data;
  } catch (error) {
    console.warn(`[Summary] Failed to generate page summary: ${errorMessage(error)}`);
    return defaultPageSummary();
  }
}
