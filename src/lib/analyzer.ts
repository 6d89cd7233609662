/**
 * citecheck Article Analyzer
 *
 * Analyzes an article paragraph by paragraph and returns the full report:
 * per-paragraph report cards, their summaries and a page summary.
 *
 * @module analyzer
 */

import type { AnalyzerConfig } from "./config-schemas";
import { DEFAULT_ANALYZER_CONFIG } from "./config-schemas";
import { clearDebugLog, debugLog } from "./analyzer/debug";
import { createModelClient, type ModelClient } from "./analyzer/llm";
import {
  createRunDiagnostics,
  orchestrateParagraphAnalysis,
  type OrchestratorDeps,
} from "./analyzer/orchestrator";
import { createSourceAnalyzers } from "./analyzer/source-analyzers";
import { generatePageSummary, generateParagraphSummary } from "./analyzer/summaries";
import { createTextScanners } from "./analyzer/text-scanners";
import type { ArticleReport, ParagraphSummary, ReportCard } from "./analyzer/types";
import { createWebRetriever, type SourceRetriever } from "./retrieval";
import { createWikipediaSource, type ArticleSource } from "./wiki-article";

export interface AnalyzeArticleOptions {
  /** Analyze only the first N paragraphs; 0 or undefined means all */
  maxParagraphs?: number;
}

export interface AnalyzerDeps {
  model: ModelClient;
  articles: ArticleSource;
  retriever: SourceRetriever;
  chunkMaxChars?: number;
}

/**
 * Collaborators for a real run, all built once from the config
 */
export function createAnalyzerDeps(config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG): AnalyzerDeps {
  return {
    model: createModelClient(config),
    articles: createWikipediaSource({ baseUrl: config.wikiBaseUrl, timeoutMs: config.fetchTimeoutMs }),
    retriever: createWebRetriever({ timeoutMs: config.fetchTimeoutMs }),
    chunkMaxChars: config.chunkMaxChars,
  };
}

export function articleTopicFromTitle(title: string): string {
  return title.replace(/_/g, " ");
}

/**
 * Analyze an article. A failed article fetch rejects before any model call;
 * nothing after that point rejects.
 */
export async function analyzeArticle(
  title: string,
  options: AnalyzeArticleOptions,
  deps: AnalyzerDeps,
): Promise<ArticleReport> {
  await clearDebugLog();
  console.error(`[Analyzer] Analyzing article: ${title}`);

  const { paragraphs: allParagraphs, refs } = await deps.articles.getTextAndRefs(title);
  console.error(`[Analyzer] Found ${allParagraphs.length} paragraphs, ${refs.length} references`);

  const { maxParagraphs } = options;
  const paragraphs =
    maxParagraphs !== undefined && maxParagraphs > 0 ? allParagraphs.slice(0, maxParagraphs) : allParagraphs;
  if (paragraphs.length < allParagraphs.length) {
    console.error(`[Analyzer] Limiting analysis to first ${paragraphs.length} paragraphs`);
  }

  const articleTopic = articleTopicFromTitle(title);
  const diagnostics = createRunDiagnostics();
  const orchestrator: OrchestratorDeps = {
    model: deps.model,
    scanners: createTextScanners(deps.model),
    analyzers: createSourceAnalyzers(deps.model, deps.retriever, { chunkMaxChars: deps.chunkMaxChars }),
    diagnostics,
  };

  const paragraphReports: ReportCard[] = [];
  const paragraphSummaries: ParagraphSummary[] = [];

  for (let i = 0; i < paragraphs.length; i++) {
    console.error(`[Analyzer] Processing paragraph ${i + 1}/${paragraphs.length}...`);

    const card = await orchestrateParagraphAnalysis(orchestrator, {
      paragraph: paragraphs[i],
      refs,
      articleTopic,
    });
    const summary = await generateParagraphSummary(deps.model, card);

    paragraphReports.push(card);
    paragraphSummaries.push(summary);

    console.error(
      `[Analyzer] Paragraph ${i + 1} summary: Bias=${summary.overall_bias_score}/10, ` +
        `Factuality=${summary.overall_factuality_score}/10`,
    );
  }

  console.error("[Analyzer] Generating page-level summary...");
  const pageSummary = await generatePageSummary(deps.model, paragraphSummaries);

  if (diagnostics.droppedMarkers > 0) {
    console.warn(`[Analyzer] ${diagnostics.droppedMarkers} citation marker(s) had no matching reference`);
  }
  debugLog("[Analyzer] Run complete", { paragraphs: paragraphs.length, diagnostics });

  return {
    article_title: title,
    article_topic: articleTopic,
    total_paragraphs_analyzed: paragraphs.length,
    paragraph_reports: paragraphReports,
    paragraph_summaries: paragraphSummaries,
    page_summary: pageSummary,
  };
}
