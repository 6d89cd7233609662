/**
 * citecheck Analyzer - Paragraph Orchestrator
 *
 * One paragraph in, one report card out:
 *
 *   escape quotes -> text scanners -> claim parser -> per claim:
 *   citation markers -> reference lookup -> source analyzers -> aggregate
 *
 * Every stage tolerates empty input and no analyzer failure escapes.
 *
 * @module analyzer/orchestrator
 */

import { extractCitationMarkers, parseParagraphIntoClaims } from "./claim-decomposition";
import { debugLog } from "./debug";
import type { ModelClient } from "./llm";
import type { CitedSource, SourceAnalyzers } from "./source-analyzers";
import { runTextScanners, type TextScanner } from "./text-scanners";
import type { ClaimReport, Reference, ReportCard, SourceAnalysis } from "./types";

// ============================================================================
// TYPES
// ============================================================================

/** Counters that describe a run but are not part of any report */
export interface RunDiagnostics {
  droppedMarkers: number;
}

export interface OrchestratorDeps {
  model: ModelClient;
  scanners: readonly TextScanner[];
  analyzers: SourceAnalyzers;
  diagnostics?: RunDiagnostics;
}

export interface ParagraphInput {
  paragraph: string;
  refs: readonly Reference[];
  articleTopic: string;
}

export function createRunDiagnostics(): RunDiagnostics {
  return { droppedMarkers: 0 };
}

// ============================================================================
// STAGES
// ============================================================================

export function escapeDoubleQuotes(text: string): string {
  return text.replace(/"/g, '\\"');
}

/**
 * Look markers up by exact key. "1" never matches "01" or a note keyed "a".
 * Unmatched markers are returned separately; they get no analysis.
 */
export function resolveReferences(
  markers: readonly string[],
  refs: readonly Reference[],
): { resolved: Reference[]; unmatched: string[] } {
  const resolved: Reference[] = [];
  const unmatched: string[] = [];
  for (const marker of markers) {
    const ref = refs.find((r) => r.key === marker);
    if (ref) resolved.push(ref);
    else unmatched.push(marker);
  }
  return { resolved, unmatched };
}

/**
 * Source analyses for one claim, in order: verification per URL citation,
 * integrity per URL citation, clustering when more than one citation
 * resolved, diversity when any resolved citation has a URL.
 */
export async function runSourceAnalyzers(
  analyzers: SourceAnalyzers,
  claim: string,
  citations: readonly Reference[],
): Promise<SourceAnalysis[]> {
  const analyses: SourceAnalysis[] = [];
  if (citations.length === 0) return analyses;

  const withUrls = citations.filter((c): c is Reference & { url: string } => Boolean(c.url));

  for (const citation of withUrls) {
    analyses.push(await analyzers.verifyClaimAgainstSource(claim, citation.url, citation.key));
  }

  for (const citation of withUrls) {
    analyses.push(await analyzers.analyzeSourceIntegrity(claim, citation.url, citation.text));
  }

  if (citations.length > 1) {
    analyses.push(
      await analyzers.analyzeCitationClustering(
        claim,
        citations.map((c) => c.text),
      ),
    );
  }

  if (withUrls.length > 0) {
    const sources: CitedSource[] = withUrls.map((c) => ({ description: c.text, url: c.url }));
    analyses.push(await analyzers.analyzeSourceDiversity(sources));
  }

  return analyses;
}

// ============================================================================
// ORCHESTRATION
// ============================================================================

/**
 * Analyze one paragraph into a report card
 */
export async function orchestrateParagraphAnalysis(
  deps: OrchestratorDeps,
  input: ParagraphInput,
): Promise<ReportCard> {
  const { model, scanners, analyzers, diagnostics } = deps;
  const paragraph = escapeDoubleQuotes(input.paragraph);
  const articleTopic = input.articleTopic;

  console.error("[Orchestrator] Running text scanners...");
  const textFindings = await runTextScanners(scanners, paragraph, articleTopic);
  console.error(`[Orchestrator] ${textFindings.length} text finding(s)`);

  const claims = await parseParagraphIntoClaims(model, paragraph);
  console.error(`[Orchestrator] ${claims.length} claim(s) for source analysis`);

  const claimReports: ClaimReport[] = [];
  for (let i = 0; i < claims.length; i++) {
    const claim = claims[i];
    const markers = extractCitationMarkers(claim);

    let sourceAnalyses: SourceAnalysis[] = [];
    if (markers.length > 0) {
      const { resolved, unmatched } = resolveReferences(markers, input.refs);
      if (unmatched.length > 0) {
        if (diagnostics) diagnostics.droppedMarkers += unmatched.length;
        debugLog(`[Orchestrator] Claim ${i + 1}: no reference for marker(s) ${unmatched.join(", ")}`);
      }
      sourceAnalyses = await runSourceAnalyzers(analyzers, claim, resolved);
      console.error(`[Orchestrator] Claim ${i + 1}/${claims.length}: ${sourceAnalyses.length} source analyses`);
    }

    claimReports.push({
      claim,
      citation_indices: markers,
      source_analyses: sourceAnalyses,
    });
  }

  return {
    paragraph,
    article_topic: articleTopic,
    text_findings: textFindings,
    claim_reports: claimReports,
    summary: {
      total_claims: claims.length,
      total_text_findings: textFindings.length,
      total_source_analyses: claimReports.reduce((sum, cr) => sum + cr.source_analyses.length, 0),
    },
  };
}
