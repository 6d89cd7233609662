/**
 * citecheck Analyzer - Source Analyzers
 *
 * Judgments about the citations behind a claim: integrity of one source,
 * clustering of several sources around one origin, diversity of the cited
 * set, and verification against the scraped source text. Each analyzer
 * returns a report even when its model call fails.
 *
 * @module analyzer/source-analyzers
 */

import type { z } from "zod";
import type { SourceRetriever } from "../retrieval";
import { verifyClaimAgainstSource } from "./claim-verification";
import { extractJsonFromResult } from "./json";
import type { ModelClient } from "./llm";
import {
  getCitationClusteringPrompt,
  getSourceDiversityPrompt,
  getSourceIntegrityPrompt,
} from "./prompts/base/source-analysis-base";
import {
  ClusteringReportSchema,
  DiversityReportSchema,
  IntegrityReportSchema,
  SourceAnalysisEnvelopeSchema,
  formatIssues,
} from "./report-schemas";
import type { SourceAnalysis } from "./types";

export interface CitedSource {
  description: string;
  url: string;
}

export interface SourceAnalyzers {
  analyzeSourceIntegrity(claim: string, url: string, description: string): Promise<SourceAnalysis>;
  analyzeCitationClustering(claim: string, descriptions: readonly string[]): Promise<SourceAnalysis>;
  analyzeSourceDiversity(sources: readonly CitedSource[]): Promise<SourceAnalysis>;
  verifyClaimAgainstSource(claim: string, url: string, key: string): Promise<SourceAnalysis>;
}

function errorMessage(error: unknown): string {
  return (error instanceof Error ? error.message : String(error)).slice(0, 100);
}

/**
 * One model call, unwrapped from the `{ source_id, report }` envelope and
 * validated against the report schema. Throws on any failure.
 */
async function requestReport<T>(
  model: ModelClient,
  system: string,
  prompt: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<{ sourceId: string | null; report: T }> {
  const raw = await model.complete({ task: "source", system, prompt });
  const envelope = SourceAnalysisEnvelopeSchema.parse(extractJsonFromResult(raw));
  const parsed = schema.safeParse(envelope.report ?? {});
  if (!parsed.success) {
    throw new Error(`invalid report (${formatIssues(parsed.error)})`);
  }
  const sourceId = typeof envelope.source_id === "string" && envelope.source_id.trim() ? envelope.source_id : null;
  return { sourceId, report: parsed.data };
}

/**
 * Bind the source analyzers to the run's model client and retriever
 */
export function createSourceAnalyzers(
  model: ModelClient,
  retriever: SourceRetriever,
  options: { chunkMaxChars?: number } = {},
): SourceAnalyzers {
  return {
    async analyzeSourceIntegrity(claim, url, description) {
      try {
        const { sourceId, report } = await requestReport(
          model,
          getSourceIntegrityPrompt(),
          `Claim: ${claim}\nSource URL: ${url}\nSource Description: ${description}`,
          IntegrityReportSchema,
        );
        return { source_id: sourceId ?? description, analysis_type: "integrity", report };
      } catch (error) {
        console.warn(`[SourceAnalyzer] Integrity analysis failed: ${errorMessage(error)}`);
        return {
          source_id: description,
          analysis_type: "integrity",
          report: {
            source_reliability: 0.5,
            source_bias_score: 0,
            verification_strength: "None",
            explanation: `Error parsing analysis: ${errorMessage(error)}`,
          },
        };
      }
    },

    async analyzeCitationClustering(claim, descriptions) {
      try {
        const { sourceId, report } = await requestReport(
          model,
          getCitationClusteringPrompt(),
          `Claim: ${claim}\nSources: ${JSON.stringify(descriptions, null, 2)}`,
          ClusteringReportSchema,
        );
        return { source_id: sourceId ?? "clustering analysis", analysis_type: "clustering", report };
      } catch (error) {
        console.warn(`[SourceAnalyzer] Clustering analysis failed: ${errorMessage(error)}`);
        return {
          source_id: "clustering analysis",
          analysis_type: "clustering",
          report: {
            is_clustered: false,
            independent_sources: descriptions.length,
            total_citations: descriptions.length,
            original_source: "",
            explanation: `Error parsing analysis: ${errorMessage(error)}`,
          },
        };
      }
    },

    async analyzeSourceDiversity(sources) {
      try {
        const { sourceId, report } = await requestReport(
          model,
          getSourceDiversityPrompt(),
          `Sources: ${JSON.stringify(sources, null, 2)}`,
          DiversityReportSchema,
        );
        return { source_id: sourceId ?? "diversity analysis", analysis_type: "diversity", report };
      } catch (error) {
        console.warn(`[SourceAnalyzer] Diversity analysis failed: ${errorMessage(error)}`);
        return {
          source_id: "diversity analysis",
          analysis_type: "diversity",
          report: {
            geographic_diversity: "Medium",
            ideological_diversity: "Medium",
            type_diversity: "Medium",
            explanation: `Error parsing analysis: ${errorMessage(error)}`,
          },
        };
      }
    },

    verifyClaimAgainstSource(claim, url, key) {
      return verifyClaimAgainstSource(model, retriever, claim, url, key, options);
    },
  };
}
