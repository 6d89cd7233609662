/**
 * Source analyzer tests
 *
 * @module analyzer/source-analyzers.test
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  getCitationClusteringPrompt,
  getClaimVerificationPrompt,
  getSourceDiversityPrompt,
  getSourceIntegrityPrompt,
} from "@/lib/analyzer/prompts/base/source-analysis-base";
import { createSourceAnalyzers } from "@/lib/analyzer/source-analyzers";
import { FakeModelClient, FakeRetriever } from "@test/helpers/fakes";

const CLAIM = "The bridge opened in 1932.";
const URL = "https://news.example.com/bridge";

describe("analyzer/source-analyzers", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("analyzeSourceIntegrity", () => {
    it("returns the model's report under its source id", async () => {
      const model = new FakeModelClient().on(
        getSourceIntegrityPrompt(),
        JSON.stringify({
          source_id: "Example News",
          analysis_type: "integrity",
          report: {
            source_reliability: 0.9,
            source_bias_score: 0.1,
            verification_strength: "full",
            explanation: "Wire report",
          },
        }),
      );
      const analyzers = createSourceAnalyzers(model, new FakeRetriever({}));

      const analysis = await analyzers.analyzeSourceIntegrity(CLAIM, URL, "Example News, 1932");

      expect(analysis).toEqual({
        source_id: "Example News",
        analysis_type: "integrity",
        report: {
          source_reliability: 0.9,
          source_bias_score: 0.1,
          verification_strength: "Full",
          explanation: "Wire report",
        },
      });
      expect(model.calls[0].task).toBe("source");
      expect(model.calls[0].prompt).toBe(
        `Claim: ${CLAIM}\nSource URL: ${URL}\nSource Description: Example News, 1932`,
      );
    });

    it("falls back to the description as source id", async () => {
      const model = new FakeModelClient().otherwise(
        '{"report": {"source_reliability": 0.4, "source_bias_score": 0, "verification_strength": "None"}}',
      );
      const analysis = await createSourceAnalyzers(model, new FakeRetriever({})).analyzeSourceIntegrity(
        CLAIM,
        URL,
        "Example News, 1932",
      );
      expect(analysis.source_id).toBe("Example News, 1932");
      expect(analysis.report.explanation).toBe("");
    });

    it("returns a neutral report when the call fails", async () => {
      const model = new FakeModelClient().otherwise(new Error("model down"));
      const analysis = await createSourceAnalyzers(model, new FakeRetriever({})).analyzeSourceIntegrity(
        CLAIM,
        URL,
        "Example News, 1932",
      );

      expect(analysis).toEqual({
        source_id: "Example News, 1932",
        analysis_type: "integrity",
        report: {
          source_reliability: 0.5,
          source_bias_score: 0,
          verification_strength: "None",
          explanation: "Error parsing analysis: model down",
        },
      });
    });

    it("returns a neutral report when the report is missing", async () => {
      const model = new FakeModelClient().otherwise('{"source_id": "x"}');
      const analysis = await createSourceAnalyzers(model, new FakeRetriever({})).analyzeSourceIntegrity(
        CLAIM,
        URL,
        "Example News, 1932",
      );
      expect(analysis.report.verification_strength).toBe("None");
      expect(analysis.report.explanation).toMatch(/^Error parsing analysis: invalid report \(/);
    });
  });

  describe("analyzeCitationClustering", () => {
    it("sends the descriptions as a JSON list", async () => {
      const model = new FakeModelClient().on(
        getCitationClusteringPrompt(),
        '{"report": {"is_clustered": true, "independent_sources": 1, "total_citations": 2, "original_source": "Agency wire"}}',
      );
      const analysis = await createSourceAnalyzers(model, new FakeRetriever({})).analyzeCitationClustering(CLAIM, [
        "Paper A",
        "Paper B",
      ]);

      expect(model.calls[0].prompt).toBe(`Claim: ${CLAIM}\nSources: ${JSON.stringify(["Paper A", "Paper B"], null, 2)}`);
      expect(analysis).toEqual({
        source_id: "clustering analysis",
        analysis_type: "clustering",
        report: {
          is_clustered: true,
          independent_sources: 1,
          total_citations: 2,
          original_source: "Agency wire",
          explanation: "",
        },
      });
    });

    it("counts every citation as independent when the call fails", async () => {
      const model = new FakeModelClient().otherwise("{ not json }");
      const analysis = await createSourceAnalyzers(model, new FakeRetriever({})).analyzeCitationClustering(CLAIM, [
        "a",
        "b",
        "c",
      ]);

      expect(analysis.report).toMatchObject({
        is_clustered: false,
        independent_sources: 3,
        total_citations: 3,
        original_source: "",
      });
    });
  });

  describe("analyzeSourceDiversity", () => {
    it("normalizes the diversity levels", async () => {
      const model = new FakeModelClient().on(
        getSourceDiversityPrompt(),
        '{"source_id": "diversity", "report": {"geographic_diversity": "HIGH", "ideological_diversity": "medium", "type_diversity": "Low", "explanation": "Two countries"}}',
      );
      const sources = [{ description: "Paper A", url: URL }];
      const analysis = await createSourceAnalyzers(model, new FakeRetriever({})).analyzeSourceDiversity(sources);

      expect(model.calls[0].prompt).toBe(`Sources: ${JSON.stringify(sources, null, 2)}`);
      expect(analysis).toEqual({
        source_id: "diversity",
        analysis_type: "diversity",
        report: {
          geographic_diversity: "High",
          ideological_diversity: "Medium",
          type_diversity: "Low",
          explanation: "Two countries",
        },
      });
    });

    it("reports medium diversity when the call fails", async () => {
      const model = new FakeModelClient().otherwise(new Error("rate limit exceeded"));
      const analysis = await createSourceAnalyzers(model, new FakeRetriever({})).analyzeSourceDiversity([]);

      expect(analysis).toEqual({
        source_id: "diversity analysis",
        analysis_type: "diversity",
        report: {
          geographic_diversity: "Medium",
          ideological_diversity: "Medium",
          type_diversity: "Medium",
          explanation: "Error parsing analysis: rate limit exceeded",
        },
      });
    });
  });

  describe("verifyClaimAgainstSource", () => {
    it("uses the retriever and the configured chunk size", async () => {
      const model = new FakeModelClient().on(
        getClaimVerificationPrompt(),
        '{"verification_score": 0.8, "content_summary": "Opening day report", "explanation": "Gives the date"}',
      );
      const retriever = new FakeRetriever({ [URL]: ["A".repeat(60), "B".repeat(60)] });

      const analysis = await createSourceAnalyzers(model, retriever, { chunkMaxChars: 100 }).verifyClaimAgainstSource(
        CLAIM,
        URL,
        "1",
      );

      expect(retriever.scraped).toEqual([URL]);
      expect(model.calls).toHaveLength(2);
      expect(analysis.source_id).toBe(`citation [1]: ${URL}`);
      expect(analysis.report.verification_score).toBe(0.8);
    });
  });
});
