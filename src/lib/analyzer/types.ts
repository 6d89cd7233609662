/**
 * citecheck Analyzer - Type Definitions
 *
 * Wire names are snake_case because every type here ends up verbatim in the
 * JSON article report.
 *
 * @module analyzer/types
 */

// ============================================================================
// TEXT FINDINGS
// ============================================================================

/**
 * Finding kinds the bundled scanners emit. Kinds are open strings: a model
 * may coin a new one and it is kept.
 */
export const KNOWN_FINDING_KINDS = [
  "loaded_language",
  "asymmetric_labeling",
  "passive_voice_omitted_actor",
  "statistical_aggregation",
  "statistical_missing_denominator",
  "omitted_context",
  "hedging_misuse",
  "temporal_framing_asymmetric",
  "temporal_framing_superlative",
  "emphasis_bias_minimizer",
  "emphasis_bias_maximizer",
  "false_balance",
  "narrative_framing",
  "missing_attribution",
  "political_alignment",
  "missing_context",
  "historical_revisionism",
  "framing_bias",
] as const;

export type KnownFindingKind = (typeof KNOWN_FINDING_KINDS)[number];

/** Only this kind is signed: negative leans left, positive leans right */
export const SIGNED_FINDING_KIND: KnownFindingKind = "political_alignment";

export interface BiasFinding {
  kind: string;
  /** [0, 1], or [-1, 1] for political_alignment */
  strength: number;
  /** Quoted span from the paragraph */
  text: string;
  /** [start, end] character indices; either may be unknown */
  offset: [number | null, number | null];
  explanation: string;
}

// ============================================================================
// SOURCE ANALYSES
// ============================================================================

export type AnalysisType = "integrity" | "clustering" | "diversity" | "verification";

export type VerificationStrength = "Full" | "Partial" | "None";
export type DiversityLevel = "Low" | "Medium" | "High";

export interface IntegrityReport {
  source_reliability: number;
  /** -1 left-leaning, +1 right-leaning */
  source_bias_score: number;
  verification_strength: VerificationStrength;
  explanation: string;
  [extra: string]: unknown;
}

export interface ClusteringReport {
  is_clustered: boolean;
  independent_sources: number;
  total_citations: number;
  original_source: string;
  explanation: string;
  [extra: string]: unknown;
}

export interface DiversityReport {
  geographic_diversity: DiversityLevel;
  ideological_diversity: DiversityLevel;
  type_diversity: DiversityLevel;
  explanation: string;
  [extra: string]: unknown;
}

export interface VerificationReport {
  verification_score: number;
  explanation: string;
  content_summary: string;
  [extra: string]: unknown;
}

interface SourceAnalysisBase<T extends AnalysisType, R> {
  source_id: string;
  analysis_type: T;
  report: R;
}

export type SourceAnalysis =
  | SourceAnalysisBase<"integrity", IntegrityReport>
  | SourceAnalysisBase<"clustering", ClusteringReport>
  | SourceAnalysisBase<"diversity", DiversityReport>
  | SourceAnalysisBase<"verification", VerificationReport>;

// ============================================================================
// ARTICLE DATA
// ============================================================================

export type ReferenceKind = "reference" | "note";

/** A footnote entry; `key` is what appears between the brackets in the prose */
export interface Reference {
  key: string;
  text: string;
  url: string | null;
  kind: ReferenceKind;
}

export interface ArticleContent {
  paragraphs: string[];
  refs: Reference[];
}

// ============================================================================
// REPORTS
// ============================================================================

export interface ClaimReport {
  claim: string;
  citation_indices: string[];
  source_analyses: SourceAnalysis[];
}

export interface ReportCard {
  paragraph: string;
  article_topic: string;
  text_findings: BiasFinding[];
  claim_reports: ClaimReport[];
  summary: {
    total_claims: number;
    total_text_findings: number;
    total_source_analyses: number;
  };
}

export interface ParagraphSummary {
  overall_bias_score: number;
  overall_factuality_score: number;
  political_leaning: string;
  representative_example: string;
  key_issues: string[];
  summary: string;
}

export interface PageSummary {
  overall_bias_score: number;
  overall_factuality_score: number;
  overall_political_leaning: string;
  representative_examples: string[];
  summary: string;
}

export interface ArticleReport {
  article_title: string;
  article_topic: string;
  total_paragraphs_analyzed: number;
  paragraph_reports: ReportCard[];
  paragraph_summaries: ParagraphSummary[];
  page_summary: PageSummary;
}
