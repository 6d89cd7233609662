/**
 * Base prompts for the SOURCE ANALYZER tools
 *
 * Integrity, clustering and diversity judge citations from their description
 * and URL. Verification judges one chunk of the scraped source text.
 */

import { EDITOR_PERSONA } from "./text-scanner-base";

const QUOTE_RULE = "Escape every double quote inside a string value as \\\".";

export function getSourceIntegrityPrompt(): string {
  return `${EDITOR_PERSONA} Assess the cited source against the claim it supports.

## REPORT FIELDS

- source_reliability (0 to 1): how reliable the source is
- source_bias_score (-1 to 1): ideological lean, -1 left, 0 neutral, 1 right
- verification_strength ("Full", "Partial" or "None"): how well the source backs the claim
- explanation: the reasoning behind the scores

${QUOTE_RULE}

## OUTPUT FORMAT

Return ONLY a JSON object:
{
  "source_id": "short description of the source",
  "analysis_type": "integrity",
  "report": {
    "source_reliability": <0.0-1.0>,
    "source_bias_score": <-1.0 to 1.0>,
    "verification_strength": "Full" | "Partial" | "None",
    "explanation": "..."
  }
}`;
}

export function getCitationClusteringPrompt(): string {
  return `${EDITOR_PERSONA} Several sources are cited for one claim. Decide whether they cluster around a single original source (for example several outlets repeating one wire report).

## REPORT FIELDS

- is_clustered: whether they trace back to one original
- independent_sources: how many are truly independent
- total_citations: how many citations were assessed
- original_source: the original source when clustered, otherwise ""
- explanation: the reasoning

${QUOTE_RULE}

## OUTPUT FORMAT

Return ONLY a JSON object:
{
  "source_id": "clustering analysis",
  "analysis_type": "clustering",
  "report": {
    "is_clustered": true | false,
    "independent_sources": <int>,
    "total_citations": <int>,
    "original_source": "...",
    "explanation": "..."
  }
}`;
}

export function getSourceDiversityPrompt(): string {
  return `${EDITOR_PERSONA} Assess how diverse the cited sources are and whether their selection suggests bias.

## REPORT FIELDS

- geographic_diversity ("Low", "Medium" or "High")
- ideological_diversity ("Low", "Medium" or "High")
- type_diversity ("Low", "Medium" or "High"): mix of primary, secondary and tertiary sources
- explanation: what the selection says about bias

${QUOTE_RULE}

## OUTPUT FORMAT

Return ONLY a JSON object:
{
  "source_id": "diversity analysis",
  "analysis_type": "diversity",
  "report": {
    "geographic_diversity": "Low" | "Medium" | "High",
    "ideological_diversity": "Low" | "Medium" | "High",
    "type_diversity": "Low" | "Medium" | "High",
    "explanation": "..."
  }
}`;
}

export function getClaimVerificationPrompt(): string {
  return `${EDITOR_PERSONA} Decide whether the source text below supports the claim.

## SCORE

- 1.0: the source clearly and directly verifies the claim
- 0.7-0.9: the source supports the claim with good evidence
- 0.5-0.6: the source partly supports the claim
- 0.3-0.4: the source covers the topic without verifying the claim
- 0.0-0.2: the source contradicts the claim or does not mention it

Also give a short summary of what the source says and explain the score.

${QUOTE_RULE}

## OUTPUT FORMAT

Return ONLY a JSON object:
{
  "verification_score": <0.0-1.0>,
  "content_summary": "what the source says",
  "explanation": "how well it verifies the claim"
}`;
}
