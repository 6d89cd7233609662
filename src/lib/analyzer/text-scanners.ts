/**
 * Text scanner registry
 *
 * Fifteen single-purpose scanners, each one model call over one paragraph.
 * The registry is an ordered list; the orchestrator runs it front to back
 * and dispatches on `arity`, so a scanner that needs the article topic
 * declares it in its signature instead of being special-cased by name.
 *
 * @module analyzer/text-scanners
 */

import { debugLog } from "./debug";
import { extractJsonFromResult } from "./json";
import type { ModelClient } from "./llm";
import {
  getAsymmetricLabelingPrompt,
  getCertaintyAndHedgingPrompt,
  getEmphasisBiasPrompt,
  getFalseBalancePrompt,
  getFramingBiasPrompt,
  getFramingVoicePrompt,
  getHistoricalRevisionismPrompt,
  getLoadedLanguagePrompt,
  getMissingAttributionPrompt,
  getMissingContextPrompt,
  getNarrativeFramingPrompt,
  getOmittedContextPrompt,
  getPoliticalAlignmentPrompt,
  getStatisticalAggregationPrompt,
  getTemporalFramingPrompt,
} from "./prompts/base/text-scanner-base";
import { FindingsEnvelopeSchema, formatIssues, normalizeFinding } from "./report-schemas";
import type { BiasFinding } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface TextOnlyScanner {
  name: string;
  arity: 1;
  scan(text: string): Promise<BiasFinding[]>;
}

export interface TopicAwareScanner {
  name: string;
  arity: 2;
  scan(text: string, topic: string): Promise<BiasFinding[]>;
}

export type TextScanner = TextOnlyScanner | TopicAwareScanner;

interface ScannerDefinition {
  name: string;
  takesTopic: boolean;
  instructions: () => string;
}

/** Registry order is the order findings appear in a report card */
const SCANNER_DEFINITIONS: readonly ScannerDefinition[] = [
  { name: "loaded_language", takesTopic: false, instructions: getLoadedLanguagePrompt },
  { name: "asymmetric_labeling", takesTopic: false, instructions: getAsymmetricLabelingPrompt },
  { name: "framing_voice", takesTopic: false, instructions: getFramingVoicePrompt },
  { name: "statistical_aggregation", takesTopic: false, instructions: getStatisticalAggregationPrompt },
  { name: "omitted_context", takesTopic: false, instructions: getOmittedContextPrompt },
  { name: "certainty_and_hedging", takesTopic: false, instructions: getCertaintyAndHedgingPrompt },
  { name: "temporal_framing", takesTopic: false, instructions: getTemporalFramingPrompt },
  { name: "emphasis_bias", takesTopic: false, instructions: getEmphasisBiasPrompt },
  { name: "false_balance", takesTopic: false, instructions: getFalseBalancePrompt },
  { name: "narrative_framing", takesTopic: true, instructions: getNarrativeFramingPrompt },
  { name: "missing_attribution", takesTopic: false, instructions: getMissingAttributionPrompt },
  { name: "political_alignment", takesTopic: false, instructions: getPoliticalAlignmentPrompt },
  { name: "missing_context", takesTopic: false, instructions: getMissingContextPrompt },
  { name: "historical_revisionism", takesTopic: false, instructions: getHistoricalRevisionismPrompt },
  { name: "framing_bias", takesTopic: false, instructions: getFramingBiasPrompt },
];

export const TEXT_SCANNER_NAMES: readonly string[] = SCANNER_DEFINITIONS.map((d) => d.name);

// ============================================================================
// SCANNING
// ============================================================================

function errorMessage(error: unknown): string {
  return (error instanceof Error ? error.message : String(error)).slice(0, 100);
}

/**
 * Run one scanner call. Any failure (model, extraction or validation)
 * means this scanner reports nothing for the paragraph.
 */
async function runScanner(
  model: ModelClient,
  definition: ScannerDefinition,
  prompt: string,
): Promise<BiasFinding[]> {
  try {
    const raw = await model.complete({ task: "scan", system: definition.instructions(), prompt });
    const parsed = FindingsEnvelopeSchema.safeParse(extractJsonFromResult(raw));
    if (!parsed.success) {
      console.warn(`[TextScanner] ${definition.name}: invalid findings (${formatIssues(parsed.error)})`);
      return [];
    }
    const findings = parsed.data.findings.map((f) => normalizeFinding(f, definition.name));
    debugLog(`[TextScanner] ${definition.name}: ${findings.length} finding(s)`);
    return findings;
  } catch (error) {
    console.warn(`[TextScanner] ${definition.name} failed: ${errorMessage(error)}`);
    return [];
  }
}

function toScanner(model: ModelClient, definition: ScannerDefinition): TextScanner {
  if (definition.takesTopic) {
    return {
      name: definition.name,
      arity: 2,
      scan: (text, topic) => runScanner(model, definition, `Text: ${text}\n\nTopic: ${topic}`),
    };
  }
  return {
    name: definition.name,
    arity: 1,
    scan: (text) => runScanner(model, definition, `Text: ${text}`),
  };
}

/**
 * Build the ordered scanner registry bound to one model client
 */
export function createTextScanners(model: ModelClient): TextScanner[] {
  return SCANNER_DEFINITIONS.map((definition) => toScanner(model, definition));
}

/**
 * Run every scanner sequentially and concatenate their findings.
 * Findings are neither filtered nor deduplicated across scanners.
 */
export async function runTextScanners(
  scanners: readonly TextScanner[],
  text: string,
  topic: string,
): Promise<BiasFinding[]> {
  const all: BiasFinding[] = [];
  for (const scanner of scanners) {
    const findings = scanner.arity === 2 ? await scanner.scan(text, topic) : await scanner.scan(text);
    all.push(...findings);
  }
  return all;
}
