/**
 * Configuration Schemas
 *
 * Zod schema for validating and canonicalizing analyzer configuration.
 *
 * @module config-schemas
 */

import { z } from "zod";

// ============================================================================
// TYPES
// ============================================================================

export const LLM_PROVIDERS = ["local", "openai", "anthropic", "google", "mistral"] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

// ============================================================================
// ANALYZER CONFIG SCHEMA
// ============================================================================

export const AnalyzerConfigSchema = z.object({
  // LLM provider
  llmProvider: z.enum(LLM_PROVIDERS).describe("Model endpoint; local is any OpenAI-compatible server"),
  llmModel: z.string().min(1).nullable().describe("Model name; null picks the provider default"),
  llmBaseUrl: z.string().url().describe("Base URL of the local OpenAI-compatible endpoint"),
  llmApiKey: z.string().nullable().describe("API key passed to the provider; null uses the provider's own env var"),
  llmTemperature: z.number().min(0).max(2),
  llmMaxRetries: z.number().int().min(0).max(10),

  // Per-task model tiering
  llmTiering: z.boolean().describe("Use a lighter model for scanning than for synthesis"),
  modelScan: z.string().min(1).nullable().describe("Model for text scanners, claim parsing and source analysis"),
  modelSummary: z.string().min(1).nullable().describe("Model for paragraph and page summaries"),

  // Source retrieval
  fetchTimeoutMs: z.number().int().min(1000).max(120000),
  chunkMaxChars: z.number().int().min(500).max(100000),

  // Article source
  wikiBaseUrl: z.string().url(),
});

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;

export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
  llmProvider: "local",
  llmModel: null,
  llmBaseUrl: "http://localhost:1234/v1",
  llmApiKey: null,
  llmTemperature: 0,
  llmMaxRetries: 2,
  llmTiering: false,
  modelScan: null,
  modelSummary: null,
  fetchTimeoutMs: 10000,
  chunkMaxChars: 8000,
  wikiBaseUrl: "https://en.wikipedia.org",
};

/**
 * Render zod issues as `path: message` lines
 */
export function formatConfigIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`);
}
