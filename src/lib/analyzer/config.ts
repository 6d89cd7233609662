/**
 * Environment-based configuration for the citecheck analyzer
 *
 * @module analyzer/config
 */

import * as fs from "fs";
import {
  AnalyzerConfigSchema,
  DEFAULT_ANALYZER_CONFIG,
  formatConfigIssues,
  type AnalyzerConfig,
} from "../config-schemas";

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid analyzer configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ============================================================================
// CONFIGURATION PARSING HELPERS
// ============================================================================

function parseOptionalString(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Numbers are passed through as NaN when unparseable so the schema reports them
 */
function parseNumber(value: string | undefined, fallback: number): number {
  const trimmed = value?.trim();
  if (!trimmed) return fallback;
  return Number(trimmed);
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  const trimmed = value?.trim().toLowerCase();
  if (!trimmed) return fallback;
  return trimmed === "true" || trimmed === "1" || trimmed === "yes";
}

// ============================================================================
// LOADERS
// ============================================================================

/**
 * Build the analyzer config from CITECHECK_* environment variables.
 * Throws `ConfigError` listing every invalid field.
 */
export function loadAnalyzerConfig(env: Env = process.env): AnalyzerConfig {
  const d = DEFAULT_ANALYZER_CONFIG;

  const candidate = {
    llmProvider: (parseOptionalString(env.CITECHECK_LLM_PROVIDER) ?? d.llmProvider).toLowerCase(),
    llmModel: parseOptionalString(env.CITECHECK_LLM_MODEL) ?? d.llmModel,
    llmBaseUrl: parseOptionalString(env.CITECHECK_LLM_BASE_URL) ?? d.llmBaseUrl,
    llmApiKey: parseOptionalString(env.CITECHECK_LLM_API_KEY) ?? d.llmApiKey,
    llmTemperature: parseNumber(env.CITECHECK_LLM_TEMPERATURE, d.llmTemperature),
    llmMaxRetries: parseNumber(env.CITECHECK_LLM_MAX_RETRIES, d.llmMaxRetries),
    llmTiering: parseBoolean(env.CITECHECK_LLM_TIERING, d.llmTiering),
    modelScan: parseOptionalString(env.CITECHECK_MODEL_SCAN) ?? d.modelScan,
    modelSummary: parseOptionalString(env.CITECHECK_MODEL_SUMMARY) ?? d.modelSummary,
    fetchTimeoutMs: parseNumber(env.CITECHECK_FETCH_TIMEOUT_MS, d.fetchTimeoutMs),
    chunkMaxChars: parseNumber(env.CITECHECK_CHUNK_MAX_CHARS, d.chunkMaxChars),
    wikiBaseUrl: parseOptionalString(env.CITECHECK_WIKI_BASE_URL) ?? d.wikiBaseUrl,
  };

  const result = AnalyzerConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(formatConfigIssues(result.error));
  }
  return result.data;
}

/**
 * Load environment variables from a .env file.
 * Only sets variables that are not already defined.
 */
export function loadEnvFile(filePath: string, env: Env = process.env): void {
  if (!fs.existsSync(filePath)) return;
  const raw = fs.readFileSync(filePath, "utf-8");
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;
    const key = trimmed.slice(0, eq).trim();
    let value = trimmed.slice(eq + 1).trim();
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    if (!Object.prototype.hasOwnProperty.call(env, key)) {
      env[key] = value;
    }
  }
}
