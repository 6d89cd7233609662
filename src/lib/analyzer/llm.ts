/**
 * citecheck Analyzer - LLM Provider Selection
 *
 * Handles model selection (with optional per-task tiering) and the single
 * model client every analyzer is handed. The client is built once per run.
 *
 * @module analyzer/llm
 */

import { generateText, type LanguageModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createMistral } from "@ai-sdk/mistral";
import { DEFAULT_ANALYZER_CONFIG, type AnalyzerConfig, type LlmProvider } from "../config-schemas";
import { classifyError, ModelInvocationError } from "../error-classification";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export interface ModelInfo {
  provider: LlmProvider;
  modelName: string;
  model: LanguageModel;
}

/** scan = text scanners; claims, source and verification = per-claim work; summary = synthesis */
export type ModelTask = "scan" | "claims" | "source" | "verification" | "summary";

const LOCAL_DEFAULT_MODEL = "openai/gpt-oss-20b";
const LOCAL_API_KEY = "not-needed";

export function normalizeProvider(raw: string | undefined): LlmProvider {
  const p = (raw || "").toLowerCase().trim();
  if (p === "anthropic" || p === "claude") return "anthropic";
  if (p === "google" || p === "gemini") return "google";
  if (p === "mistral") return "mistral";
  if (p === "openai") return "openai";
  return "local";
}

function detectProviderFromModelName(modelName: string): LlmProvider | null {
  const name = (modelName || "").toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gemini")) return "google";
  if (name.includes("mistral")) return "mistral";
  if (name.startsWith("gpt")) return "openai";
  return null;
}

function isSynthesisTask(task: ModelTask): boolean {
  return task === "summary";
}

function defaultModelNameForTask(provider: LlmProvider, task: ModelTask): string {
  const synthesis = isSynthesisTask(task);
  switch (provider) {
    case "anthropic":
      return synthesis ? "claude-sonnet-4-20250514" : "claude-3-5-haiku-20241022";
    case "google":
      return synthesis ? "gemini-1.5-pro" : "gemini-1.5-flash";
    case "mistral":
      return synthesis ? "mistral-large-latest" : "mistral-small-latest";
    case "openai":
      return synthesis ? "gpt-4o" : "gpt-4o-mini";
    case "local":
      return LOCAL_DEFAULT_MODEL;
  }
}

function defaultModelName(provider: LlmProvider): string {
  return defaultModelNameForTask(provider, "summary");
}

function buildModelInfo(provider: LlmProvider, modelName: string, config: AnalyzerConfig): ModelInfo {
  const apiKey = config.llmApiKey ?? undefined;
  switch (provider) {
    case "anthropic":
      return { provider, modelName, model: createAnthropic({ apiKey })(modelName) };
    case "google":
      return { provider, modelName, model: createGoogleGenerativeAI({ apiKey })(modelName) };
    case "mistral":
      return { provider, modelName, model: createMistral({ apiKey })(modelName) };
    case "openai":
      return { provider, modelName, model: createOpenAI({ apiKey })(modelName) };
    case "local":
      return {
        provider,
        modelName,
        model: createOpenAI({
          baseURL: config.llmBaseUrl,
          apiKey: apiKey ?? LOCAL_API_KEY,
          compatibility: "compatible",
        })(modelName),
      };
  }
}

function modelOverrideForTask(task: ModelTask, config: AnalyzerConfig): string | null {
  return isSynthesisTask(task) ? config.modelSummary : config.modelScan;
}

/**
 * Get the LLM model based on configuration
 */
export function getModel(config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG): ModelInfo {
  const provider = normalizeProvider(config.llmProvider);
  return buildModelInfo(provider, config.llmModel ?? defaultModelName(provider), config);
}

/**
 * Get an LLM model for a specific analyzer task.
 *
 * By default, tiering is OFF and this returns the same model as `getModel()`.
 */
export function getModelForTask(task: ModelTask, config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG): ModelInfo {
  if (!config.llmTiering) {
    return getModel(config);
  }

  const provider = normalizeProvider(config.llmProvider);
  const overrideName = modelOverrideForTask(task, config);
  let modelName: string | null = null;

  if (overrideName) {
    const inferredProvider = detectProviderFromModelName(overrideName);
    if (inferredProvider && provider !== "local" && inferredProvider !== provider) {
      console.warn(
        `[LLM] Ignoring model override "${overrideName}" for task "${task}" because provider is "${provider}"`,
      );
    } else {
      modelName = overrideName;
    }
  }

  if (!modelName) {
    modelName = config.llmModel ?? defaultModelNameForTask(provider, task);
  }
  return buildModelInfo(provider, modelName, config);
}

// ============================================================================
// MODEL CLIENT
// ============================================================================

export interface CompletionRequest {
  task: ModelTask;
  /** Tool instructions */
  system: string;
  prompt: string;
}

/**
 * The one model handle every component receives.
 * `complete` resolves to raw model text or rejects with `ModelInvocationError`.
 */
export interface ModelClient {
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * Build the model client for a run. Each task's model is resolved on its
 * first call and cached for the rest of the run.
 */
export function createModelClient(config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG): ModelClient {
  const models = new Map<ModelTask, ModelInfo>();
  const modelFor = (task: ModelTask): ModelInfo => {
    let info = models.get(task);
    if (!info) {
      info = getModelForTask(task, config);
      models.set(task, info);
    }
    return info;
  };

  return {
    async complete({ task, system, prompt }: CompletionRequest): Promise<string> {
      const { model, modelName } = modelFor(task);
      try {
        const result = await generateText({
          model,
          system,
          prompt,
          temperature: config.llmTemperature,
          maxRetries: config.llmMaxRetries,
        });
        return result.text;
      } catch (error) {
        const classified = classifyError(error);
        console.error(`[LLM] ${task} call to ${modelName} failed (${classified.category}): ${classified.message}`);
        throw new ModelInvocationError(classified, { cause: error });
      }
    },
  };
}
