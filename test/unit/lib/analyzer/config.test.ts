/**
 * Analyzer configuration tests
 *
 * @module analyzer/config.test
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigError, loadAnalyzerConfig, loadEnvFile, type Env } from "@/lib/analyzer/config";
import { DEFAULT_ANALYZER_CONFIG } from "@/lib/config-schemas";

describe("loadAnalyzerConfig", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadAnalyzerConfig({})).toEqual(DEFAULT_ANALYZER_CONFIG);
  });

  it("reads CITECHECK_* variables", () => {
    const config = loadAnalyzerConfig({
      CITECHECK_LLM_PROVIDER: "Anthropic",
      CITECHECK_LLM_API_KEY: "test-secret",
      CITECHECK_LLM_TIERING: "yes",
      CITECHECK_MODEL_SCAN: "claude-3-5-haiku-20241022",
      CITECHECK_CHUNK_MAX_CHARS: "4000",
      CITECHECK_LLM_TEMPERATURE: "0.3",
    });

    expect(config).toEqual({
      ...DEFAULT_ANALYZER_CONFIG,
      llmProvider: "anthropic",
      llmApiKey: "test-secret",
      llmTiering: true,
      modelScan: "claude-3-5-haiku-20241022",
      chunkMaxChars: 4000,
      llmTemperature: 0.3,
    });
  });

  it("treats blank values as unset", () => {
    expect(loadAnalyzerConfig({ CITECHECK_LLM_MODEL: "  ", CITECHECK_FETCH_TIMEOUT_MS: "" })).toEqual(
      DEFAULT_ANALYZER_CONFIG,
    );
  });

  it("lists every invalid field", () => {
    let caught: unknown;
    try {
      loadAnalyzerConfig({ CITECHECK_LLM_PROVIDER: "cohere", CITECHECK_FETCH_TIMEOUT_MS: "soon" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((issue) => issue.split(":")[0])).toEqual(["llmProvider", "fetchTimeoutMs"]);
      expect(caught.message.startsWith("Invalid analyzer configuration:\n  llmProvider:")).toBe(true);
    }
  });

  it("rejects out-of-range numbers", () => {
    expect(() => loadAnalyzerConfig({ CITECHECK_CHUNK_MAX_CHARS: "10" })).toThrow(ConfigError);
    expect(() => loadAnalyzerConfig({ CITECHECK_LLM_MAX_RETRIES: "1.5" })).toThrow(ConfigError);
  });
});

describe("loadEnvFile", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  function writeEnv(contents: string): string {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "citecheck-env-"));
    const file = path.join(dir, ".env");
    fs.writeFileSync(file, contents);
    return file;
  }

  it("sets unset variables and keeps existing ones", () => {
    const file = writeEnv(
      ['# model', 'CITECHECK_LLM_MODEL="my-model"', "CITECHECK_LLM_PROVIDER=openai", "NOT A SETTING", ""].join("\n"),
    );
    const env: Env = { CITECHECK_LLM_PROVIDER: "local" };

    loadEnvFile(file, env);

    expect(env).toEqual({ CITECHECK_LLM_PROVIDER: "local", CITECHECK_LLM_MODEL: "my-model" });
  });

  it("does nothing when the file is missing", () => {
    const env: Env = {};
    loadEnvFile(path.join(os.tmpdir(), "citecheck-no-such-dir", ".env"), env);
    expect(env).toEqual({});
  });
});
