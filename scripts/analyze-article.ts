#!/usr/bin/env npx tsx
/**
 * Analyze a Wikipedia article for bias and factuality.
 *
 * Usage: npx tsx scripts/analyze-article.ts <title> [--max-paragraphs N] [--output FILE]
 *
 * The JSON report goes to FILE, or to stdout. Progress goes to stderr.
 */

import fs from "fs";
import path from "path";
import { analyzeArticle, createAnalyzerDeps, type AnalyzerDeps } from "../src/lib/analyzer";
import type { ArticleReport } from "../src/lib/analyzer/types";
import { ConfigError, loadAnalyzerConfig, loadEnvFile } from "../src/lib/analyzer/config";

interface CliArgs {
  title: string;
  maxParagraphs?: number;
  output?: string;
}

const USAGE = "Usage: npx tsx scripts/analyze-article.ts <title> [--max-paragraphs N] [--output FILE]";

function parseArgs(argv: string[]): CliArgs {
  let title: string | undefined;
  let maxParagraphs: number | undefined;
  let output: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--max-paragraphs") {
      const n = Number(argv[++i]);
      if (!Number.isInteger(n)) throw new Error("--max-paragraphs expects an integer");
      maxParagraphs = n;
    } else if (arg === "--output") {
      output = argv[++i];
      if (!output) throw new Error("--output expects a file path");
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (title === undefined) {
      title = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (!title) throw new Error("Missing article title");
  return { title, maxParagraphs, output };
}

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`[FAIL] ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    return 2;
  }

  loadEnvFile(path.resolve(process.cwd(), ".env"));

  let deps: AnalyzerDeps;
  try {
    deps = createAnalyzerDeps(loadAnalyzerConfig());
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[FAIL] ${err.message}`);
      return 2;
    }
    throw err;
  }

  let report: ArticleReport;
  try {
    report = await analyzeArticle(args.title, { maxParagraphs: args.maxParagraphs }, deps);
  } catch (err) {
    console.error(`[FAIL] Could not analyze "${args.title}": ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const json = JSON.stringify(report, null, 2);
  if (args.output) {
    fs.writeFileSync(args.output, json);
    console.error(`Results saved to: ${args.output}`);
  } else {
    process.stdout.write(json + "\n");
  }
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error("[FAIL] Unexpected error:", err);
    process.exit(1);
  });
