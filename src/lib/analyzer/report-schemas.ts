/**
 * Zod schemas for model outputs
 *
 * Every structured model answer is validated here before it enters a report.
 * Numbers arrive as numbers, numeric strings or null; enum-like fields arrive
 * in any letter case. Report schemas pass unknown fields through untouched.
 *
 * @module analyzer/report-schemas
 */

import { z } from "zod";
import {
  KNOWN_FINDING_KINDS,
  SIGNED_FINDING_KIND,
  type BiasFinding,
  type PageSummary,
  type ParagraphSummary,
} from "./types";

// ============================================================================
// COERCION HELPERS
// ============================================================================

export function coerceNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** "partial" / "PARTIAL" -> "Partial" */
function capitalize(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const t = value.trim().toLowerCase();
  return t.charAt(0).toUpperCase() + t.slice(1);
}

function toBoolean(value: unknown): unknown {
  if (typeof value === "string") {
    const t = value.trim().toLowerCase();
    if (t === "true" || t === "yes") return true;
    if (t === "false" || t === "no") return false;
  }
  return value;
}

const requiredNumber = z.preprocess((v) => coerceNumber(v) ?? v, z.number());

const boundedNumber = (min: number, max: number) => requiredNumber.transform((v) => clamp(v, min, max));

const numberOr = (fallback: number, min: number, max: number) =>
  z.unknown().transform((v) => clamp(coerceNumber(v) ?? fallback, min, max));

const count = z.preprocess((v) => coerceNumber(v) ?? v, z.number().int().min(0));

const text = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

const stringList = z
  .array(z.unknown())
  .nullish()
  .transform((items) => (items ?? []).filter((item): item is string => typeof item === "string"));

const diversityLevel = z.preprocess(capitalize, z.enum(["Low", "Medium", "High"]));

// ============================================================================
// TEXT FINDINGS
// ============================================================================

function offsetIndex(value: unknown): number | null {
  const n = coerceNumber(value);
  return n === null ? null : Math.trunc(n);
}

/** Anything but a [start, end] pair reads as unknown indices */
const offset = z.unknown().transform((v): [number | null, number | null] =>
  Array.isArray(v) && v.length === 2 ? [offsetIndex(v[0]), offsetIndex(v[1])] : [null, null],
);

export const BiasFindingSchema = z.object({
  kind: z.string().trim().min(1),
  strength: z.unknown().transform((v) => coerceNumber(v) ?? 0),
  text,
  offset,
  explanation: text,
});

/** A missing `findings` key means the model found nothing */
export const FindingsEnvelopeSchema = z.object({
  findings: z.array(BiasFindingSchema).nullish().transform((v) => v ?? []),
});

const KNOWN_KINDS: ReadonlySet<string> = new Set(KNOWN_FINDING_KINDS);

/**
 * Warn on kinds no bundled scanner emits and clamp strength into the kind's range
 */
export function normalizeFinding(finding: BiasFinding, scanner: string): BiasFinding {
  if (!KNOWN_KINDS.has(finding.kind)) {
    console.warn(`[TextScanner] ${scanner}: unknown finding kind "${finding.kind}" kept as-is`);
  }

  const min = finding.kind === SIGNED_FINDING_KIND ? -1 : 0;
  const strength = clamp(finding.strength, min, 1);
  if (strength !== finding.strength) {
    console.warn(
      `[TextScanner] ${scanner}: strength ${finding.strength} for "${finding.kind}" clamped to ${strength}`,
    );
  }

  return { ...finding, strength };
}

// ============================================================================
// SOURCE ANALYSIS REPORTS
// ============================================================================

export const IntegrityReportSchema = z
  .object({
    source_reliability: boundedNumber(0, 1),
    source_bias_score: boundedNumber(-1, 1),
    verification_strength: z.preprocess(capitalize, z.enum(["Full", "Partial", "None"])),
    explanation: text,
  })
  .passthrough();

export const ClusteringReportSchema = z
  .object({
    is_clustered: z.preprocess(toBoolean, z.boolean()),
    independent_sources: count,
    total_citations: count,
    original_source: text,
    explanation: text,
  })
  .passthrough();

export const DiversityReportSchema = z
  .object({
    geographic_diversity: diversityLevel,
    ideological_diversity: diversityLevel,
    type_diversity: diversityLevel,
    explanation: text,
  })
  .passthrough();

/** One chunk's verdict; a missing score counts as no support */
export const ChunkVerificationSchema = z.object({
  verification_score: numberOr(0, 0, 1),
  content_summary: text,
  explanation: text,
});

/** `{ source_id?, analysis_type?, report }` wrapper the source prompts ask for */
export const SourceAnalysisEnvelopeSchema = z.object({
  source_id: z.unknown().optional(),
  report: z.unknown().optional(),
});

// ============================================================================
// SUMMARIES
// ============================================================================

const DEFAULT_LEANING = "Center";

const leaning = z
  .unknown()
  .transform((v) => (typeof v === "string" && v.trim() ? v.trim() : DEFAULT_LEANING));

export const ParagraphSummarySchema: z.ZodType<ParagraphSummary, z.ZodTypeDef, unknown> = z.object({
  overall_bias_score: numberOr(5, 0, 10),
  overall_factuality_score: numberOr(5, 0, 10),
  political_leaning: leaning,
  representative_example: text,
  key_issues: stringList,
  summary: text,
});

export const PageSummarySchema: z.ZodType<PageSummary, z.ZodTypeDef, unknown> = z.object({
  overall_bias_score: numberOr(5, 0, 10),
  overall_factuality_score: numberOr(5, 0, 10),
  overall_political_leaning: leaning,
  representative_examples: stringList,
  summary: text,
});

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`).join("; ");
}
