// lib/normalize.ts
import type { AnalysisReport, RedFlag } from "@/lib/types";

export const GENERAL_FLAG = "General Flag";
export const NO_DESCRIPTION = "No description provided.";
export const NO_SUMMARY = "No summary available.";
export const NO_INSIGHT = "No educational insight available.";

const MIN_SCORE = 0;
const MAX_SCORE = 10;

// -----------------------------
// Small helpers
// -----------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function clampScore(n: number): number {
  return Math.max(MIN_SCORE, Math.min(MAX_SCORE, n));
}

function readScore(raw: unknown): number {
  if (typeof raw === "number" && Number.isFinite(raw)) return clampScore(raw);
  if (typeof raw === "string" && raw.trim() !== "") {
    const n = Number(raw);
    if (Number.isFinite(n)) return clampScore(n);
  }
  return 0;
}

function readString(raw: unknown, fallback: string): string {
  return typeof raw === "string" ? raw : fallback;
}

// -----------------------------
// Fences + JSON
// -----------------------------

/** Drop ```json / ``` markers wherever they appear. */
export function stripCodeFences(raw: string): string {
  return raw.trim().replaceAll("```json", "").replaceAll("```", "").trim();
}

/** Throws SyntaxError on malformed JSON. */
export function parseModelText(raw: string): unknown {
  return JSON.parse(stripCodeFences(raw));
}

// -----------------------------
// Red flags
// -----------------------------

/**
 * Every entry becomes a RedFlag; none are dropped.
 *
 * - object  → flag_type / description, defaulted when absent or not a string
 * - string  → General Flag with the string as description
 * - other   → General Flag with String(value), or the default description for null
 */
export function normalizeRedFlag(raw: unknown): RedFlag {
  if (isRecord(raw)) {
    return {
      flagType: readString(raw.flag_type, GENERAL_FLAG),
      description: readString(raw.description, NO_DESCRIPTION)
    };
  }

  if (typeof raw === "string") return { flagType: GENERAL_FLAG, description: raw };

  if (raw === null || raw === undefined) return { flagType: GENERAL_FLAG, description: NO_DESCRIPTION };

  return { flagType: GENERAL_FLAG, description: String(raw) };
}

export function normalizeRedFlags(raw: unknown): RedFlag[] {
  if (raw === undefined || raw === null) return [];
  if (Array.isArray(raw)) return raw.map(normalizeRedFlag);
  if (typeof raw === "string") return raw.trim() ? [normalizeRedFlag(raw)] : [];
  return [normalizeRedFlag(raw)];
}

// -----------------------------
// Report
// -----------------------------

/**
 * Fill a report from a partial model answer.
 * Only a non-object payload (array, string, number, null) is rejected.
 */
export function normalizeReport(parsed: unknown): AnalysisReport {
  if (!isRecord(parsed)) {
    throw new Error("Model returned non-object JSON.");
  }

  return {
    credibilityScore: readScore(parsed.credibility_score),
    summary: readString(parsed.summary, NO_SUMMARY),
    redFlags: normalizeRedFlags(parsed.red_flags),
    educationalInsight: readString(parsed.educational_insight, NO_INSIGHT)
  };
}
