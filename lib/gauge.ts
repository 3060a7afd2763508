// lib/gauge.ts

export type ScoreBand = "low" | "medium" | "high";

export const GAUGE_MAX = 10;

// Band edges: [0,4) low, [4,7) medium, [7,10] high.
export function scoreBand(score: number): ScoreBand {
  if (score >= 7) return "high";
  if (score >= 4) return "medium";
  return "low";
}

export function bandLabel(band: ScoreBand): string {
  if (band === "high") return "Likely credible";
  if (band === "medium") return "Treat with caution";
  return "Low credibility";
}

/** 0–100 fill for the gauge arc. */
export function gaugePercent(score: number): number {
  if (!Number.isFinite(score)) return 0;
  const s = Math.max(0, Math.min(GAUGE_MAX, score));
  return Math.round((s / GAUGE_MAX) * 100);
}
