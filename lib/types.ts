// lib/types.ts
// Shapes shared by the pipeline, the route handler and the page.

export type ImageMimeType = "image/png" | "image/jpeg";

export type ImageInput = {
  data: Uint8Array;
  mimeType: ImageMimeType;
};

export type AnalysisRequest =
  | { kind: "text"; body: string }
  | { kind: "url"; body: string }
  | { kind: "image"; instruction: string; image: ImageInput };

export type RedFlag = {
  flagType: string;
  description: string;
};

export type AnalysisReport = {
  credibilityScore: number; // 0–10, model-provided
  summary: string;
  redFlags: RedFlag[];
  educationalInsight: string;
};

export type FailureStage = "fetch" | "analysis";

export type AnalysisResult =
  | { ok: true; report: AnalysisReport }
  | { ok: false; stage: FailureStage; message: string };

export type FetchError = { message: string };

export type FetchResult =
  | { ok: true; text: string }
  | { ok: false; error: FetchError };

