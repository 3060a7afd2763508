// lib/analyze.ts
import { fetchPageText, type FetchPageOptions } from "@/lib/fetcher";
import type { ModelClient, ModelInput } from "@/lib/model";
import { normalizeReport, parseModelText } from "@/lib/normalize";
import { buildPrompt } from "@/lib/prompt";
import type { AnalysisRequest, AnalysisResult, FetchResult, ImageInput } from "@/lib/types";

export const ANALYSIS_FAILED_PREFIX = "AI analysis failed.";

export type AnalyzeDeps = {
  model: ModelClient;
  fetchPage?: (url: string, options?: FetchPageOptions) => Promise<FetchResult>;
  fetchTimeoutMs?: number;
  region?: string;
  logger?: Pick<Console, "warn">;
};

function causeOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function analysisFailed(reason: string, err: unknown): AnalysisResult {
  return {
    ok: false,
    stage: "analysis",
    message: `${ANALYSIS_FAILED_PREFIX} ${reason} Details: ${causeOf(err)}`
  };
}

type ResolvedContent =
  | { kind: "content"; content: string; image?: ImageInput }
  | { kind: "done"; result: AnalysisResult };

/**
 * Resolve the request to prompt content; URLs are fetched here.
 * Returns a finished result when the fetch fails.
 */
async function resolveContent(request: AnalysisRequest, deps: AnalyzeDeps): Promise<ResolvedContent> {
  switch (request.kind) {
    case "text":
      return { kind: "content", content: request.body };
    case "image":
      return { kind: "content", content: request.instruction, image: request.image };
    case "url": {
      const fetchPage = deps.fetchPage ?? fetchPageText;
      const fetched = await fetchPage(request.body, { timeoutMs: deps.fetchTimeoutMs });
      if (!fetched.ok) {
        deps.logger?.warn("[analyze] fetch failed:", fetched.error.message);
        return { kind: "done", result: { ok: false, stage: "fetch", message: fetched.error.message } };
      }
      return { kind: "content", content: fetched.text };
    }
  }
}

/**
 * Content → prompt → model → normalized report.
 * Never throws: every failure comes back as `{ ok: false }`.
 */
export async function analyze(request: AnalysisRequest, deps: AnalyzeDeps): Promise<AnalysisResult> {
  const logger = deps.logger ?? console;

  let resolved: ResolvedContent;
  try {
    resolved = await resolveContent(request, { ...deps, logger });
  } catch (err: unknown) {
    logger.warn("[analyze] content resolution failed:", causeOf(err));
    return { ok: false, stage: "fetch", message: `Error fetching URL: ${causeOf(err)}` };
  }
  if (resolved.kind === "done") return resolved.result;

  const input: ModelInput = {
    prompt: buildPrompt(resolved.content, { region: deps.region }),
    image: resolved.image
  };

  let raw: string;
  try {
    raw = await deps.model.generate(input);
  } catch (err: unknown) {
    logger.warn("[analyze] model call failed:", causeOf(err));
    return analysisFailed("The model request did not complete.", err);
  }

  let parsed: unknown;
  try {
    parsed = parseModelText(raw);
  } catch (err: unknown) {
    logger.warn("[analyze] unparseable model output:", { chars: raw.length, cause: causeOf(err) });
    return analysisFailed("The model response was not valid JSON.", err);
  }

  try {
    return { ok: true, report: normalizeReport(parsed) };
  } catch (err: unknown) {
    logger.warn("[analyze] unexpected model output shape:", causeOf(err));
    return analysisFailed("The model response was not a JSON object.", err);
  }
}
