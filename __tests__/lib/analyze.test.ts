import { describe, it, expect, vi } from "vitest";
import { analyze, ANALYSIS_FAILED_PREFIX } from "@/lib/analyze";
import type { ModelClient, ModelInput } from "@/lib/model";
import { DEFAULT_IMAGE_INSTRUCTION } from "@/lib/prompt";
import type { AnalysisRequest, FetchResult } from "@/lib/types";

const LOTTERY_RESPONSE = JSON.stringify({
  credibility_score: 2,
  summary: "Scam",
  red_flags: [{ flag_type: "Urgency", description: "Pressure to act fast" }],
  educational_insight: "Lottery scams..."
});

function fakeModel(reply: string | Error) {
  const generate = vi.fn(async (_input: ModelInput): Promise<string> => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const model: ModelClient = { generate };
  return { model, generate };
}

const silent = { warn: vi.fn() };

const IMAGE_REQUEST: AnalysisRequest = {
  kind: "image",
  instruction: DEFAULT_IMAGE_INSTRUCTION,
  image: { data: new Uint8Array([0x89, 0x50, 0x4e, 0x47]), mimeType: "image/png" }
};

// ---------------------------------------------------------------------------
// Scenario
// ---------------------------------------------------------------------------

describe("analyze — lottery message", () => {
  it("yields the stubbed verdict", async () => {
    const { model } = fakeModel(LOTTERY_RESPONSE);

    const result = await analyze({ kind: "text", body: "CONGRATS! You won..." }, { model, logger: silent });

    expect(result).toEqual({
      ok: true,
      report: {
        credibilityScore: 2,
        summary: "Scam",
        redFlags: [{ flagType: "Urgency", description: "Pressure to act fast" }],
        educationalInsight: "Lottery scams..."
      }
    });
  });

  it("sends the text inside the prompt and no image", async () => {
    const { model, generate } = fakeModel(LOTTERY_RESPONSE);

    await analyze({ kind: "text", body: "CONGRATS! You won..." }, { model, logger: silent });

    expect(generate).toHaveBeenCalledTimes(1);
    const input = generate.mock.calls[0][0];
    expect(input.prompt).toContain("---\nCONGRATS! You won...\n---");
    expect(input.image).toBeUndefined();
  });

  it("passes the configured region into the prompt", async () => {
    const { model, generate } = fakeModel(LOTTERY_RESPONSE);

    await analyze({ kind: "text", body: "x" }, { model, region: "Kenyan", logger: silent });

    expect(generate.mock.calls[0][0].prompt).toContain("specializing in the Kenyan context");
  });
});

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

describe("analyze — request variants", () => {
  it("attaches the image and uses the instruction as content", async () => {
    const { model, generate } = fakeModel(LOTTERY_RESPONSE);

    const result = await analyze(IMAGE_REQUEST, { model, logger: silent });

    expect(result.ok).toBe(true);
    const input = generate.mock.calls[0][0];
    expect(input.prompt).toContain(`---\n${DEFAULT_IMAGE_INSTRUCTION}\n---`);
    expect(input.image).toEqual(IMAGE_REQUEST.kind === "image" ? IMAGE_REQUEST.image : undefined);
  });

  it("fetches a URL and analyzes the page text", async () => {
    const { model, generate } = fakeModel(LOTTERY_RESPONSE);
    const fetchPage = vi.fn(async (): Promise<FetchResult> => ({ ok: true, text: "A. B." }));

    const result = await analyze(
      { kind: "url", body: "https://news.example.com/a" },
      { model, fetchPage, fetchTimeoutMs: 2_500, logger: silent }
    );

    expect(result.ok).toBe(true);
    expect(fetchPage).toHaveBeenCalledWith("https://news.example.com/a", { timeoutMs: 2_500 });
    expect(generate.mock.calls[0][0].prompt).toContain("---\nA. B.\n---");
  });

  it("returns the raw fetch cause and skips the model when the fetch fails", async () => {
    const { model, generate } = fakeModel(LOTTERY_RESPONSE);
    const fetchPage = vi.fn(
      async (): Promise<FetchResult> => ({ ok: false, error: { message: "Error fetching URL: HTTP 404 Not Found" } })
    );

    const result = await analyze({ kind: "url", body: "https://news.example.com/gone" }, { model, fetchPage, logger: silent });

    expect(result).toEqual({ ok: false, stage: "fetch", message: "Error fetching URL: HTTP 404 Not Found" });
    expect(generate).not.toHaveBeenCalled();
  });

  it("returns exactly one outcome for every variant", async () => {
    const requests: AnalysisRequest[] = [
      { kind: "text", body: "hello" },
      { kind: "url", body: "https://news.example.com/a" },
      IMAGE_REQUEST
    ];
    const fetchPage = async (): Promise<FetchResult> => ({ ok: true, text: "page" });

    for (const reply of [LOTTERY_RESPONSE, "not json", new Error("boom")]) {
      for (const request of requests) {
        const { model } = fakeModel(reply);
        const result = await analyze(request, { model, fetchPage, logger: silent });
        if (result.ok) {
          expect(Object.keys(result).sort()).toEqual(["ok", "report"]);
        } else {
          expect(Object.keys(result).sort()).toEqual(["message", "ok", "stage"]);
        }
      }
    }
  });
});

// ---------------------------------------------------------------------------
// Tolerance + failures
// ---------------------------------------------------------------------------

describe("analyze — response handling", () => {
  it("parses a fenced response the same as a plain one", async () => {
    const plain = await analyze({ kind: "text", body: "x" }, { model: fakeModel(LOTTERY_RESPONSE).model, logger: silent });
    const fenced = await analyze(
      { kind: "text", body: "x" },
      { model: fakeModel("```json\n" + LOTTERY_RESPONSE + "\n```").model, logger: silent }
    );

    expect(fenced).toEqual(plain);
  });

  it("succeeds with an empty red flag list when red_flags is missing", async () => {
    const { model } = fakeModel(JSON.stringify({ credibility_score: 8, summary: "Fine", educational_insight: "None" }));

    const result = await analyze({ kind: "text", body: "x" }, { model, logger: silent });

    expect(result).toEqual({
      ok: true,
      report: { credibilityScore: 8, summary: "Fine", redFlags: [], educationalInsight: "None" }
    });
  });

  it("promotes string red flags to General Flag entries", async () => {
    const { model } = fakeModel(JSON.stringify({ credibility_score: 3, red_flags: ["Unnamed source", "All caps"] }));

    const result = await analyze({ kind: "text", body: "x" }, { model, logger: silent });

    expect(result.ok && result.report.redFlags).toEqual([
      { flagType: "General Flag", description: "Unnamed source" },
      { flagType: "General Flag", description: "All caps" }
    ]);
  });

  it("turns malformed JSON into a failure record", async () => {
    const { model } = fakeModel('{"credibility_score": 3, "summ');

    const result = await analyze({ kind: "text", body: "x" }, { model, logger: silent });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.stage).toBe("analysis");
    expect(!result.ok && result.message).toMatch(
      /^AI analysis failed\. The model response was not valid JSON\. Details: .+/
    );
  });

  it("turns a model call failure into a failure record with the cause", async () => {
    const { model } = fakeModel(new Error("401 Incorrect API key provided"));

    const result = await analyze({ kind: "text", body: "x" }, { model, logger: silent });

    expect(result).toEqual({
      ok: false,
      stage: "analysis",
      message: `${ANALYSIS_FAILED_PREFIX} The model request did not complete. Details: 401 Incorrect API key provided`
    });
  });

  it("turns a JSON array answer into a failure record", async () => {
    const { model } = fakeModel("[1, 2, 3]");

    const result = await analyze({ kind: "text", body: "x" }, { model, logger: silent });

    expect(result).toEqual({
      ok: false,
      stage: "analysis",
      message: `${ANALYSIS_FAILED_PREFIX} The model response was not a JSON object. Details: Model returned non-object JSON.`
    });
  });

  it("logs handled failures through the injected logger", async () => {
    const logger = { warn: vi.fn() };
    const { model } = fakeModel(new Error("429 quota exceeded"));

    await analyze({ kind: "text", body: "x" }, { model, logger });

    expect(logger.warn).toHaveBeenCalledWith("[analyze] model call failed:", "429 quota exceeded");
  });
});
