// app/api/analyze/route.ts
import { z } from "zod";
import { analyze } from "@/lib/analyze";
import { ConfigError, getConfig } from "@/lib/config";
import { createDefaultModel, type ModelClient } from "@/lib/model";
import { DEFAULT_IMAGE_INSTRUCTION } from "@/lib/prompt";
import type { AnalysisRequest, AnalysisResult } from "@/lib/types";

export const runtime = "nodejs";

const MAX_TEXT_CHARS = 15_000;
const MAX_IMAGE_BYTES = 5 * 1024 * 1024;

// -----------------------------
// Request schema
// -----------------------------
const HttpUrl = z
  .string()
  .trim()
  .url("Enter a valid URL.")
  .refine((u) => /^https?:\/\//i.test(u), "Only http and https URLs are supported.");

const BodySchema = z.discriminatedUnion("inputMode", [
  z.object({
    inputMode: z.literal("text"),
    text: z
      .string()
      .trim()
      .min(1, "Please provide text for analysis.")
      .max(MAX_TEXT_CHARS, `Text is too long (max ${MAX_TEXT_CHARS.toLocaleString("en-US")} characters).`)
  }),
  z.object({
    inputMode: z.literal("url"),
    url: HttpUrl
  }),
  z.object({
    inputMode: z.literal("image"),
    image: z.string().min(1, "Please upload an image."),
    mimeType: z.enum(["image/png", "image/jpeg"]),
    instruction: z.string().trim().optional()
  })
]);

type Body = z.infer<typeof BodySchema>;

// -----------------------------
// Small helpers
// -----------------------------
function json(status: number, data: unknown): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json" }
  });
}

function badRequest(message: string): Response {
  return json(400, { error: message });
}

// Accepts bare base64 or a data: URL as produced by FileReader.
function decodeImage(raw: string): Uint8Array {
  const base64 = raw.replace(/^data:[^;,]+;base64,/, "");
  return new Uint8Array(Buffer.from(base64, "base64"));
}

function toRequest(body: Body): AnalysisRequest | { error: string } {
  switch (body.inputMode) {
    case "text":
      return { kind: "text", body: body.text };
    case "url":
      return { kind: "url", body: body.url };
    case "image": {
      const data = decodeImage(body.image);
      if (data.byteLength === 0) return { error: "The uploaded image is empty." };
      if (data.byteLength > MAX_IMAGE_BYTES) return { error: "The uploaded image is larger than 5 MB." };
      return {
        kind: "image",
        instruction: body.instruction || DEFAULT_IMAGE_INSTRUCTION,
        image: { data, mimeType: body.mimeType }
      };
    }
  }
}

function toResponse(result: AnalysisResult): Response {
  if (result.ok) return json(200, result);
  return json(result.stage === "fetch" ? 422 : 502, { ok: false, stage: result.stage, error: result.message });
}

let model: ModelClient | null = null;

function getModel(): ModelClient {
  if (!model) {
    const config = getConfig();
    model = createDefaultModel(config.openaiApiKey, config.model);
  }
  return model;
}

// -----------------------------
// Route handler
// -----------------------------
export async function POST(req: Request) {
  try {
    let raw: unknown;
    try {
      raw = await req.json();
    } catch {
      return badRequest("Request body must be JSON.");
    }

    const parsed = BodySchema.safeParse(raw);
    if (!parsed.success) {
      return badRequest(parsed.error.issues[0]?.message ?? "Invalid request.");
    }

    const request = toRequest(parsed.data);
    if ("error" in request) return badRequest(request.error);

    const config = getConfig();
    const result = await analyze(request, {
      model: getModel(),
      region: config.region,
      fetchTimeoutMs: config.fetchTimeoutMs
    });

    return toResponse(result);
  } catch (err: unknown) {
    console.error("POST /api/analyze failed:", err);
    const message = err instanceof Error ? err.message : "Unknown error";
    if (err instanceof ConfigError) {
      return json(500, { error: "Server not configured.", detail: message });
    }
    return json(500, { error: "Failed to analyze content.", detail: message });
  }
}
