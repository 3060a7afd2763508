// lib/model.ts
import OpenAI from "openai";
import type { ResponseInputContent } from "openai/resources/responses/responses";
import type { ImageInput } from "@/lib/types";

export type ModelInput = {
  prompt: string;
  image?: ImageInput;
};

/** One stateless call in, raw model text out. */
export interface ModelClient {
  generate(input: ModelInput): Promise<string>;
}

export function toDataUrl(image: ImageInput): string {
  return `data:${image.mimeType};base64,${Buffer.from(image.data).toString("base64")}`;
}

function buildContent(input: ModelInput): ResponseInputContent[] {
  const content: ResponseInputContent[] = [{ type: "input_text", text: input.prompt }];
  if (input.image) {
    content.push({ type: "input_image", image_url: toDataUrl(input.image), detail: "auto" });
  }
  return content;
}

// -----------------------------
// Responses API
// -----------------------------
export function createOpenAIModel(client: OpenAI, model: string): ModelClient {
  return {
    async generate(input) {
      const resp = await client.responses.create({
        model,
        input: [{ role: "user", content: buildContent(input) }],
        text: { format: { type: "json_object" } }
      });

      const message = resp.output?.find((item) => item.type === "message");
      if (!message || message.type !== "message") {
        throw new Error("No message output from model.");
      }

      const content = message.content?.find((part) => part.type === "output_text");
      if (!content || content.type !== "output_text") {
        throw new Error("Model did not return text output.");
      }

      return content.text;
    }
  };
}

// Server-side only; the key never reaches the browser.
export function createDefaultModel(apiKey: string, model: string): ModelClient {
  return createOpenAIModel(new OpenAI({ apiKey }), model);
}
