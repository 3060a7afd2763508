// lib/fetcher.ts
import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { FetchResult } from "@/lib/types";

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

// Plain browser UA; some sites reject requests without one.
const USER_AGENT = "Mozilla/5.0";

export type FetchPageOptions = {
  timeoutMs?: number;
};

function fetchFailed(cause: string): FetchResult {
  return { ok: false, error: { message: `Error fetching URL: ${cause}` } };
}

// undici reports "fetch failed" and keeps the socket error in `cause`.
function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  if (err.cause instanceof Error && err.cause.message) {
    return `${err.message} (${err.cause.message})`;
  }
  return err.message;
}

/** Charset label from a Content-Type header, if it declares one. */
export function charsetFromContentType(contentType: string | null): string | undefined {
  const m = contentType?.match(/charset=["']?([^;"'\s]+)/i);
  return m ? m[1] : undefined;
}

function paragraphText($: CheerioAPI): string {
  return $("p")
    .map((_, el) => $(el).text())
    .get()
    .join(" ");
}

/** Text of every <p>, in document order, joined by single spaces. */
export function extractParagraphText(html: string): string {
  return paragraphText(cheerio.load(html));
}

/**
 * Same as extractParagraphText, from undecoded bytes. A BOM wins, then the
 * header charset, then <meta charset>, then UTF-8.
 */
export function extractParagraphTextFromBytes(bytes: Uint8Array, charset?: string): string {
  const $ = cheerio.loadBuffer(Buffer.from(bytes), {
    encoding: { transportLayerEncodingLabel: charset, defaultEncoding: "utf-8" }
  });
  return paragraphText($);
}

export async function fetchPageText(
  url: string,
  options: FetchPageOptions = {}
): Promise<FetchResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  let r: Response;
  try {
    r = await fetch(url, {
      method: "GET",
      headers: { "user-agent": USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs)
    });
  } catch (err: unknown) {
    return fetchFailed(describeError(err));
  }

  if (!r.ok) {
    return fetchFailed(`HTTP ${r.status} ${r.statusText}`.trim());
  }

  try {
    const bytes = new Uint8Array(await r.arrayBuffer());
    const charset = charsetFromContentType(r.headers.get("content-type"));
    return { ok: true, text: extractParagraphTextFromBytes(bytes, charset) };
  } catch (err: unknown) {
    return fetchFailed(describeError(err));
  }
}
