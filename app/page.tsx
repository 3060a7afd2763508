"use client";

import { useState } from "react";
import { AnalysisReport } from "@/app/components/AnalysisReport";
import { HelpTip } from "@/app/components/HelpTip";
import { TEXT_EXAMPLES } from "@/lib/examples";
import type { AnalysisReport as Report, FailureStage, ImageMimeType } from "@/lib/types";

type InputMode = "text" | "url" | "image";

type ApiSuccess = { ok: true; report: Report };
type ApiFailure = { ok?: false; stage?: FailureStage; error: string; detail?: string };
type ApiResponse = ApiSuccess | ApiFailure;

type PendingImage = {
  dataUrl: string;
  mimeType: ImageMimeType;
  name: string;
};

const MAX_CHARS = 15_000;

const STAGE_TEXT: Record<InputMode, string> = {
  text: "Analyzing linguistic patterns…",
  url: "Fetching the page and analyzing its content…",
  image: "Reading the image and extracting text…"
};

function isImageMime(x: string): x is ImageMimeType {
  return x === "image/png" || x === "image/jpeg";
}

function isSuccess(x: ApiResponse): x is ApiSuccess {
  return x.ok === true;
}

function readAsDataUrl(file: File): Promise<string> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () =>
      typeof reader.result === "string" ? resolve(reader.result) : reject(new Error("Could not read the image."));
    reader.onerror = () => reject(reader.error ?? new Error("Could not read the image."));
    reader.readAsDataURL(file);
  });
}

export default function Page() {
  // --- User input ---
  const [inputMode, setInputMode] = useState<InputMode>("text");
  const [text, setText] = useState("");
  const [url, setUrl] = useState("");
  const [image, setImage] = useState<PendingImage | null>(null);

  // --- Results ---
  const [report, setReport] = useState<Report | null>(null);

  // --- UX state ---
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const overLimit = inputMode === "text" && text.length > MAX_CHARS;

  const canSubmit =
    !loading &&
    !overLimit &&
    (inputMode === "text" ? text.trim().length > 0 : inputMode === "url" ? url.trim().length > 0 : image !== null);

  function switchMode(next: InputMode) {
    setInputMode(next);
    setError(null);
  }

  async function onPickImage(file: File | undefined) {
    setError(null);
    if (!file) {
      setImage(null);
      return;
    }
    if (!isImageMime(file.type)) {
      setImage(null);
      setError("Upload a JPG or PNG image.");
      return;
    }
    try {
      setImage({ dataUrl: await readAsDataUrl(file), mimeType: file.type, name: file.name });
    } catch (e: unknown) {
      setError(e instanceof Error ? e.message : "Could not read the image.");
    }
  }

  async function onScan() {
    setLoading(true);
    setError(null);
    setReport(null);

    try {
      const payload =
        inputMode === "text"
          ? { inputMode, text }
          : inputMode === "url"
            ? { inputMode, url: url.trim() }
            : { inputMode, image: image?.dataUrl ?? "", mimeType: image?.mimeType ?? "image/png" };

      const res = await fetch("/api/analyze", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload)
      });

      const data = (await res.json()) as ApiResponse;

      if (isSuccess(data)) {
        setReport(data.report);
      } else if (data.stage === "analysis") {
        setError(`Analysis Error: ${data.error}`);
      } else {
        setError(data.detail ? `${data.error} ${data.detail}` : data.error);
      }
    } catch (e: unknown) {
      setError(e instanceof Error ? e.message : "An unknown error occurred.");
    } finally {
      setLoading(false);
    }
  }

  return (
    <main className="page">
      <header className="top">
        <h1 className="brand-headline">Truth Sentinel</h1>
        <p className="sub">Scan text, links and images for misinformation red flags.</p>
        <p className="disclaimer">
          <strong>Disclaimer:</strong> AI is a tool, not a replacement for critical thinking. Always verify.
        </p>
      </header>

      <div className="input-card">
        <div className="input-tabs" role="tablist" aria-label="Input mode">
          {(["text", "url", "image"] as const).map((m) => (
            <button
              key={m}
              type="button"
              role="tab"
              aria-selected={inputMode === m}
              className={`input-tab ${inputMode === m ? "active" : ""}`}
              onClick={() => switchMode(m)}
            >
              {m === "text" ? "Analyze Text" : m === "url" ? "Analyze URL" : "Analyze Image"}
            </button>
          ))}
        </div>

        <div className="input-body">
          {inputMode === "text" && (
            <>
              <select
                className="example-select"
                aria-label="Pre-loaded example"
                defaultValue=""
                onChange={(e) => {
                  const example = TEXT_EXAMPLES.find((x) => x.id === e.target.value);
                  setText(example ? example.text : "");
                }}
              >
                <option value="">Select a pre-loaded example</option>
                {TEXT_EXAMPLES.map((x) => (
                  <option key={x.id} value={x.id}>
                    {x.label}
                  </option>
                ))}
              </select>

              <textarea
                className="article-input"
                value={text}
                onChange={(e) => setText(e.target.value)}
                rows={8}
                placeholder="Or paste your text content here…"
              />
            </>
          )}

          {inputMode === "url" && (
            <input
              className="url-input"
              value={url}
              onChange={(e) => setUrl(e.target.value)}
              placeholder="Enter a webpage URL…"
            />
          )}

          {inputMode === "image" && (
            <>
              <HelpTip text="The image is described, its text extracted, then analyzed." placement="below">
                <input
                  className="file-input"
                  type="file"
                  accept="image/png,image/jpeg"
                  onChange={(e) => void onPickImage(e.target.files?.[0])}
                />
              </HelpTip>
              {image && (
                <img className="image-preview" src={image.dataUrl} alt={`Awaiting analysis: ${image.name}`} />
              )}
            </>
          )}

          <div className="action-row">
            <button className="primary-button" onClick={() => void onScan()} disabled={!canSubmit}>
              {loading ? "Scanning…" : "Initiate Scan"}
            </button>

            <div className="status-slot" aria-live="polite">
              {loading ? (
                <div className="thinking">
                  <span className="dot" />
                  <span className="dot" />
                  <span className="dot" />
                  <span className="thinkingText">{STAGE_TEXT[inputMode]}</span>
                </div>
              ) : (
                <span className="status-text">
                  {overLimit
                    ? `Too long: ${text.length.toLocaleString()} / ${MAX_CHARS.toLocaleString()} chars.`
                    : canSubmit
                      ? "Ready when you are."
                      : inputMode === "text"
                        ? "Please provide text for analysis."
                        : inputMode === "url"
                          ? "Please provide a URL for analysis."
                          : "Upload a JPG or PNG image."}
                </span>
              )}
            </div>
          </div>

          {error && <div className="error-box">{error}</div>}
        </div>
      </div>

      {report && <AnalysisReport report={report} />}
    </main>
  );
}
