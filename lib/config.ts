// lib/config.ts
import { z } from "zod";

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1, "OPENAI_API_KEY is required"),
  ANALYSIS_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  ANALYSIS_REGION: z.string().trim().min(1).default("Indian"),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000)
});

export type AppConfig = {
  openaiApiKey: string;
  model: string;
  region: string;
  fetchTimeoutMs: number;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/**
 * Validate the process environment.
 *
 * Blank values count as missing, so an `.env` line like `ANALYSIS_MODEL=`
 * falls back to the default instead of failing.
 */
export function loadConfig(env: Env): AppConfig {
  const present: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }

  return {
    openaiApiKey: parsed.data.OPENAI_API_KEY,
    model: parsed.data.ANALYSIS_MODEL,
    region: parsed.data.ANALYSIS_REGION,
    fetchTimeoutMs: parsed.data.FETCH_TIMEOUT_MS
  };
}

let cached: AppConfig | null = null;

// Read once per process; never mutated afterwards.
export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig(process.env);
  return cached;
}
