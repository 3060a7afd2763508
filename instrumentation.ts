// instrumentation.ts
// Runs once when the server boots; a missing credential stops startup.
import { getConfig } from "@/lib/config";

export function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;
  const config = getConfig();
  console.info("[startup] analysis model configured:", { model: config.model, region: config.region });
}
