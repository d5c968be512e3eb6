/**
 * Environment loading.
 */
import { readFileSync } from "node:fs";

/** Load `.env.local` into process.env without overriding what is already set. */
export function loadEnvFile(file = ".env.local"): void {
  let content: string;
  try {
    content = readFileSync(file, "utf8");
  } catch {
    return; // optional
  }
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    const val = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
    if (!process.env[key]) process.env[key] = val;
  }
}

export function defaultLogLevel(): string {
  return process.env.WIKICORPUS_LOG_LEVEL ?? "info";
}
