/**
 * Simple arg parsing helpers.
 * Supports --key=value, --key value, --flag and single-letter aliases.
 */
import { ConfigError } from "@wikicorpus/core";

const ALIASES: Record<string, string> = {
  i: "input",
  o: "output",
  l: "lang",
  t: "tokens",
};

/** Whether `arg` can be an option's value rather than the next option. */
function isValue(arg: string | undefined): arg is string {
  return arg !== undefined && (!arg.startsWith("-") || /^-\d+$/.test(arg));
}

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    let key: string;
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
        continue;
      }
      key = arg.slice(2);
    } else if (/^-[a-zA-Z]$/.test(arg)) {
      key = ALIASES[arg.slice(1)] ?? arg.slice(1);
    } else {
      continue;
    }
    const next = args[i + 1];
    if (isValue(next)) {
      result[key] = next;
      i++;
    } else {
      result[key] = "true";
    }
  }
  return result;
}

/** Arguments that are neither options nor option values. */
export function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("-")) {
      const takesValue = !arg.includes("=");
      const next = args[i + 1];
      if (takesValue && isValue(next)) i++;
      continue;
    }
    out.push(arg);
  }
  return out;
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new ConfigError({ message: `Missing required argument: --${key}${label ? ` (${label})` : ""}` });
  }
  return val;
}

/** Integer option with no default; rejects anything that is not a whole number. */
export function optionalIntArg(kv: Record<string, string>, key: string): number | undefined {
  const val = kv[key];
  if (val === undefined) return undefined;
  if (!/^-?\d+$/.test(val.trim())) {
    throw new ConfigError({ message: `--${key} must be an integer, got "${val}"` });
  }
  return parseInt(val, 10);
}

export function floatArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  return val ? parseFloat(val) : defaultVal;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function oneOfArg<T extends string>(
  kv: Record<string, string>,
  key: string,
  choices: readonly T[],
  defaultVal: T,
): T {
  const val = kv[key];
  if (val === undefined) return defaultVal;
  const match = choices.find((c) => c === val);
  if (match === undefined) {
    throw new ConfigError({ message: `--${key} must be one of ${choices.join(", ")}, got "${val}"` });
  }
  return match;
}

/** Load a JSON config file and merge with CLI overrides. */
export async function loadConfig(kv: Record<string, string>): Promise<Record<string, string>> {
  const configPath = kv["config"];
  if (!configPath) return kv;
  const fs = await import("node:fs/promises");
  const raw = await fs.readFile(configPath, "utf-8");
  const data: unknown = JSON.parse(raw);
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigError({ message: `Config file ${configPath} must hold a JSON object` });
  }
  const config: Record<string, string> = {};
  for (const [key, value] of Object.entries(data)) {
    if (value === null || value === undefined) continue;
    if (typeof value === "object") {
      throw new ConfigError({ message: `Config key "${key}" in ${configPath} must be a string, number or boolean` });
    }
    config[key] = String(value);
  }
  // CLI overrides take precedence
  return { ...config, ...kv };
}
