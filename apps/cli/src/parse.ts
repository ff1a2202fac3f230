/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { readFile } from "node:fs/promises";
import { ConfigError, isPrecision, type Precision, type ProjectionKind } from "@lexembed/core";

export type Args = Record<string, string>;

export function parseKV(args: string[]): Args {
  const result: Args = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(kv: Args, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new ConfigError({ message: `Missing required argument: --${key}${label ? ` (${label})` : ""}` });
  }
  return val;
}

export function intArg(kv: Args, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = parseInt(val, 10);
  if (Number.isNaN(n)) throw new ConfigError({ message: `--${key} must be an integer, got "${val}"` });
  return n;
}

export function floatArg(kv: Args, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = parseFloat(val);
  if (Number.isNaN(n)) throw new ConfigError({ message: `--${key} must be a number, got "${val}"` });
  return n;
}

export function strArg(kv: Args, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function boolArg(kv: Args, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

export function precisionArg(kv: Args, key: string, defaultVal: Precision): Precision {
  const val = kv[key];
  if (!val) return defaultVal;
  if (!isPrecision(val)) throw new ConfigError({ message: `--${key} must be f16, f32 or f64, got "${val}"` });
  return val;
}

export function projectionArg(kv: Args, key: string, defaultVal: ProjectionKind): ProjectionKind {
  const val = kv[key];
  if (!val) return defaultVal;
  if (val !== "indicator" && val !== "tfidf") {
    throw new ConfigError({ message: `--${key} must be indicator or tfidf, got "${val}"` });
  }
  return val;
}

/** Load a JSON config file and merge with CLI overrides. */
export async function loadConfig(kv: Args): Promise<Args> {
  const configPath = kv["config"];
  if (!configPath) return kv;
  const raw: unknown = JSON.parse(await readFile(configPath, "utf-8"));
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError({ message: `${configPath}: config must be a JSON object` });
  }
  const config: Args = {};
  for (const [key, value] of Object.entries(raw)) {
    config[key] = Array.isArray(value) ? value.join(",") : String(value);
  }
  // CLI overrides take precedence
  return { ...config, ...kv };
}
