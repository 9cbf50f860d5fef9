/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError } from "@bytelevel/core";

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

export function requireArg(kv: Args, key: string, label?: string): Effect.Effect<string, ConfigError> {
  const val = kv[key];
  if (!val) {
    return Effect.fail(
      new ConfigError({ message: `Missing required argument: --${key}${label ? ` (${label})` : ""}` }),
    );
  }
  return Effect.succeed(val);
}

export function intArg(kv: Args, key: string, defaultVal: number): Effect.Effect<number, ConfigError> {
  const val = kv[key];
  if (!val) return Effect.succeed(defaultVal);
  const n = Number(val);
  if (!Number.isSafeInteger(n)) {
    return Effect.fail(new ConfigError({ message: `--${key} must be an integer, got "${val}"` }));
  }
  return Effect.succeed(n);
}

export function strArg(kv: Args, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

/** Comma- or space-separated integers, e.g. `--ids=1,2,3`. */
export function idsArg(kv: Args, key: string): Effect.Effect<number[], ConfigError> {
  return requireArg(kv, key, "comma-separated token ids").pipe(
    Effect.flatMap((raw): Effect.Effect<number[], ConfigError> => {
      const ids: number[] = [];
      for (const part of raw.split(/[,\s]+/).filter((p) => p.length > 0)) {
        const n = Number(part);
        if (!Number.isSafeInteger(n) || n < 0) {
          return Effect.fail(new ConfigError({ message: `--${key}: "${part}" is not a token id` }));
        }
        ids.push(n);
      }
      return Effect.succeed(ids);
    }),
  );
}

/** Load a JSON config file and merge with CLI overrides. */
export function loadConfig(kv: Args): Effect.Effect<Args, ConfigError> {
  const configPath = kv["config"];
  if (!configPath) return Effect.succeed(kv);
  return Effect.tryPromise({
    try: async () => {
      const raw = await readFile(configPath, "utf-8");
      const config: unknown = JSON.parse(raw);
      if (typeof config !== "object" || config === null || Array.isArray(config)) {
        throw new Error("config file must hold a JSON object");
      }
      const flat: Args = {};
      for (const [key, value] of Object.entries(config)) {
        flat[key] = typeof value === "string" ? value : JSON.stringify(value);
      }
      // CLI overrides take precedence
      return { ...flat, ...kv };
    },
    catch: (cause) =>
      new ConfigError({ message: `Failed to load config "${configPath}": ${String(cause)}`, cause }),
  });
}
