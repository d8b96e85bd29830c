/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { ConfigError } from "@verity/core";

export type ArgMap = Record<string, string>;

export function parseKV(args: string[]): ArgMap {
  const result: ArgMap = {};
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

export function requireArg(kv: ArgMap, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new ConfigError({ message: `Missing required argument: --${key}${label ? ` (${label})` : ""}` });
  }
  return val;
}

export function intArg(kv: ArgMap, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (!Number.isInteger(n)) throw new ConfigError({ message: `--${key} must be an integer, got "${val}"` });
  return n;
}

export function positiveIntArg(kv: ArgMap, key: string, defaultVal: number): number {
  const n = intArg(kv, key, defaultVal);
  if (n < 1) throw new ConfigError({ message: `--${key} must be a positive integer, got "${kv[key]}"` });
  return n;
}

export function optionalIntArg(kv: ArgMap, key: string): number | undefined {
  return kv[key] ? intArg(kv, key, 0) : undefined;
}

export function floatArg(kv: ArgMap, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (!Number.isFinite(n)) throw new ConfigError({ message: `--${key} must be a number, got "${val}"` });
  return n;
}

export function strArg(kv: ArgMap, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

/** Comma-separated positive integers, e.g. --hidden=64,64,64. */
export function intListArg(kv: ArgMap, key: string, defaultVal: readonly number[]): number[] {
  const val = kv[key];
  if (val === undefined) return [...defaultVal];
  if (val === "") return [];
  return val.split(",").map((part) => {
    const n = Number(part.trim());
    if (!Number.isInteger(n) || n < 1) {
      throw new ConfigError({ message: `--${key} must list positive integers, got "${val}"` });
    }
    return n;
  });
}

/** A value from a closed set, checked by `guard`. */
export function choiceArg<T extends string>(
  kv: ArgMap,
  key: string,
  choices: readonly T[],
  guard: (value: unknown) => value is T,
  defaultVal: T,
): T {
  const val = kv[key];
  if (val === undefined) return defaultVal;
  if (!guard(val)) {
    throw new ConfigError({ message: `--${key} must be one of ${choices.join(", ")}, got "${val}"` });
  }
  return val;
}
