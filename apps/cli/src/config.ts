/**
 * Settings file: where the persisted network and the test image live.
 *
 *   { "settingsPath": "networks/classifier.json", "testPath": "images/test.png" }
 *
 * `--settingsPath` and `--testPath` override file values.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError } from "@verity/core";
import type { ArgMap } from "./parse.js";

export const DEFAULT_CONFIG_PATH = "./config/config.json";

export interface VerityConfig {
  readonly settingsPath: string;
  readonly testPath: string;
}

function isMissingFile(cause: unknown): boolean {
  return typeof cause === "object" && cause !== null && "code" in cause && cause.code === "ENOENT";
}

/** Validate a parsed settings object, throwing `ConfigError` on bad fields. */
export function validateConfig(raw: unknown): VerityConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError({ message: "Config must be a JSON object" });
  }
  const record: Record<string, unknown> = { ...raw };

  const { settingsPath, testPath } = record;
  if (typeof settingsPath !== "string" || settingsPath === "") {
    throw new ConfigError({ message: "settingsPath must be a non-empty string" });
  }
  if (typeof testPath !== "string" || testPath === "") {
    throw new ConfigError({ message: "testPath must be a non-empty string" });
  }

  return { settingsPath, testPath };
}

function overridesFrom(kv: ArgMap): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (kv.settingsPath) out.settingsPath = kv.settingsPath;
  if (kv.testPath) out.testPath = kv.testPath;
  return out;
}

/**
 * Load the config named by `--config` (or the default path), then apply CLI
 * overrides. A missing default file is tolerated when overrides fill every
 * required field; a missing explicit `--config` is an error.
 */
export function loadConfig(kv: ArgMap): Effect.Effect<VerityConfig, ConfigError> {
  const explicit = kv.config;
  const path = explicit ?? DEFAULT_CONFIG_PATH;

  const readRaw = Effect.tryPromise({
    try: () =>
      readFile(path, "utf-8").catch((cause: unknown) => {
        if (!explicit && isMissingFile(cause)) return "{}";
        throw cause;
      }),
    catch: (cause) => new ConfigError({ message: `Failed to read config at ${path}`, cause }),
  });

  return readRaw.pipe(
    Effect.flatMap((raw) =>
      Effect.try({
        try: (): unknown => JSON.parse(raw),
        catch: (cause) => new ConfigError({ message: `Failed to parse config at ${path}: invalid JSON`, cause }),
      }),
    ),
    Effect.flatMap((parsed) =>
      Effect.try({
        try: () => {
          if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
            throw new ConfigError({ message: `Config at ${path} must be a JSON object` });
          }
          return validateConfig({ ...parsed, ...overridesFrom(kv) });
        },
        catch: (cause) =>
          cause instanceof ConfigError ? cause : new ConfigError({ message: `Invalid config at ${path}`, cause }),
      }),
    ),
    Effect.tap((config) => Effect.logDebug(`config: network=${config.settingsPath} image=${config.testPath}`)),
  );
}
