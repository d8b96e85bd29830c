/**
 * Runs a command's Effect with logging and the RNG layer installed.
 */
import { Cause, Effect, Exit, Layer } from "effect";
import type { RngService } from "@verity/core";
import { LoggingLive, RngLive } from "@verity/effect-runtime";
import { optionalIntArg, strArg, type ArgMap } from "./parse.js";

export interface TaggedFailure {
  readonly _tag: string;
  readonly message: string;
}

export function describeFailure(error: unknown): string {
  if (typeof error === "object" && error !== null && "_tag" in error && "message" in error) {
    return `${String(error._tag)}: ${String(error.message)}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * `--logLevel` picks the minimum level (default info); `--seed` makes every
 * random draw reproducible. Failures are printed and set a non-zero exit code.
 */
export async function runCommand<E extends TaggedFailure>(
  kv: ArgMap,
  program: Effect.Effect<void, E, RngService>,
): Promise<boolean> {
  const layer = Layer.suspend(() =>
    Layer.merge(LoggingLive(strArg(kv, "logLevel", "info")), RngLive(optionalIntArg(kv, "seed"))),
  );
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(layer)));

  if (Exit.isFailure(exit)) {
    console.error(describeFailure(Cause.squash(exit.cause)));
    process.exitCode = 1;
    return false;
  }
  return true;
}
