/**
 * Effect layers for dependency injection.
 */
import { Layer } from "effect";
import { RngService, SeededRng, globalRng } from "@verity/core";

// ── RNG Layer ──────────────────────────────────────────────────────────────

/** Seeded generator when a seed is given, the process-wide one otherwise. */
export const RngLive = (seed?: number) =>
  Layer.succeed(RngService, seed === undefined ? globalRng : new SeededRng(seed));
