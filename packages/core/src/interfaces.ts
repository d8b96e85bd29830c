/**
 * Subsystem interfaces (ports).
 */
import { Context } from "effect";

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  /** Returns a number in [0, 1). */
  next(): number;
  /** Returns a number in [min, max). */
  range(min: number, max: number): number;
  /** The seed the current sequence started from. */
  state(): number;
  seed(s: number): void;
}

export class RngService extends Context.Tag("RngService")<
  RngService,
  Rng
>() {}

// ── Genetic ────────────────────────────────────────────────────────────────

/**
 * In-place random perturbation of numeric parameters. Each implementor
 * delegates to the parts it owns with the same `alpha`.
 */
export interface Genetic {
  mutate(alpha: number, rng?: Rng): void;
}
