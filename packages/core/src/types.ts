/**
 * Core types for the verity system.
 */

// ── Activation ─────────────────────────────────────────────────────────────
export type ActivationKind = "linear" | "relu" | "sigmoid" | "softmax";

export const ACTIVATION_KINDS: readonly ActivationKind[] = ["linear", "relu", "sigmoid", "softmax"];

export const defaultActivation: ActivationKind = "linear";

export function isActivationKind(value: unknown): value is ActivationKind {
  return ACTIVATION_KINDS.some((kind) => kind === value);
}

// ── Cost ───────────────────────────────────────────────────────────────────
/** mse: mean squared error, cce: categorical cross-entropy. */
export type CostKind = "mse" | "cce";

export const COST_KINDS: readonly CostKind[] = ["mse", "cce"];

export const defaultCost: CostKind = "mse";

export function isCostKind(value: unknown): value is CostKind {
  return COST_KINDS.some((kind) => kind === value);
}

// ── Vectors ────────────────────────────────────────────────────────────────
export type Vector = readonly number[];
