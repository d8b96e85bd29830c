/**
 * Activation functions. Each maps a vector of pre-activation sums to a vector
 * of the same length.
 */
import type { ActivationKind, Vector } from "@verity/core";

export function relu(values: Vector): number[] {
  return values.map((x) => Math.max(0, x));
}

export function sigmoid(values: Vector): number[] {
  return values.map((x) => 1 / (1 + Math.exp(-x)));
}

/**
 * Softmax over the whole vector. No max-subtraction: large inputs overflow
 * `exp` and produce NaN.
 */
export function softmax(values: Vector): number[] {
  let partition = 0;
  for (const x of values) partition += Math.exp(x);
  return values.map((x) => Math.exp(x) / partition);
}

export function applyActivation(kind: ActivationKind, values: Vector): number[] {
  switch (kind) {
    case "linear": return [...values];
    case "relu": return relu(values);
    case "sigmoid": return sigmoid(values);
    case "softmax": return softmax(values);
  }
}
