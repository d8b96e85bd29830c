/**
 * Cost functions: (outputs, targets) → scalar loss.
 */
import { DimensionError, type CostKind, type Vector } from "@verity/core";
import { softmax } from "./activation.js";

function checkLengths(outputs: Vector, targets: Vector): void {
  if (outputs.length !== targets.length) {
    throw new DimensionError({
      message: `Cost needs equal lengths: ${outputs.length} outputs, ${targets.length} targets`,
      expected: outputs.length,
      actual: targets.length,
    });
  }
}

export function meanSquaredError(outputs: Vector, targets: Vector): number {
  checkLengths(outputs, targets);
  let sum = 0;
  for (let i = 0; i < outputs.length; i++) {
    const diff = targets[i] - outputs[i];
    sum += diff * diff;
  }
  return sum / outputs.length;
}

/**
 * Cross-entropy of softmax(outputs) against targets. Softmax is applied here,
 * so outputs must not already be softmaxed.
 */
export function categoricalCrossEntropy(outputs: Vector, targets: Vector): number {
  checkLengths(outputs, targets);
  const probs = softmax(outputs);
  let sum = 0;
  for (let i = 0; i < probs.length; i++) sum += targets[i] * Math.log(probs[i]);
  return -sum;
}

export function applyCost(kind: CostKind, outputs: Vector, targets: Vector): number {
  switch (kind) {
    case "mse": return meanSquaredError(outputs, targets);
    case "cce": return categoricalCrossEntropy(outputs, targets);
  }
}
