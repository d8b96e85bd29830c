/**
 * Classification labels and their one-hot encoding.
 */
import { DimensionError, type Vector } from "@verity/core";

export type Label = "real" | "fake";

/** Label order fixes the one-hot index: real → 0, fake → 1. */
export const LABELS: readonly Label[] = ["real", "fake"];

/** Output width of a classification network. */
export const LABEL_COUNT = LABELS.length;

export function oneHot(label: Label): number[] {
  switch (label) {
    case "real": return [1, 0];
    case "fake": return [0, 1];
  }
}

/**
 * Pick the label whose output is largest. Ties keep the earliest index, so
 * [0.5, 0.5] is "real".
 */
export function labelFromOutputs(outputs: Vector): Label {
  if (outputs.length !== LABEL_COUNT) {
    throw new DimensionError({
      message: `Outputs are invalid: expected ${LABEL_COUNT} values, got ${outputs.length}`,
      expected: LABEL_COUNT,
      actual: outputs.length,
    });
  }

  let best = 0;
  for (let i = 1; i < outputs.length; i++) {
    if (outputs[i] > outputs[best]) best = i;
  }
  return best === 0 ? "real" : "fake";
}

export function labelName(label: Label): string {
  return label === "real" ? "Real" : "Fake";
}
