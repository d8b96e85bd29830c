/**
 * A single input vector with its label.
 */
import { globalRng, type Rng, type Vector } from "@verity/core";
import { oneHot, type Label } from "./label.js";

export interface NoisyDatapoint {
  datapoint: Datapoint;
  /** Per-input perturbation that was added, already scaled by alpha. */
  noise: number[];
}

export class Datapoint {
  private readonly _inputs: readonly number[];
  readonly label: Label;

  constructor(inputs: Vector, label: Label = "real") {
    this._inputs = [...inputs];
    this.label = label;
  }

  get inputs(): Vector {
    return this._inputs;
  }

  get size(): number {
    return this._inputs.length;
  }

  /** One-hot training target for this datapoint's label. */
  targets(): number[] {
    return oneHot(this.label);
  }

  withLabel(label: Label): Datapoint {
    return new Datapoint(this._inputs, label);
  }

  /**
   * Perturb each input v by a draw from [-v, 1 - v) scaled by alpha. With
   * alpha in [0, 1] the result stays in [0, 1). This datapoint is unchanged.
   */
  addNoise(alpha: number, rng: Rng = globalRng): NoisyDatapoint {
    const noise = this._inputs.map((input) => {
      const min = -input;
      const max = 1 - input;
      return rng.range(min, max) * alpha;
    });

    const inputs = this._inputs.map((input, i) => input + noise[i]);
    return { datapoint: new Datapoint(inputs, this.label), noise };
  }
}
