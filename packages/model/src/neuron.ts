import { DimensionError, globalRng, symmetric, type Genetic, type Rng, type Vector } from "@verity/core";

export class Neuron implements Genetic {
  private readonly _weights: number[];
  private _bias: number;
  /** Last weighted sum computed by `weightedSum`. */
  output = 0;

  constructor(weights: Vector, bias: number) {
    this._weights = [...weights];
    this._bias = bias;
  }

  /** Weights and bias drawn independently from [-1, 1). */
  static random(inputSize: number, rng: Rng = globalRng): Neuron {
    const weights = new Array<number>(inputSize);
    for (let i = 0; i < inputSize; i++) weights[i] = symmetric(rng);
    return new Neuron(weights, symmetric(rng));
  }

  get weights(): Vector {
    return this._weights;
  }

  get bias(): number {
    return this._bias;
  }

  get inputSize(): number {
    return this._weights.length;
  }

  weightedSum(inputs: Vector): number {
    if (inputs.length !== this._weights.length) {
      throw new DimensionError({
        message: `Invalid dot product! ${inputs.length} != ${this._weights.length}`,
        expected: this._weights.length,
        actual: inputs.length,
      });
    }

    let acc = 0;
    for (let i = 0; i < inputs.length; i++) acc += this._weights[i] * inputs[i];
    this.output = acc + this._bias;
    return this.output;
  }

  mutate(alpha: number, rng: Rng = globalRng): void {
    for (let i = 0; i < this._weights.length; i++) {
      this._weights[i] += symmetric(rng) * alpha;
    }
    this._bias += symmetric(rng) * alpha;
  }
}
