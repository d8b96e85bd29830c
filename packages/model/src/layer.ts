import { DimensionError, globalRng, type ActivationKind, type Genetic, type Rng, type Vector } from "@verity/core";
import { applyActivation } from "./activation.js";
import { Neuron } from "./neuron.js";

/** Neurons sharing one input width and one activation. */
export class Layer implements Genetic {
  private readonly _neurons: Neuron[];
  readonly inputSize: number;
  readonly activation: ActivationKind;

  constructor(inputSize: number, neurons: Neuron[], activation: ActivationKind) {
    for (const neuron of neurons) {
      if (neuron.inputSize !== inputSize) {
        throw new DimensionError({
          message: `Neuron has ${neuron.inputSize} weights, layer input size is ${inputSize}`,
          expected: inputSize,
          actual: neuron.inputSize,
        });
      }
    }
    this.inputSize = inputSize;
    this._neurons = [...neurons];
    this.activation = activation;
  }

  static random(inputSize: number, size: number, activation: ActivationKind, rng: Rng = globalRng): Layer {
    const neurons: Neuron[] = [];
    for (let i = 0; i < size; i++) neurons.push(Neuron.random(inputSize, rng));
    return new Layer(inputSize, neurons, activation);
  }

  get neurons(): readonly Neuron[] {
    return this._neurons;
  }

  /** Output width. */
  getSize(): number {
    return this._neurons.length;
  }

  /** Memoized weighted sums from the last forward pass. */
  outputs(): number[] {
    return this._neurons.map((n) => n.output);
  }

  forward(inputs: Vector): number[] {
    const sums = this._neurons.map((n) => n.weightedSum(inputs));
    return applyActivation(this.activation, sums);
  }

  mutate(alpha: number, rng: Rng = globalRng): void {
    for (const neuron of this._neurons) neuron.mutate(alpha, rng);
  }
}
