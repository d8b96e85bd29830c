/**
 * Feedforward network.
 *
 * Construction is split into two types: `NetworkBuilder` owns a growing list
 * of layers and is consumed by `build()`, which hands the layers to an
 * immutable-topology `Network`. Only a built `Network` can run, be costed or
 * be mutated; nothing on it adds or removes layers.
 */
import {
  BuildError, DimensionError, defaultActivation, defaultCost, globalRng,
  type ActivationKind, type CostKind, type Genetic, type Rng, type Vector,
} from "@verity/core";
import { labelFromOutputs, type Datapoint, type Dataset, type Label } from "@verity/data";
import { applyCost } from "./cost.js";
import { Layer } from "./layer.js";

export interface RunResult {
  label: Label;
  outputs: number[];
}

function outputWidth(inputSize: number, layers: readonly Layer[]): number {
  const last = layers[layers.length - 1];
  return last ? last.getSize() : inputSize;
}

// ── Building ───────────────────────────────────────────────────────────────

export class NetworkBuilder {
  readonly inputSize: number;
  private readonly rng: Rng;
  private layers: Layer[] = [];
  private consumed = false;

  constructor(inputSize: number, rng: Rng = globalRng) {
    if (!Number.isInteger(inputSize) || inputSize < 1) {
      throw new BuildError({ message: `Input size must be a positive integer, got ${inputSize}` });
    }
    this.inputSize = inputSize;
    this.rng = rng;
  }

  private ensureOpen(op: string): void {
    if (this.consumed) {
      throw new BuildError({ message: `${op}() called on a builder that was already built` });
    }
  }

  get outputSize(): number {
    return outputWidth(this.inputSize, this.layers);
  }

  get layerCount(): number {
    return this.layers.length;
  }

  /** Append a randomly initialised layer fed by the current output width. */
  addLayer(size: number, activation: ActivationKind = defaultActivation): NetworkBuilder {
    this.ensureOpen("addLayer");
    if (!Number.isInteger(size) || size < 1) {
      throw new BuildError({ message: `Layer size must be a positive integer, got ${size}` });
    }
    this.layers.push(Layer.random(this.outputSize, size, activation, this.rng));
    return this;
  }

  build(cost: CostKind = defaultCost): Network {
    this.ensureOpen("build");
    this.consumed = true;
    const layers = this.layers;
    this.layers = [];
    return new Network(this.inputSize, layers, cost);
  }
}

// ── Ready ──────────────────────────────────────────────────────────────────

export class Network implements Genetic {
  readonly inputSize: number;
  readonly costKind: CostKind;
  private readonly _layers: readonly Layer[];

  /** Validates that every layer is fed by its predecessor's output width. */
  constructor(inputSize: number, layers: readonly Layer[], cost: CostKind) {
    let width = inputSize;
    layers.forEach((layer, i) => {
      if (layer.inputSize !== width) {
        throw new DimensionError({
          message: `Layer ${i} expects ${layer.inputSize} inputs but receives ${width}`,
          expected: width,
          actual: layer.inputSize,
        });
      }
      width = layer.getSize();
    });

    this.inputSize = inputSize;
    this._layers = [...layers];
    this.costKind = cost;
  }

  static create(inputSize: number, rng?: Rng): NetworkBuilder {
    return new NetworkBuilder(inputSize, rng);
  }

  get layers(): readonly Layer[] {
    return this._layers;
  }

  get outputSize(): number {
    return outputWidth(this.inputSize, this._layers);
  }

  /** Forward a raw vector through every layer. Overwrites each neuron's `output`. */
  forward(inputs: Vector): number[] {
    if (inputs.length !== this.inputSize) {
      throw new DimensionError({
        message: `Network expects ${this.inputSize} inputs, got ${inputs.length}`,
        expected: this.inputSize,
        actual: inputs.length,
      });
    }

    let activations: number[] = [...inputs];
    for (const layer of this._layers) activations = layer.forward(activations);
    return activations;
  }

  run(datapoint: Datapoint): RunResult {
    const outputs = this.forward(datapoint.inputs);
    return { label: labelFromOutputs(outputs), outputs };
  }

  /** Mean cost over the dataset. An empty dataset gives NaN. */
  cost(dataset: Dataset): number {
    let total = 0;
    for (const datapoint of dataset) {
      const { outputs } = this.run(datapoint);
      total += applyCost(this.costKind, outputs, datapoint.targets());
    }
    return total / dataset.size();
  }

  mutate(alpha: number, rng: Rng = globalRng): void {
    for (const layer of this._layers) layer.mutate(alpha, rng);
  }
}
