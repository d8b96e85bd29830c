import { describe, it, expect } from "vitest";
import { DimensionError, SeededRng } from "@verity/core";
import { Layer, Network, Neuron } from "@verity/model";

describe("Neuron", () => {
  it("computes the weighted sum plus bias and memoizes it", () => {
    const neuron = new Neuron([1, 2, 3, 4], 0.5);
    expect(neuron.weightedSum([1, 1, 1, 1])).toBe(10.5);
    expect(neuron.output).toBe(10.5);
  });

  it("fails on a dimension mismatch instead of truncating", () => {
    const neuron = new Neuron([1, 2, 3, 4], 0);
    expect(() => neuron.weightedSum([1, 1, 1])).toThrow(DimensionError);
    expect(() => neuron.weightedSum([1, 1, 1, 1, 1])).toThrow(DimensionError);
    expect(neuron.output).toBe(0);
  });

  it("draws random weights and bias from [-1, 1)", () => {
    const neuron = Neuron.random(50, new SeededRng(3));
    expect(neuron.weights).toHaveLength(50);
    for (const w of [...neuron.weights, neuron.bias]) {
      expect(w).toBeGreaterThanOrEqual(-1);
      expect(w).toBeLessThan(1);
    }
  });

  it("mutate(0) leaves parameters unchanged", () => {
    const neuron = Neuron.random(8, new SeededRng(4));
    const weights = [...neuron.weights];
    const bias = neuron.bias;
    neuron.mutate(0, new SeededRng(5));
    expect(neuron.weights).toEqual(weights);
    expect(neuron.bias).toBe(bias);
  });

  it("mutate(alpha) perturbs every parameter by at most alpha", () => {
    const neuron = Neuron.random(8, new SeededRng(4));
    const weights = [...neuron.weights];
    const bias = neuron.bias;
    neuron.mutate(0.5, new SeededRng(6));

    expect(neuron.weights).toHaveLength(8);
    neuron.weights.forEach((w, i) => {
      expect(w).not.toBe(weights[i]);
      expect(Math.abs(w - weights[i])).toBeLessThanOrEqual(0.5);
    });
    expect(neuron.bias).not.toBe(bias);
  });
});

describe("Layer", () => {
  const makeLayer = () =>
    new Layer(2, [new Neuron([1, 1], 0), new Neuron([1, -1], 0)], "relu");

  it("applies the activation to the vector of weighted sums", () => {
    const layer = makeLayer();
    expect(layer.forward([2, 3])).toEqual([5, 0]);
    expect(layer.outputs()).toEqual([5, -1]);
    expect(layer.getSize()).toBe(2);
  });

  it("rejects neurons whose width differs from the layer input size", () => {
    expect(() => new Layer(3, [new Neuron([1, 1], 0)], "linear")).toThrow(DimensionError);
  });

  it("keeps its own copy of the neuron list", () => {
    const neurons = [new Neuron([1, 1], 0), new Neuron([1, -1], 0)];
    const network = new Network(2, [new Layer(2, neurons, "linear")], "mse");
    neurons.push(new Neuron([1, 1, 1, 1, 1], 0));

    expect(network.layers[0].getSize()).toBe(2);
    expect(network.outputSize).toBe(2);
    expect(network.forward([1, 2])).toEqual([3, -1]);
  });

  it("random layers give every neuron the input width", () => {
    const layer = Layer.random(7, 4, "sigmoid", new SeededRng(1));
    expect(layer.getSize()).toBe(4);
    expect(layer.inputSize).toBe(7);
    for (const n of layer.neurons) expect(n.weights).toHaveLength(7);
  });

  it("mutation reaches every neuron", () => {
    const layer = Layer.random(3, 3, "linear", new SeededRng(2));
    const before = layer.neurons.map((n) => [...n.weights, n.bias]);
    layer.mutate(0.1, new SeededRng(8));
    layer.neurons.forEach((n, i) => {
      const after = [...n.weights, n.bias];
      after.forEach((v, j) => expect(v).not.toBe(before[i][j]));
    });
  });
});
