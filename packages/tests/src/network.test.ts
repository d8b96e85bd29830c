import { describe, it, expect } from "vitest";
import { BuildError, DimensionError, SeededRng } from "@verity/core";
import { Datapoint, Dataset, LABELS } from "@verity/data";
import { Layer, Network, Neuron, serializeNetwork } from "@verity/model";

function identityNetwork(cost: "mse" | "cce" = "mse"): Network {
  const layer = new Layer(2, [new Neuron([1, 0], 0), new Neuron([0, 1], 0)], "linear");
  return new Network(2, [layer], cost);
}

describe("NetworkBuilder", () => {
  it("chains layer widths from the input size", () => {
    const network = Network.create(5, new SeededRng(1))
      .addLayer(4, "relu")
      .addLayer(3)
      .addLayer(2, "sigmoid")
      .build("cce");

    expect(network.inputSize).toBe(5);
    expect(network.layers.map((l) => l.inputSize)).toEqual([5, 4, 3]);
    expect(network.layers.map((l) => l.getSize())).toEqual([4, 3, 2]);
    expect(network.layers.map((l) => l.activation)).toEqual(["relu", "linear", "sigmoid"]);
    expect(network.outputSize).toBe(2);
    expect(network.costKind).toBe("cce");
  });

  it("defaults the cost to mean squared error", () => {
    expect(Network.create(2).addLayer(2).build().costKind).toBe("mse");
  });

  it("reports the current output width while building", () => {
    const builder = Network.create(6);
    expect(builder.outputSize).toBe(6);
    builder.addLayer(3);
    expect(builder.outputSize).toBe(3);
    expect(builder.layerCount).toBe(1);
  });

  it("is consumed by build()", () => {
    const builder = Network.create(2).addLayer(2);
    builder.build();
    expect(() => builder.addLayer(2)).toThrow(BuildError);
    expect(() => builder.build()).toThrow(BuildError);
  });

  it("rejects non-positive sizes", () => {
    expect(() => Network.create(0)).toThrow(BuildError);
    expect(() => Network.create(2).addLayer(0)).toThrow(BuildError);
    expect(() => Network.create(2).addLayer(1.5)).toThrow(BuildError);
  });

  it("gives a built network no way to add layers", () => {
    const network = Network.create(2).addLayer(2).build();
    expect("addLayer" in network).toBe(false);
    expect("build" in network).toBe(false);
  });

  it("builds identical networks from identical seeds", () => {
    const make = () => Network.create(4, new SeededRng(7)).addLayer(3, "relu").addLayer(2).build();
    expect(serializeNetwork(make())).toEqual(serializeNetwork(make()));
  });
});

describe("Network", () => {
  it("rejects layers that do not chain", () => {
    const layer = new Layer(2, [new Neuron([1, 1], 0)], "linear");
    expect(() => new Network(3, [layer], "mse")).toThrow(DimensionError);
  });

  it("runs the default classifier topology", () => {
    const inputSize = 64 * 64 * 4;
    const rng = new SeededRng(11);
    const network = Network.create(inputSize, rng)
      .addLayer(64, "sigmoid")
      .addLayer(64, "sigmoid")
      .addLayer(64, "sigmoid")
      .addLayer(2, "sigmoid")
      .build("mse");

    const inputs = Array.from({ length: inputSize }, () => rng.next());
    const { label, outputs } = network.run(new Datapoint(inputs));

    expect(outputs).toHaveLength(2);
    expect(LABELS).toContain(label);
  });

  it("forwards through layers in order", () => {
    const network = identityNetwork();
    expect(network.run(new Datapoint([0.9, 0.1]))).toEqual({ label: "real", outputs: [0.9, 0.1] });
    expect(network.run(new Datapoint([0.2, 0.8]))).toEqual({ label: "fake", outputs: [0.2, 0.8] });
  });

  it("memoizes each neuron's weighted sum during run", () => {
    const layer = new Layer(2, [new Neuron([1, 1], 0), new Neuron([-1, 0], 0)], "sigmoid");
    const network = new Network(2, [layer], "mse");
    const { outputs } = network.run(new Datapoint([1, 2]));

    expect(network.layers[0].outputs()).toEqual([3, -1]);
    expect(outputs).toEqual([1 / (1 + Math.exp(-3)), 1 / (1 + Math.exp(1))]);
  });

  it("fails on inputs of the wrong width", () => {
    expect(() => identityNetwork().run(new Datapoint([1, 2, 3]))).toThrow(DimensionError);
  });

  it("averages the cost over a dataset", () => {
    const dataset = new Dataset([
      new Datapoint([0.9, 0.1], "real"),
      new Datapoint([0.2, 0.8], "fake"),
    ]);
    expect(identityNetwork("mse").cost(dataset)).toBeCloseTo(0.025, 12);
  });

  it("uses its cost kind", () => {
    const dataset = new Dataset([new Datapoint([0, 0], "real")]);
    expect(identityNetwork("cce").cost(dataset)).toBeCloseTo(Math.LN2, 12);
  });

  it("costs an empty dataset as NaN", () => {
    expect(identityNetwork().cost(new Dataset())).toBeNaN();
  });

  it("mutate(0) keeps every parameter", () => {
    const network = Network.create(4, new SeededRng(2)).addLayer(3).addLayer(2).build();
    const before = serializeNetwork(network);
    network.mutate(0, new SeededRng(3));
    expect(serializeNetwork(network)).toEqual(before);
  });

  it("mutate(alpha) changes every parameter but not the topology", () => {
    const network = Network.create(4, new SeededRng(2)).addLayer(3).addLayer(2).build();
    const before = serializeNetwork(network);
    network.mutate(0.2, new SeededRng(3));
    const after = serializeNetwork(network);

    expect(after.layers.map((l) => l.neurons.length)).toEqual([3, 2]);
    after.layers.forEach((layer, li) => {
      layer.neurons.forEach((neuron, ni) => {
        const old = before.layers[li].neurons[ni];
        expect(neuron.weights).toHaveLength(old.weights.length);
        neuron.weights.forEach((w, wi) => expect(w).not.toBe(old.weights[wi]));
        expect(neuron.bias).not.toBe(old.bias);
      });
    });
  });

  it("mutating one network leaves another untouched", () => {
    const make = () => Network.create(3, new SeededRng(5)).addLayer(2).build();
    const a = make();
    const b = make();
    a.mutate(1, new SeededRng(1));
    expect(serializeNetwork(b)).toEqual(serializeNetwork(make()));
  });
});
