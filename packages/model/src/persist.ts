/**
 * Network save/load.
 *
 * JSON format: the `NetworkState` object, UTF-8.
 * Binary format: raw Float64 parameters, bit-exact including -0.
 *
 * Binary layout:
 *   [4 bytes: magic "VRTY"]
 *   [4 bytes: uint32 LE header JSON byte length]
 *   [N bytes: header JSON (UTF-8), topology without parameters]
 *   [remaining: per layer, per neuron: weights then bias, float64 LE]
 */
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import {
  PersistError, isActivationKind, isCostKind,
  type ActivationKind, type CostKind,
} from "@verity/core";
import { Layer } from "./layer.js";
import { Network } from "./network.js";
import { Neuron } from "./neuron.js";

const MAGIC = Buffer.from("VRTY");
const STATE_VERSION = 1;

export type NetworkFormat = "json" | "binary";

export interface NeuronState {
  readonly weights: readonly number[];
  readonly bias: number;
}

export interface LayerState {
  readonly activation: ActivationKind;
  readonly neurons: readonly NeuronState[];
}

export interface NetworkState {
  readonly version: number;
  readonly inputSize: number;
  readonly cost: CostKind;
  readonly layers: readonly LayerState[];
}

interface BinaryHeader {
  version: number;
  inputSize: number;
  cost: CostKind;
  layers: { activation: ActivationKind; neurons: number }[];
}

// ── State ──────────────────────────────────────────────────────────────────

export function serializeNetwork(network: Network): NetworkState {
  return {
    version: STATE_VERSION,
    inputSize: network.inputSize,
    cost: network.costKind,
    layers: network.layers.map((layer) => ({
      activation: layer.activation,
      neurons: layer.neurons.map((n) => ({ weights: [...n.weights], bias: n.bias })),
    })),
  };
}

function fail(message: string): never {
  throw new PersistError({ message });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function finite(value: unknown, where: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) fail(`${where} must be a finite number`);
  return value;
}

function positiveInt(value: unknown, where: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    fail(`${where} must be a positive integer`);
  }
  return value;
}

/**
 * Rebuild a network from untrusted state. Every field is checked; layer
 * widths must chain from `inputSize`.
 */
export function deserializeNetwork(state: unknown): Network {
  if (!isRecord(state)) fail("Network state must be an object");
  if (state.version !== STATE_VERSION) fail(`Unsupported network state version: ${String(state.version)}`);

  const inputSize = positiveInt(state.inputSize, "inputSize");
  const cost = state.cost;
  if (!isCostKind(cost)) fail(`Unknown cost function: ${String(cost)}`);
  if (!Array.isArray(state.layers)) fail("Missing or invalid 'layers' field");

  const layers: Layer[] = [];
  let width = inputSize;
  state.layers.forEach((rawLayer: unknown, li: number) => {
    if (!isRecord(rawLayer)) fail(`layers[${li}] must be an object`);
    const activation = rawLayer.activation;
    if (!isActivationKind(activation)) fail(`layers[${li}]: unknown activation ${String(activation)}`);
    if (!Array.isArray(rawLayer.neurons) || rawLayer.neurons.length === 0) {
      fail(`layers[${li}] must have at least one neuron`);
    }

    const neurons = rawLayer.neurons.map((rawNeuron: unknown, ni: number) => {
      const where = `layers[${li}].neurons[${ni}]`;
      if (!isRecord(rawNeuron) || !Array.isArray(rawNeuron.weights)) fail(`${where} must have a weights array`);
      if (rawNeuron.weights.length !== width) {
        fail(`${where} has ${rawNeuron.weights.length} weights, expected ${width}`);
      }
      const weights = rawNeuron.weights.map((w: unknown, wi: number) => finite(w, `${where}.weights[${wi}]`));
      return new Neuron(weights, finite(rawNeuron.bias, `${where}.bias`));
    });

    layers.push(new Layer(width, neurons, activation));
    width = neurons.length;
  });

  return new Network(inputSize, layers, cost);
}

// ── Bytes ──────────────────────────────────────────────────────────────────

function encodeBinary(state: NetworkState): Buffer {
  const header: BinaryHeader = {
    version: state.version,
    inputSize: state.inputSize,
    cost: state.cost,
    layers: state.layers.map((l) => ({ activation: l.activation, neurons: l.neurons.length })),
  };
  const headerBuf = Buffer.from(JSON.stringify(header), "utf-8");

  let paramCount = 0;
  for (const layer of state.layers) {
    for (const n of layer.neurons) paramCount += n.weights.length + 1;
  }

  const out = Buffer.alloc(8 + headerBuf.length + paramCount * 8);
  MAGIC.copy(out, 0);
  out.writeUInt32LE(headerBuf.length, 4);
  headerBuf.copy(out, 8);

  let offset = 8 + headerBuf.length;
  for (const layer of state.layers) {
    for (const n of layer.neurons) {
      for (const w of n.weights) offset = out.writeDoubleLE(w, offset);
      offset = out.writeDoubleLE(n.bias, offset);
    }
  }
  return out;
}

function decodeBinary(data: Buffer): unknown {
  if (data.length < 8) fail("Binary network is truncated");
  let offset = 4; // skip magic
  const headerLen = data.readUInt32LE(offset); offset += 4;
  if (offset + headerLen > data.length) fail("Binary network header is truncated");

  let header: unknown;
  try {
    header = JSON.parse(data.subarray(offset, offset + headerLen).toString("utf-8"));
  } catch (cause) {
    throw new PersistError({ message: "Binary network header is not valid JSON", cause });
  }
  offset += headerLen;
  if (!isRecord(header) || !Array.isArray(header.layers)) fail("Binary network header is malformed");

  let width = positiveInt(header.inputSize, "inputSize");
  const layers = header.layers.map((rawLayer: unknown, li: number) => {
    if (!isRecord(rawLayer)) fail(`layers[${li}] must be an object`);
    const count = positiveInt(rawLayer.neurons, `layers[${li}].neurons`);
    const neurons: NeuronState[] = [];
    for (let ni = 0; ni < count; ni++) {
      if (offset + (width + 1) * 8 > data.length) fail("Binary network parameters are truncated");
      const weights: number[] = [];
      for (let wi = 0; wi < width; wi++) {
        weights.push(data.readDoubleLE(offset));
        offset += 8;
      }
      const bias = data.readDoubleLE(offset);
      offset += 8;
      neurons.push({ weights, bias });
    }
    width = count;
    return { activation: rawLayer.activation, neurons };
  });

  if (offset !== data.length) fail(`Binary network has ${data.length - offset} trailing bytes`);
  return { version: header.version, inputSize: header.inputSize, cost: header.cost, layers };
}

export function encodeNetwork(network: Network, format: NetworkFormat = "json"): Buffer {
  const state = serializeNetwork(network);
  return format === "binary" ? encodeBinary(state) : Buffer.from(JSON.stringify(state), "utf-8");
}

/** Decode either format; binary is recognised by its magic. */
export function decodeNetwork(data: Buffer): Network {
  if (data.length >= 4 && data.subarray(0, 4).equals(MAGIC)) {
    return deserializeNetwork(decodeBinary(data));
  }
  let state: unknown;
  try {
    state = JSON.parse(data.toString("utf-8"));
  } catch (cause) {
    throw new PersistError({ message: "Network file is neither binary nor valid JSON", cause });
  }
  return deserializeNetwork(state);
}

// ── Files ──────────────────────────────────────────────────────────────────

export function saveNetwork(
  path: string,
  network: Network,
  format: NetworkFormat = "json",
): Effect.Effect<void, PersistError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, encodeNetwork(network, format));
    },
    catch: (cause) => new PersistError({ message: `Failed to save network to "${path}"`, cause }),
  }).pipe(
    Effect.tap(() => Effect.logDebug(`saved ${format} network (${network.layers.length} layers) to ${path}`)),
  );
}

export function loadNetwork(path: string): Effect.Effect<Network, PersistError> {
  return Effect.tryPromise({
    try: () => readFile(path),
    catch: (cause) => new PersistError({ message: `Failed to read network from "${path}"`, cause }),
  }).pipe(
    Effect.flatMap((data) =>
      Effect.try({
        try: () => decodeNetwork(data),
        catch: (cause) =>
          cause instanceof PersistError
            ? new PersistError({ message: `Failed to load network from "${path}": ${cause.message}`, cause })
            : new PersistError({ message: `Failed to load network from "${path}"`, cause }),
      }),
    ),
    Effect.tap((network) => Effect.logDebug(`loaded network (${network.layers.length} layers) from ${path}`)),
  );
}
