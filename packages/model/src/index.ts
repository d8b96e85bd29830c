export { applyActivation, relu, sigmoid, softmax } from "./activation.js";

export { applyCost, meanSquaredError, categoricalCrossEntropy } from "./cost.js";

export { Neuron } from "./neuron.js";

export { Layer } from "./layer.js";

export { Network, NetworkBuilder, type RunResult } from "./network.js";

export {
  type NetworkState,
  type LayerState,
  type NeuronState,
  type NetworkFormat,
  serializeNetwork,
  deserializeNetwork,
  encodeNetwork,
  decodeNetwork,
  saveNetwork,
  loadNetwork,
} from "./persist.js";
