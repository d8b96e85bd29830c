export {
  type ActivationKind,
  type CostKind,
  type Vector,
  ACTIVATION_KINDS,
  COST_KINDS,
  defaultActivation,
  defaultCost,
  isActivationKind,
  isCostKind,
} from "./types.js";

export {
  DimensionError,
  CodecError,
  BuildError,
  PersistError,
  ConfigError,
  ImageError,
} from "./errors.js";

export { type Rng, type Genetic, RngService } from "./interfaces.js";

export { SeededRng, globalRng, uniform, symmetric } from "./rng.js";
