export {
  type ArgMap,
  parseKV,
  requireArg,
  intArg,
  positiveIntArg,
  optionalIntArg,
  floatArg,
  strArg,
  intListArg,
  choiceArg,
} from "./parse.js";

export { type VerityConfig, DEFAULT_CONFIG_PATH, validateConfig, loadConfig } from "./config.js";

export { decodePng, encodePng, readImage, writeImage, loadLabelledDataset } from "./image.js";

export { runCommand, describeFailure, type TaggedFailure } from "./runtime.js";

export { classifyCmd } from "./commands/classify.js";
export { initCmd } from "./commands/init.js";
export { costCmd } from "./commands/cost.js";
export { mutateCmd } from "./commands/mutate.js";
export { noiseCmd } from "./commands/noise.js";
