export {
  type Label,
  LABELS,
  LABEL_COUNT,
  oneHot,
  labelFromOutputs,
  labelName,
} from "./label.js";

export { Datapoint, type NoisyDatapoint } from "./datapoint.js";

export { Dataset } from "./dataset.js";

export {
  type PixelBuffer,
  CHANNEL_COUNT,
  datapointFromPixels,
  pixelsFromDatapoint,
  imageDimensions,
} from "./pixels.js";
