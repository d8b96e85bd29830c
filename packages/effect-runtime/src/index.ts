export { RngLive } from "./layers.js";

export {
  type LineSink,
  formatLogLine,
  makePrettyLogger,
  prettyLogger,
  parseLogLevel,
  LoggingLive,
} from "./logging.js";
