export { EncoderLive, EncoderFrom } from "./layers.js";

export {
  prettyLogger,
  formatLogLine,
  parseLogLevel,
  withLogging,
} from "./logging.js";
