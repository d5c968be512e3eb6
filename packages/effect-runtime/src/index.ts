export {
  TokenizerFrom,
  TokenizerLive,
} from "./layers.js";

export {
  prettyLogger,
  PrettyLoggerLive,
  loggingLayer,
  withSpan,
  parseLogLevel,
} from "./logging.js";
