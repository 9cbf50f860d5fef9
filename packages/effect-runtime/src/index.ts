export {
  TokenizerFrom,
  TokenizerLive,
} from "./layers.js";

export {
  prettyLogger,
  withSpan,
  parseLogLevel,
  logLevelName,
  loggingLayer,
} from "./logging.js";
