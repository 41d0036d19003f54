export {
  prettyLogger,
  loggingLayer,
  silentLogging,
  captureLogging,
  formatLogMessage,
  parseLogLevel,
  type CapturedLine,
} from "./logging.js";
