export { ClassifierFrom } from "./layers.js";

export {
  prettyLogger,
  parseLogLevel,
  withLogging,
  SilentLogging,
} from "./logging.js";
