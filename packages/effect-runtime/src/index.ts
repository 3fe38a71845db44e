export {
  RngLive,
  RngFrom,
  LoggerLive,
  SweepRuntime,
} from "./layers.js";

export {
  prettyLogger,
  formatLogLine,
  parseLogLevel,
  LOG_LEVELS,
} from "./logging.js";

export {
  type RuntimeConfig,
  defaultRuntimeConfig,
  resolveRuntimeConfig,
  validateRuntimeConfig,
} from "./config.js";
