/**
 * @hypersweep/core — errors, the random-source port and shared helpers.
 */
export {
  ConfigError,
  GeneratorError,
  InvariantError,
  configError,
  errorMessage,
} from "./errors.js";
export { type Rng, RngService } from "./interfaces.js";
export { SeededRng, choice } from "./rng.js";
export { hashConfig } from "./hash.js";
