/**
 * @hypersweep/space — hyperparameter search spaces and sweep strategies.
 */

// Generators
export {
  type HyperValue,
  type ConfigDict,
  type FixedValue,
  type Candidates,
  type Factory,
  type Generator,
  type GeneratorInput,
  type NamedInputs,
  fixed,
  candidates,
  factory,
  isGenerator,
  toGenerator,
  sampleGenerator,
} from "./generators.js";

// Space
export { ConfigSpace, type SearchError } from "./config-space.js";

// Sweep helpers
export {
  type SweepEntry,
  type TaggedConfig,
  repeatSweep,
  tagSweep,
} from "./sweep.js";
