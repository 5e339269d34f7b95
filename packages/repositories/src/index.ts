// @thermalwin/repositories
// Reference data providers for split-window LST estimation.
//
// The estimator codes against the provider interfaces only. Tables come from
// the bundled CSV files, files named through the environment, or synthetic
// data built in memory.

export * from './interfaces/index.js';
export * from './errors.js';
export {
  createInMemoryCoefficientProvider,
  createInMemoryEmissivityProvider,
} from './in-memory/index.js';
export * from './tables/index.js';
