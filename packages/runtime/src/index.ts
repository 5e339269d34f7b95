// @thermalwin/runtime
// Split-window land surface temperature estimation

// Estimator and its building blocks
export {
  SplitWindowEstimator,
  createSplitWindowEstimator,
  createEstimatorForLandCover,
  resolveSubrange,
  findMatchingSubranges,
  listSubrangeBounds,
  DEFAULT_TIE_BREAK,
  evaluateSplitWindow,
  deriveEmissivityTerms,
  renderModel,
  renderFormula,
  EQUATION,
  checkT1xRange,
  isInDnRange,
  type SplitWindowInput,
  type SplitWindowOptions,
  type TieBreakPolicy,
  type ResolveSubrangeOptions,
  type EmissivityTerms,
  type FormulaTerms,
  type ModelTerms,
} from './split-window/index.js';

// Constants
export {
  DN_MIN,
  DN_MAX,
  MAPCALC_PLACEHOLDER_T10,
  MAPCALC_PLACEHOLDER_T11,
  CITATION,
} from './constants.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  OutOfRangeInputError,
  InvalidEmissivityError,
  NoMatchingSubrangeError,
  AmbiguousSubrangeError,
  UnknownLandCoverError,
  type BrightnessOperand,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createConsoleLogger,
  createCapturingLogger,
  type EstimatorLogger,
  type LogEntry,
} from './logger.js';
