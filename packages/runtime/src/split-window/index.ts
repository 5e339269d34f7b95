// Split-window module
//
// Subrange resolution, equation evaluation, rendering and the estimator
// that ties them together.

export {
  SplitWindowEstimator,
  createSplitWindowEstimator,
  createEstimatorForLandCover,
  type SplitWindowInput,
  type SplitWindowOptions,
} from './estimator.js';

export {
  resolveSubrange,
  findMatchingSubranges,
  listSubrangeBounds,
  DEFAULT_TIE_BREAK,
  type TieBreakPolicy,
  type ResolveSubrangeOptions,
} from './subrange.js';

export {
  evaluateSplitWindow,
  deriveEmissivityTerms,
  type EmissivityTerms,
} from './formula.js';

export {
  renderModel,
  renderFormula,
  EQUATION,
  type FormulaTerms,
  type ModelTerms,
} from './render.js';

export { checkT1xRange, isInDnRange } from './range.js';
