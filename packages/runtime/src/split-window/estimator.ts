// Split-Window LST Estimator
//
// Land surface temperature from the two TIRS brightness temperatures, after
// Du et al. (2015). The emissivity terms and the coefficient subrange are
// fixed at construction; computeLst is then pure arithmetic per pixel.

import {
  toCoefficients,
  toCoefficientTuple,
  type CoefficientTuple,
  type CwvSubrange,
  type LandCoverClass,
  type SplitWindowCoefficients,
} from '@thermalwin/protocol';
import type { CoefficientProvider, EmissivityProvider } from '@thermalwin/repositories';
import { CITATION } from '../constants.js';
import {
  InvalidEmissivityError,
  UnknownLandCoverError,
  ValidationError,
} from '../errors.js';
import { silentLogger, type EstimatorLogger } from '../logger.js';
import { checkT1xRange } from './range.js';
import { resolveSubrange, type ResolveSubrangeOptions } from './subrange.js';
import { deriveEmissivityTerms, evaluateSplitWindow } from './formula.js';
import { EQUATION, renderFormula, renderModel } from './render.js';

/**
 * Per-scene inputs of the estimator
 */
export type SplitWindowInput = {
  /** Average emissivity of TIRS band 10, in (0, 1] */
  emissivityB10: number;

  /** Average emissivity of TIRS band 11, in (0, 1] */
  emissivityB11: number;

  /** Column water vapour estimate, g/cm², expected in (0.0, 6.3] */
  columnWaterVapour: number;
};

/**
 * Options for creating an estimator
 */
export type SplitWindowOptions = ResolveSubrangeOptions & {
  /** Source of the regression coefficients */
  coefficients: CoefficientProvider;
};

function checkEmissivity(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw new InvalidEmissivityError(field, value);
  }
}

/**
 * Split-window land surface temperature estimator.
 *
 * @example
 * ```ts
 * const { coefficients } = await loadDefaultProviders();
 * const estimator = createSplitWindowEstimator(
 *   { emissivityB10: 0.971, emissivityB11: 0.968, columnWaterVapour: 1.2 },
 *   { coefficients, tieBreak: 'first' }
 * );
 *
 * estimator.computeLst(301.2, 299.8);
 * estimator.mapcalc; // expression over Input_T10 / Input_T11
 * ```
 */
export class SplitWindowEstimator {
  readonly citation = CITATION;

  readonly emissivityT10: number;
  readonly emissivityT11: number;
  readonly averageEmissivity: number;
  readonly deltaEmissivity: number;
  readonly columnWaterVapour: number;

  /** Coefficient subrange resolved from the CWV estimate */
  readonly subrange: CwvSubrange;
  readonly coefficients: Readonly<SplitWindowCoefficients>;
  readonly rmse: number;

  /** The equation with this estimator's numbers, for display */
  readonly model: string;

  /** Raster-algebra expression over the default placeholders */
  readonly mapcalc: string;

  private last: number | undefined;
  private readonly logger: EstimatorLogger;

  constructor(input: SplitWindowInput, options: SplitWindowOptions) {
    this.logger = options.logger ?? silentLogger;

    checkEmissivity('emissivityB10', input.emissivityB10);
    checkEmissivity('emissivityB11', input.emissivityB11);
    if (!Number.isFinite(input.columnWaterVapour)) {
      throw new ValidationError(
        `Column water vapour must be a finite number: ${input.columnWaterVapour}`,
        { field: 'columnWaterVapour', details: { value: input.columnWaterVapour } }
      );
    }

    this.emissivityT10 = input.emissivityB10;
    this.emissivityT11 = input.emissivityB11;

    const terms = deriveEmissivityTerms(this.emissivityT10, this.emissivityT11);
    this.averageEmissivity = terms.averageEmissivity;
    this.deltaEmissivity = terms.deltaEmissivity;

    this.columnWaterVapour = input.columnWaterVapour;
    this.subrange = resolveSubrange(
      this.columnWaterVapour,
      options.coefficients.getColumnWaterVapourTable(),
      { tieBreak: options.tieBreak, random: options.random, logger: this.logger }
    );
    this.coefficients = Object.freeze(toCoefficients(this.subrange));
    this.rmse = this.subrange.rmse;

    this.model = renderModel({
      ...this.coefficients,
      ...terms,
      emissivityT10: this.emissivityT10,
      emissivityT11: this.emissivityT11,
    });
    this.mapcalc = this.renderFormula();

    this.logger.debug('Resolved column water vapour subrange', {
      columnWaterVapour: this.columnWaterVapour,
      subrange: this.subrange.key,
      rmse: this.rmse,
    });
  }

  /**
   * The most recent result of computeLst, if any.
   */
  get lastLst(): number | undefined {
    return this.last;
  }

  /**
   * Compute land surface temperature from band 10 and band 11 brightness
   * temperatures. T10 is checked before T11.
   *
   * @throws OutOfRangeInputError if either input is outside [1, 65535]
   */
  computeLst(t10: number, t11: number): number {
    checkT1xRange(t10, 't10');
    checkT1xRange(t11, 't11');

    const lst = evaluateSplitWindow(
      this.coefficients,
      { averageEmissivity: this.averageEmissivity, deltaEmissivity: this.deltaEmissivity },
      t10,
      t11
    );
    this.last = lst;
    return lst;
  }

  /**
   * Coefficients b0..b7 as a tuple.
   */
  getCoefficients(): CoefficientTuple {
    return toCoefficientTuple(this.coefficients);
  }

  reportRmse(): string {
    return `Associated RMSE: ${this.rmse}`;
  }

  /**
   * Raster-algebra expression with custom placeholder tokens.
   */
  renderFormula(placeholderT10?: string, placeholderT11?: string): string {
    return renderFormula(
      {
        ...this.coefficients,
        averageEmissivity: this.averageEmissivity,
        deltaEmissivity: this.deltaEmissivity,
      },
      placeholderT10,
      placeholderT11
    );
  }

  toString(): string {
    const equation = '   > The equation: ' + EQUATION;
    const model = '   > The model: ' + this.model;
    return equation + '\n' + model;
  }
}

/**
 * Create a split-window estimator.
 *
 * @throws InvalidEmissivityError, ValidationError, NoMatchingSubrangeError or AmbiguousSubrangeError
 */
export function createSplitWindowEstimator(
  input: SplitWindowInput,
  options: SplitWindowOptions
): SplitWindowEstimator {
  return new SplitWindowEstimator(input, options);
}

/**
 * Create an estimator with the emissivities of a land cover class.
 *
 * @throws UnknownLandCoverError if the provider has no entry for the class
 */
export function createEstimatorForLandCover(
  landCover: LandCoverClass,
  columnWaterVapour: number,
  options: SplitWindowOptions & { emissivities: EmissivityProvider }
): SplitWindowEstimator {
  const pair = options.emissivities.getEmissivities(landCover);
  if (!pair) {
    throw new UnknownLandCoverError(landCover);
  }

  return new SplitWindowEstimator(
    { emissivityB10: pair.b10, emissivityB11: pair.b11, columnWaterVapour },
    options
  );
}
