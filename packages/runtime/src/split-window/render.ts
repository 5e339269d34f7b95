// Textual model and raster formula rendering

import type { SplitWindowCoefficients } from '@thermalwin/protocol';
import { MAPCALC_PLACEHOLDER_T10, MAPCALC_PLACEHOLDER_T11 } from '../constants.js';
import type { EmissivityTerms } from './formula.js';

/**
 * The split-window equation in symbolic form.
 */
export const EQUATION =
  '[b0 + (b1 + b2*((1-ae)/ae)) + b3*(de/ae) * ((t10 + t11)/2) + ' +
  '(b4 + b5*((1-ae)/ae) + b6*(de/ae^2))*((t10 - t11)/2) + b7*(t10 - t11)^2]';

export type FormulaTerms = SplitWindowCoefficients & EmissivityTerms;

export type ModelTerms = FormulaTerms & {
  emissivityT10: number;
  emissivityT11: number;
};

/**
 * Write a number so that parsing the text gives back the same double.
 */
function num(value: number): string {
  return String(value);
}

/**
 * Render the equation with numeric coefficients for display.
 *
 * The t10/t11 slots carry the two band emissivities: this is a summary of
 * the estimator's parameters, not an expression to evaluate.
 */
export function renderModel(terms: ModelTerms): string {
  const ae = num(terms.averageEmissivity);
  const de = num(terms.deltaEmissivity);
  const t10 = num(terms.emissivityT10);
  const t11 = num(terms.emissivityT11);

  return (
    `[${num(terms.b0)} + ` +
    `(${num(terms.b1)} + ${num(terms.b2)}*((1-${ae})/${ae})) + ` +
    `${num(terms.b3)}*(${de}/${ae}) * ((${t10} + ${t11})/2) + ` +
    `(${num(terms.b4)} + ${num(terms.b5)}*((1-${ae})/${ae}) + ${num(terms.b6)}*(${de}/${ae}^2))` +
    `*((${t10} - ${t11})/2) + ` +
    `${num(terms.b7)}*(${t10} - ${t11})^2]\n`
  );
}

/**
 * Render the equation as a raster-algebra expression.
 *
 * Coefficients and emissivity terms are substituted; the brightness
 * temperatures stay as placeholder tokens for the consumer to replace with
 * band references. `^` denotes a power.
 */
export function renderFormula(
  terms: FormulaTerms,
  placeholderT10: string = MAPCALC_PLACEHOLDER_T10,
  placeholderT11: string = MAPCALC_PLACEHOLDER_T11
): string {
  const ae = num(terms.averageEmissivity);
  const de = num(terms.deltaEmissivity);
  const t10 = placeholderT10;
  const t11 = placeholderT11;

  return (
    `${num(terms.b0)} + ` +
    `(${num(terms.b1)} + (${num(terms.b2)})*((1-${ae})/${ae})) + ` +
    `(${num(terms.b3)})*(${de}/${ae}) * ((${t10} + ${t11})/2) + ` +
    `(${num(terms.b4)} + (${num(terms.b5)})*((1-${ae})/${ae}) + (${num(terms.b6)})*(${de}/${ae}^2))` +
    `*((${t10} - ${t11})/2) + ` +
    `(${num(terms.b7)})*(${t10} - ${t11})^2`
  );
}
