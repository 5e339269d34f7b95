// Split-window equation
//
//   LST = b0
//       + (b1 + b2 * ((1 - ae) / ae))
//       + b3 * (de / ae) * ((t10 + t11) / 2)
//       + (b4 + b5 * ((1 - ae) / ae) + b6 * (de / ae^2)) * ((t10 - t11) / 2)
//       + b7 * (t10 - t11)^2
//
// ae is the average and de the difference of the band 10 and band 11
// emissivities. The five addends are summed left to right; the rendered
// raster formula relies on the same order to reproduce results bit for bit.

import type { SplitWindowCoefficients } from '@thermalwin/protocol';
import { InvalidEmissivityError } from '../errors.js';

/**
 * Emissivity terms of the equation
 */
export type EmissivityTerms = {
  /** ae = 0.5 * (e10 + e11) */
  averageEmissivity: number;
  /** de = e10 - e11 */
  deltaEmissivity: number;
};

export function deriveEmissivityTerms(emissivityB10: number, emissivityB11: number): EmissivityTerms {
  return {
    averageEmissivity: 0.5 * (emissivityB10 + emissivityB11),
    deltaEmissivity: emissivityB10 - emissivityB11,
  };
}

/**
 * Evaluate the split-window equation for one pair of brightness temperatures.
 * Inputs are not range-checked here.
 *
 * @returns Land surface temperature, in the unit of t10 and t11
 * @throws InvalidEmissivityError if the average emissivity is zero
 */
export function evaluateSplitWindow(
  coefficients: SplitWindowCoefficients,
  terms: EmissivityTerms,
  t10: number,
  t11: number
): number {
  const { b0, b1, b2, b3, b4, b5, b6, b7 } = coefficients;
  const avg = terms.averageEmissivity;
  const delta = terms.deltaEmissivity;

  if (avg === 0) {
    throw new InvalidEmissivityError('averageEmissivity', avg, 'must not be zero');
  }

  const a = b0;
  const b = b1 + b2 * ((1 - avg) / avg);
  const c = b3 * (delta / avg) * ((t10 + t11) / 2);
  const d1 = b4 + b5 * ((1 - avg) / avg) + b6 * (delta / avg ** 2);
  const d2 = (t10 - t11) / 2;
  const d = d1 * d2;
  const e = b7 * (t10 - t11) ** 2;

  return a + b + c + d + e;
}
