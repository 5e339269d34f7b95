// Brightness temperature input checks

import { DN_MAX, DN_MIN } from '../constants.js';
import { OutOfRangeInputError, type BrightnessOperand } from '../errors.js';

/**
 * Whether a digital number lies in [1, 65535]. NaN does not.
 */
export function isInDnRange(dn: number): boolean {
  return dn >= DN_MIN && dn <= DN_MAX;
}

/**
 * Check that a T10 or T11 digital number lies in the expected range.
 *
 * @throws OutOfRangeInputError naming the operand and its value
 */
export function checkT1xRange(dn: number, operand: BrightnessOperand = 't10'): void {
  if (!isInDnRange(dn)) {
    throw new OutOfRangeInputError(operand, dn);
  }
}
