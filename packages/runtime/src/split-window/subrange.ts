// Column water vapour subrange resolution
//
// Picks the coefficient set whose open CWV interval contains the scene's
// estimate. Reference tables may overlap (the whole-domain subrange of Du et
// al. covers every other one), so what happens on several matches is an
// explicit policy.

import {
  containsCwv,
  toBounds,
  type CoefficientTable,
  type CwvSubrange,
  type SubrangeBounds,
} from '@thermalwin/protocol';
import { AmbiguousSubrangeError, NoMatchingSubrangeError } from '../errors.js';
import { silentLogger, type EstimatorLogger } from '../logger.js';

/**
 * What to do when several subranges contain the CWV value.
 *
 * - 'random': pick one uniformly at random
 * - 'first': pick the first match in table order
 * - 'strict': raise AmbiguousSubrangeError
 */
export type TieBreakPolicy = 'random' | 'first' | 'strict';

export const DEFAULT_TIE_BREAK: TieBreakPolicy = 'random';

/**
 * Options for subrange resolution
 */
export type ResolveSubrangeOptions = {
  /** Policy for several matches (default: 'random') */
  tieBreak?: TieBreakPolicy;

  /** Source of uniform numbers in [0, 1) for the 'random' policy (default: Math.random) */
  random?: () => number;

  /** Logger for resolution diagnostics */
  logger?: EstimatorLogger;
};

/**
 * All subranges whose open interval strictly contains the value, in table order.
 */
export function findMatchingSubranges(cwv: number, table: CoefficientTable): CwvSubrange[] {
  return table.filter((subrange) => containsCwv(subrange, cwv));
}

/**
 * Key and bounds of every subrange in a table.
 */
export function listSubrangeBounds(table: CoefficientTable): SubrangeBounds[] {
  return table.map(toBounds);
}

/**
 * Select the coefficient subrange for a column water vapour estimate.
 *
 * @param cwv - Column water vapour, expected in (0.0, 6.3]
 * @param table - Coefficient table to search
 * @returns The single match, or the one the tie-break policy picks
 * @throws NoMatchingSubrangeError if no subrange contains cwv
 * @throws AmbiguousSubrangeError on several matches under 'strict'
 */
export function resolveSubrange(
  cwv: number,
  table: CoefficientTable,
  options: ResolveSubrangeOptions = {}
): CwvSubrange {
  const matches = findMatchingSubranges(cwv, table);

  if (matches.length === 0) {
    throw new NoMatchingSubrangeError(cwv, listSubrangeBounds(table));
  }

  if (matches.length === 1) {
    return matches[0];
  }

  const tieBreak = options.tieBreak ?? DEFAULT_TIE_BREAK;
  const keys = matches.map((m) => m.key);

  if (tieBreak === 'strict') {
    throw new AmbiguousSubrangeError(cwv, keys);
  }

  let selected: CwvSubrange;
  if (tieBreak === 'first') {
    selected = matches[0];
  } else {
    const random = options.random ?? Math.random;
    const draw = Math.floor(random() * matches.length);
    // Draws outside [0, 1), NaN included, fall back to the nearest end.
    const index = Number.isNaN(draw) ? 0 : Math.max(0, Math.min(matches.length - 1, draw));
    selected = matches[index];
  }

  const logger = options.logger ?? silentLogger;
  logger.warn('Several subranges contain the column water vapour value', {
    columnWaterVapour: cwv,
    matches: keys,
    selected: selected.key,
    tieBreak,
  });

  return selected;
}
