// Column water vapour coefficient types

/**
 * Identifier of a CWV subrange, e.g. "Range_1"
 */
export type SubrangeKey = string;

/**
 * Regression coefficients of the split-window equation.
 */
export type SplitWindowCoefficients = {
  b0: number;
  b1: number;
  b2: number;
  b3: number;
  b4: number;
  b5: number;
  b6: number;
  b7: number;
};

/**
 * The coefficients as an ordered tuple, b0 first.
 */
export type CoefficientTuple = readonly [
  b0: number,
  b1: number,
  b2: number,
  b3: number,
  b4: number,
  b5: number,
  b6: number,
  b7: number,
];

/**
 * Open interval (low, high) over column water vapour, in g/cm².
 */
export type SubrangeBounds = {
  key: SubrangeKey;
  low: number;
  high: number;
};

/**
 * A partition of the CWV domain with its own coefficient set.
 * Subranges of one table may overlap or touch.
 */
export type CwvSubrange = SubrangeBounds &
  SplitWindowCoefficients & {
    /**
     * Root-mean-square error of the regression for this subrange, in K
     */
    rmse: number;
  };

/**
 * Decoded coefficient table. Keys are unique; order is the source order.
 */
export type CoefficientTable = readonly CwvSubrange[];

/**
 * Pick the coefficient fields out of a subrange.
 */
export function toCoefficients(subrange: SplitWindowCoefficients): SplitWindowCoefficients {
  const { b0, b1, b2, b3, b4, b5, b6, b7 } = subrange;
  return { b0, b1, b2, b3, b4, b5, b6, b7 };
}

/**
 * Ordered tuple view of the coefficients.
 */
export function toCoefficientTuple(c: SplitWindowCoefficients): CoefficientTuple {
  return [c.b0, c.b1, c.b2, c.b3, c.b4, c.b5, c.b6, c.b7];
}

/**
 * Strip a subrange down to its key and bounds.
 */
export function toBounds(subrange: SubrangeBounds): SubrangeBounds {
  return { key: subrange.key, low: subrange.low, high: subrange.high };
}

/**
 * Whether a CWV value lies strictly inside the subrange's open interval.
 */
export function containsCwv(bounds: SubrangeBounds, cwv: number): boolean {
  return bounds.low < cwv && cwv < bounds.high;
}
