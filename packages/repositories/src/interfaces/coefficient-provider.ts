import type { CoefficientTable, CwvSubrange, SubrangeBounds, SubrangeKey } from '@thermalwin/protocol';

/**
 * Provider of split-window regression coefficients.
 *
 * Tables are reference data: loaded once, validated, and shared read-only
 * between estimators.
 */
export interface CoefficientProvider {
  /**
   * The whole decoded table, in source order
   */
  getColumnWaterVapourTable(): CoefficientTable;

  /**
   * Get a subrange's coefficients and RMSE by key
   * @returns CwvSubrange or null if not found
   */
  getSubrange(key: SubrangeKey): CwvSubrange | null;

  /**
   * Enumerate all subranges with their (low, high) CWV bounds
   */
  listSubranges(): SubrangeBounds[];
}
