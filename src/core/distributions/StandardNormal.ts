/**
 * Standard normal distribution N(0, 1)
 *
 * Thin wrapper over jstat with the domain guards the sample-size formulas need:
 * the quantile only accepts probabilities strictly inside (0, 1), and the CDF
 * only accepts finite arguments.
 */

import jStat from 'jstat';
import { PowerPlanError, ErrorCode } from '../errors';

export class StandardNormal {
  /**
   * Φ(z)
   */
  static cdf(z: number): number {
    if (Number.isNaN(z)) {
      throw new PowerPlanError(ErrorCode.INTERNAL_ERROR, 'Normal CDF evaluated at NaN');
    }
    if (z === Infinity) return 1;
    if (z === -Infinity) return 0;

    return jStat.normal.cdf(z, 0, 1);
  }

  /**
   * Φ⁻¹(p), defined for 0 < p < 1
   */
  static quantile(p: number): number {
    if (!(p > 0 && p < 1)) {
      throw new PowerPlanError(
        ErrorCode.INTERNAL_ERROR,
        `Normal quantile requires 0 < p < 1, got ${p}`,
        { p }
      );
    }
    if (p === 0.5) return 0;

    return jStat.normal.inv(p, 0, 1);
  }
}
