/**
 * Parameter Validator
 *
 * Re-validates test parameters on every call, whatever the caller already
 * checked. Raises the first failure found; nothing is computed for invalid input.
 */

import { TestParameters, TestType, EffectMode, impliedVariantRate } from '../types';
import { InvalidParameterError } from '../../core/errors';

const EFFECT_MODES: readonly EffectMode[] = ['absolute', 'relative'];
const TEST_TYPES: readonly string[] = Object.values(TestType);

function isOpenUnitInterval(value: number): boolean {
  return typeof value === 'number' && value > 0 && value < 1;
}

export class ParameterValidator {
  /**
   * Validate a full parameter set
   *
   * @throws InvalidParameterError naming the first offending field
   */
  static validate(params: TestParameters): void {
    this.validateRates(params);
    this.validateTargets(params);
    this.validateDailyTraffic(params.dailyTraffic);
  }

  /**
   * Baseline, effect and the variant rate they imply
   */
  private static validateRates(params: TestParameters): void {
    const { baselineRate, minimumDetectableEffect } = params;

    if (!isOpenUnitInterval(baselineRate)) {
      throw new InvalidParameterError(
        'baselineRate',
        'must be strictly between 0 and 1',
        baselineRate
      );
    }

    if (
      typeof minimumDetectableEffect !== 'number' ||
      !Number.isFinite(minimumDetectableEffect) ||
      minimumDetectableEffect <= 0
    ) {
      throw new InvalidParameterError(
        'minimumDetectableEffect',
        'must be a positive number',
        minimumDetectableEffect
      );
    }

    const effectMode = params.effectMode ?? 'absolute';
    if (!EFFECT_MODES.includes(effectMode)) {
      throw new InvalidParameterError(
        'effectMode',
        `must be one of ${EFFECT_MODES.join(', ')}`,
        effectMode
      );
    }

    const variantRate = impliedVariantRate(baselineRate, minimumDetectableEffect, effectMode);
    if (!isOpenUnitInterval(variantRate)) {
      throw new InvalidParameterError(
        'minimumDetectableEffect',
        'effect pushes conversion rate out of bounds',
        { baselineRate, minimumDetectableEffect, effectMode, variantRate }
      );
    }

    if (variantRate === baselineRate) {
      throw new InvalidParameterError(
        'minimumDetectableEffect',
        'effect too small to distinguish from the baseline',
        { baselineRate, minimumDetectableEffect, effectMode, variantRate }
      );
    }
  }

  /**
   * Power, significance and tail choice
   */
  private static validateTargets(params: TestParameters): void {
    if (!isOpenUnitInterval(params.power)) {
      throw new InvalidParameterError('power', 'must be strictly between 0 and 1', params.power);
    }

    if (!isOpenUnitInterval(params.significance)) {
      throw new InvalidParameterError(
        'significance',
        'must be strictly between 0 and 1',
        params.significance
      );
    }

    if (!TEST_TYPES.includes(params.testType)) {
      throw new InvalidParameterError(
        'testType',
        `must be one of ${TEST_TYPES.join(', ')}`,
        params.testType
      );
    }
  }

  private static validateDailyTraffic(dailyTraffic: number | undefined): void {
    if (dailyTraffic === undefined) return;

    if (!Number.isInteger(dailyTraffic) || dailyTraffic < 0) {
      throw new InvalidParameterError(
        'dailyTraffic',
        'must be a non-negative integer',
        dailyTraffic
      );
    }
  }
}
