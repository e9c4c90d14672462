// src/power/SampleSizeEngine.ts
import { StandardNormal } from '../core/distributions';
import { PowerPlanError, InvalidParameterError, ErrorCode } from '../core/errors';
import {
  CalculationResult,
  EffectMode,
  TestParameters,
  TestSummary,
  TestType,
  impliedVariantRate,
} from '../domain/types';
import { ParameterValidator } from '../domain/validation';
import { PowerCurve } from './PowerCurve';

/**
 * Power-curve sweep settings
 */
export interface EngineConfig {
  /** Number of evenly spaced points on the curve */
  curvePoints: number;
  /** Lower end of the sweep as a fraction of the minimum detectable effect */
  minEffectFraction: number;
  /** Upper end of the sweep as a multiple of the minimum detectable effect */
  maxEffectMultiple: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
  curvePoints: 40,
  minEffectFraction: 0.1,
  maxEffectMultiple: 3,
};

/** Achieved power is kept inside the open interval (0, 1) */
const POWER_EPSILON = 1e-9;

/** Share of the remaining headroom above the MDE the sweep may use */
const HEADROOM_SHARE = 0.999;

/**
 * Rates and quantiles shared by the sample-size and power computations
 */
interface ResolvedTest {
  p1: number;
  p2: number;
  /** Minimum detectable effect in its own unit */
  effect: number;
  absoluteEffect: number;
  effectMode: EffectMode;
  zAlpha: number;
  zBeta: number;
}

/**
 * Sample size for a two-proportion z-test with equal allocation.
 *
 * The engine is stateless: every call re-validates and recomputes from its
 * inputs alone.
 */
export class SampleSizeEngine {
  private readonly config: EngineConfig;

  constructor(config: Partial<EngineConfig> = {}) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.validateConfig();
  }

  getConfig(): Readonly<EngineConfig> {
    return { ...this.config };
  }

  /**
   * Required sample size, duration and power curve for one parameter set
   *
   * @throws InvalidParameterError when any parameter is out of range
   */
  calculate(params: TestParameters): CalculationResult {
    ParameterValidator.validate(params);
    const test = this.resolve(params);

    const exactSampleSize = this.exactSampleSize(test);
    const sampleSizePerVariant = Math.max(1, Math.ceil(exactSampleSize));
    const totalSampleSize = 2 * sampleSizePerVariant;
    const estimatedDays = estimateDuration(totalSampleSize, params.dailyTraffic);

    const summary: TestSummary = {
      controlRate: test.p1,
      variantRate: test.p2,
      absoluteEffect: test.absoluteEffect,
      relativeEffect: test.absoluteEffect / test.p1,
      zAlpha: test.zAlpha,
      zBeta: test.zBeta,
      exactSampleSize,
    };

    return {
      sampleSizePerVariant,
      totalSampleSize,
      ...(estimatedDays !== undefined ? { estimatedDays } : {}),
      powerCurve: this.buildCurve(test, sampleSizePerVariant),
      summary,
    };
  }

  /**
   * Power achieved at `effectSize` (in the parameters' effect unit) when each
   * variant receives `sampleSizePerVariant` visitors
   */
  achievedPower(params: TestParameters, effectSize: number, sampleSizePerVariant: number): number {
    ParameterValidator.validate(params);
    this.validateSampleSize(sampleSizePerVariant);
    this.validateEffectSize(effectSize);

    return this.powerAt(this.resolve(params), effectSize, sampleSizePerVariant);
  }

  /**
   * Power curve at a caller-chosen sample size
   */
  powerCurve(params: TestParameters, sampleSizePerVariant: number): PowerCurve {
    ParameterValidator.validate(params);
    this.validateSampleSize(sampleSizePerVariant);

    return this.buildCurve(this.resolve(params), sampleSizePerVariant);
  }

  private resolve(params: TestParameters): ResolvedTest {
    const effectMode = params.effectMode ?? 'absolute';
    const p1 = params.baselineRate;
    const p2 = impliedVariantRate(p1, params.minimumDetectableEffect, effectMode);

    return {
      p1,
      p2,
      effect: params.minimumDetectableEffect,
      absoluteEffect: p2 - p1,
      effectMode,
      zAlpha: criticalValue(params.testType, params.significance),
      zBeta: StandardNormal.quantile(params.power),
    };
  }

  /**
   * n = (zα·√(2p̄(1−p̄)) + zβ·√(p1(1−p1) + p2(1−p2)))² / (p2 − p1)²
   *
   * A non-positive bracket means the target power is met with no visitors at all.
   */
  private exactSampleSize(test: ResolvedTest): number {
    const { p1, p2, zAlpha, zBeta } = test;
    const pooled = (p1 + p2) / 2;

    const numerator = Math.max(
      0,
      zAlpha * Math.sqrt(2 * pooled * (1 - pooled)) +
        zBeta * Math.sqrt(p1 * (1 - p1) + p2 * (1 - p2))
    );

    return (numerator * numerator) / ((p2 - p1) * (p2 - p1));
  }

  /**
   * Inverts the sample-size formula for power at a fixed n
   */
  private powerAt(test: ResolvedTest, effectSize: number, sampleSize: number): number {
    const { p1, zAlpha } = test;
    const p2 = impliedVariantRate(p1, effectSize, test.effectMode);
    if (!(Number.isFinite(effectSize) && p2 > 0 && p2 < 1)) {
      throw new InvalidParameterError(
        'effectSize',
        'effect pushes conversion rate out of bounds',
        { effectSize, variantRate: p2 }
      );
    }

    const pooled = (p1 + p2) / 2;
    const nullSd = Math.sqrt(2 * pooled * (1 - pooled));
    const altSd = Math.sqrt(p1 * (1 - p1) + p2 * (1 - p2));

    const z = (Math.abs(p2 - p1) * Math.sqrt(sampleSize) - zAlpha * nullSd) / altSd;
    return clampPower(StandardNormal.cdf(z));
  }

  /**
   * Sweep from minEffectFraction × MDE up to maxEffectMultiple × MDE, capped so
   * the swept variant rate stays strictly below 1
   */
  private buildCurve(test: ResolvedTest, sampleSize: number): PowerCurve {
    const { p1, absoluteEffect } = test;
    const { curvePoints, minEffectFraction, maxEffectMultiple } = this.config;

    const headroom = 1 - p1 - absoluteEffect;
    const lowAbsolute = minEffectFraction * absoluteEffect;
    const highAbsolute = Math.min(
      maxEffectMultiple * absoluteEffect,
      absoluteEffect + headroom * HEADROOM_SHARE
    );

    const toEffectUnit = (difference: number): number =>
      test.effectMode === 'relative' ? difference / p1 : difference;

    // Rounding can land the capped end on a variant rate of exactly 1
    let maxEffect = toEffectUnit(highAbsolute);
    if (impliedVariantRate(p1, maxEffect, test.effectMode) >= 1) {
      maxEffect = test.effect;
    }

    return new PowerCurve(
      toEffectUnit(lowAbsolute),
      maxEffect,
      curvePoints,
      sampleSize,
      (effectSize) => this.powerAt(test, effectSize, sampleSize)
    );
  }

  private validateConfig(): void {
    const { curvePoints, minEffectFraction, maxEffectMultiple } = this.config;

    if (!Number.isInteger(curvePoints) || curvePoints < 2) {
      throw new PowerPlanError(
        ErrorCode.INVALID_CONFIG,
        'curvePoints must be an integer of at least 2',
        { curvePoints }
      );
    }

    if (!(minEffectFraction > 0 && minEffectFraction <= 1)) {
      throw new PowerPlanError(
        ErrorCode.INVALID_CONFIG,
        'minEffectFraction must be in (0, 1]',
        { minEffectFraction }
      );
    }

    if (!(Number.isFinite(maxEffectMultiple) && maxEffectMultiple >= 1)) {
      throw new PowerPlanError(
        ErrorCode.INVALID_CONFIG,
        'maxEffectMultiple must be a finite number of at least 1',
        { maxEffectMultiple }
      );
    }
  }

  private validateSampleSize(sampleSizePerVariant: number): void {
    if (!Number.isInteger(sampleSizePerVariant) || sampleSizePerVariant < 1) {
      throw new InvalidParameterError(
        'sampleSizePerVariant',
        'must be a positive integer',
        sampleSizePerVariant
      );
    }
  }

  private validateEffectSize(effectSize: number): void {
    if (!(Number.isFinite(effectSize) && effectSize > 0)) {
      throw new InvalidParameterError('effectSize', 'must be a positive number', effectSize);
    }
  }
}

/**
 * Critical value of the test statistic. One-tailed puts all of α on one side;
 * two-tailed splits it.
 */
export function criticalValue(testType: TestType, significance: number): number {
  switch (testType) {
    case TestType.ONE_TAILED:
      return StandardNormal.quantile(1 - significance);
    case TestType.TWO_TAILED:
      return StandardNormal.quantile(1 - significance / 2);
  }
}

/**
 * Days needed to reach `totalSampleSize`; undefined when traffic is unknown
 */
export function estimateDuration(
  totalSampleSize: number,
  dailyTraffic: number | undefined
): number | undefined {
  if (dailyTraffic === undefined || dailyTraffic <= 0) {
    return undefined;
  }
  return Math.ceil(totalSampleSize / dailyTraffic);
}

/**
 * One-shot calculation with an optional engine configuration
 */
export function calculateSampleSize(
  params: TestParameters,
  config: Partial<EngineConfig> = {}
): CalculationResult {
  return new SampleSizeEngine(config).calculate(params);
}

function clampPower(power: number): number {
  return Math.min(1 - POWER_EPSILON, Math.max(POWER_EPSILON, power));
}
