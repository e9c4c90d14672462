/**
 * Test planning data structures
 *
 * Inputs and outputs of the sample-size engine. Every value here is treated as
 * immutable once constructed.
 */

import type { PowerCurve } from '../../power/PowerCurve';

/**
 * Which side(s) of the null distribution the significance level covers
 */
export enum TestType {
  ONE_TAILED = 'one-tailed',
  TWO_TAILED = 'two-tailed',
}

/**
 * How the minimum detectable effect relates the variant rate to the baseline.
 * - absolute: p2 = p1 + mde (percentage points as a fraction)
 * - relative: p2 = p1 * (1 + mde) (lift)
 */
export type EffectMode = 'absolute' | 'relative';

export interface TestParameters {
  /** Control-group conversion probability, 0 < p < 1 */
  readonly baselineRate: number;
  /** Smallest effect the test must reliably detect, in effectMode units */
  readonly minimumDetectableEffect: number;
  /** Target power (1 - β) */
  readonly power: number;
  /** Target significance level (α) */
  readonly significance: number;
  readonly testType: TestType;
  /** Expected visitors per day across both variants; 0 means not provided */
  readonly dailyTraffic?: number;
  /** Defaults to 'absolute' */
  readonly effectMode?: EffectMode;
}

/**
 * Intermediate quantities behind a sample size
 */
export interface TestSummary {
  readonly controlRate: number;
  readonly variantRate: number;
  /** p2 - p1 */
  readonly absoluteEffect: number;
  /** (p2 - p1) / p1 */
  readonly relativeEffect: number;
  readonly zAlpha: number;
  readonly zBeta: number;
  /** Un-rounded per-variant n */
  readonly exactSampleSize: number;
}

export interface PowerCurvePoint {
  /** Effect size in the same unit as the configured minimum detectable effect */
  readonly effectSize: number;
  readonly achievedPower: number;
}

export interface CalculationResult {
  readonly sampleSizePerVariant: number;
  readonly totalSampleSize: number;
  readonly estimatedDays?: number;
  readonly powerCurve: PowerCurve;
  readonly summary: TestSummary;
}

/**
 * Conventional defaults for a new calculation
 */
export const DEFAULT_TEST_PARAMETERS: Readonly<
  Pick<TestParameters, 'power' | 'significance' | 'testType' | 'effectMode'>
> = {
  power: 0.8,
  significance: 0.05,
  testType: TestType.TWO_TAILED,
  effectMode: 'absolute',
};

export type TestParametersInput = Pick<TestParameters, 'baselineRate' | 'minimumDetectableEffect'> &
  Partial<TestParameters>;

/**
 * Fill in conventional defaults for any omitted parameter
 */
export function createTestParameters(input: TestParametersInput): TestParameters {
  return { ...DEFAULT_TEST_PARAMETERS, ...input };
}

/**
 * Variant conversion rate implied by a baseline and an effect
 */
export function impliedVariantRate(
  baselineRate: number,
  effect: number,
  mode: EffectMode = 'absolute'
): number {
  return mode === 'relative' ? baselineRate * (1 + effect) : baselineRate + effect;
}
