import { describe, it, expect } from 'vitest';
import {
  SampleSizeEngine,
  DEFAULT_ENGINE_CONFIG,
  calculateSampleSize,
  criticalValue,
  estimateDuration,
} from '../../power/SampleSizeEngine';
import { TestType, createTestParameters } from '../../domain/types';
import { InvalidParameterError, PowerPlanError, ErrorCode } from '../../core/errors';

const worked = createTestParameters({
  baselineRate: 0.1,
  minimumDetectableEffect: 0.02,
  power: 0.8,
  significance: 0.05,
  testType: TestType.TWO_TAILED,
  dailyTraffic: 1000,
});

describe('SampleSizeEngine', () => {
  const engine = new SampleSizeEngine();

  describe('worked example', () => {
    it('should size a 10% baseline with a 2 point lift', () => {
      const result = engine.calculate(worked);

      expect(result.sampleSizePerVariant).toBe(3841);
      expect(result.totalSampleSize).toBe(7682);
      expect(result.estimatedDays).toBe(8);
    });

    it('should expose the intermediate quantities', () => {
      const { summary } = engine.calculate(worked);

      expect(summary.controlRate).toBe(0.1);
      expect(summary.variantRate).toBeCloseTo(0.12, 12);
      expect(summary.absoluteEffect).toBeCloseTo(0.02, 12);
      expect(summary.relativeEffect).toBeCloseTo(0.2, 12);
      expect(summary.zAlpha).toBeCloseTo(1.959964, 6);
      expect(summary.zBeta).toBeCloseTo(0.841621, 6);
      expect(summary.exactSampleSize).toBeCloseTo(3840.847, 2);
    });

    it('should need fewer visitors one-tailed', () => {
      const result = engine.calculate({ ...worked, testType: TestType.ONE_TAILED });
      expect(result.sampleSizePerVariant).toBe(3026);
    });
  });

  describe('relative effects', () => {
    it('should treat the effect as a lift on the baseline', () => {
      const result = engine.calculate(
        createTestParameters({
          baselineRate: 0.05,
          minimumDetectableEffect: 0.1,
          effectMode: 'relative',
        })
      );

      expect(result.sampleSizePerVariant).toBe(31234);
      expect(result.summary.variantRate).toBeCloseTo(0.055, 12);
    });

    it('should agree with the equivalent absolute effect', () => {
      const relative = engine.calculate(
        createTestParameters({ baselineRate: 0.05, minimumDetectableEffect: 0.5, effectMode: 'relative' })
      );
      const absolute = engine.calculate(
        createTestParameters({ baselineRate: 0.05, minimumDetectableEffect: 0.025 })
      );

      expect(relative.sampleSizePerVariant).toBe(1471);
      expect(absolute.sampleSizePerVariant).toBe(1471);
    });
  });

  describe('duration', () => {
    it('should round days up', () => {
      const result = engine.calculate({ ...worked, dailyTraffic: 333 });
      expect(result.estimatedDays).toBe(24);
    });

    it('should omit the duration without traffic', () => {
      const withoutTraffic = engine.calculate({ ...worked, dailyTraffic: undefined });
      const zeroTraffic = engine.calculate({ ...worked, dailyTraffic: 0 });

      expect(withoutTraffic.estimatedDays).toBeUndefined();
      expect('estimatedDays' in withoutTraffic).toBe(false);
      expect(zeroTraffic.estimatedDays).toBeUndefined();
    });

    it('should estimate directly from a total', () => {
      expect(estimateDuration(7682, 1000)).toBe(8);
      expect(estimateDuration(7000, 1000)).toBe(7);
      expect(estimateDuration(7682, 0)).toBeUndefined();
      expect(estimateDuration(7682, undefined)).toBeUndefined();
    });
  });

  describe('properties', () => {
    it('should always return a positive per-variant size and an exact doubled total', () => {
      const cases = [
        worked,
        createTestParameters({ baselineRate: 0.5, minimumDetectableEffect: 0.49, power: 0.01, significance: 0.99 }),
        createTestParameters({ baselineRate: 0.01, minimumDetectableEffect: 0.001 }),
        createTestParameters({ baselineRate: 0.95, minimumDetectableEffect: 0.04, testType: TestType.ONE_TAILED }),
      ];

      for (const params of cases) {
        const result = engine.calculate(params);
        expect(Number.isInteger(result.sampleSizePerVariant)).toBe(true);
        expect(result.sampleSizePerVariant).toBeGreaterThanOrEqual(1);
        expect(result.totalSampleSize).toBe(2 * result.sampleSizePerVariant);
      }
    });

    it('should never need fewer visitors for more power', () => {
      const sizes = [0.5, 0.6, 0.7, 0.8, 0.9, 0.95, 0.99].map(
        (power) => engine.calculate({ ...worked, power }).sampleSizePerVariant
      );

      expect(sizes).toEqual([1881, 2398, 3021, 3841, 5142, 6358, 8989]);
    });

    it('should keep growing with power when the significance level is loose', () => {
      const loose = { ...worked, significance: 0.5 };
      const powers = Array.from({ length: 99 }, (_, i) => (i + 1) / 100);
      const sizes = powers.map(
        (power) => engine.calculate({ ...loose, power }).sampleSizePerVariant
      );

      for (let i = 1; i < sizes.length; i++) {
        expect(sizes[i]).toBeGreaterThanOrEqual(sizes[i - 1]);
      }
    });

    it('should need a single visitor when the target power is met with none', () => {
      const loose = { ...worked, significance: 0.5 };
      const sizes = [0.01, 0.1, 0.3, 0.5].map(
        (power) => engine.calculate({ ...loose, power }).sampleSizePerVariant
      );

      expect(sizes).toEqual([1, 1, 12, 223]);
      expect(engine.calculate({ ...loose, power: 0.01 }).summary.exactSampleSize).toBe(0);
    });

    it('should never need more visitors for a looser significance level', () => {
      const sizes = [0.01, 0.02, 0.05, 0.1, 0.2].map(
        (significance) => engine.calculate({ ...worked, significance }).sampleSizePerVariant
      );

      for (let i = 1; i < sizes.length; i++) {
        expect(sizes[i]).toBeLessThanOrEqual(sizes[i - 1]);
      }
      expect(sizes[0]).toBe(5716);
      expect(sizes[4]).toBe(2206);
    });

    it('should grow without bound as the effect shrinks', () => {
      const sizes = [0.05, 0.02, 0.01, 0.005, 0.001].map(
        (minimumDetectableEffect) =>
          engine.calculate({ ...worked, minimumDetectableEffect }).sampleSizePerVariant
      );

      for (let i = 1; i < sizes.length; i++) {
        expect(sizes[i]).toBeGreaterThan(sizes[i - 1]);
      }
      expect(sizes[4]).toBeGreaterThan(1_000_000);
    });

    it('should never need more visitors one-tailed than two-tailed', () => {
      for (const baselineRate of [0.02, 0.1, 0.3, 0.5, 0.8]) {
        for (const significance of [0.01, 0.05, 0.1]) {
          const params = { ...worked, baselineRate, significance };
          const oneTailed = engine.calculate({ ...params, testType: TestType.ONE_TAILED });
          const twoTailed = engine.calculate({ ...params, testType: TestType.TWO_TAILED });

          expect(oneTailed.sampleSizePerVariant).toBeLessThanOrEqual(twoTailed.sampleSizePerVariant);
        }
      }
    });

    it('should give a two-tailed test at 2α the same size as one-tailed at α', () => {
      const twoTailed = engine.calculate({ ...worked, significance: 0.1 });
      const oneTailed = engine.calculate({ ...worked, testType: TestType.ONE_TAILED });
      expect(twoTailed.sampleSizePerVariant).toBe(oneTailed.sampleSizePerVariant);
    });

    it('should recompute identically on every call', () => {
      const first = engine.calculate(worked);
      const second = engine.calculate(worked);

      expect(second.sampleSizePerVariant).toBe(first.sampleSizePerVariant);
      expect(second.summary).toEqual(first.summary);
      expect(second.powerCurve.toArray()).toEqual(first.powerCurve.toArray());
    });
  });

  describe('errors', () => {
    it('should reject a variant rate pushed out of bounds and compute nothing', () => {
      expect(() =>
        engine.calculate({ ...worked, baselineRate: 0.99, minimumDetectableEffect: 0.02 })
      ).toThrow(InvalidParameterError);
    });

    it('should reject invalid baselines', () => {
      expect(() => engine.calculate({ ...worked, baselineRate: 1.5 })).toThrow(
        'Invalid baselineRate: must be strictly between 0 and 1'
      );
    });
  });

  describe('configuration', () => {
    it('should start from the defaults', () => {
      expect(engine.getConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
      expect(new SampleSizeEngine({ curvePoints: 10 }).getConfig()).toEqual({
        ...DEFAULT_ENGINE_CONFIG,
        curvePoints: 10,
      });
    });

    it.each([
      { curvePoints: 1 },
      { curvePoints: 12.5 },
      { minEffectFraction: 0 },
      { minEffectFraction: 1.5 },
      { maxEffectMultiple: 0.5 },
      { maxEffectMultiple: Infinity },
    ])('should reject %o', (config) => {
      try {
        new SampleSizeEngine(config);
        expect.unreachable('invalid configuration should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(PowerPlanError);
        expect((error as PowerPlanError).code).toBe(ErrorCode.INVALID_CONFIG);
      }
    });
  });
});

describe('criticalValue', () => {
  it('should split α across both tails only for two-tailed tests', () => {
    expect(criticalValue(TestType.TWO_TAILED, 0.05)).toBeCloseTo(1.959964, 6);
    expect(criticalValue(TestType.ONE_TAILED, 0.05)).toBeCloseTo(1.644854, 6);
  });
});

describe('calculateSampleSize', () => {
  it('should match the engine and honour the curve configuration', () => {
    const result = calculateSampleSize(worked, { curvePoints: 5 });

    expect(result.sampleSizePerVariant).toBe(3841);
    expect(result.powerCurve.length).toBe(5);
  });
});
