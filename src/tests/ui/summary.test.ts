import { describe, it, expect } from 'vitest';
import { summarize } from '../../ui/summary';
import { Formatters } from '../../ui/formatters';
import { SampleSizeEngine } from '../../power/SampleSizeEngine';
import { TestType, createTestParameters } from '../../domain/types';

describe('summarize', () => {
  const engine = new SampleSizeEngine();

  it('should describe a calculation row by row', () => {
    const params = createTestParameters({
      baselineRate: 0.1,
      minimumDetectableEffect: 0.02,
      dailyTraffic: 1000,
    });

    expect(summarize(params, engine.calculate(params))).toEqual([
      { parameter: 'Control Group Rate', value: '10.00%' },
      { parameter: 'Expected Variant Rate', value: '12.00%' },
      { parameter: 'Absolute Effect', value: '+2.00 percentage points' },
      { parameter: 'Relative Effect', value: '+20.0%' },
      { parameter: 'Statistical Power', value: '80%' },
      { parameter: 'Significance Level', value: '5.0%' },
      { parameter: 'Test Type', value: 'Two-tailed' },
      { parameter: 'Per Variant', value: '3,841' },
      { parameter: 'Total (Both Variants)', value: '7,682' },
      { parameter: 'Estimated Duration', value: '8 days' },
    ]);
  });

  it('should omit the duration row without traffic', () => {
    const params = createTestParameters({
      baselineRate: 0.1,
      minimumDetectableEffect: 0.02,
      testType: TestType.ONE_TAILED,
    });
    const rows = summarize(params, engine.calculate(params));

    expect(rows).toHaveLength(9);
    expect(rows.find((r) => r.parameter === 'Test Type')?.value).toBe('One-tailed');
    expect(rows.find((r) => r.parameter === 'Per Variant')?.value).toBe('3,026');
  });
});

describe('Formatters', () => {
  it('should pluralise days', () => {
    expect(Formatters.days(1)).toBe('1 day');
    expect(Formatters.days(1500)).toBe('1,500 days');
  });

  it('should group large counts', () => {
    expect(Formatters.count()(1419073)).toBe('1,419,073');
  });
});
