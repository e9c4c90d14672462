/**
 * Test summary table
 *
 * Rows shown beneath a calculation: the rates being compared, the targets, and
 * the resulting sample sizes.
 */

import { CalculationResult, TestParameters, TestType } from '../domain/types';
import { Formatters } from './formatters';

export interface SummaryRow {
  parameter: string;
  value: string;
}

const TEST_TYPE_LABELS: Record<TestType, string> = {
  [TestType.ONE_TAILED]: 'One-tailed',
  [TestType.TWO_TAILED]: 'Two-tailed',
};

export function summarize(params: TestParameters, result: CalculationResult): SummaryRow[] {
  const { summary } = result;

  const rows: SummaryRow[] = [
    { parameter: 'Control Group Rate', value: Formatters.percentage(2)(summary.controlRate) },
    { parameter: 'Expected Variant Rate', value: Formatters.percentage(2)(summary.variantRate) },
    {
      parameter: 'Absolute Effect',
      value: Formatters.percentagePoints(2)(summary.absoluteEffect),
    },
    {
      parameter: 'Relative Effect',
      value: Formatters.signedPercentage(1)(summary.relativeEffect),
    },
    { parameter: 'Statistical Power', value: Formatters.percentage(0)(params.power) },
    { parameter: 'Significance Level', value: Formatters.percentage(1)(params.significance) },
    { parameter: 'Test Type', value: TEST_TYPE_LABELS[params.testType] },
    { parameter: 'Per Variant', value: Formatters.count()(result.sampleSizePerVariant) },
    { parameter: 'Total (Both Variants)', value: Formatters.count()(result.totalSampleSize) },
  ];

  if (result.estimatedDays !== undefined) {
    rows.push({ parameter: 'Estimated Duration', value: Formatters.days(result.estimatedDays) });
  }

  return rows;
}
