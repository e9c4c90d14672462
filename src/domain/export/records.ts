/**
 * Persistence record mapping
 *
 * Flat snake_case rows mirroring the `test_calculations` table. The mapping is
 * lossless for every parameter and result field; the power curve is not stored
 * because it is derived from the parameters and the sample size.
 */

import { PowerPlanError, ErrorCode } from '../../core/errors';
import { CalculationResult, EffectMode, TestParameters, TestType } from '../types';

export interface CalculationRecord {
  name: string;
  baseline_rate: number;
  mde: number;
  power: number;
  significance: number;
  test_type: TestType;
  effect_mode: EffectMode;
  daily_traffic: number | null;
  sample_size_per_variant: number;
  total_sample_size: number;
  estimated_days: number | null;
  notes: string | null;
}

export interface StoredCalculation {
  name: string;
  parameters: TestParameters;
  sampleSizePerVariant: number;
  totalSampleSize: number;
  estimatedDays?: number;
  notes?: string;
}

export function toCalculationRecord(
  name: string,
  params: TestParameters,
  result: CalculationResult,
  notes?: string
): CalculationRecord {
  return {
    name,
    baseline_rate: params.baselineRate,
    mde: params.minimumDetectableEffect,
    power: params.power,
    significance: params.significance,
    test_type: params.testType,
    effect_mode: params.effectMode ?? 'absolute',
    daily_traffic: params.dailyTraffic ?? null,
    sample_size_per_variant: result.sampleSizePerVariant,
    total_sample_size: result.totalSampleSize,
    estimated_days: result.estimatedDays ?? null,
    notes: notes ?? null,
  };
}

/**
 * @throws PowerPlanError (INVALID_INPUT) when the record is inconsistent
 */
export function fromCalculationRecord(record: CalculationRecord): StoredCalculation {
  if (!Object.values(TestType).includes(record.test_type)) {
    throw new PowerPlanError(ErrorCode.INVALID_INPUT, `Unknown test_type ${record.test_type}`, {
      name: record.name,
    });
  }
  if (record.effect_mode !== 'absolute' && record.effect_mode !== 'relative') {
    throw new PowerPlanError(
      ErrorCode.INVALID_INPUT,
      `Unknown effect_mode ${String(record.effect_mode)}`,
      { name: record.name }
    );
  }
  if (record.total_sample_size !== 2 * record.sample_size_per_variant) {
    throw new PowerPlanError(
      ErrorCode.INVALID_INPUT,
      'total_sample_size must be twice sample_size_per_variant',
      {
        name: record.name,
        sampleSizePerVariant: record.sample_size_per_variant,
        totalSampleSize: record.total_sample_size,
      }
    );
  }

  const parameters: TestParameters = {
    baselineRate: record.baseline_rate,
    minimumDetectableEffect: record.mde,
    power: record.power,
    significance: record.significance,
    testType: record.test_type,
    effectMode: record.effect_mode,
    ...(record.daily_traffic !== null ? { dailyTraffic: record.daily_traffic } : {}),
  };

  return {
    name: record.name,
    parameters,
    sampleSizePerVariant: record.sample_size_per_variant,
    totalSampleSize: record.total_sample_size,
    ...(record.estimated_days !== null ? { estimatedDays: record.estimated_days } : {}),
    ...(record.notes !== null ? { notes: record.notes } : {}),
  };
}
