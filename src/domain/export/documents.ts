/**
 * Export documents
 *
 * JSON-safe snapshots of calculations and comparisons for download. Absent
 * optional values become null so every document has the same keys; sizes and
 * days are integers, rates are reals.
 */

import { CalculationResult, PowerCurvePoint, TestParameters, TestSummary } from '../types';
import { ComparisonReport } from '../results';

export const EXPORT_FORMAT_VERSION = 1;

export interface ExportedParameters {
  baselineRate: number;
  minimumDetectableEffect: number;
  power: number;
  significance: number;
  testType: TestParameters['testType'];
  effectMode: NonNullable<TestParameters['effectMode']>;
  dailyTraffic: number | null;
}

export interface ExportedResult {
  sampleSizePerVariant: number;
  totalSampleSize: number;
  estimatedDays: number | null;
  summary: TestSummary;
  powerCurve: PowerCurvePoint[];
}

export interface CalculationExport {
  version: number;
  parameters: ExportedParameters;
  result: ExportedResult;
}

export type ExportedScenario = {
  index: number;
  id: string;
  name: string;
  parameters: ExportedParameters;
} & (
  | { status: 'ok'; result: ExportedResult }
  | { status: 'failed'; error: { field: string; reason: string } }
);

export interface ComparisonExport {
  version: number;
  scenarios: ExportedScenario[];
  aggregates: {
    succeeded: number;
    failed: number;
    maxSampleSizePerVariant: number | null;
    maxTotalSampleSize: number | null;
    maxEstimatedDays: number | null;
  };
}

function exportParameters(params: TestParameters): ExportedParameters {
  return {
    baselineRate: params.baselineRate,
    minimumDetectableEffect: params.minimumDetectableEffect,
    power: params.power,
    significance: params.significance,
    testType: params.testType,
    effectMode: params.effectMode ?? 'absolute',
    dailyTraffic: params.dailyTraffic ?? null,
  };
}

function exportResult(result: CalculationResult): ExportedResult {
  return {
    sampleSizePerVariant: result.sampleSizePerVariant,
    totalSampleSize: result.totalSampleSize,
    estimatedDays: result.estimatedDays ?? null,
    summary: { ...result.summary },
    powerCurve: result.powerCurve.toArray(),
  };
}

export function exportCalculation(
  params: TestParameters,
  result: CalculationResult
): CalculationExport {
  return {
    version: EXPORT_FORMAT_VERSION,
    parameters: exportParameters(params),
    result: exportResult(result),
  };
}

export function exportComparison(report: ComparisonReport): ComparisonExport {
  const scenarios = report.entries.map((entry): ExportedScenario => {
    const base = {
      index: entry.index,
      id: entry.scenarioId,
      name: entry.scenarioName,
      parameters: exportParameters(entry.parameters),
    };

    return entry.outcome.status === 'ok'
      ? { ...base, status: 'ok', result: exportResult(entry.outcome.result) }
      : {
          ...base,
          status: 'failed',
          error: { field: entry.outcome.error.field, reason: entry.outcome.error.reason },
        };
  });

  return {
    version: EXPORT_FORMAT_VERSION,
    scenarios,
    aggregates: {
      succeeded: report.succeeded,
      failed: report.failed,
      maxSampleSizePerVariant: report.maxSampleSizePerVariant ?? null,
      maxTotalSampleSize: report.maxTotalSampleSize ?? null,
      maxEstimatedDays: report.maxEstimatedDays ?? null,
    },
  };
}
