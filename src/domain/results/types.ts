/**
 * Types for scenario comparison
 */

import type { InvalidParameterError } from '../../core/errors';
import type { CalculationResult, TestParameters } from '../types';

/**
 * A named parameter set in a comparison session
 */
export interface Scenario {
  /** Unique within its ScenarioSet */
  readonly id: string;
  /** Free-form label; several scenarios may share one */
  readonly name: string;
  readonly parameters: TestParameters;
}

/**
 * Scenario as supplied by callers that do not hold a ScenarioSet
 */
export interface ScenarioInput {
  readonly id?: string;
  readonly name: string;
  readonly parameters: TestParameters;
}

export type ScenarioOutcome =
  | { readonly status: 'ok'; readonly result: CalculationResult }
  | { readonly status: 'failed'; readonly error: InvalidParameterError };

export interface ComparisonEntry {
  /** Position in the input, 0-based */
  readonly index: number;
  readonly scenarioId: string;
  readonly scenarioName: string;
  readonly parameters: TestParameters;
  readonly outcome: ScenarioOutcome;
}

export type SucceededEntry = ComparisonEntry & {
  readonly outcome: Extract<ScenarioOutcome, { status: 'ok' }>;
};

/**
 * Linear axis for charting sample sizes
 */
export interface AxisScale {
  readonly domain: [number, number];
  readonly ticks: number[];
}

/**
 * Result of running the engine over a scenario set, in input order.
 * Aggregates cover succeeded entries only.
 */
export interface ComparisonReport {
  readonly entries: ComparisonEntry[];
  readonly succeeded: number;
  readonly failed: number;
  readonly maxSampleSizePerVariant?: number;
  readonly maxTotalSampleSize?: number;
  readonly maxEstimatedDays?: number;
  /** Nice [0, max] domain over per-variant sample sizes */
  readonly sampleSizeAxis: AxisScale;
}
