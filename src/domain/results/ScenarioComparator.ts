/**
 * Scenario comparison
 *
 * Runs the sample-size engine over every scenario, in input order, and collects
 * an aligned report for tables and charts. A scenario with invalid parameters
 * is reported as failed next to the others; it never aborts the pass.
 */

import * as d3 from 'd3';
import {
  PowerPlanError,
  ErrorCode,
  isInvalidParameterError,
  wrapError,
} from '../../core/errors';
import { SampleSizeEngine } from '../../power/SampleSizeEngine';
import { ScenarioSet } from './ScenarioSet';
import {
  AxisScale,
  ComparisonEntry,
  ComparisonReport,
  ScenarioInput,
  ScenarioOutcome,
  SucceededEntry,
} from './types';

const AXIS_TICKS = 5;

export class ScenarioComparator {
  constructor(private readonly engine: SampleSizeEngine = new SampleSizeEngine()) {}

  /**
   * Compute every scenario. Nothing is cached between calls.
   *
   * @throws PowerPlanError (INVALID_INPUT) when the input is not a scenario
   * collection or an entry lacks a name or parameters
   */
  compare(scenarios: ScenarioSet | readonly ScenarioInput[]): ComparisonReport {
    const inputs = ScenarioComparator.toInputs(scenarios);

    const entries: ComparisonEntry[] = inputs.map((scenario, index) => ({
      index,
      scenarioId: scenario.id ?? `scenario-${index + 1}`,
      scenarioName: scenario.name,
      parameters: scenario.parameters,
      outcome: this.run(scenario),
    }));

    const succeeded = entries.filter(isSucceeded);
    const perVariant = succeeded.map((e) => e.outcome.result.sampleSizePerVariant);
    const totals = succeeded.map((e) => e.outcome.result.totalSampleSize);
    const days = succeeded.flatMap((e) => {
      const estimatedDays = e.outcome.result.estimatedDays;
      return estimatedDays === undefined ? [] : [estimatedDays];
    });

    const maxSampleSizePerVariant = d3.max(perVariant);

    return {
      entries,
      succeeded: succeeded.length,
      failed: entries.length - succeeded.length,
      maxSampleSizePerVariant,
      maxTotalSampleSize: d3.max(totals),
      maxEstimatedDays: d3.max(days),
      sampleSizeAxis: sampleSizeAxis(maxSampleSizePerVariant),
    };
  }

  /**
   * Succeeded entries from the smallest total sample size to the largest.
   * Ties keep their input order.
   */
  rank(report: ComparisonReport): SucceededEntry[] {
    return report.entries
      .filter(isSucceeded)
      .sort(
        (a, b) =>
          a.outcome.result.totalSampleSize - b.outcome.result.totalSampleSize || a.index - b.index
      );
  }

  private run(scenario: ScenarioInput): ScenarioOutcome {
    try {
      return { status: 'ok', result: this.engine.calculate(scenario.parameters) };
    } catch (error) {
      if (isInvalidParameterError(error)) {
        return { status: 'failed', error };
      }
      throw wrapError(error);
    }
  }

  private static toInputs(scenarios: ScenarioSet | readonly ScenarioInput[]): ScenarioInput[] {
    const items: unknown = scenarios instanceof ScenarioSet ? scenarios.toArray() : scenarios;

    if (!Array.isArray(items)) {
      throw new PowerPlanError(
        ErrorCode.INVALID_INPUT,
        'Scenarios must be a ScenarioSet or an array of scenarios',
        { received: typeof items }
      );
    }

    const list: readonly unknown[] = items;
    return list.map((item, index) => {
      if (!isScenarioInput(item)) {
        throw new PowerPlanError(
          ErrorCode.INVALID_INPUT,
          `Scenario at index ${index} must have a name and parameters`,
          { index }
        );
      }
      return item;
    });
  }
}

function isSucceeded(entry: ComparisonEntry): entry is SucceededEntry {
  return entry.outcome.status === 'ok';
}

function isScenarioInput(value: unknown): value is ScenarioInput {
  if (typeof value !== 'object' || value === null) return false;
  if (!('name' in value) || typeof value.name !== 'string') return false;
  if (!('parameters' in value) || typeof value.parameters !== 'object' || value.parameters === null) {
    return false;
  }
  return !('id' in value) || value.id === undefined || typeof value.id === 'string';
}

/**
 * [0, max] rounded out to nice tick boundaries; [0, 1] when nothing succeeded
 */
function sampleSizeAxis(max: number | undefined): AxisScale {
  const scale = d3.scaleLinear().domain([0, max ?? 1]).nice();
  const [low, high] = scale.domain();

  return { domain: [low, high], ticks: scale.ticks(AXIS_TICKS) };
}
