/**
 * Scenario comparison
 */

export { ScenarioSet } from './ScenarioSet';
export { ScenarioComparator } from './ScenarioComparator';
export type {
  Scenario,
  ScenarioInput,
  ScenarioOutcome,
  ComparisonEntry,
  SucceededEntry,
  AxisScale,
  ComparisonReport,
} from './types';
