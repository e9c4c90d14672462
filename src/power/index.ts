export {
  SampleSizeEngine,
  DEFAULT_ENGINE_CONFIG,
  calculateSampleSize,
  criticalValue,
  estimateDuration,
} from './SampleSizeEngine';
export type { EngineConfig } from './SampleSizeEngine';
export { PowerCurve } from './PowerCurve';
export { PowerSimulator, DEFAULT_SIMULATION_OPTIONS, zStatistic } from './PowerSimulator';
export type { SimulationOptions, SimulationResult } from './PowerSimulator';
