export { toCalculationRecord, fromCalculationRecord } from './records';
export type { CalculationRecord, StoredCalculation } from './records';
export { exportCalculation, exportComparison, EXPORT_FORMAT_VERSION } from './documents';
export type {
  CalculationExport,
  ComparisonExport,
  ExportedParameters,
  ExportedResult,
  ExportedScenario,
} from './documents';
