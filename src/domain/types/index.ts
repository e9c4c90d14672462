export {
  TestType,
  DEFAULT_TEST_PARAMETERS,
  createTestParameters,
  impliedVariantRate,
} from './parameters';
export type {
  EffectMode,
  TestParameters,
  TestParametersInput,
  TestSummary,
  PowerCurvePoint,
  CalculationResult,
} from './parameters';
