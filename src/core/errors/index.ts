export {
  PowerPlanError,
  InvalidParameterError,
  ErrorCode,
  isPowerPlanError,
  isInvalidParameterError,
  wrapError,
} from './PowerPlanError';
export type { ErrorContext } from './PowerPlanError';
