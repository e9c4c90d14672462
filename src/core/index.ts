/**
 * Core powerplan module exports
 */

// Error handling system
export {
  PowerPlanError,
  InvalidParameterError,
  ErrorCode,
  isPowerPlanError,
  isInvalidParameterError,
  wrapError,
} from './errors';
export type { ErrorContext } from './errors';

// Distributions
export { StandardNormal } from './distributions';
