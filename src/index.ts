/**
 * powerplan - sample-size planning for two-proportion A/B tests
 *
 * Computes the visitors each variant needs, how long the test will run, and
 * the power achieved across a range of effect sizes. The engine and the
 * comparator are pure functions of their inputs.
 */

// Error handling and the standard normal primitive
export * from './core';

// Parameters and results
export * from './domain/types';
export { ParameterValidator } from './domain/validation';

// Engine, power curve, simulation
export * from './power';

// Scenario comparison
export * from './domain/results';

// Export documents and persistence records
export * from './domain/export';

// Summary table
export * from './ui';

// Version
export const VERSION = '0.1.0';
