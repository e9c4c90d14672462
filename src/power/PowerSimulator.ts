// src/power/PowerSimulator.ts
import { Random, MersenneTwister19937 } from 'random-js';
import { PowerPlanError, ErrorCode } from '../core/errors';
import { TestParameters, TestType, impliedVariantRate } from '../domain/types';
import { ParameterValidator } from '../domain/validation';
import { SampleSizeEngine, criticalValue } from './SampleSizeEngine';

/**
 * Configuration for a Monte-Carlo power check
 */
export interface SimulationOptions {
  /** Number of simulated experiments */
  iterations: number;
  /** Seed for the Mersenne Twister; same seed, same result */
  seed: number;
  /** Visitors per variant; defaults to the engine's required sample size */
  sampleSizePerVariant?: number;
  /** Log progress and the final summary to the console */
  verbose?: boolean;
}

export const DEFAULT_SIMULATION_OPTIONS: Readonly<SimulationOptions> = {
  iterations: 1000,
  seed: 12345,
  verbose: false,
};

/**
 * Aggregated results from repeated simulated experiments
 */
export interface SimulationResult {
  /** Share of simulated experiments where the z-test rejected the null */
  empiricalPower: number;
  /** Closed-form power at the same effect and sample size */
  analyticalPower: number;
  rejections: number;
  iterations: number;
  sampleSizePerVariant: number;
}

/**
 * Cross-checks the closed-form power by simulating experiments: both arms draw
 * Bernoulli conversions at the baseline and variant rates, and each experiment
 * is analyzed with a pooled two-proportion z-test.
 */
export class PowerSimulator {
  constructor(private readonly engine: SampleSizeEngine = new SampleSizeEngine()) {}

  /**
   * Run the simulation
   *
   * @throws InvalidParameterError for invalid test parameters
   * @throws PowerPlanError (INVALID_CONFIG) for invalid simulation options
   */
  simulate(params: TestParameters, options: Partial<SimulationOptions> = {}): SimulationResult {
    const config: SimulationOptions = { ...DEFAULT_SIMULATION_OPTIONS, ...options };
    ParameterValidator.validate(params);
    this.validateOptions(config);

    const sampleSize =
      config.sampleSizePerVariant ?? this.engine.calculate(params).sampleSizePerVariant;
    const controlRate = params.baselineRate;
    const variantRate = impliedVariantRate(
      controlRate,
      params.minimumDetectableEffect,
      params.effectMode
    );
    const zCritical = criticalValue(params.testType, params.significance);

    if (config.verbose) {
      console.log(
        `PowerSimulator: ${config.iterations} experiments, n=${sampleSize} per variant, seed ${config.seed}`
      );
    }

    const random = new Random(MersenneTwister19937.seed(config.seed));
    let rejections = 0;

    for (let i = 0; i < config.iterations; i++) {
      const controlConversions = countConversions(random, controlRate, sampleSize);
      const variantConversions = countConversions(random, variantRate, sampleSize);

      const z = zStatistic(controlConversions, variantConversions, sampleSize);
      if (rejectsNull(z, zCritical, params.testType)) {
        rejections++;
      }
    }

    const result: SimulationResult = {
      empiricalPower: rejections / config.iterations,
      analyticalPower: this.engine.achievedPower(
        params,
        params.minimumDetectableEffect,
        sampleSize
      ),
      rejections,
      iterations: config.iterations,
      sampleSizePerVariant: sampleSize,
    };

    if (config.verbose) {
      console.log(
        `PowerSimulator: empirical power ${result.empiricalPower.toFixed(3)}, analytical ${result.analyticalPower.toFixed(3)}`
      );
    }

    return result;
  }

  private validateOptions(options: SimulationOptions): void {
    if (!Number.isInteger(options.iterations) || options.iterations < 1) {
      throw new PowerPlanError(
        ErrorCode.INVALID_CONFIG,
        'iterations must be a positive integer',
        { iterations: options.iterations }
      );
    }

    if (!Number.isInteger(options.seed)) {
      throw new PowerPlanError(ErrorCode.INVALID_CONFIG, 'seed must be an integer', {
        seed: options.seed,
      });
    }

    const { sampleSizePerVariant } = options;
    if (
      sampleSizePerVariant !== undefined &&
      (!Number.isInteger(sampleSizePerVariant) || sampleSizePerVariant < 1)
    ) {
      throw new PowerPlanError(
        ErrorCode.INVALID_CONFIG,
        'sampleSizePerVariant must be a positive integer',
        { sampleSizePerVariant }
      );
    }
  }
}

function countConversions(random: Random, rate: number, visitors: number): number {
  let conversions = 0;
  for (let i = 0; i < visitors; i++) {
    if (random.real(0, 1) < rate) {
      conversions++;
    }
  }
  return conversions;
}

/**
 * Pooled two-proportion z statistic (variant minus control)
 */
export function zStatistic(
  controlConversions: number,
  variantConversions: number,
  sampleSize: number
): number {
  const pooled = (controlConversions + variantConversions) / (2 * sampleSize);
  const standardError = Math.sqrt(pooled * (1 - pooled) * (2 / sampleSize));

  // No variation in either arm: the test cannot reject
  if (standardError === 0) return 0;

  return (variantConversions - controlConversions) / sampleSize / standardError;
}

function rejectsNull(z: number, zCritical: number, testType: TestType): boolean {
  switch (testType) {
    case TestType.ONE_TAILED:
      return z > zCritical;
    case TestType.TWO_TAILED:
      return Math.abs(z) > zCritical;
  }
}

