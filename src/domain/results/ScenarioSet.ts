/**
 * Ordered collection of scenarios owned by one comparison session
 */

import type { TestParametersInput } from '../types';
import { createTestParameters } from '../types';
import { Scenario } from './types';

export class ScenarioSet implements Iterable<Scenario> {
  private scenarios: Scenario[] = [];
  private nextId = 1;

  /**
   * Append a scenario. Omitted parameters take the conventional defaults.
   * Identical names or parameters are kept as distinct scenarios.
   */
  add(name: string, parameters: TestParametersInput): Scenario {
    const scenario: Scenario = {
      id: `scenario-${this.nextId++}`,
      name,
      parameters: createTestParameters(parameters),
    };
    this.scenarios.push(scenario);
    return scenario;
  }

  /**
   * Remove a scenario by id; returns whether one was removed
   */
  remove(id: string): boolean {
    const before = this.scenarios.length;
    this.scenarios = this.scenarios.filter((s) => s.id !== id);
    return this.scenarios.length !== before;
  }

  clear(): void {
    this.scenarios = [];
  }

  get(id: string): Scenario | undefined {
    return this.scenarios.find((s) => s.id === id);
  }

  get size(): number {
    return this.scenarios.length;
  }

  [Symbol.iterator](): Iterator<Scenario> {
    return this.scenarios[Symbol.iterator]();
  }

  toArray(): Scenario[] {
    return [...this.scenarios];
  }
}
