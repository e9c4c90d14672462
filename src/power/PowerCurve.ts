// src/power/PowerCurve.ts
import { PowerCurvePoint } from '../domain/types';

/**
 * Achieved power across a sweep of effect sizes at a fixed sample size.
 *
 * Points are evaluated lazily and regenerated on every iteration, so the same
 * curve can be walked any number of times (once per chart redraw, once per
 * export) and always yields the same sequence.
 */
export class PowerCurve implements Iterable<PowerCurvePoint> {
  constructor(
    private readonly minEffect: number,
    private readonly maxEffect: number,
    private readonly points: number,
    private readonly sampleSize: number,
    private readonly evaluate: (effectSize: number) => number
  ) {}

  get length(): number {
    return this.points;
  }

  /**
   * Per-variant sample size the curve was evaluated at
   */
  get sampleSizePerVariant(): number {
    return this.sampleSize;
  }

  /**
   * Swept effect range, in the unit of the configured minimum detectable effect
   */
  get effectRange(): [number, number] {
    return [this.minEffect, this.maxEffect];
  }

  *[Symbol.iterator](): Iterator<PowerCurvePoint> {
    for (let i = 0; i < this.points; i++) {
      yield this.at(i);
    }
  }

  /**
   * The i-th point of the sweep
   */
  at(index: number): PowerCurvePoint {
    if (!Number.isInteger(index) || index < 0 || index >= this.points) {
      throw new RangeError(`Power curve index ${index} out of range [0, ${this.points})`);
    }

    const step = this.points > 1 ? (this.maxEffect - this.minEffect) / (this.points - 1) : 0;
    // Pin the last point so floating-point drift never overshoots the range
    const effectSize = index === this.points - 1 ? this.maxEffect : this.minEffect + step * index;

    return { effectSize, achievedPower: this.evaluate(effectSize) };
  }

  /**
   * Achieved power at an arbitrary effect size, not necessarily on the sweep
   */
  powerAt(effectSize: number): number {
    return this.evaluate(effectSize);
  }

  toArray(): PowerCurvePoint[] {
    return Array.from(this);
  }
}
