import * as d3 from 'd3';

/**
 * Common value formatters
 */
export const Formatters = {
  /** 0.1 -> "10.00%" */
  percentage: (decimals: number = 2) => d3.format(`.${decimals}%`),

  /** Signed percentage: 0.2 -> "+20.0%" */
  signedPercentage: (decimals: number = 1) => d3.format(`+.${decimals}%`),

  /** Rate difference in percentage points: 0.02 -> "+2.00 percentage points" */
  percentagePoints: (decimals: number = 2) => {
    const format = d3.format(`+.${decimals}f`);
    return (d: number) => `${format(d * 100)} percentage points`;
  },

  /** Grouped integer: 3841 -> "3,841" */
  count: () => d3.format(','),

  days: (d: number) => `${d3.format(',')(d)} ${d === 1 ? 'day' : 'days'}`,
};
