// Type declarations for the parts of jstat used by powerplan

declare module 'jstat' {
  export interface JStatStatic {
    normal: {
      cdf(x: number, mean: number, std: number): number;
      inv(p: number, mean: number, std: number): number;
    };
  }

  const jStat: JStatStatic;
  export default jStat;
}
