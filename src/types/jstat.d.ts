// Type declarations for the parts of jstat used here; the package ships none.

declare module "jstat" {
  interface ContinuousDistribution<P extends unknown[]> {
    pdf(x: number, ...params: P): number;
    cdf(x: number, ...params: P): number;
    inv(p: number, ...params: P): number;
    sample(...params: P): number;
    mean(...params: P): number;
    variance(...params: P): number;
  }

  interface JStatStatic {
    /** (mean, std) */
    normal: ContinuousDistribution<[mean: number, std: number]>;
    /** (mu, sigma) of the underlying normal */
    lognormal: ContinuousDistribution<[mu: number, sigma: number]>;
    /** (shape, scale) */
    gamma: ContinuousDistribution<[shape: number, scale: number]>;
  }

  const jStat: JStatStatic;
  export = jStat;
}
