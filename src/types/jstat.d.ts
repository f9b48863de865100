// Type declarations for the parts of jstat used by the fitting module

declare module 'jstat' {
  export interface jStat {
    min(data: number[]): number;
    max(data: number[]): number;
    mean(data: number[]): number;
    /**
     * k-th percentile, k in [0, 1]
     */
    percentile(data: number[], k: number, exclusive?: boolean): number;
  }

  const jStat: jStat;
  export default jStat;
}
