// jstat ships no type declarations; only the distribution functions in use
declare module 'jstat' {
  interface ContinuousDistribution1 {
    cdf(x: number, dof: number): number
  }

  interface NormalDistribution {
    cdf(x: number, mean: number, std: number): number
  }

  interface JStat {
    studentt: ContinuousDistribution1
    chisquare: ContinuousDistribution1
    normal: NormalDistribution
  }

  const jStat: JStat
  export default jStat
}
