/**
 * Statistics module exports
 */

export { InvalidArgumentError } from './errors.ts'

export {
  createWelford,
  welfordUpdate,
  welfordUpdateBatch,
  welfordMerge,
  welfordVariance,
  welfordPopulationVariance,
  welfordStdDev,
  welfordFromArray,
  welford,
} from './welford.ts'
export type { WelfordState, WelfordSummary } from './welford.ts'

export {
  mean,
  variance,
  std,
  zscore,
  meanNan,
  varianceNan,
  stdNan,
  trimmedMean,
  signMask,
  demeanWithSigns,
  meanAxis,
} from './descriptive.ts'
export type { DemeanedSigns } from './descriptive.ts'

export {
  quantileSorted,
  quantile,
  quantiles,
  percentile,
  median,
  iqr,
  mad,
} from './quantile.ts'
export type { InterpolationMethod, InterquartileRange } from './quantile.ts'

export {
  MAD_NORMAL_SCALE,
  computeDispersion,
  dispersionSummary,
  minmaxScale,
  robustScale,
  winsorize,
  quantileBins,
  iqrOutliers,
  zscoreOutliers,
} from './dispersion.ts'
export type { Dispersion, MinMaxScaled, RobustScaled, RobustScaleOptions } from './dispersion.ts'

export {
  rollingMean,
  rollingVar,
  rollingStd,
  rollingMeanStd,
  rollingZscore,
  ewma,
  rollingMeanNan,
  rollingVarNan,
  rollingStdNan,
  rollingZscoreNan,
  rollingMeanAxis0,
  rollingVarAxis0,
  rollingStdAxis0,
  rollingZscoreAxis0,
  rollingMeanStdAxis0,
} from './rolling.ts'
export type { RollingMeanStd, RollingMeanStdMatrix, RollingNanOptions } from './rolling.ts'

export {
  cov,
  corr,
  covNan,
  corrNan,
  covMatrix,
  corrMatrix,
  rollingCov,
  rollingCorr,
  rollingCovNan,
  rollingCorrNan,
} from './pairwise.ts'

export { padNan, diff, pctChange, cumsum, cummean, ecdf } from './transform.ts'
export type { Ecdf } from './transform.ts'

export { selectBandwidth, kdeGaussian } from './density.ts'
export type { BandwidthRule, KdeOptions, KdeResult } from './density.ts'

export {
  tTest1Samp,
  tTest2Samp,
  chi2Gof,
  chi2Independence,
  cohensD,
  hedgesG,
  averageRanks,
  mannWhitneyU,
} from './inference.ts'
export type {
  TestResult,
  TTestResult,
  ChiSquareResult,
  ContingencyResult,
  TTest2SampOptions,
  ContingencyOptions,
  CohensDOptions,
  RankResult,
} from './inference.ts'

export type { Alternative } from './distributions.ts'

export { columnBlocks, mapColumns, reduceColumns } from './columns.ts'
export type { ColumnOptions, ColumnBlock } from './columns.ts'
