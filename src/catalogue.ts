/**
 * Function catalogue
 * The one list of public engine functions; the facade and the CLI read it
 */

import * as stats from './stats/index.ts'

export const CATALOGUE_VERSION = '1.0.0'

export type CatalogueGroup =
  | 'accumulator'
  | 'descriptive'
  | 'robust'
  | 'rolling'
  | 'pairwise'
  | 'transform'
  | 'inference'

export interface CatalogueEntry {
  group: CatalogueGroup
  fn: (...args: never[]) => unknown
}

export const catalogue = {
  // accumulator
  welford: { group: 'accumulator', fn: stats.welford },

  // descriptive
  mean: { group: 'descriptive', fn: stats.mean },
  std: { group: 'descriptive', fn: stats.std },
  variance: { group: 'descriptive', fn: stats.variance },
  zscore: { group: 'descriptive', fn: stats.zscore },
  meanNan: { group: 'descriptive', fn: stats.meanNan },
  stdNan: { group: 'descriptive', fn: stats.stdNan },
  varianceNan: { group: 'descriptive', fn: stats.varianceNan },
  meanAxis: { group: 'descriptive', fn: stats.meanAxis },
  percentile: { group: 'descriptive', fn: stats.percentile },
  quantile: { group: 'descriptive', fn: stats.quantile },
  median: { group: 'descriptive', fn: stats.median },
  iqr: { group: 'descriptive', fn: stats.iqr },
  mad: { group: 'descriptive', fn: stats.mad },
  signMask: { group: 'descriptive', fn: stats.signMask },
  demeanWithSigns: { group: 'descriptive', fn: stats.demeanWithSigns },

  // robust
  trimmedMean: { group: 'robust', fn: stats.trimmedMean },
  minmaxScale: { group: 'robust', fn: stats.minmaxScale },
  robustScale: { group: 'robust', fn: stats.robustScale },
  winsorize: { group: 'robust', fn: stats.winsorize },
  quantileBins: { group: 'robust', fn: stats.quantileBins },
  iqrOutliers: { group: 'robust', fn: stats.iqrOutliers },
  zscoreOutliers: { group: 'robust', fn: stats.zscoreOutliers },

  // rolling
  rollingMean: { group: 'rolling', fn: stats.rollingMean },
  rollingVar: { group: 'rolling', fn: stats.rollingVar },
  rollingStd: { group: 'rolling', fn: stats.rollingStd },
  rollingMeanStd: { group: 'rolling', fn: stats.rollingMeanStd },
  rollingZscore: { group: 'rolling', fn: stats.rollingZscore },
  ewma: { group: 'rolling', fn: stats.ewma },
  rollingMeanNan: { group: 'rolling', fn: stats.rollingMeanNan },
  rollingVarNan: { group: 'rolling', fn: stats.rollingVarNan },
  rollingStdNan: { group: 'rolling', fn: stats.rollingStdNan },
  rollingZscoreNan: { group: 'rolling', fn: stats.rollingZscoreNan },
  rollingMeanAxis0: { group: 'rolling', fn: stats.rollingMeanAxis0 },
  rollingVarAxis0: { group: 'rolling', fn: stats.rollingVarAxis0 },
  rollingStdAxis0: { group: 'rolling', fn: stats.rollingStdAxis0 },
  rollingZscoreAxis0: { group: 'rolling', fn: stats.rollingZscoreAxis0 },
  rollingMeanStdAxis0: { group: 'rolling', fn: stats.rollingMeanStdAxis0 },

  // pairwise
  cov: { group: 'pairwise', fn: stats.cov },
  corr: { group: 'pairwise', fn: stats.corr },
  covNan: { group: 'pairwise', fn: stats.covNan },
  corrNan: { group: 'pairwise', fn: stats.corrNan },
  covMatrix: { group: 'pairwise', fn: stats.covMatrix },
  corrMatrix: { group: 'pairwise', fn: stats.corrMatrix },
  rollingCov: { group: 'pairwise', fn: stats.rollingCov },
  rollingCorr: { group: 'pairwise', fn: stats.rollingCorr },
  rollingCovNan: { group: 'pairwise', fn: stats.rollingCovNan },
  rollingCorrNan: { group: 'pairwise', fn: stats.rollingCorrNan },

  // transform
  padNan: { group: 'transform', fn: stats.padNan },
  diff: { group: 'transform', fn: stats.diff },
  pctChange: { group: 'transform', fn: stats.pctChange },
  cumsum: { group: 'transform', fn: stats.cumsum },
  cummean: { group: 'transform', fn: stats.cummean },
  ecdf: { group: 'transform', fn: stats.ecdf },
  kdeGaussian: { group: 'transform', fn: stats.kdeGaussian },

  // inference
  tTest1Samp: { group: 'inference', fn: stats.tTest1Samp },
  tTest2Samp: { group: 'inference', fn: stats.tTest2Samp },
  chi2Gof: { group: 'inference', fn: stats.chi2Gof },
  chi2Independence: { group: 'inference', fn: stats.chi2Independence },
  cohensD: { group: 'inference', fn: stats.cohensD },
  hedgesG: { group: 'inference', fn: stats.hedgesG },
  mannWhitneyU: { group: 'inference', fn: stats.mannWhitneyU },
} as const satisfies Record<string, CatalogueEntry>

export type CatalogueName = keyof typeof catalogue

export interface CatalogueListing {
  name: string
  group: CatalogueGroup
}

/**
 * Catalogue names grouped in declaration order
 */
export function listCatalogue(): CatalogueListing[] {
  return Object.entries(catalogue).map(([name, entry]) => ({ name, group: entry.group }))
}

export function isCatalogueName(name: string): name is CatalogueName {
  return Object.prototype.hasOwnProperty.call(catalogue, name)
}
