/**
 * statfold
 * Statistics engine over dense float64 sequences and matrices
 */

export * from './stats/index.ts'
export * from './data/vec.ts'
export {
  createMatrix,
  matrixFromRows,
  matrixFromColumns,
  getValue,
  setValue,
  getColumn,
  setColumn,
  getRow,
  toRows,
} from './data/matrix.ts'
export type { Matrix } from './data/matrix.ts'
export * from './config/index.ts'
export {
  CATALOGUE_VERSION,
  catalogue,
  listCatalogue,
  isCatalogueName,
} from './catalogue.ts'
export type {
  CatalogueGroup,
  CatalogueEntry,
  CatalogueName,
  CatalogueListing,
} from './catalogue.ts'
