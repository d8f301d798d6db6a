/**
 * Configuration module exports
 */

export {
  validateEngineConfig,
  readEngineConfig,
  DEFAULT_ENGINE_CONFIG,
} from './types.ts'
export type {
  RollingConfig,
  RobustConfig,
  KdeConfig,
  OutlierConfig,
  EngineConfig,
  EngineConfigInput,
} from './types.ts'

export {
  loadEngineConfig,
  loadEngineConfigFromString,
  mergeWithDefaults,
  generateExampleConfig,
} from './loader.ts'
export type { ConfigFormat } from './loader.ts'
