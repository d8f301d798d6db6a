/**
 * Configuration Loader
 * Loads and validates YAML/JSON engine configuration files
 */

import { readFileSync, existsSync } from 'node:fs'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import {
  readEngineConfig,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type EngineConfigInput,
} from './types.ts'

export type ConfigFormat = 'json' | 'yaml'

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

function parseContent(content: string, format: ConfigFormat | undefined): unknown {
  if (format === 'json') {
    try {
      return JSON.parse(content)
    } catch (e) {
      throw new Error(`Failed to parse JSON: ${messageOf(e)}`)
    }
  }
  if (format === 'yaml') {
    try {
      return parseYaml(content)
    } catch (e) {
      throw new Error(`Failed to parse YAML: ${messageOf(e)}`)
    }
  }

  // Unknown extension: JSON first, then YAML
  try {
    return JSON.parse(content)
  } catch {
    try {
      return parseYaml(content)
    } catch (e) {
      throw new Error(`Failed to parse config: ${messageOf(e)}`)
    }
  }
}

function toConfig(parsed: unknown): EngineConfig {
  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) return DEFAULT_ENGINE_CONFIG

  const { config, errors } = readEngineConfig(parsed)
  if (errors.length > 0) {
    throw new Error(`Invalid config:\n${errors.join('\n')}`)
  }
  return config
}

/**
 * Load engine configuration from file
 * Supports .yaml, .yml, and .json extensions
 */
export async function loadEngineConfig(path: string): Promise<EngineConfig> {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`)
  }

  const content = readFileSync(path, 'utf-8')
  const ext = path.toLowerCase().split('.').pop()
  const format: ConfigFormat | undefined =
    ext === 'json' ? 'json' : ext === 'yaml' || ext === 'yml' ? 'yaml' : undefined

  return toConfig(parseContent(content, format))
}

/**
 * Load engine configuration from string
 */
export function loadEngineConfigFromString(
  content: string,
  format: ConfigFormat = 'yaml'
): EngineConfig {
  return toConfig(parseContent(content, format))
}

/**
 * Merge partial configuration with defaults
 */
export function mergeWithDefaults(config: EngineConfigInput): EngineConfig {
  return {
    parallelism: config.parallelism ?? DEFAULT_ENGINE_CONFIG.parallelism,
    rolling: { ...DEFAULT_ENGINE_CONFIG.rolling, ...config.rolling },
    robust: { ...DEFAULT_ENGINE_CONFIG.robust, ...config.robust },
    kde: { ...DEFAULT_ENGINE_CONFIG.kde, ...config.kde },
    outliers: { ...DEFAULT_ENGINE_CONFIG.outliers, ...config.outliers },
  }
}

/**
 * Generate example configuration YAML
 */
export function generateExampleConfig(): string {
  return `# statfold engine configuration\n${stringifyYaml(DEFAULT_ENGINE_CONFIG)}`
}
