import type { PepverConfig, PepverOptions } from './types'
import process from 'node:process'
import { loadConfig } from 'bunfig'
import { ALLOW_INVALID_ENV } from './utils'

export const defaultConfig: PepverConfig = {
  allowInvalid: false,
  check: false,
  quiet: false,
  verbose: false,
}

/**
 * Whether the environment asks for invalid versions to be let through.
 * Any non-empty value counts.
 */
export function allowInvalidFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env[ALLOW_INVALID_ENV])
}

/**
 * Load pepver configuration: defaults, then `pepver.config.*`, then the
 * environment, then explicit overrides
 */
export async function loadPepverConfig(overrides?: PepverOptions, env: NodeJS.ProcessEnv = process.env): Promise<PepverConfig> {
  const loaded = await loadConfig({
    name: 'pepver',
    defaultConfig,
  })

  const fromEnv: PepverOptions = allowInvalidFromEnv(env) ? { allowInvalid: true } : {}

  return { ...defaultConfig, ...loaded, ...fromEnv, ...overrides }
}

/**
 * Define configuration helper for TypeScript config files
 */
export function defineConfig(config: PepverOptions): PepverOptions {
  return config
}
