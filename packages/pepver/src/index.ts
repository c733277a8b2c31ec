export { formatVersion, isCanonicalVersion, PRE_RELEASE_SPELLINGS } from './canonical'
export { allowInvalidFromEnv, defaultConfig, defineConfig, loadPepverConfig } from './config'
export { InvalidVersion } from './errors'
export { isValidVersion, parseVersion } from './grammar'
export { normalizeVersion, normalizeVersions } from './normalize'
export * from './types'
export { ALLOW_INVALID_ENV, colors, formatDiagnostic, logDiagnostic, symbols } from './utils'
