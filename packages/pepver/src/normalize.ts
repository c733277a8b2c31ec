import type { NormalizeOptions, NormalizeResult } from './types'
import { formatVersion } from './canonical'
import { InvalidVersion } from './errors'
import { parseVersion } from './grammar'
import { DiagnosticEvent } from './types'

/**
 * Normalise a version number according to the rules in PEP 440.
 *
 * Throws `InvalidVersion` when the input does not match the version grammar,
 * unless `allowInvalid` is set, in which case the lowercased input comes back
 * unchanged. `onDiagnostic` hears about every input whose text was changed.
 *
 * https://peps.python.org/pep-0440/#normalization
 */
export function normalizeVersion(original: string, options: NormalizeOptions = {}): string {
  const { allowInvalid = false, onDiagnostic } = options
  const version = original.toLowerCase()
  const fields = parseVersion(version)

  if (!fields) {
    if (!allowInvalid)
      throw new InvalidVersion(original)

    onDiagnostic?.({ event: DiagnosticEvent.InvalidAllowed, original, version })
    return version
  }

  const canonical = formatVersion(fields)
  if (canonical !== original)
    onDiagnostic?.({ event: DiagnosticEvent.Normalized, original, version: canonical })

  return canonical
}

/**
 * Normalise several version numbers, collecting invalid ones instead of
 * stopping at the first
 */
export function normalizeVersions(versions: string[], options: NormalizeOptions = {}): NormalizeResult[] {
  return versions.map((input) => {
    try {
      const version = normalizeVersion(input, options)
      return { input, version, changed: version !== input }
    }
    catch (error) {
      if (error instanceof InvalidVersion)
        return { input, error, changed: false }
      throw error
    }
  })
}
