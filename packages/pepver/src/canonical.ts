import type { PreReleaseLetter, PreReleaseTag, VersionFields } from './types'
import { parseVersion } from './grammar'

export const PRE_RELEASE_SPELLINGS: Readonly<Record<PreReleaseTag, PreReleaseLetter>> = {
  a: 'a',
  alpha: 'a',
  b: 'b',
  beta: 'b',
  rc: 'rc',
  c: 'rc',
  pre: 'rc',
  preview: 'rc',
}

/**
 * Render decomposed version fields in canonical PEP 440 form:
 * `[N!]N(.N)*[{a|b|rc}N][.postN][.devN][+local]`
 */
export function formatVersion(fields: VersionFields): string {
  const components: string[] = []

  if (fields.epoch !== undefined)
    components.push(`${fields.epoch}!`)

  components.push(fields.release.join('.'))

  if (fields.pre)
    components.push(`${PRE_RELEASE_SPELLINGS[fields.pre.tag]}${fields.pre.number}`)

  if (fields.post !== undefined)
    components.push(`.post${fields.post}`)

  if (fields.dev !== undefined)
    components.push(`.dev${fields.dev}`)

  if (fields.local)
    components.push(`+${fields.local.join('.')}`)

  return components.join('')
}

/**
 * Check if a string is already in canonical form
 */
export function isCanonicalVersion(raw: string): boolean {
  const fields = parseVersion(raw)
  return fields !== null && formatVersion(fields) === raw
}
