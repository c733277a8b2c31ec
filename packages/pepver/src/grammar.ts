import type { LocalSegment, PreRelease, PreReleaseTag, VersionFields } from './types'

const SEPARATORS = ['-', '_', '.'] as const

// Longest spellings first so `preview` is never read as `pre` + `view`
const PRE_RELEASE_TAGS: readonly PreReleaseTag[] = ['preview', 'alpha', 'beta', 'pre', 'rc', 'a', 'b', 'c']
const POST_RELEASE_TAGS = ['post', 'rev', 'r'] as const

const DIGIT = /[0-9]/
const ALPHANUMERIC = /[a-z0-9]/
// Python's `str.isspace()` set: no BOM, but the information separators and NEL
const WHITESPACE = /[\t\n\v\f\r\x1C-\x1F \x85\xA0\u1680\u2000-\u200A\u2028\u2029\u202F\u205F\u3000]/

/**
 * Cursor over a lowercased version string
 */
class VersionScanner {
  private pos = 0

  constructor(private readonly text: string) {}

  get position(): number {
    return this.pos
  }

  get done(): boolean {
    return this.pos >= this.text.length
  }

  rewind(position: number): void {
    this.pos = position
  }

  eat(literal: string): boolean {
    if (!this.text.startsWith(literal, this.pos))
      return false
    this.pos += literal.length
    return true
  }

  eatOneOf<T extends string>(literals: readonly T[]): T | undefined {
    return literals.find(literal => this.eat(literal))
  }

  eatSeparator(): boolean {
    return this.eatOneOf(SEPARATORS) !== undefined
  }

  eatRun(pattern: RegExp): string | undefined {
    const start = this.pos
    while (this.pos < this.text.length && pattern.test(this.text[this.pos]))
      this.pos++
    return this.pos > start ? this.text.slice(start, this.pos) : undefined
  }

  digits(): string | undefined {
    return this.eatRun(DIGIT)
  }

  skipWhitespace(): void {
    this.eatRun(WHITESPACE)
  }
}

type Rule<T> = (scanner: VersionScanner) => T | undefined

/**
 * Run an optional rule, leaving the cursor untouched when it does not match
 */
function attempt<T>(scanner: VersionScanner, rule: Rule<T>): T | undefined {
  const start = scanner.position
  const result = rule(scanner)
  if (result === undefined)
    scanner.rewind(start)
  return result
}

function toNumber(digits: string | undefined): bigint {
  return digits === undefined ? 0n : BigInt(digits)
}

function parseRelease(scanner: VersionScanner): Pick<VersionFields, 'epoch' | 'release'> | undefined {
  let first = scanner.digits()
  if (first === undefined)
    return undefined

  let epoch: bigint | undefined
  if (scanner.eat('!')) {
    epoch = BigInt(first)
    first = scanner.digits()
    if (first === undefined)
      return undefined
  }

  const release = [BigInt(first)]
  for (;;) {
    const next = attempt(scanner, s => (s.eat('.') ? s.digits() : undefined))
    if (next === undefined)
      break
    release.push(BigInt(next))
  }

  return epoch === undefined ? { release } : { epoch, release }
}

function parsePreRelease(scanner: VersionScanner): PreRelease | undefined {
  scanner.eatSeparator()
  const tag = scanner.eatOneOf(PRE_RELEASE_TAGS)
  if (tag === undefined)
    return undefined
  scanner.eatSeparator()
  return { tag, number: toNumber(scanner.digits()) }
}

function parsePostRelease(scanner: VersionScanner): bigint | undefined {
  // `-N` shorthand
  const shorthand = attempt(scanner, s => (s.eat('-') ? s.digits() : undefined))
  if (shorthand !== undefined)
    return BigInt(shorthand)

  scanner.eatSeparator()
  if (scanner.eatOneOf(POST_RELEASE_TAGS) === undefined)
    return undefined
  scanner.eatSeparator()
  return toNumber(scanner.digits())
}

function parseDevRelease(scanner: VersionScanner): bigint | undefined {
  scanner.eatSeparator()
  if (!scanner.eat('dev'))
    return undefined
  scanner.eatSeparator()
  return toNumber(scanner.digits())
}

function parseLocal(scanner: VersionScanner): LocalSegment[] | undefined {
  const first = scanner.eatRun(ALPHANUMERIC)
  if (first === undefined)
    return undefined

  const segments = [first]
  for (;;) {
    const next = attempt(scanner, s => (s.eatSeparator() ? s.eatRun(ALPHANUMERIC) : undefined))
    if (next === undefined)
      break
    segments.push(next)
  }

  return segments.map(segment => (/^[0-9]+$/.test(segment) ? BigInt(segment) : segment))
}

/**
 * Match a version string against the permissive PEP 440 grammar.
 *
 * Surrounding whitespace, a leading `v`, upper case letters, alternate
 * pre-release spellings and `-`/`_`/`.` separators are all accepted. The whole
 * string has to match; anything left over means there is no match.
 *
 * @returns the decomposed fields, or `null` when the string is not a version
 */
export function parseVersion(raw: string): VersionFields | null {
  const scanner = new VersionScanner(raw.toLowerCase())

  scanner.skipWhitespace()
  scanner.eat('v')

  const head = parseRelease(scanner)
  if (!head)
    return null

  const fields: VersionFields = { ...head }

  const pre = attempt(scanner, parsePreRelease)
  if (pre !== undefined)
    fields.pre = pre

  const post = attempt(scanner, parsePostRelease)
  if (post !== undefined)
    fields.post = post

  const dev = attempt(scanner, parseDevRelease)
  if (dev !== undefined)
    fields.dev = dev

  if (scanner.eat('+')) {
    const local = parseLocal(scanner)
    if (!local)
      return null
    fields.local = local
  }

  scanner.skipWhitespace()
  return scanner.done ? fields : null
}

/**
 * Check if a string is a version number the normalizer accepts
 */
export function isValidVersion(raw: string): boolean {
  return parseVersion(raw) !== null
}
