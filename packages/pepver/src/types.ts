export type PreReleaseTag = 'a' | 'alpha' | 'b' | 'beta' | 'rc' | 'c' | 'pre' | 'preview'

export type PreReleaseLetter = 'a' | 'b' | 'rc'

export interface PreRelease {
  /** Spelling as it appeared in the input */
  tag: PreReleaseTag
  number: bigint
}

/** A local version segment: digit-only segments are numbers, the rest stay text */
export type LocalSegment = bigint | string

/**
 * A version number decomposed into its PEP 440 segments.
 *
 * Every numeric field is a `bigint`, so long digit runs (date stamps, build
 * numbers) keep their exact value.
 */
export interface VersionFields {
  epoch?: bigint
  release: bigint[]
  pre?: PreRelease
  post?: bigint
  dev?: bigint
  local?: LocalSegment[]
}

export enum DiagnosticEvent {
  Normalized = 'normalized',
  InvalidAllowed = 'invalidAllowed',
}

export interface VersionDiagnostic {
  event: DiagnosticEvent
  /** Input exactly as supplied */
  original: string
  /** Value returned to the caller */
  version: string
}

export type DiagnosticCallback = (diagnostic: VersionDiagnostic) => void

export interface NormalizeOptions {
  /**
   * Return the lowercased input instead of throwing when it does not match
   * the version grammar
   */
  allowInvalid?: boolean

  /**
   * Called whenever the returned text differs from the input
   */
  onDiagnostic?: DiagnosticCallback
}

export interface NormalizeResult {
  input: string
  version?: string
  error?: Error
  changed: boolean
}

export interface PepverConfig {
  allowInvalid: boolean
  check: boolean
  quiet: boolean
  verbose: boolean
}

export type PepverOptions = Partial<PepverConfig>

export enum ExitCode {
  Success = 0,
  InvalidArgument = 1,
  FatalError = 2,
}
