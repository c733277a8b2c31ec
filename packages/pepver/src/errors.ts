/**
 * Thrown when a version number does not match the PEP 440 grammar.
 */
export class InvalidVersion extends Error {
  /** The rejected input, before lowercasing */
  readonly version: string

  constructor(version: string) {
    super(`Version number '${version}' does not match PEP 440 rules`)
    this.name = 'InvalidVersion'
    this.version = version
  }
}
