/* eslint-disable no-console */
import type { PepverConfig, PepverOptions } from './types'
import process from 'node:process'
import { isCanonicalVersion } from './canonical'
import { normalizeVersions } from './normalize'
import { ExitCode } from './types'
import { colors, logDiagnostic, symbols } from './utils'

// CAC hands a boolean flag the argument after it as its value (`-q 1.0` gives
// `quiet: 1`), so flag values arrive as whatever the parser made of that argument
type FlagValue = boolean | string | number

// Define CLI options interface to match CAC's naming conventions
export interface CLIOptions {
  allowInvalid?: FlagValue
  check?: FlagValue
  quiet?: FlagValue
  verbose?: FlagValue
}

function flag(value: FlagValue | undefined): boolean | undefined {
  if (value === undefined || typeof value === 'boolean')
    return value
  return true
}

/**
 * Only pass CLI flags that were explicitly provided, so the config file and
 * environment fill in the rest
 */
export function cliOverrides(options: CLIOptions): PepverOptions {
  const overrides: PepverOptions = {}

  const allowInvalid = flag(options.allowInvalid)
  if (allowInvalid !== undefined)
    overrides.allowInvalid = allowInvalid
  const check = flag(options.check)
  if (check !== undefined)
    overrides.check = check
  const quiet = flag(options.quiet)
  if (quiet !== undefined)
    overrides.quiet = quiet
  const verbose = flag(options.verbose)
  if (verbose !== undefined)
    overrides.verbose = verbose

  return overrides
}

/**
 * Pick the version numbers out of the raw command line arguments.
 *
 * CAC turns positionals that look numeric into numbers (`1.0` becomes `1`) and
 * lets boolean flags swallow the next argument, so versions are read from argv
 * as typed. A version never starts with `-`; everything after `--` is kept.
 */
export function versionArguments(args: string[]): string[] {
  const end = args.indexOf('--')
  const before = end === -1 ? args : args.slice(0, end)
  const after = end === -1 ? [] : args.slice(end + 1)

  return [...before.filter(arg => !arg.startsWith('-')), ...after]
}

/**
 * Normalize each version and print the canonical forms, one per line
 */
export function runNormalize(versions: string[], config: PepverConfig): ExitCode {
  if (versions.length === 0) {
    console.error(colors.red(`${symbols.error} No version numbers given`))
    return ExitCode.InvalidArgument
  }

  const results = normalizeVersions(versions, {
    allowInvalid: config.allowInvalid,
    onDiagnostic: config.quiet ? undefined : logDiagnostic,
  })

  let exitCode = ExitCode.Success

  for (const result of results) {
    if (result.error) {
      console.error(colors.red(`${symbols.error} ${result.error.message}`))
      exitCode = ExitCode.InvalidArgument
      continue
    }

    console.log(result.version)

    const canonical = isCanonicalVersion(result.input)
    if (config.verbose && canonical)
      console.warn(colors.gray(`${symbols.info} ${result.input} is already canonical`))

    if (config.check && !canonical)
      exitCode = ExitCode.InvalidArgument
  }

  if (config.check && exitCode === ExitCode.Success && !config.quiet)
    console.warn(colors.green(`${symbols.success} All version numbers are canonical`))

  return exitCode
}

/**
 * Report an unexpected error and pick the exit code for it
 */
export function errorHandler(error: unknown): ExitCode {
  const err = error instanceof Error ? error : new Error(String(error))
  let message = err.message

  // Always show full error details in CI for debugging
  if (process.env.CI || process.env.DEBUG)
    message += `\n\n${err.stack ?? ''}`

  console.error(colors.red(`${symbols.error} ${message}`))
  return ExitCode.FatalError
}
