/* eslint-disable no-console */
import type { VersionDiagnostic } from './types'
import { DiagnosticEvent } from './types'

/**
 * Environment variable that lets invalid version numbers through the CLI
 */
export const ALLOW_INVALID_ENV = 'PEPVER_ALLOW_INVALID'

/**
 * Console symbols for better output
 */
export const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
}

/**
 * Colorize console output (simple ANSI colors)
 */
export const colors = {
  green: (text: string) => `\x1B[32m${text}\x1B[0m`,
  red: (text: string) => `\x1B[31m${text}\x1B[0m`,
  yellow: (text: string) => `\x1B[33m${text}\x1B[0m`,
  gray: (text: string) => `\x1B[90m${text}\x1B[0m`,
  bold: (text: string) => `\x1B[1m${text}\x1B[0m`,
}

export function formatDiagnostic({ event, original, version }: VersionDiagnostic): string {
  switch (event) {
    case DiagnosticEvent.Normalized:
      return `Version number normalised: '${original}' -> '${version}' (see PEP 440)`
    case DiagnosticEvent.InvalidAllowed:
      return `Invalid version number '${original}' allowed (allowInvalid)`
  }
}

/**
 * Default diagnostic callback: a yellow warning on stderr
 */
export function logDiagnostic(diagnostic: VersionDiagnostic): void {
  console.warn(colors.yellow(`${symbols.warning} ${formatDiagnostic(diagnostic)}`))
}
