import { spawnSync } from 'node:child_process'
import { existsSync, mkdirSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import process from 'node:process'
import { fileURLToPath } from 'node:url'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { version } from '../package.json'
import { colors, symbols } from '../src/utils'

const packageDir = fileURLToPath(new URL('..', import.meta.url))
const cliPath = join(packageDir, 'bin', 'cli.ts')

// tsx is hoisted to the workspace root unless npm had to nest it
const tsxBin = [
  join(packageDir, 'node_modules', '.bin', 'tsx'),
  join(packageDir, '..', '..', 'node_modules', '.bin', 'tsx'),
].find(candidate => existsSync(candidate)) ?? 'tsx'

const TIMEOUT = 30_000

describe('CLI Integration Tests', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = join(tmpdir(), `pepver-cli-test-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`)
    mkdirSync(tempDir, { recursive: true })
  })

  afterEach(() => {
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  const runCLI = (args: string[]): { code: number | null, stdout: string, stderr: string } => {
    const result = spawnSync(tsxBin, [cliPath, ...args], {
      cwd: tempDir,
      encoding: 'utf-8',
      env: { ...process.env, PEPVER_ALLOW_INVALID: '', CI: '', DEBUG: '' },
    })
    return { code: result.status, stdout: result.stdout, stderr: result.stderr }
  }

  it('should print canonical versions', () => {
    const result = runCLI(['1.0-1', '1.0a1'])

    expect(result.code).toBe(0)
    expect(result.stdout).toBe('1.0.post1\n1.0a1\n')
    expect(result.stderr).toContain(`${symbols.warning} Version number normalised: '1.0-1' -> '1.0.post1' (see PEP 440)`)
  }, TIMEOUT)

  it('should keep versions intact after a flag', () => {
    const result = runCLI(['--check', '1.0'])

    expect(result.code).toBe(0)
    expect(result.stdout).toBe('1.0\n')
    expect(result.stderr).toContain(colors.green(`${symbols.success} All version numbers are canonical`))
  }, TIMEOUT)

  it('should accept flags after the versions', () => {
    const result = runCLI(['1.10', '2.0', '--check'])

    expect(result.code).toBe(0)
    expect(result.stdout).toBe('1.10\n2.0\n')
  }, TIMEOUT)

  it('should let invalid versions through with --allow-invalid', () => {
    const result = runCLI(['--allow-invalid', 'Not-A-Version'])

    expect(result.code).toBe(0)
    expect(result.stdout).toBe('not-a-version\n')
    expect(result.stderr).toContain(`Invalid version number 'Not-A-Version' allowed (allowInvalid)`)
  }, TIMEOUT)

  it('should reject invalid versions by default', () => {
    const result = runCLI(['not-a-version'])

    expect(result.code).toBe(1)
    expect(result.stdout).toBe('')
    expect(result.stderr).toContain(`${symbols.error} Version number 'not-a-version' does not match PEP 440 rules`)
  }, TIMEOUT)

  it('should fail --check on a version that is not canonical', () => {
    const result = runCLI(['--check', '1.0alpha1'])

    expect(result.code).toBe(1)
    expect(result.stdout).toBe('1.0a1\n')
  }, TIMEOUT)

  it('should stay quiet with -q', () => {
    const result = runCLI(['-q', '1.0-1'])

    expect(result.code).toBe(0)
    expect(result.stdout).toBe('1.0.post1\n')
    expect(result.stderr).not.toContain('normalised')
  }, TIMEOUT)

  it('should take versions after a double dash', () => {
    const result = runCLI(['--', 'V2.0'])

    expect(result.code).toBe(0)
    expect(result.stdout).toBe('2.0\n')
  }, TIMEOUT)

  it('should fail when no versions are given', () => {
    const result = runCLI(['--check'])

    expect(result.code).toBe(1)
    expect(result.stderr).toContain(`${symbols.error} No version numbers given`)
  }, TIMEOUT)

  it('should show the version with --version', () => {
    const result = runCLI(['--version'])

    expect(result.code).toBe(0)
    expect(result.stdout.startsWith(`pepver/${version} `)).toBe(true)
  }, TIMEOUT)

  it('should show the version with the version command', () => {
    const result = runCLI(['version'])

    expect(result.code).toBe(0)
    expect(result.stdout).toBe(`${version}\n`)
  }, TIMEOUT)
})
