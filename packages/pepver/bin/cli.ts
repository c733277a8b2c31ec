#!/usr/bin/env tsx
/* eslint-disable no-console */
import type { CLIOptions } from '../src/cli'
import process from 'node:process'
import { CAC } from 'cac'
import { version } from '../package.json'
import { cliOverrides, errorHandler, runNormalize, versionArguments } from '../src/cli'
import { loadPepverConfig } from '../src/config'
import { ALLOW_INVALID_ENV } from '../src/utils'

const cli = new CAC('pepver')

cli
  .command('[...versions]', 'Normalize version numbers to canonical PEP 440 form')
  .option('--allow-invalid', `Pass invalid version numbers through lowercased (also set by ${ALLOW_INVALID_ENV})`)
  .option('--check', 'Exit with an error unless every version is already canonical')
  .option('-q, --quiet', 'Do not report normalised versions')
  .option('--verbose', 'Also report versions that are already canonical')
  .example('pepver 1.0-1')
  .example('pepver --check 1!2.0a1.post3.dev4+local.7')
  .example('pepver --allow-invalid not-a-version')
  .action(async (_versions: unknown, options: CLIOptions) => {
    try {
      const config = await loadPepverConfig(cliOverrides(options))
      process.exitCode = runNormalize(versionArguments(process.argv.slice(2)), config)
    }
    catch (error) {
      process.exitCode = errorHandler(error)
    }
  })

// Version command
cli
  .command('version', 'Show the version of pepver')
  .action(() => {
    console.log(version)
  })

cli.version(version)
cli.help()
cli.parse()
