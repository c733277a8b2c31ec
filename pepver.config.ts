import type { PepverOptions } from './packages/pepver/src/types'
import { defineConfig } from './packages/pepver/src/config'

const config: PepverOptions = defineConfig({
  allowInvalid: false,
  check: false,
  quiet: false,
  verbose: false,
})

export default config
