#!/usr/bin/env node

import { createProgram } from './program'

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`\n❌ Unexpected error: ${String(error)}`)
    process.exit(1)
  })
