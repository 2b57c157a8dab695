#!/usr/bin/env node
import { runCli } from './cli.js'
import { describeError } from './error-utils.js'

try {
  process.exitCode = await runCli(process.argv.slice(2))
} catch (err) {
  console.error(`[sweepstat] ${describeError(err)}`)
  process.exitCode = 1
}
