#!/usr/bin/env node

/**
 * Hostbook — Entry Point
 *
 * Parses the command line, runs one command, sets the exit code.
 */

import { run } from './cli/program.js'

const exitCode = await run(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
})

process.exitCode = exitCode
