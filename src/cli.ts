#!/usr/bin/env node
import { Command } from 'commander'
import { runCommand } from './commands/run.js'
import { initCommand } from './commands/init.js'
import { normalizeArgv } from './commands/argv.js'
import { VERSION } from './version.js'

const program = new Command()

program
  .name('depsum')
  .description('Content-derived dependency hashes for the input files of a source tree')
  .version(VERSION, '-v, --version')

program.addCommand(runCommand, { isDefault: true })
program.addCommand(initCommand)

program.parseAsync(normalizeArgv(process.argv)).catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
