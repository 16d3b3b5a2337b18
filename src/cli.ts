#!/usr/bin/env node
import { Command } from 'commander'
import { runCommand } from './commands/run.js'
import { initCommand } from './commands/init.js'

const program = new Command()

program
  .name('pr-scribe')
  .description('Generate technical documentation and a code review for a pull request')
  .version('0.1.0')

program.addCommand(runCommand)
program.addCommand(initCommand)

program.parse()
