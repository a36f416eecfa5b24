#!/usr/bin/env node
import { Command } from 'commander'
import { registerInitCommand } from './commands/init.js'
import { registerAdvertiseCommand } from './commands/advertise.js'
import { registerBrowseCommand } from './commands/browse.js'
import { registerResolveCommand } from './commands/resolve.js'

const program = new Command()

program
  .name('nsd')
  .description('Advertise, browse and resolve DNS-SD services on the local network')
  .version('0.1.0')

registerInitCommand(program)
registerAdvertiseCommand(program)
registerBrowseCommand(program)
registerResolveCommand(program)

export { program }

program.parse()
