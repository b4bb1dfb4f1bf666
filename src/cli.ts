#!/usr/bin/env node

// mailquery: structured Gmail queries and bulk actions, built on goke.
// Entry point: registers all commands, help and version.

import { goke } from 'goke'
import { registerAuthCommands } from './commands/auth-cmd.js'
import { registerBulkCommands } from './commands/bulk.js'
import { registerLabelCommands } from './commands/label.js'
import { registerMailCommands } from './commands/mail.js'

const cli = goke('mailquery')

// whoami first so it appears at the top of --help
registerAuthCommands(cli)
registerMailCommands(cli)
registerBulkCommands(cli)
registerLabelCommands(cli)

cli.help()
cli.version('0.1.0')

cli.parse()
