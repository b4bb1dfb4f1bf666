// Auth commands: whoami.
// Credentials come from the token file; see auth.ts for its shape.

import type { Goke } from 'goke'
import { getAuthStatus } from '../auth.js'
import { loadConfig } from '../config.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'

export function registerAuthCommands(cli: Goke) {
  cli
    .command('whoami', 'Show the account in the token file')
    .action(async () => {
      const config = loadConfig()
      if (config instanceof Error) handleCommandError(config)

      const status = getAuthStatus(config)
      if (status instanceof Error) {
        out.hint(`No usable credentials: ${status.message}`)
        return
      }

      out.printYaml({
        email: status.email,
        expires: status.expiresAt?.toISOString() ?? 'unknown',
        token_file: config.tokenFile,
      })
    })
}
