// Bulk command: apply one mutation to every message a filter matches.
// Without --commit the matching ids are only counted and previewed; nothing
// is sent. With --commit the action runs once over the whole result set.

import type { Goke } from 'goke'
import { z } from 'zod'
import { getMailbox } from '../auth.js'
import { Category } from '../labels.js'
import type { Mailbox } from '../mailbox.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import type { BulkAction, BulkActionContext } from '../query.js'
import { filterCommand, queryFromOptions } from './mail.js'

const BULK_ACTIONS = [
  'read',
  'unread',
  'star',
  'unstar',
  'important',
  'unimportant',
  'archive',
  'delete',
  'add-label',
  'remove-label',
  'category',
] as const
type BulkActionName = (typeof BULK_ACTIONS)[number]

function isBulkActionName(name: string): name is BulkActionName {
  return BULK_ACTIONS.some((a) => a === name)
}

function targetProxy(mailbox: Mailbox, target: string | undefined) {
  if (!target) {
    out.error('--target <label> is required for this action')
    process.exit(1)
  }
  const node = mailbox.labels.getByName(target)
  if (node instanceof Error) handleCommandError(node)
  return node.proxy
}

async function selectAction(mailbox: Mailbox, bulk: BulkAction, action: BulkActionName, target: string | undefined): Promise<BulkActionContext> {
  switch (action) {
    case 'read':
      return bulk.markIsRead()
    case 'unread':
      return bulk.markIsRead(false)
    case 'star':
      return bulk.markIsStarred()
    case 'unstar':
      return bulk.markIsStarred(false)
    case 'important':
      return bulk.markIsImportant()
    case 'unimportant':
      return bulk.markIsImportant(false)
    case 'archive':
      return bulk.archive()
    case 'delete':
      return bulk.delete()
    case 'add-label':
      return bulk.addLabels(targetProxy(mailbox, target))
    case 'remove-label':
      return bulk.removeLabels(targetProxy(mailbox, target))
    case 'category': {
      const category = await targetProxy(mailbox, target).entity()
      if (category instanceof Error) handleCommandError(category)
      if (!(category instanceof Category)) {
        out.error(`"${category.name}" is not a category`)
        process.exit(1)
      }
      const scoped = bulk.changeCategoryTo(category)
      if (scoped instanceof Error) handleCommandError(scoped)
      return scoped
    }
  }
}

export function registerBulkCommands(cli: Goke) {
  filterCommand(cli, 'bulk <action>', `Apply an action to every matching message: ${BULK_ACTIONS.join(', ')}. Previews unless --commit is given.`)
    .option('--target <target>', z.string().describe('Label or category name for add-label, remove-label and category'))
    .option('--commit', 'Perform the action (default is a dry run)')
    .action(async (action, options) => {
      if (!isBulkActionName(action)) {
        out.error(`Unknown action "${action}". Expected one of: ${BULK_ACTIONS.join(', ')}`)
        process.exit(1)
      }

      const mailbox = await getMailbox()
      if (mailbox instanceof Error) handleCommandError(mailbox)
      const query = queryFromOptions(mailbox, options)
      const scoped = await selectAction(mailbox, query.bulk, action, options.target)

      const affected = await scoped.run(async (scope) => {
        out.printYaml({ action, query: query.describe(), matched: scope.size })
        if (scope.isEmpty) return
        if (!options.commit) {
          out.hint('Dry run. Pass --commit to apply')
          return
        }
        if (action === 'delete' && process.stdin.isTTY) {
          if (!(await out.confirm(`Permanently delete ${scope.size} message(s)?`))) {
            out.hint('Cancelled')
            return
          }
        }
        scope.commit()
      })
      if (affected instanceof Error) handleCommandError(affected)

      if (affected > 0) out.success(`${action}: ${affected} message(s)`)
    })
}
