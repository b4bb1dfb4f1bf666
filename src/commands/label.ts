// Label commands: list, tree, get, create, rename, delete.
// Labels are addressed by full name ("Work/Clients"); system labels and
// categories by their display name or id ("Inbox", "CATEGORY_SOCIAL").

import type { Goke } from 'goke'
import { z } from 'zod'
import { getMailbox } from '../auth.js'
import { describeTree } from '../label-hierarchy.js'
import { UserLabel, type BaseLabel, type LabelOptions } from '../labels.js'
import type { Mailbox } from '../mailbox.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'

const visibilitySchema = z.enum(['labelShow', 'labelShowIfUnread', 'labelHide'])

async function openMailbox(): Promise<Mailbox> {
  const mailbox = await getMailbox()
  if (mailbox instanceof Error) handleCommandError(mailbox)
  return mailbox
}

async function findLabel(mailbox: Mailbox, nameOrId: string): Promise<BaseLabel> {
  const byId = mailbox.labels.getById(nameOrId)
  const node = byId instanceof Error ? mailbox.labels.getByName(nameOrId) : byId
  if (node instanceof Error) handleCommandError(node)
  const label = await node.entity()
  if (label instanceof Error) handleCommandError(label)
  return label
}

async function findUserLabel(mailbox: Mailbox, name: string): Promise<UserLabel> {
  const label = await findLabel(mailbox, name)
  if (!(label instanceof UserLabel)) {
    out.error(`"${label.name}" is not a user label`)
    process.exit(1)
  }
  return label
}

function labelDetails(label: BaseLabel): Record<string, unknown> {
  return {
    id: label.id,
    name: label.name,
    type: label.type,
    messages_total: label.messagesTotal,
    messages_unread: label.messagesUnread,
    threads_total: label.threadsTotal,
    threads_unread: label.threadsUnread,
    label_list_visibility: label.labelListVisibility,
    message_list_visibility: label.messageListVisibility,
    color: label.color,
  }
}

export function registerLabelCommands(cli: Goke) {
  // =========================================================================
  // label list / tree
  // =========================================================================

  cli
    .command('label list', 'List all labels (categories, system labels, then user labels)')
    .action(async () => {
      const mailbox = await openMailbox()
      const nodes = mailbox.labels.nodes()

      out.printList(nodes.map((n) => ({ id: n.id, name: n.name, kind: n.kind })))
      out.hint(`${nodes.length} label(s)`)
    })

  cli
    .command('label tree', 'Show the user label hierarchy')
    .action(async () => {
      const mailbox = await openMailbox()
      const lines = describeTree(mailbox.labels.user)
      if (lines.length === 0) {
        out.hint('No user labels')
        return
      }
      process.stdout.write(lines.join('\n') + '\n')
    })

  // =========================================================================
  // label get
  // =========================================================================

  cli
    .command('label get <name>', 'Get label details with counts')
    .action(async (name) => {
      const mailbox = await openMailbox()
      const label = await findLabel(mailbox, name)
      out.printYaml(labelDetails(label))
    })

  // =========================================================================
  // label create / rename
  // =========================================================================

  cli
    .command('label create <name>', 'Create a user label. Slashes nest it: "Work/Clients"')
    .option('--bg-color <bgColor>', z.string().describe('Background color (hex, e.g. #4986e7)'))
    .option('--text-color <textColor>', z.string().describe('Text color (hex, e.g. #ffffff)'))
    .option('--visibility <visibility>', visibilitySchema.describe('Label list visibility'))
    .action(async (name, options) => {
      const mailbox = await openMailbox()
      const labelOptions: LabelOptions & { name: string } = { name }
      if (options.bgColor) labelOptions.backgroundColor = options.bgColor
      if (options.textColor) labelOptions.textColor = options.textColor
      if (options.visibility) labelOptions.labelListVisibility = options.visibility

      const label = await mailbox.createLabel(labelOptions)
      if (label instanceof Error) handleCommandError(label)

      out.printYaml(labelDetails(label))
      out.success(`Label created: "${label.name}"`)
    })

  cli
    .command('label rename <name> <newName>', 'Rename a user label; its children move with it')
    .action(async (name, newName) => {
      const mailbox = await openMailbox()
      const label = await findUserLabel(mailbox, name)

      const updated = await label.update({ name: newName })
      if (updated instanceof Error) handleCommandError(updated)

      out.printYaml({ id: updated.id, name: updated.name })
      out.success(`Renamed "${name}" to "${updated.name}"`)
    })

  // =========================================================================
  // label delete
  // =========================================================================

  cli
    .command('label delete <name>', 'Delete a user label')
    .option('--recursive', 'Also delete every label below it')
    .option('--force', 'Skip confirmation')
    .action(async (name, options) => {
      const mailbox = await openMailbox()
      const label = await findUserLabel(mailbox, name)

      if (!options.force && process.stdin.isTTY) {
        const scope = options.recursive ? ' and everything below it' : ''
        if (!(await out.confirm(`Delete label "${label.name}"${scope}?`))) {
          out.hint('Cancelled')
          return
        }
      }

      const res = await label.delete({ recursive: Boolean(options.recursive) })
      if (res instanceof Error) handleCommandError(res)

      out.printYaml({ label: label.name, deleted: true })
    })
}
