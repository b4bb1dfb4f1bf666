// Mail commands: search, show.
// search builds an attribute-algebra filter from flags, runs it through the
// query executor and prints one YAML item per message.

import type { Goke } from 'goke'
import { z } from 'zod'
import { getMailbox } from '../auth.js'
import { formatContact } from '../email-utils.js'
import type { Mailbox } from '../mailbox.js'
import { Message } from '../message.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import type { Query } from '../query.js'
import { buildClause, parseOrderings, type FilterFlags } from '../search-filter.js'

// ---------------------------------------------------------------------------
// Shared filter options and query building (also used by bulk)
// ---------------------------------------------------------------------------

export interface QueryOptions extends FilterFlags {
  in?: string[]
  limit?: string
  all?: boolean
  order?: string
  includeTrash?: boolean
}

/** Build a Query from command options, exiting on invalid input. */
export function queryFromOptions(mailbox: Mailbox, options: QueryOptions): Query {
  const query = mailbox.query()

  const clause = buildClause(options, { truncateOperands: mailbox.settings.truncateOperands })
  if (clause instanceof Error) handleCommandError(clause)
  if (clause) query.where(clause)

  if (options.in && options.in.length > 0) {
    const proxies = options.in.map((name) => {
      const node = mailbox.labels.getByName(name)
      if (node instanceof Error) handleCommandError(node)
      return node.proxy
    })
    query.labels(proxies)
  }

  if (options.all) {
    query.limit(null)
  } else if (options.limit) {
    const limit = Number(options.limit)
    if (!Number.isInteger(limit) || limit < 1) {
      out.error(`--limit must be a positive integer, got "${options.limit}"`)
      process.exit(1)
    }
    query.limit(limit)
  }

  if (options.order) {
    const orderings = parseOrderings(options.order)
    if (orderings instanceof Error) handleCommandError(orderings)
    query.orderBy(orderings)
  }

  if (options.includeTrash) query.includeTrash()
  return query
}

/** Register `name` with every filter option; search and bulk share these. */
export function filterCommand<N extends string>(cli: Goke, name: N, description: string) {
  return cli
    .command(name, description)
    .option('--from <from>', z.string().describe('Sender address'))
    .option('--to <to>', z.string().describe('Recipient address'))
    .option('--cc <cc>', z.string().describe('Cc address'))
    .option('--subject <subject>', z.string().describe('Subject contains'))
    .option('--filename <filename>', z.string().describe('Attachment file name'))
    .option('--label <label>', z.string().describe('Search operator label:NAME'))
    .option('--after <after>', z.string().describe('Received after date (YYYY-MM-DD)'))
    .option('--before <before>', z.string().describe('Received before date (YYYY-MM-DD)'))
    .option('--larger <larger>', z.string().describe('Larger than size (bytes, or 5M)'))
    .option('--smaller <smaller>', z.string().describe('Smaller than size'))
    .option('--has <has>', z.array(z.string()).describe('has: flag, e.g. attachment, drive (repeatable)'))
    .option('--is <is>', z.array(z.string()).describe('is: flag, e.g. unread, starred (repeatable)'))
    .option('--not <not>', z.array(z.string()).describe('Negated is: flag (repeatable)'))
    .option('--in <in>', z.array(z.string()).describe('Restrict to a label by name (repeatable)'))
    .option('--limit <limit>', z.string().describe('Max messages (default: batch size)'))
    .option('--all', 'No limit')
    .option('--include-trash', 'Include spam and trash')
    .option('--order <order>', z.string().describe('Client-side ordering, e.g. date:desc,subject'))
}

function messageSummary(message: Message): Record<string, unknown> {
  return {
    id: message.id,
    from: message.from ? formatContact(message.from) : '',
    subject: message.subject,
    date: out.formatDate(message.date),
    labels: message.labels.map((l) => l.name),
    ...(message.category ? { category: message.category.name } : {}),
  }
}

// ---------------------------------------------------------------------------
// Register commands
// ---------------------------------------------------------------------------

export function registerMailCommands(cli: Goke) {
  // =========================================================================
  // mail search
  // =========================================================================

  filterCommand(cli, 'mail search', 'Search messages with structured filters. All filters are AND-ed.')
    .option('--print-query', 'Only print the compiled search string')
    .action(async (options) => {
      const mailbox = await getMailbox()
      if (mailbox instanceof Error) handleCommandError(mailbox)
      const query = queryFromOptions(mailbox, options)

      if (options.printQuery) {
        out.printYaml(query.describe())
        return
      }

      const messages = await query.execute()
      if (messages instanceof Error) handleCommandError(messages)

      if (messages.length === 0) {
        out.hint('No messages found')
        return
      }
      out.printList(messages.map(messageSummary))
      out.hint(`${messages.length} message(s)`)
    })

  // =========================================================================
  // mail show
  // =========================================================================

  cli
    .command('mail show <messageId>', 'Show one message with its body')
    .action(async (messageId) => {
      const mailbox = await getMailbox()
      if (mailbox instanceof Error) handleCommandError(mailbox)

      const message = await Message.fromId(mailbox, messageId)
      if (message instanceof Error) handleCommandError(message)

      out.printYaml({
        ...messageSummary(message),
        to: message.to.map(formatContact),
        ...(message.cc.length > 0 ? { cc: message.cc.map(formatContact) } : {}),
        attachments: message.attachments.map((a) => `${a.filename} (${a.mimeType}, ${a.size} bytes)`),
      })
      process.stdout.write('\n' + message.text() + '\n')
    })
}
