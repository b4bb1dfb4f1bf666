// Message query: filter + labels + limit + trash flag + ordering.
//   const messages = await mailbox.messages
//     .where(From.eq('billing@example.com').and(Has.flags.attachment))
//     .orderBy([Date.desc(), Subject.asc()])
//     .limit(50)
//     .execute()
//
// execute() lists ids page by page, then fetches bodies either one by one or
// in batches spaced at least `batchDelayMs` apart (start to start), then
// applies the orderings client side. Everything runs sequentially, and the
// first transport error aborts the query and is returned as is.

import { TypeMismatchError, type TransportError } from './api-utils.js'
import type { MailboxContext } from './context.js'
import type { LabelProxy } from './label-hierarchy.js'
import { Category, type BaseLabel } from './labels.js'
import { Message, type LabelRef, type MessageError } from './message.js'
import { compile, type Clause, type Ordering, type OrderableField } from './query-attributes.js'
import { MAX_PAGE_SIZE, type LabelChange, type ListMessagesParams, type RemoteMessage } from './transport.js'

type SortValue = string | number

function sortValue(message: Message, field: OrderableField): SortValue {
  switch (field) {
    case 'date':
      return message.date.getTime()
    case 'size':
      return message.size
    case 'subject':
      return message.subject
    case 'from':
      return message.from?.email ?? ''
    case 'to':
    case 'cc':
    case 'bcc':
      return message[field].map((c) => c.email).join(', ')
  }
}

function compareValues(a: SortValue, b: SortValue): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/** Stable multi-key sort: apply each ordering from last to first, so the first is the primary key. */
export function applyOrdering(messages: Message[], orderings: Ordering[]): Message[] {
  let sorted = [...messages]
  for (const { field, direction } of [...orderings].reverse()) {
    const sign = direction === 'desc' ? -1 : 1
    sorted = [...sorted].sort((a, b) => sign * compareValues(sortValue(a, field), sortValue(b, field)))
  }
  return sorted
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

export class Query {
  private filter: Clause | null = null
  private labelIds: string[] | null = null
  private labelNames: string[] = []
  private maxResults: number | null
  private trash = false
  private orderings: Ordering[] | null = null

  constructor(private readonly context: MailboxContext) {
    this.maxResults = context.settings.batchSize || 25
  }

  /** Bulk actions over this query's result ids. */
  get bulk(): BulkAction {
    return new BulkAction(this, this.context)
  }

  where(clause: Clause): this {
    this.filter = clause
    return this
  }

  labels(labels: BaseLabel | LabelProxy | Array<BaseLabel | LabelProxy>): this {
    const list = Array.isArray(labels) ? labels : [labels]
    this.labelIds = list.map((l) => l.id)
    this.labelNames = list.map((l) => l.name)
    return this
  }

  orderBy(orderings: Ordering | Ordering[]): this {
    this.orderings = Array.isArray(orderings) ? orderings : [orderings]
    return this
  }

  /** Maximum number of messages; null for no limit. */
  limit(limit: number | null): this {
    this.maxResults = limit
    return this
  }

  includeTrash(includeTrash = true): this {
    this.trash = includeTrash
    return this
  }

  /** The compiled search string, or null when no filter is set. */
  searchString(): string | null {
    if (!this.filter) return null
    return compile(this.filter, { truncateAtWhitespace: this.context.settings.truncateOperands })
  }

  describe(): Record<string, unknown> {
    return {
      where: this.searchString(),
      labels: this.labelIds ? this.labelNames : null,
      limit: this.maxResults,
      include_trash: this.trash,
      order_by: this.orderings?.map((o) => `${o.field} ${o.direction}`) ?? null,
    }
  }

  // =========================================================================
  // Execution
  // =========================================================================

  /** Resolve the matching message ids, following page tokens until the limit is met. */
  async messageIds(): Promise<string[] | TransportError> {
    const q = this.searchString()

    const limit = this.maxResults
    const params: ListMessagesParams = {
      ...(q ? { q } : {}),
      ...(this.labelIds ? { labelIds: this.labelIds } : {}),
      ...(this.trash ? { includeSpamTrash: true } : {}),
      maxResults: limit === null ? MAX_PAGE_SIZE : Math.min(limit, MAX_PAGE_SIZE),
    }

    const ids: string[] = []
    let page = await this.context.transport.listMessages(params)
    if (page instanceof Error) return page
    ids.push(...page.messages.map((m) => m.id))

    while (page.nextPageToken) {
      let maxResults = params.maxResults
      if (limit !== null) {
        const remaining = limit - ids.length
        if (remaining <= 0) break
        maxResults = Math.min(remaining, MAX_PAGE_SIZE)
      }
      page = await this.context.transport.listMessages({ ...params, maxResults, pageToken: page.nextPageToken })
      if (page instanceof Error) return page
      ids.push(...page.messages.map((m) => m.id))
    }

    return limit === null ? ids : ids.slice(0, limit)
  }

  async execute(): Promise<Message[] | TransportError | MessageError> {
    const ids = await this.messageIds()
    if (ids instanceof Error) return ids

    const messages = await this.fetchMessages(ids)
    if (messages instanceof Error) return messages

    return this.orderings ? applyOrdering(messages, this.orderings) : messages
  }

  private async fetchMessages(ids: string[]): Promise<Message[] | MessageError> {
    const { batchSize } = this.context.settings
    const messages: Message[] = []

    if (!batchSize) {
      for (const id of ids) {
        const message = await Message.fromId(this.context, id)
        if (message instanceof Error) return message
        messages.push(message)
      }
      return messages
    }

    for (const batch of chunk(ids, batchSize)) {
      const fetched = await this.fetchBatch(batch)
      if (fetched instanceof Error) return fetched
      messages.push(...fetched)
    }
    return messages
  }

  /** One batched detail fetch, padded with a sleep so batches start at least batchDelayMs apart. */
  private async fetchBatch(ids: string[]): Promise<Message[] | MessageError> {
    const { clock, batchDelayMs } = this.context.settings
    const started = clock.now()

    const resources: RemoteMessage[] = []
    const res = await this.context.transport.batchGetMessages(ids, (_id, response, error) => {
      if (error) return error
      if (response) resources.push(response)
    })
    if (res instanceof Error) return res

    const messages: Message[] = []
    for (const resource of resources) {
      const message = await Message.fromResource(this.context, resource)
      if (message instanceof Error) return message
      messages.push(message)
    }

    const elapsed = clock.now() - started
    if (elapsed < batchDelayMs) await clock.sleep(batchDelayMs - elapsed)

    return messages
  }
}

// ---------------------------------------------------------------------------
// Bulk actions
// ---------------------------------------------------------------------------

type BulkMutation = (ids: string[]) => Promise<void | TransportError>

/**
 * A pending mutation over a query's result set.
 * Scoped use: enter() captures the ids, commit() arms the action, exit()
 * performs it only if it was committed. run() wraps the three.
 * Immediate use: execute() captures the ids and performs the action.
 */
export class BulkActionContext {
  private resultSet: string[] | null = null
  private committed = false

  constructor(
    private readonly query: Query,
    private readonly action: BulkMutation,
  ) {}

  /** Ids captured by the last enter() / execute(); empty before either. */
  get ids(): readonly string[] {
    return this.resultSet ?? []
  }

  get size(): number {
    return this.ids.length
  }

  get isEmpty(): boolean {
    return this.size === 0
  }

  get isCommitted(): boolean {
    return this.committed
  }

  async enter(): Promise<this | TransportError> {
    const ids = await this.query.messageIds()
    if (ids instanceof Error) return ids
    this.resultSet = ids
    this.committed = false
    return this
  }

  /** Arm the action; it runs when the scope is exited. */
  commit(): void {
    this.committed = true
  }

  /** Perform the action if committed. Returns the number of affected messages (0 when not committed). */
  async exit(): Promise<number | TransportError> {
    if (!this.committed) return 0
    this.committed = false
    const ids = this.resultSet ?? []
    const res = await this.action(ids)
    if (res instanceof Error) return res
    return ids.length
  }

  /**
   * enter(), hand the context to `fn` to inspect and maybe commit(), then exit().
   * exit() also runs when `fn` throws: an action committed before the throw is
   * still applied, then the error is rethrown.
   */
  async run(fn: (scope: this) => void | Promise<void>): Promise<number | TransportError> {
    const entered = await this.enter()
    if (entered instanceof Error) return entered
    try {
      await fn(this)
    } catch (err) {
      const exited = await this.exit()
      if (exited instanceof Error) {
        throw new AggregateError([err, exited], 'Bulk action failed after its callback threw')
      }
      throw err
    }
    return this.exit()
  }

  /** Capture the ids and apply the action right away. Returns the affected count. */
  async execute(): Promise<number | TransportError> {
    const ids = await this.query.messageIds()
    if (ids instanceof Error) return ids
    this.resultSet = ids
    const res = await this.action(ids)
    if (res instanceof Error) return res
    return ids.length
  }
}

export class BulkAction {
  constructor(
    private readonly query: Query,
    private readonly context: MailboxContext,
  ) {}

  private modify(change: LabelChange): BulkActionContext {
    return new BulkActionContext(this.query, async (ids) => {
      if (ids.length === 0) return
      return this.context.transport.batchModifyMessages(ids, change)
    })
  }

  delete(): BulkActionContext {
    return new BulkActionContext(this.query, async (ids) => {
      if (ids.length === 0) return
      return this.context.transport.batchDeleteMessages(ids)
    })
  }

  changeCategoryTo(category: Category): BulkActionContext | TypeMismatchError {
    if (!(category instanceof Category)) {
      return new TypeMismatchError({ actual: typeof category, container: 'bulk category change', expected: 'Category' })
    }
    return this.modify({ addLabelIds: [category.id] })
  }

  addLabels(labels: LabelRef | LabelRef[]): BulkActionContext {
    return this.modify({ addLabelIds: (Array.isArray(labels) ? labels : [labels]).map((l) => l.id) })
  }

  removeLabels(labels: LabelRef | LabelRef[]): BulkActionContext {
    return this.modify({ removeLabelIds: (Array.isArray(labels) ? labels : [labels]).map((l) => l.id) })
  }

  markIsRead(isRead = true): BulkActionContext {
    const unread = this.context.labels.system.unread
    return isRead ? this.removeLabels(unread) : this.addLabels(unread)
  }

  markIsImportant(isImportant = true): BulkActionContext {
    const important = this.context.labels.system.important
    return isImportant ? this.addLabels(important) : this.removeLabels(important)
  }

  markIsStarred(isStarred = true): BulkActionContext {
    const starred = this.context.labels.system.starred
    return isStarred ? this.addLabels(starred) : this.removeLabels(starred)
  }

  archive(): BulkActionContext {
    return this.removeLabels(this.context.labels.system.inbox)
  }
}
