// Label entities: live objects behind the label proxies.
// An entity is a snapshot of labels.get (counts, visibility, color) that can
// be refreshed. User labels also know their place in the hierarchy and can
// create children, be renamed and be deleted; every such change refreshes the
// accessor so proxies see the new tree.

import { NotFoundError, TypeMismatchError, ValidationError, type TransportError } from './api-utils.js'
import type { MailboxContext } from './context.js'
import { Message } from './message.js'
import type { Query } from './query.js'
import { SYSTEM_CATEGORIES, SYSTEM_LABELS, isSystemCategoryId, isSystemLabelId } from './system-labels.js'
import type { LabelBody, LabelColor, RemoteLabel } from './transport.js'

export interface LabelOptions {
  labelListVisibility?: 'labelShow' | 'labelShowIfUnread' | 'labelHide'
  messageListVisibility?: 'show' | 'hide'
  textColor?: string
  backgroundColor?: string
}

export function buildLabelBody(name: string | undefined, options: LabelOptions): LabelBody {
  const body: LabelBody = {}
  if (name !== undefined) body.name = name
  if (options.labelListVisibility) body.labelListVisibility = options.labelListVisibility
  if (options.messageListVisibility) body.messageListVisibility = options.messageListVisibility
  if (options.textColor || options.backgroundColor) {
    body.color = {
      ...(options.textColor ? { textColor: options.textColor } : {}),
      ...(options.backgroundColor ? { backgroundColor: options.backgroundColor } : {}),
    }
  }
  return body
}

function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (typeof value === 'object') return value.constructor.name
  return typeof value
}

// ---------------------------------------------------------------------------
// BaseLabel
// ---------------------------------------------------------------------------

export abstract class BaseLabel {
  readonly id: string
  name = ''
  type: 'system' | 'user' = 'user'
  messagesTotal = 0
  messagesUnread = 0
  threadsTotal = 0
  threadsUnread = 0
  messageListVisibility: string | null = null
  labelListVisibility: string | null = null
  color: LabelColor | null = null

  constructor(
    protected readonly context: MailboxContext,
    remote: RemoteLabel,
  ) {
    this.id = remote.id
    this.apply(remote)
  }

  protected apply(remote: RemoteLabel): void {
    this.name = this.displayName(remote)
    this.type = remote.type
    this.messagesTotal = remote.messagesTotal
    this.messagesUnread = remote.messagesUnread
    this.threadsTotal = remote.threadsTotal
    this.threadsUnread = remote.threadsUnread
    this.messageListVisibility = remote.messageListVisibility
    this.labelListVisibility = remote.labelListVisibility
    this.color = remote.color
  }

  protected displayName(remote: RemoteLabel): string {
    return remote.name
  }

  /** Refetch counts and settings for this label. */
  async refresh(): Promise<this | TransportError> {
    const remote = await this.context.transport.getLabel(this.id)
    if (remote instanceof Error) return remote
    this.apply(remote)
    return this
  }

  /** A query restricted to messages carrying this label. */
  messages(): Query {
    return this.context.query().labels(this)
  }

  toString(): string {
    return this.name
  }
}

// ---------------------------------------------------------------------------
// Category
// ---------------------------------------------------------------------------

export class Category extends BaseLabel {
  protected override displayName(remote: RemoteLabel): string {
    return isSystemCategoryId(this.id) ? SYSTEM_CATEGORIES[this.id] : remote.name
  }

  /** Whether the message is filed under this category. */
  contains(message: Message): boolean | TypeMismatchError {
    if (message instanceof Message) return message.category?.id === this.id
    return new TypeMismatchError({ actual: describeValue(message), container: `category "${this.name}"`, expected: 'Message' })
  }
}

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

export class Label extends BaseLabel {
  /** A label contains itself and every label below it; a message when it carries this label. */
  contains(other: BaseLabel | Message): boolean | TypeMismatchError {
    if (other instanceof BaseLabel) {
      return other.id === this.id || other.name.startsWith(`${this.name}/`)
    }
    if (other instanceof Message) return other.hasLabel(this)
    return new TypeMismatchError({ actual: describeValue(other), container: `label "${this.name}"`, expected: 'BaseLabel, Message' })
  }
}

export class SystemLabel extends Label {
  protected override displayName(remote: RemoteLabel): string {
    return isSystemLabelId(this.id) ? SYSTEM_LABELS[this.id] : remote.name
  }
}

export class UserLabel extends Label {
  /** Create a user label and refresh the hierarchy so it is reachable by name. */
  static async create(
    context: MailboxContext,
    { name, ...options }: LabelOptions & { name: string },
  ): Promise<UserLabel | TransportError | NotFoundError> {
    const body = buildLabelBody(name, {
      ...options,
      labelListVisibility: options.labelListVisibility ?? 'labelShow',
      messageListVisibility: options.messageListVisibility ?? 'show',
    })

    const id = await context.transport.createLabel(body)
    if (id instanceof Error) return id

    const refreshed = await context.labels.refresh()
    if (refreshed instanceof Error) return refreshed

    const node = context.labels.getById(id)
    if (node instanceof Error) return node
    const entity = await node.entity()
    if (entity instanceof Error) return entity
    if (!(entity instanceof UserLabel)) return new NotFoundError({ resource: `user label ${id}` })
    return entity
  }

  /** The label one level up, or null for a top-level label. */
  async parent(): Promise<BaseLabel | null | TransportError | NotFoundError> {
    const node = this.context.labels.getById(this.id)
    if (node instanceof Error) return node
    return node.parent ? node.parent.entity() : null
  }

  async children(): Promise<BaseLabel[] | TransportError | NotFoundError> {
    const node = this.context.labels.getById(this.id)
    if (node instanceof Error) return node

    const entities: BaseLabel[] = []
    for (const child of node.children.values()) {
      const entity = await child.entity()
      if (entity instanceof Error) return entity
      entities.push(entity)
    }
    return entities
  }

  /** Create `name` directly below this label. */
  createChild(name: string, options: LabelOptions = {}): Promise<UserLabel | TransportError | NotFoundError> {
    return UserLabel.create(this.context, { ...options, name: `${this.name}/${name}` })
  }

  /** Rename or restyle this label. At least one field must be given. */
  async update(options: LabelOptions & { name?: string }): Promise<this | TransportError | ValidationError> {
    const { name, ...rest } = options
    const body = buildLabelBody(name, rest)
    if (Object.keys(body).length === 0) {
      return new ValidationError({ field: 'label update', reason: 'no fields to change' })
    }

    const updated = await this.context.transport.updateLabel(this.id, body)
    if (updated instanceof Error) return updated

    const refreshed = await this.refresh()
    if (refreshed instanceof Error) return refreshed
    const hierarchy = await this.context.labels.refresh()
    if (hierarchy instanceof Error) return hierarchy
    return this
  }

  /** Delete this label; with `recursive`, every user label below it as well. */
  async delete({ recursive = false }: { recursive?: boolean } = {}): Promise<void | TransportError> {
    const deleted = await this.context.transport.deleteLabel(this.id)
    if (deleted instanceof Error) return deleted

    if (recursive) {
      const labels = await this.context.transport.listLabels()
      if (labels instanceof Error) return labels
      for (const label of labels) {
        if (label.type !== 'user' || !label.name.startsWith(`${this.name}/`)) continue
        const res = await this.context.transport.deleteLabel(label.id)
        if (res instanceof Error) return res
      }
    }

    const refreshed = await this.context.labels.refresh()
    if (refreshed instanceof Error) return refreshed
  }
}
