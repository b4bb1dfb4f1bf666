// Message: an immutable snapshot of one messages.get (format: full) response.
// Label ids are resolved to label entities through the accessor; a message
// carries any number of labels and at most one category. Mutations call the
// transport and return a fresh snapshot; the old object is left untouched.

import type { gmail_v1 } from '@googleapis/gmail'
import { NotFoundError, ParseError, TypeMismatchError, type TransportError } from './api-utils.js'
import type { MailboxContext } from './context.js'
import { parseAddressList, parseFrom, type Contact } from './email-utils.js'
import { LabelProxy } from './label-hierarchy.js'
import { BaseLabel, Category, Label } from './labels.js'
import { renderEmailBody } from './output.js'
import type { LabelChange, RemoteMessage } from './transport.js'

export interface MessageBody {
  text: string
  html: string
}

export interface AttachmentMeta {
  attachmentId: string
  filename: string
  mimeType: string
  size: number
}

/** Anything that names a label: an entity or a proxy. */
export type LabelRef = Label | LabelProxy

export type MessageError = TransportError | NotFoundError | ParseError

// ---------------------------------------------------------------------------
// Payload helpers
// ---------------------------------------------------------------------------

function decodeBase64Url(encoded: string) {
  const base64 = encoded.replace(/-/g, '+').replace(/_/g, '/')
  return Buffer.from(base64, 'base64').toString('utf-8')
}

function getHeader(headers: gmail_v1.Schema$MessagePartHeader[], name: string): string {
  return headers
    .filter((h) => h.name?.toLowerCase() === name)
    .map((h) => h.value ?? '')
    .filter((v) => v.length > 0)
    .join(', ')
}

/** Decoded bodies of every part with the given MIME type, depth first. */
function collectParts(part: gmail_v1.Schema$MessagePart, mimeType: string, out: string[] = []): string[] {
  if (part.mimeType === mimeType && part.body?.data && !part.filename) {
    out.push(decodeBase64Url(part.body.data))
  }
  for (const child of part.parts ?? []) collectParts(child, mimeType, out)
  return out
}

function collectAttachments(part: gmail_v1.Schema$MessagePart, out: AttachmentMeta[] = []): AttachmentMeta[] {
  if (part.filename && part.body?.attachmentId) {
    out.push({
      attachmentId: part.body.attachmentId,
      filename: part.filename,
      mimeType: part.mimeType ?? 'application/octet-stream',
      size: Number(part.body.size ?? 0),
    })
  }
  for (const child of part.parts ?? []) collectAttachments(child, out)
  return out
}

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

interface MessageFields {
  labels: Label[]
  category: Category | null
}

export class Message {
  readonly id: string
  readonly threadId: string
  readonly size: number
  readonly date: Date
  readonly subject: string
  readonly from: Contact | null
  readonly to: Contact[]
  readonly cc: Contact[]
  readonly bcc: Contact[]
  readonly body: MessageBody
  readonly attachments: AttachmentMeta[]
  readonly labels: readonly Label[]
  readonly category: Category | null

  private constructor(
    private readonly context: MailboxContext,
    readonly resource: RemoteMessage,
    { labels, category }: MessageFields,
  ) {
    const payload = resource.payload ?? {}
    const headers = payload.headers ?? []

    this.id = resource.id ?? ''
    this.threadId = resource.threadId ?? ''
    this.size = resource.sizeEstimate ?? 0
    this.date = new Date(Number(resource.internalDate ?? 0))
    this.subject = getHeader(headers, 'subject')
    this.from = parseFrom(getHeader(headers, 'from'))
    this.to = parseAddressList(getHeader(headers, 'to'))
    this.cc = parseAddressList(getHeader(headers, 'cc'))
    this.bcc = parseAddressList(getHeader(headers, 'bcc'))
    this.body = {
      text: collectParts(payload, 'text/plain').join('\n\n'),
      html: collectParts(payload, 'text/html').join('\n\n'),
    }
    this.attachments = collectAttachments(payload)
    this.labels = labels
    this.category = category
  }

  /** Build a message from a full-format resource, resolving its label ids to entities.
   *  An unknown label id triggers one label refresh before giving up. */
  static async fromResource(context: MailboxContext, resource: RemoteMessage): Promise<Message | MessageError> {
    const labels: Label[] = []
    const categories: Category[] = []
    let refreshed = false

    for (const labelId of resource.labelIds ?? []) {
      if (!context.labels.hasId(labelId) && !refreshed) {
        refreshed = true
        const res = await context.labels.refresh()
        if (res instanceof Error) return res
      }
      const node = context.labels.getById(labelId)
      if (node instanceof Error) return node

      const entity = await node.entity()
      if (entity instanceof Error) return entity
      if (entity instanceof Category) categories.push(entity)
      else if (entity instanceof Label) labels.push(entity)
    }

    if (categories.length > 1) {
      return new ParseError({
        what: `message ${resource.id ?? ''}`,
        reason: `expected at most one category, got ${categories.map((c) => c.name).join(', ')}`,
      })
    }

    return new Message(context, resource, { labels, category: categories[0] ?? null })
  }

  static async fromId(context: MailboxContext, messageId: string): Promise<Message | MessageError> {
    const resource = await context.transport.getMessage(messageId)
    if (resource instanceof Error) return resource
    return Message.fromResource(context, resource)
  }

  // =========================================================================
  // Reading
  // =========================================================================

  /** Plain text body, or the HTML body rendered as markdown when there is no plain part. */
  text(): string {
    if (this.body.text) return renderEmailBody(this.body.text, 'text/plain')
    return renderEmailBody(this.body.html, 'text/html')
  }

  hasLabel(label: BaseLabel | LabelProxy): boolean {
    return this.labels.some((l) => l.id === label.id)
  }

  /** Whether the label is among this message's labels or is its category. */
  contains(label: BaseLabel): boolean | TypeMismatchError {
    if (!(label instanceof BaseLabel)) {
      return new TypeMismatchError({ actual: typeof label, container: `message ${this.id}`, expected: 'BaseLabel' })
    }
    return this.hasLabel(label) || this.category?.id === label.id
  }

  toString(): string {
    return this.text()
  }

  // =========================================================================
  // Mutations (each returns a fresh snapshot)
  // =========================================================================

  async refresh(): Promise<Message | MessageError> {
    return Message.fromId(this.context, this.id)
  }

  private async modify(change: LabelChange): Promise<Message | MessageError> {
    const res = await this.context.transport.modifyMessage(this.id, change)
    if (res instanceof Error) return res
    return this.refresh()
  }

  private labelIds(labels: LabelRef | LabelRef[]): string[] | TypeMismatchError {
    const list = Array.isArray(labels) ? labels : [labels]
    const ids: string[] = []
    for (const label of list) {
      if (label instanceof Category || (label instanceof LabelProxy && label.node.kind === 'category')) {
        return new TypeMismatchError({ actual: `category "${label.name}"`, container: `message ${this.id}`, expected: 'Label, LabelProxy' })
      }
      ids.push(label.id)
    }
    return ids
  }

  async addLabels(labels: LabelRef | LabelRef[]): Promise<Message | MessageError | TypeMismatchError> {
    const ids = this.labelIds(labels)
    if (ids instanceof Error) return ids
    return this.modify({ addLabelIds: ids })
  }

  async removeLabels(labels: LabelRef | LabelRef[]): Promise<Message | MessageError | TypeMismatchError> {
    const ids = this.labelIds(labels)
    if (ids instanceof Error) return ids
    return this.modify({ removeLabelIds: ids })
  }

  async changeCategoryTo(category: Category): Promise<Message | MessageError | TypeMismatchError> {
    if (!(category instanceof Category)) {
      return new TypeMismatchError({ actual: typeof category, container: `message ${this.id}`, expected: 'Category' })
    }
    return this.modify({
      addLabelIds: [category.id],
      ...(this.category ? { removeLabelIds: [this.category.id] } : {}),
    })
  }

  markIsRead(isRead = true) {
    const unread = this.context.labels.system.unread
    return isRead ? this.removeLabels(unread) : this.addLabels(unread)
  }

  markIsImportant(isImportant = true) {
    const important = this.context.labels.system.important
    return isImportant ? this.addLabels(important) : this.removeLabels(important)
  }

  markIsStarred(isStarred = true) {
    const starred = this.context.labels.system.starred
    return isStarred ? this.addLabels(starred) : this.removeLabels(starred)
  }

  archive() {
    return this.removeLabels(this.context.labels.system.inbox)
  }

  async trash(): Promise<Message | MessageError> {
    const res = await this.context.transport.trashMessage(this.id)
    if (res instanceof Error) return res
    return this.refresh()
  }

  async untrash(): Promise<Message | MessageError> {
    const res = await this.context.transport.untrashMessage(this.id)
    if (res instanceof Error) return res
    return this.refresh()
  }

  /** Permanently delete, bypassing trash. */
  async delete(): Promise<void | TransportError> {
    const res = await this.context.transport.deleteMessage(this.id)
    if (res instanceof Error) return res
  }
}
