// In-process MailTransport for tests. Keeps labels and messages in maps,
// records every call, and can be told to fail a method once.

import { ApiError, type TransportError } from './api-utils.js'
import type { Clock } from './context.js'
import { Mailbox, type MailboxOptions } from './mailbox.js'
import type {
  BatchItemCallback,
  LabelBody,
  LabelChange,
  ListMessagesParams,
  MailTransport,
  MessagePage,
  RemoteLabel,
  RemoteMessage,
} from './transport.js'

export interface Call {
  method: keyof MailTransport
  args: unknown[]
}

function remoteLabel(id: string, name: string, type: 'system' | 'user'): RemoteLabel {
  return {
    id,
    name,
    type,
    messagesTotal: 0,
    messagesUnread: 0,
    threadsTotal: 0,
    threadsUnread: 0,
    messageListVisibility: null,
    labelListVisibility: null,
    color: null,
  }
}

const SYSTEM_IDS = [
  'INBOX', 'SENT', 'UNREAD', 'IMPORTANT', 'STARRED', 'DRAFT', 'CHAT', 'TRASH', 'SPAM',
  'CATEGORY_PERSONAL', 'CATEGORY_SOCIAL', 'CATEGORY_PROMOTIONS', 'CATEGORY_UPDATES', 'CATEGORY_FORUMS',
]

export class FakeTransport implements MailTransport {
  labels = new Map<string, RemoteLabel>()
  messages = new Map<string, RemoteMessage>()
  calls: Call[] = []
  /** Upper bound on ids per listMessages page, on top of maxResults. */
  pageSize = 50
  private failures = new Map<keyof MailTransport, TransportError>()
  private nextLabelId = 1

  constructor() {
    for (const id of SYSTEM_IDS) this.labels.set(id, remoteLabel(id, id, 'system'))
  }

  /** Make the next call to `method` return `error`. */
  failNext(method: keyof MailTransport, error: TransportError = new ApiError({ reason: `${method} failed` })): void {
    this.failures.set(method, error)
  }

  callsTo(method: keyof MailTransport): Call[] {
    return this.calls.filter((c) => c.method === method)
  }

  /** Add a user label directly, bypassing the call log. */
  seedLabel(name: string, id = `Label_${this.nextLabelId++}`): string {
    this.labels.set(id, remoteLabel(id, name, 'user'))
    return id
  }

  seedMessage(message: RemoteMessage): void {
    if (message.id) this.messages.set(message.id, message)
  }

  private record(method: keyof MailTransport, ...args: unknown[]): TransportError | null {
    this.calls.push({ method, args })
    const failure = this.failures.get(method)
    if (!failure) return null
    this.failures.delete(method)
    return failure
  }

  // =========================================================================
  // MailTransport
  // =========================================================================

  async getProfile() {
    const failed = this.record('getProfile')
    if (failed) return failed
    return { emailAddress: 'me@example.com' }
  }

  async listLabels() {
    const failed = this.record('listLabels')
    if (failed) return failed
    return [...this.labels.values()].map((l) => ({ ...l }))
  }

  async getLabel(id: string) {
    const failed = this.record('getLabel', id)
    if (failed) return failed
    const label = this.labels.get(id)
    if (!label) return new ApiError({ reason: `label ${id} not found` })
    return { ...label }
  }

  async createLabel(body: LabelBody) {
    const failed = this.record('createLabel', body)
    if (failed) return failed
    const name = body.name ?? ''
    if ([...this.labels.values()].some((l) => l.name === name)) {
      return new ApiError({ reason: `label name exists: ${name}` })
    }
    const id = this.seedLabel(name)
    const label = this.labels.get(id)
    if (label) {
      label.labelListVisibility = body.labelListVisibility ?? null
      label.messageListVisibility = body.messageListVisibility ?? null
    }
    return id
  }

  async updateLabel(id: string, body: LabelBody): Promise<void | TransportError> {
    const failed = this.record('updateLabel', id, body)
    if (failed) return failed
    const label = this.labels.get(id)
    if (!label) return new ApiError({ reason: `label ${id} not found` })
    if (body.name !== undefined) {
      const oldPrefix = `${label.name}/`
      for (const other of this.labels.values()) {
        if (other.name.startsWith(oldPrefix)) other.name = `${body.name}/${other.name.slice(oldPrefix.length)}`
      }
      label.name = body.name
    }
    if (body.labelListVisibility) label.labelListVisibility = body.labelListVisibility
    if (body.messageListVisibility) label.messageListVisibility = body.messageListVisibility
  }

  async deleteLabel(id: string): Promise<void | TransportError> {
    const failed = this.record('deleteLabel', id)
    if (failed) return failed
    if (!this.labels.delete(id)) return new ApiError({ reason: `label ${id} not found` })
  }

  async listMessages(params: ListMessagesParams): Promise<MessagePage | TransportError> {
    const failed = this.record('listMessages', params)
    if (failed) return failed

    const matching = [...this.messages.values()].filter((m) => {
      const labels = m.labelIds ?? []
      if (!params.includeSpamTrash && (labels.includes('TRASH') || labels.includes('SPAM'))) return false
      return (params.labelIds ?? []).every((id) => labels.includes(id))
    })

    const offset = params.pageToken ? Number(params.pageToken) : 0
    const size = Math.min(params.maxResults ?? this.pageSize, this.pageSize)
    const page = matching.slice(offset, offset + size)
    const end = offset + page.length
    return {
      messages: page.flatMap((m) => (m.id ? [{ id: m.id }] : [])),
      nextPageToken: end < matching.length ? String(end) : null,
    }
  }

  async getMessage(id: string) {
    const failed = this.record('getMessage', id)
    if (failed) return failed
    const message = this.messages.get(id)
    if (!message) return new ApiError({ reason: `message ${id} not found` })
    return { ...message, labelIds: [...(message.labelIds ?? [])] }
  }

  async batchGetMessages(ids: string[], onItem: BatchItemCallback): Promise<void | TransportError> {
    const failed = this.record('batchGetMessages', ids)
    if (failed) return failed
    for (const id of ids) {
      const message = this.messages.get(id)
      const verdict = message
        ? onItem(id, { ...message, labelIds: [...(message.labelIds ?? [])] }, null)
        : onItem(id, null, new ApiError({ reason: `message ${id} not found` }))
      if (verdict instanceof Error) return verdict
    }
  }

  private applyChange(id: string, change: LabelChange): void {
    const message = this.messages.get(id)
    if (!message) return
    const labels = new Set(message.labelIds ?? [])
    for (const add of change.addLabelIds ?? []) labels.add(add)
    for (const remove of change.removeLabelIds ?? []) labels.delete(remove)
    message.labelIds = [...labels]
  }

  async modifyMessage(id: string, change: LabelChange): Promise<void | TransportError> {
    const failed = this.record('modifyMessage', id, change)
    if (failed) return failed
    if (!this.messages.has(id)) return new ApiError({ reason: `message ${id} not found` })
    this.applyChange(id, change)
  }

  async trashMessage(id: string): Promise<void | TransportError> {
    const failed = this.record('trashMessage', id)
    if (failed) return failed
    this.applyChange(id, { addLabelIds: ['TRASH'], removeLabelIds: ['INBOX'] })
  }

  async untrashMessage(id: string): Promise<void | TransportError> {
    const failed = this.record('untrashMessage', id)
    if (failed) return failed
    this.applyChange(id, { removeLabelIds: ['TRASH'] })
  }

  async deleteMessage(id: string): Promise<void | TransportError> {
    const failed = this.record('deleteMessage', id)
    if (failed) return failed
    this.messages.delete(id)
  }

  async batchDeleteMessages(ids: string[]): Promise<void | TransportError> {
    const failed = this.record('batchDeleteMessages', ids)
    if (failed) return failed
    for (const id of ids) this.messages.delete(id)
  }

  async batchModifyMessages(ids: string[], change: LabelChange): Promise<void | TransportError> {
    const failed = this.record('batchModifyMessages', ids, change)
    if (failed) return failed
    for (const id of ids) this.applyChange(id, change)
  }
}

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function base64Url(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '')
}

export interface MessageFixture {
  id: string
  from?: string
  to?: string
  cc?: string
  subject?: string
  /** Milliseconds since epoch. */
  date?: number
  size?: number
  labelIds?: string[]
  text?: string
  html?: string
  attachment?: { filename: string; attachmentId: string; size: number; mimeType: string }
}

/** A messages.get (format: full) resource built from plain fields. */
export function makeMessage(fixture: MessageFixture): RemoteMessage {
  const headers = [
    ...(fixture.from ? [{ name: 'From', value: fixture.from }] : []),
    ...(fixture.to ? [{ name: 'To', value: fixture.to }] : []),
    ...(fixture.cc ? [{ name: 'Cc', value: fixture.cc }] : []),
    { name: 'Subject', value: fixture.subject ?? '' },
  ]
  const parts = [
    ...(fixture.text !== undefined ? [{ mimeType: 'text/plain', body: { data: base64Url(fixture.text) } }] : []),
    ...(fixture.html !== undefined ? [{ mimeType: 'text/html', body: { data: base64Url(fixture.html) } }] : []),
    ...(fixture.attachment
      ? [{
          mimeType: fixture.attachment.mimeType,
          filename: fixture.attachment.filename,
          body: { attachmentId: fixture.attachment.attachmentId, size: fixture.attachment.size },
        }]
      : []),
  ]
  return {
    id: fixture.id,
    threadId: `t-${fixture.id}`,
    labelIds: fixture.labelIds ?? ['INBOX'],
    sizeEstimate: fixture.size ?? 1000,
    internalDate: String(fixture.date ?? 0),
    payload: { mimeType: 'multipart/mixed', headers, parts },
  }
}

/** Clock whose sleep() advances time instantly and records each duration. */
export class FakeClock implements Clock {
  time = 0
  sleeps: number[] = []
  /** Added to the time on every now() call, to simulate work between reads. */
  tick = 0

  now(): number {
    const current = this.time
    this.time += this.tick
    return current
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms)
    this.time += ms
  }
}

export function fakeMailbox(options: Partial<Omit<MailboxOptions, 'transport'>> = {}) {
  const transport = new FakeTransport()
  const clock = new FakeClock()
  const mailbox = new Mailbox({ transport, clock, ...options })
  return { mailbox, transport, clock }
}

/** Narrow away the error branch of a result, failing the test with the error itself. */
export function assertOk<T>(value: T): asserts value is Exclude<T, Error> {
  if (value instanceof Error) throw value
}
