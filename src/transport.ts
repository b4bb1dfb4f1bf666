// Mailbox transport: the remote calls the core depends on.
// MailTransport is the seam the label hierarchy, messages and queries talk to;
// GmailTransport implements it on the @googleapis/gmail SDK. Every SDK call
// goes through gmailBoundary, which turns thrown exceptions into AuthError /
// ApiError values, and through withRetry for rate limits. The core above this
// layer never retries.

import { gmail as gmailApi, type gmail_v1 } from '@googleapis/gmail'
import type { OAuth2Client } from 'google-auth-library'
import * as errore from 'errore'
import { withRetry, isAuthLikeError, AuthError, ApiError, type TransportError } from './api-utils.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LabelColor {
  backgroundColor: string
  textColor: string
}

export interface RemoteLabel {
  id: string
  name: string
  type: 'system' | 'user'
  messagesTotal: number
  messagesUnread: number
  threadsTotal: number
  threadsUnread: number
  messageListVisibility: string | null
  labelListVisibility: string | null
  color: LabelColor | null
}

export interface LabelBody {
  name?: string
  labelListVisibility?: string
  messageListVisibility?: string
  color?: Partial<LabelColor>
}

export interface ListMessagesParams {
  q?: string
  labelIds?: string[]
  maxResults?: number
  includeSpamTrash?: boolean
  pageToken?: string
}

export interface MessagePage {
  messages: Array<{ id: string }>
  nextPageToken: string | null
}

/** A message as returned by messages.get with format 'full'. */
export type RemoteMessage = gmail_v1.Schema$Message

export interface LabelChange {
  addLabelIds?: string[]
  removeLabelIds?: string[]
}

/** Called once per id of a batch. Returning an error aborts the rest of the batch
 *  and makes batchGetMessages return that error. */
export type BatchItemCallback = (
  id: string,
  response: RemoteMessage | null,
  error: TransportError | null,
) => void | TransportError

export interface MailTransport {
  getProfile(): Promise<{ emailAddress: string } | TransportError>
  listLabels(): Promise<RemoteLabel[] | TransportError>
  getLabel(id: string): Promise<RemoteLabel | TransportError>
  createLabel(body: LabelBody): Promise<string | TransportError>
  updateLabel(id: string, body: LabelBody): Promise<void | TransportError>
  deleteLabel(id: string): Promise<void | TransportError>
  listMessages(params: ListMessagesParams): Promise<MessagePage | TransportError>
  getMessage(id: string): Promise<RemoteMessage | TransportError>
  batchGetMessages(ids: string[], onItem: BatchItemCallback): Promise<void | TransportError>
  modifyMessage(id: string, change: LabelChange): Promise<void | TransportError>
  trashMessage(id: string): Promise<void | TransportError>
  untrashMessage(id: string): Promise<void | TransportError>
  deleteMessage(id: string): Promise<void | TransportError>
  batchDeleteMessages(ids: string[]): Promise<void | TransportError>
  batchModifyMessages(ids: string[], change: LabelChange): Promise<void | TransportError>
}

/** Gmail's ceiling for messages.list maxResults. */
export const MAX_PAGE_SIZE = 500

/** Gmail's ceiling for ids per batchModify / batchDelete request. */
const MAX_BATCH_IDS = 1000

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parseRawLabel(label: gmail_v1.Schema$Label, fallbackId = ''): RemoteLabel {
  return {
    id: label.id ?? fallbackId,
    name: label.name ?? '',
    type: label.type === 'system' ? 'system' : 'user',
    messagesTotal: label.messagesTotal ?? 0,
    messagesUnread: label.messagesUnread ?? 0,
    threadsTotal: label.threadsTotal ?? 0,
    threadsUnread: label.threadsUnread ?? 0,
    messageListVisibility: label.messageListVisibility ?? null,
    labelListVisibility: label.labelListVisibility ?? null,
    color: label.color
      ? {
          backgroundColor: label.color.backgroundColor ?? '',
          textColor: label.color.textColor ?? '',
        }
      : null,
  }
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

// ---------------------------------------------------------------------------
// GmailTransport
// ---------------------------------------------------------------------------

export class GmailTransport implements MailTransport {
  private gmail: gmail_v1.Gmail
  private email: string

  constructor({ auth, email }: { auth: OAuth2Client; email?: string }) {
    this.gmail = gmailApi({ version: 'v1', auth })
    this.email = email ?? 'unknown'
  }

  /** Wrap an SDK call: auth-like failures become AuthError, everything else ApiError.
   *  The original exception is kept as `cause`. */
  private boundary<T>(fn: () => Promise<T>) {
    return errore.tryAsync({
      try: () => withRetry(fn),
      catch: (err) => isAuthLikeError(err)
        ? new AuthError({ email: this.email, reason: String(err) })
        : new ApiError({ reason: String(err), cause: err }),
    })
  }

  async getProfile(): Promise<{ emailAddress: string } | TransportError> {
    const res = await this.boundary(() => this.gmail.users.getProfile({ userId: 'me' }))
    if (res instanceof Error) return res
    const emailAddress = res.data.emailAddress ?? this.email
    this.email = emailAddress
    return { emailAddress }
  }

  // =========================================================================
  // Labels
  // =========================================================================

  async listLabels(): Promise<RemoteLabel[] | TransportError> {
    const res = await this.boundary(() => this.gmail.users.labels.list({ userId: 'me' }))
    if (res instanceof Error) return res
    return (res.data.labels ?? []).map((label) => parseRawLabel(label))
  }

  async getLabel(id: string): Promise<RemoteLabel | TransportError> {
    const res = await this.boundary(() => this.gmail.users.labels.get({ userId: 'me', id }))
    if (res instanceof Error) return res
    return parseRawLabel(res.data, id)
  }

  async createLabel(body: LabelBody): Promise<string | TransportError> {
    const res = await this.boundary(() =>
      this.gmail.users.labels.create({ userId: 'me', requestBody: body }),
    )
    if (res instanceof Error) return res
    if (!res.data.id) return new ApiError({ reason: `labels.create returned no id for "${body.name ?? ''}"` })
    return res.data.id
  }

  async updateLabel(id: string, body: LabelBody): Promise<void | TransportError> {
    const res = await this.boundary(() =>
      this.gmail.users.labels.update({ userId: 'me', id, requestBody: { ...body, id } }),
    )
    if (res instanceof Error) return res
  }

  async deleteLabel(id: string): Promise<void | TransportError> {
    const res = await this.boundary(() => this.gmail.users.labels.delete({ userId: 'me', id }))
    if (res instanceof Error) return res
  }

  // =========================================================================
  // Messages
  // =========================================================================

  async listMessages({ q, labelIds, maxResults, includeSpamTrash, pageToken }: ListMessagesParams): Promise<MessagePage | TransportError> {
    const res = await this.boundary(() =>
      this.gmail.users.messages.list({
        userId: 'me',
        q: q || undefined,
        labelIds: labelIds && labelIds.length > 0 ? labelIds : undefined,
        maxResults,
        includeSpamTrash: includeSpamTrash || undefined,
        pageToken: pageToken || undefined,
      }),
    )
    if (res instanceof Error) return res

    const messages = (res.data.messages ?? []).flatMap((m) => (m.id ? [{ id: m.id }] : []))
    return { messages, nextPageToken: res.data.nextPageToken ?? null }
  }

  async getMessage(id: string): Promise<RemoteMessage | TransportError> {
    const res = await this.boundary(() =>
      this.gmail.users.messages.get({ userId: 'me', id, format: 'full' }),
    )
    if (res instanceof Error) return res
    return res.data
  }

  /** The Node SDK has no multipart batch endpoint, so items are fetched one
   *  after another and handed to the callback in order. */
  async batchGetMessages(ids: string[], onItem: BatchItemCallback): Promise<void | TransportError> {
    for (const id of ids) {
      const res = await this.getMessage(id)
      const verdict = res instanceof Error ? onItem(id, null, res) : onItem(id, res, null)
      if (verdict instanceof Error) return verdict
    }
  }

  async modifyMessage(id: string, change: LabelChange): Promise<void | TransportError> {
    const res = await this.boundary(() =>
      this.gmail.users.messages.modify({ userId: 'me', id, requestBody: change }),
    )
    if (res instanceof Error) return res
  }

  async trashMessage(id: string): Promise<void | TransportError> {
    const res = await this.boundary(() => this.gmail.users.messages.trash({ userId: 'me', id }))
    if (res instanceof Error) return res
  }

  async untrashMessage(id: string): Promise<void | TransportError> {
    const res = await this.boundary(() => this.gmail.users.messages.untrash({ userId: 'me', id }))
    if (res instanceof Error) return res
  }

  async deleteMessage(id: string): Promise<void | TransportError> {
    const res = await this.boundary(() => this.gmail.users.messages.delete({ userId: 'me', id }))
    if (res instanceof Error) return res
  }

  async batchDeleteMessages(ids: string[]): Promise<void | TransportError> {
    for (const part of chunk(ids, MAX_BATCH_IDS)) {
      const res = await this.boundary(() =>
        this.gmail.users.messages.batchDelete({ userId: 'me', requestBody: { ids: part } }),
      )
      if (res instanceof Error) return res
    }
  }

  async batchModifyMessages(ids: string[], change: LabelChange): Promise<void | TransportError> {
    for (const part of chunk(ids, MAX_BATCH_IDS)) {
      const res = await this.boundary(() =>
        this.gmail.users.messages.batchModify({ userId: 'me', requestBody: { ids: part, ...change } }),
      )
      if (res instanceof Error) return res
    }
  }
}
