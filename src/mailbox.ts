// Mailbox: the root object a caller holds. Owns the transport, the label
// accessor and the batching settings, and hands out queries.
//   const mailbox = await Mailbox.connect({ auth })
//   if (mailbox instanceof Error) ...
//   const unread = await mailbox.messages.where(Is.flags.unread).execute()

import type { OAuth2Client } from 'google-auth-library'
import type { NotFoundError, TransportError } from './api-utils.js'
import { systemClock, type Clock, type MailboxContext, type MailboxSettings } from './context.js'
import { LabelAccessor } from './label-accessor.js'
import type { LabelNode } from './label-hierarchy.js'
import { UserLabel, type BaseLabel, type LabelOptions } from './labels.js'
import { Query } from './query.js'
import { GmailTransport, type MailTransport } from './transport.js'

export interface MailboxOptions {
  transport: MailTransport
  /** Messages per batched detail fetch; 0 or null fetches one by one. */
  batchSize?: number | null
  batchDelayMs?: number
  truncateOperands?: boolean
  clock?: Clock
}

export class Mailbox implements MailboxContext {
  readonly transport: MailTransport
  readonly settings: MailboxSettings
  readonly labels: LabelAccessor
  /** Set by connect(); null for a mailbox built directly on a transport. */
  emailAddress: string | null = null

  constructor({ transport, batchSize = 100, batchDelayMs = 1000, truncateOperands = false, clock = systemClock }: MailboxOptions) {
    this.transport = transport
    this.settings = { batchSize, batchDelayMs, truncateOperands, clock }
    this.labels = new LabelAccessor(this)
  }

  /** Build a mailbox on the Gmail API, look up the account address and load the label tree. */
  static async connect({
    auth,
    ...options
  }: Omit<MailboxOptions, 'transport'> & { auth: OAuth2Client }): Promise<Mailbox | TransportError> {
    const transport = new GmailTransport({ auth })
    const profile = await transport.getProfile()
    if (profile instanceof Error) return profile

    const mailbox = new Mailbox({ ...options, transport })
    mailbox.emailAddress = profile.emailAddress

    const refreshed = await mailbox.labels.refresh()
    if (refreshed instanceof Error) return refreshed
    return mailbox
  }

  /** A fresh query over every message. */
  get messages(): Query {
    return this.query()
  }

  query(): Query {
    return new Query(this)
  }

  createLabel(options: LabelOptions & { name: string }): Promise<UserLabel | TransportError | NotFoundError> {
    return UserLabel.create(this, options)
  }

  /** The label entity registered under `name` (system, category or user). */
  async labelFromName(name: string): Promise<BaseLabel | TransportError | NotFoundError> {
    const node = this.labels.getByName(name)
    if (node instanceof Error) return node
    return node.entity()
  }

  refreshLabels(): Promise<LabelNode[] | TransportError> {
    return this.labels.refresh()
  }
}
