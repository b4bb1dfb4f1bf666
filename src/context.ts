// What labels, messages and queries need from the Mailbox that owns them.
// Kept as an interface so those modules don't import mailbox.ts.

import type { MailTransport } from './transport.js'
import type { LabelAccessor } from './label-accessor.js'
import type { Query } from './query.js'

export interface Clock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
}

export interface MailboxSettings {
  /** Messages per batched detail fetch; 0 or null fetches one by one. Also the default query limit. */
  batchSize: number | null
  /** Minimum time between the starts of two consecutive batches. */
  batchDelayMs: number
  /** Compatibility mode: equatable operands are cut at the first whitespace. */
  truncateOperands: boolean
  clock: Clock
}

export interface MailboxContext {
  readonly transport: MailTransport
  readonly labels: LabelAccessor
  readonly settings: MailboxSettings
  query(): Query
}
