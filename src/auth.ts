// OAuth2 credentials for mailquery.
// Credentials are obtained elsewhere and stored as JSON in one token file
// (MAILQUERY_TOKEN_FILE, default ~/.mailquery/token.json):
//   { "email": "me@example.com", "tokens": { "refresh_token": "...", ... } }
// The OAuth client id and secret come from MAILQUERY_CLIENT_ID /
// MAILQUERY_CLIENT_SECRET; nothing is built in.

import fs from 'node:fs'
import { OAuth2Client, type Credentials } from 'google-auth-library'
import * as errore from 'errore'
import { z } from 'zod'
import { NotFoundError, ParseError, ValidationError, type TransportError } from './api-utils.js'
import { loadConfig, type Config } from './config.js'
import { Mailbox } from './mailbox.js'

const storedAccountSchema = z.object({
  email: z.string(),
  tokens: z.object({
    access_token: z.string().nullish(),
    refresh_token: z.string().nullish(),
    expiry_date: z.number().nullish(),
    token_type: z.string().nullish(),
    id_token: z.string().nullish(),
    scope: z.string().optional(),
  }),
})

export interface StoredAccount {
  email: string
  tokens: Credentials
}

export type AuthSetupError = ValidationError | NotFoundError | ParseError

// ---------------------------------------------------------------------------
// OAuth2 client factory
// ---------------------------------------------------------------------------

export function createOAuth2Client(config: Config): OAuth2Client | ValidationError {
  if (!config.clientId) {
    return new ValidationError({ field: 'MAILQUERY_CLIENT_ID', reason: 'not set' })
  }
  return new OAuth2Client({
    clientId: config.clientId,
    clientSecret: config.clientSecret ?? undefined,
  })
}

// ---------------------------------------------------------------------------
// Token file
// ---------------------------------------------------------------------------

export function readStoredAccount(tokenFile: string): StoredAccount | NotFoundError | ParseError {
  if (!fs.existsSync(tokenFile)) return new NotFoundError({ resource: `token file ${tokenFile}` })

  const raw = errore.tryFn((): unknown => JSON.parse(fs.readFileSync(tokenFile, 'utf-8')))
  if (raw instanceof Error) return new ParseError({ what: tokenFile, reason: raw.message, cause: raw })

  const parsed = storedAccountSchema.safeParse(raw)
  if (!parsed.success) return new ParseError({ what: tokenFile, reason: parsed.error.message })
  return parsed.data
}

// ---------------------------------------------------------------------------
// Authenticated client
// ---------------------------------------------------------------------------

/**
 * OAuth2Client for the stored account. google-auth-library refreshes an
 * expired access token by itself as long as a refresh_token is present.
 */
export function authenticate(config: Config): { email: string; auth: OAuth2Client } | AuthSetupError {
  const account = readStoredAccount(config.tokenFile)
  if (account instanceof NotFoundError) {
    return new NotFoundError({ resource: `stored credentials (${config.tokenFile})`, cause: account })
  }
  if (account instanceof Error) return account
  if (!account.tokens.refresh_token && !account.tokens.access_token) {
    return new ValidationError({ field: config.tokenFile, reason: 'holds neither an access_token nor a refresh_token' })
  }

  const oauth2Client = createOAuth2Client(config)
  if (oauth2Client instanceof Error) return oauth2Client
  oauth2Client.setCredentials(account.tokens)
  return { email: account.email, auth: oauth2Client }
}

export interface AuthStatus {
  email: string
  expiresAt: Date | null
}

export function getAuthStatus(config: Config): AuthStatus | NotFoundError | ParseError {
  const account = readStoredAccount(config.tokenFile)
  if (account instanceof Error) return account
  const { expiry_date } = account.tokens
  return { email: account.email, expiresAt: expiry_date ? new Date(expiry_date) : null }
}

// ---------------------------------------------------------------------------
// Connected mailbox for commands
// ---------------------------------------------------------------------------

/** Load config, authenticate the stored account and connect a Mailbox with the configured batching. */
export async function getMailbox(): Promise<Mailbox | AuthSetupError | TransportError> {
  const config = loadConfig()
  if (config instanceof Error) return config

  const session = authenticate(config)
  if (session instanceof Error) return session

  return Mailbox.connect({
    auth: session.auth,
    batchSize: config.batchSize,
    batchDelayMs: config.batchDelayMs,
    truncateOperands: config.truncateOperands,
  })
}
