// Shared error types and retry helper for mailquery.
// Transport failures, lookup misses and query-building mistakes are all
// errore tagged errors. Anything that talks to the transport returns them as
// values; the fluent expression builders throw them, since a chain like
// `a.and(b).or(c)` has nowhere to put an error value.
// See https://errore.org/ for the errors-as-values pattern.

import * as errore from 'errore'

// ---------------------------------------------------------------------------
// Transport errors
// ---------------------------------------------------------------------------

/** Returned when authentication fails (expired token, revoked access, etc.). */
export class AuthError extends errore.createTaggedError({
  name: 'AuthError',
  message: 'Authentication failed for $email: $reason',
}) {}

/** Returned when a non-auth API call fails. The original error is kept as `cause`. */
export class ApiError extends errore.createTaggedError({
  name: 'ApiError',
  message: 'API call failed: $reason',
}) {}

export type TransportError = AuthError | ApiError

// ---------------------------------------------------------------------------
// Lookup and data errors
// ---------------------------------------------------------------------------

/** Returned when a label, message or registry entry doesn't exist. */
export class NotFoundError extends errore.createTaggedError({
  name: 'NotFoundError',
  message: '$resource not found',
}) {}

/** Returned when a remote resource cannot be turned into a local object. */
export class ParseError extends errore.createTaggedError({
  name: 'ParseError',
  message: 'Failed to parse $what: $reason',
}) {}

/** Returned when caller input fails validation. */
export class ValidationError extends errore.createTaggedError({
  name: 'ValidationError',
  message: 'Invalid $field: $reason',
}) {}

/** Returned when a membership test receives something it cannot test. */
export class TypeMismatchError extends errore.createTaggedError({
  name: 'TypeMismatchError',
  message: 'Cannot test $actual for membership in $container, expected one of: $expected',
}) {}

// ---------------------------------------------------------------------------
// Query building errors
// ---------------------------------------------------------------------------

/** An operator that the attribute kind cannot render (e.g. `gt` on an equatable). */
export class InvalidOperatorError extends errore.createTaggedError({
  name: 'InvalidOperatorError',
  message: "Invalid operator '$operator' for $kind attribute '$attribute'",
}) {}

/** A bare attribute used in an expression that has no implicit boolean form. */
export class UnresolvableAttributeError extends errore.createTaggedError({
  name: 'UnresolvableAttributeError',
  message: "Cannot resolve $kind attribute '$attribute' without using it as part of a boolean expression",
}) {}

/** An expression side is missing its operand or operator. */
export class MalformedExpressionError extends errore.createTaggedError({
  name: 'MalformedExpressionError',
  message: "Cannot filter '$attribute': $reason",
}) {}

export type QueryBuildError = InvalidOperatorError | UnresolvableAttributeError | MalformedExpressionError

// ---------------------------------------------------------------------------
// Retry (transport only; the core never retries)
// ---------------------------------------------------------------------------

interface ErrorDetail {
  reason?: string
}

interface GoogleLikeError {
  code?: number
  status?: number
  errors?: ErrorDetail[]
  response?: { status?: number; data?: { error?: { errors?: ErrorDetail[] } } }
}

function asGoogleError(err: unknown): GoogleLikeError {
  return typeof err === 'object' && err !== null ? err : {}
}

function statusOf(err: unknown): number | undefined {
  const e = asGoogleError(err)
  return e.code ?? e.status ?? e.response?.status
}

const RATE_LIMIT_REASONS = new Set([
  'userRateLimitExceeded',
  'rateLimitExceeded',
  'quotaExceeded',
  'dailyLimitExceeded',
  'limitExceeded',
  'backendError',
])

/** 429, or a 403 whose reason is one of the quota reasons. */
export function isRateLimitError(err: unknown): boolean {
  const status = statusOf(err)
  if (status === 429) return true
  if (status === 403) {
    const e = asGoogleError(err)
    const errors = e.errors ?? e.response?.data?.error?.errors ?? []
    return errors.some((d) => d.reason !== undefined && RATE_LIMIT_REASONS.has(d.reason))
  }
  return false
}

/** Detect auth-like errors from googleapis so the boundary can return AuthError.
 *  String matching is intentional: this is where untyped library exceptions
 *  become typed values. */
export function isAuthLikeError(err: unknown): boolean {
  const status = statusOf(err)
  if (status === 401) return true
  if (status === 403 && !isRateLimitError(err)) return true
  const msg = String(err)
  return msg.includes('Invalid credentials') || msg.includes('Unauthorized') || msg.includes('invalid_grant')
}

/** Retry rate limit errors with exponential backoff. Other errors are rethrown immediately. */
export async function withRetry<T>(fn: () => Promise<T>, maxAttempts = 5, delayMs = 2000): Promise<T> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (err) {
      if (!isRateLimitError(err) || attempt === maxAttempts) throw err
      const wait = delayMs * Math.pow(2, attempt - 1)
      await new Promise((r) => setTimeout(r, wait))
    }
  }
  throw new Error('unreachable')
}
