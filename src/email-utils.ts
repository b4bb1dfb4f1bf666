// Email address parsing utilities.
// Wraps the `email-addresses` package (RFC 5322 parser) with simpler return types.

import { parseFrom as _parseFrom, parseAddressList as _parseAddressList } from 'email-addresses'

export interface Contact {
  name?: string
  email: string
}

/**
 * Parse an RFC 5322 "From" header into a contact.
 * Group addresses yield their first member. Returns null for an empty or
 * unparseable header.
 */
export function parseFrom(fromHeader: string): Contact | null {
  if (!fromHeader.trim()) return null
  const parsed = _parseFrom(fromHeader)
  const first = parsed?.[0]
  if (!first) return null

  if (first.type === 'group') {
    const member = first.addresses?.[0]
    if (!member) return null
    return member.name ? { name: member.name, email: member.address } : { email: member.address }
  }

  return first.name ? { name: first.name, email: first.address } : { email: first.address }
}

/**
 * Parse an address list header (To, Cc, Bcc) into contacts, flattening groups.
 * Returns an empty array when the header cannot be parsed.
 */
export function parseAddressList(header: string): Contact[] {
  if (!header.trim()) return []
  const parsed = _parseAddressList(header)
  if (!parsed) return []

  return parsed.flatMap((address) => {
    const members = address.type === 'group' ? address.addresses ?? [] : [address]
    return members.map((m) => (m.name ? { name: m.name, email: m.address } : { email: m.address }))
  })
}

/** `Name <email>` when there is a distinct display name, otherwise just the email. */
export function formatContact(contact: Contact): string {
  if (contact.name && contact.name !== contact.email) {
    return `${contact.name} <${contact.email}>`
  }
  return contact.email
}
