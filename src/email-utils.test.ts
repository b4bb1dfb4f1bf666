import { describe, expect, test } from 'vitest'
import { formatContact, parseAddressList, parseFrom } from './email-utils.js'

describe('parseFrom', () => {
  test('name and address', () => {
    expect(parseFrom('Alice Example <alice@example.com>')).toEqual({ name: 'Alice Example', email: 'alice@example.com' })
  })

  test('bare address', () => {
    expect(parseFrom('alice@example.com')).toEqual({ email: 'alice@example.com' })
  })

  test('empty or unparseable headers', () => {
    expect(parseFrom('')).toBeNull()
    expect(parseFrom('   ')).toBeNull()
    expect(parseFrom('not an address')).toBeNull()
  })
})

describe('parseAddressList', () => {
  test('mixed entries', () => {
    expect(parseAddressList('a@example.com, Bob Example <bob@example.com>')).toEqual([
      { email: 'a@example.com' },
      { name: 'Bob Example', email: 'bob@example.com' },
    ])
  })

  test('groups are flattened', () => {
    expect(parseAddressList('Team: a@example.com, b@example.com;')).toEqual([
      { email: 'a@example.com' },
      { email: 'b@example.com' },
    ])
  })

  test('empty header', () => {
    expect(parseAddressList('')).toEqual([])
  })
})

describe('formatContact', () => {
  test('includes a distinct display name', () => {
    expect(formatContact({ name: 'Alice', email: 'alice@example.com' })).toBe('Alice <alice@example.com>')
    expect(formatContact({ email: 'alice@example.com' })).toBe('alice@example.com')
    expect(formatContact({ name: 'alice@example.com', email: 'alice@example.com' })).toBe('alice@example.com')
  })
})
