import { describe, expect, test } from 'vitest'
import { ValidationError } from './api-utils.js'
import { compile } from './query-attributes.js'
import { buildClause, parseOrderings, type FilterFlags } from './search-filter.js'

function compiled(flags: FilterFlags) {
  const clause = buildClause(flags)
  if (clause === null || clause instanceof Error) throw new Error('expected a clause')
  return compile(clause)
}

describe('buildClause', () => {
  test('no flags means no clause', () => {
    expect(buildClause({})).toBeNull()
    expect(buildClause({ has: [], is: [] })).toBeNull()
  })

  test('a single flag compiles on its own', () => {
    expect(compiled({ from: 'a@example.com' })).toBe('from:"a@example.com"')
    expect(compiled({ has: ['drive'] })).toBe('has:drive')
  })

  test('flags are and-ed left to right', () => {
    expect(compiled({ from: 'a@example.com', has: ['attachment'], not: ['read'] })).toBe(
      '((from:"a@example.com" has:attachment) -is:read)',
    )
    expect(compiled({ subject: 'invoice', after: '2024-01-05', smaller: '1M' })).toBe(
      '((subject:invoice after:2024-01-05) smaller:1M)',
    )
    expect(compiled({ is: ['unread', 'starred'] })).toBe('(is:unread is:starred)')
  })

  test('a multi-word subject is matched as a phrase', () => {
    expect(compiled({ subject: 'quarterly report', from: 'a@example.com' })).toBe(
      '(from:"a@example.com" subject:"quarterly report")',
    )
  })

  test('multi-word values are rejected when operands are truncated', () => {
    expect(buildClause({ subject: 'quarterly report' }, { truncateOperands: true })).toBeInstanceOf(ValidationError)
    expect(buildClause({ from: 'Alice Example' }, { truncateOperands: true })).toBeInstanceOf(ValidationError)
    const single = buildClause({ subject: 'quarterly' }, { truncateOperands: true })
    if (single === null || single instanceof Error) throw new Error('expected a clause')
    expect(compile(single, { truncateAtWhitespace: true })).toBe('subject:quarterly')
  })

  test('unknown flag names are rejected', () => {
    expect(buildClause({ is: ['sleepy'] })).toBeInstanceOf(ValidationError)
    expect(buildClause({ has: ['unread'] })).toBeInstanceOf(ValidationError)
  })
})

describe('parseOrderings', () => {
  test('direction defaults to ascending', () => {
    expect(parseOrderings('date:desc, subject')).toEqual([
      { field: 'date', direction: 'desc' },
      { field: 'subject', direction: 'asc' },
    ])
  })

  test('an empty string means no ordering', () => {
    expect(parseOrderings('')).toEqual([])
  })

  test('unknown fields and directions are rejected', () => {
    expect(parseOrderings('label')).toBeInstanceOf(ValidationError)
    expect(parseOrderings('constructor')).toBeInstanceOf(ValidationError)
    expect(parseOrderings('date:sideways')).toBeInstanceOf(ValidationError)
  })
})
