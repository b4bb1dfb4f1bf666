// Turns CLI filter flags into an attribute-algebra clause and orderings.
//   --from a@example.com --has attachment --is unread --after 2024-01-01
// All given flags are AND-ed, left to right in the order below.

import { ValidationError } from './api-utils.js'
import { MessageAttribute } from './attributes.js'
import { and, type Clause, type FlagAttribute, type Direction, type OrderableField, type Ordering } from './query-attributes.js'

export interface FilterFlags {
  from?: string
  to?: string
  cc?: string
  subject?: string
  filename?: string
  label?: string
  after?: string
  before?: string
  larger?: string
  smaller?: string
  has?: string[]
  is?: string[]
  not?: string[]
}

const ORDERABLE: Record<string, OrderableField> = {
  from: 'from',
  to: 'to',
  cc: 'cc',
  bcc: 'bcc',
  subject: 'subject',
  date: 'date',
  size: 'size',
}

function flagsOf(family: 'Has' | 'Is'): FlagAttribute[] {
  const flags: Record<string, FlagAttribute> = MessageAttribute[family].flags
  return Object.values(flags)
}

export interface ClauseOptions {
  /** Operands will be cut at the first whitespace when compiled; multi-word values are rejected. */
  truncateOperands?: boolean
}

const TEXT_FLAGS = ['from', 'to', 'cc', 'subject', 'filename', 'label'] as const

/** Build the combined clause, or null when no flag was given.
 *  A multi-word subject is matched as a quoted phrase. */
export function buildClause(flags: FilterFlags, options: ClauseOptions = {}): Clause | null | ValidationError {
  const { From, To, Cc, Subject, FileName, Label, Date, Size } = MessageAttribute
  const parts: Clause[] = []

  if (options.truncateOperands) {
    for (const name of TEXT_FLAGS) {
      const value = flags[name]
      if (value && /\s/.test(value.trim())) {
        return new ValidationError({ field: `--${name} "${value}"`, reason: 'operand truncation is on, so only single words can be matched' })
      }
    }
  }

  if (flags.from) parts.push(From.eq(flags.from))
  if (flags.to) parts.push(To.eq(flags.to))
  if (flags.cc) parts.push(Cc.eq(flags.cc))
  if (flags.subject) {
    const subject = flags.subject.trim()
    parts.push(/\s/.test(subject) ? Subject.eq(subject) : Subject.contains(subject))
  }
  if (flags.filename) parts.push(FileName.eq(flags.filename))
  if (flags.label) parts.push(Label.eq(flags.label))
  if (flags.after) parts.push(Date.gt(flags.after))
  if (flags.before) parts.push(Date.lt(flags.before))
  if (flags.larger) parts.push(Size.gt(flags.larger))
  if (flags.smaller) parts.push(Size.lt(flags.smaller))

  for (const [family, names, negate] of [
    ['Has', flags.has ?? [], false],
    ['Is', flags.is ?? [], false],
    ['Is', flags.not ?? [], true],
  ] as const) {
    for (const name of names) {
      const flag = flagsOf(family).find((f) => f.name === name)
      if (!flag) {
        const known = flagsOf(family).map((f) => f.name).join(', ')
        return new ValidationError({ field: `${family.toLowerCase()} flag "${name}"`, reason: `expected one of ${known}` })
      }
      parts.push(negate ? flag.not() : flag)
    }
  }

  const [first, ...rest] = parts
  if (!first) return null
  return rest.reduce<Clause>((acc, part) => and(acc, part), first)
}

/** Parse `date:desc,subject` into orderings; the direction defaults to asc. */
export function parseOrderings(text: string): Ordering[] | ValidationError {
  const orderings: Ordering[] = []
  for (const item of text.split(',').map((s) => s.trim()).filter(Boolean)) {
    const [name = '', dir = 'asc'] = item.split(':')
    const field = Object.hasOwn(ORDERABLE, name) ? ORDERABLE[name] : undefined
    if (!field) {
      return new ValidationError({ field: `order field "${name}"`, reason: `expected one of ${Object.keys(ORDERABLE).join(', ')}` })
    }
    if (dir !== 'asc' && dir !== 'desc') {
      return new ValidationError({ field: `order direction "${dir}"`, reason: 'expected asc or desc' })
    }
    const direction: Direction = dir
    orderings.push({ field, direction })
  }
  return orderings
}
