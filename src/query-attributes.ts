// Filter predicate algebra that compiles to Gmail search syntax.
// Attributes come in a closed set of kinds (equatable, comparable, flag,
// enumerative). Each kind renders its own predicates. A predicate checks its
// operator against the attribute kind when it is built and throws
// InvalidOperatorError on a mismatch.
//
// Grammar produced (https://support.google.com/mail/answer/7190):
//   field:"value"   -field:"value"   field:value (contains)
//   after:value  before:value  larger:value  smaller:value
//   owner:flag  -owner:flag
//   (left right) for AND, {left right} for OR, leading - for negation

import {
  InvalidOperatorError,
  MalformedExpressionError,
  UnresolvableAttributeError,
} from './api-utils.js'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const Operator = {
  EQUAL: 'equal',
  NOT_EQUAL: 'not_equal',
  GREATER: 'greater',
  LESS: 'less',
  CONTAINS: 'contains',
} as const
export type Operator = (typeof Operator)[keyof typeof Operator]

export type ChainOperator = 'and' | 'or'
export type Direction = 'asc' | 'desc'

/** Message fields that client-side ordering can sort on. */
export type OrderableField = 'from' | 'to' | 'cc' | 'bcc' | 'subject' | 'date' | 'size'

export interface ComparableName {
  name: string
  less: string
  greater: string
}

export interface Ordering {
  field: OrderableField
  direction: Direction
}

export interface CompileOptions {
  /** Keep only the first whitespace-delimited token of equatable operands. Off by default. */
  truncateAtWhitespace?: boolean
}

export type Operand = string | number | boolean | Date

// ---------------------------------------------------------------------------
// Attributes
// ---------------------------------------------------------------------------

abstract class BaseAttribute {
  abstract readonly kind: 'equatable' | 'comparable' | 'flag' | 'enumerative'
  readonly orderBy: OrderableField | null

  constructor(orderBy?: OrderableField) {
    this.orderBy = orderBy ?? null
  }

  abstract get label(): string

  asc(): Ordering {
    return this.ordering('asc')
  }

  desc(): Ordering {
    return this.ordering('desc')
  }

  private ordering(direction: Direction): Ordering {
    if (this.orderBy === null) {
      throw new InvalidOperatorError({ operator: `order ${direction}`, kind: this.kind, attribute: this.label })
    }
    return { field: this.orderBy, direction }
  }
}

export class EquatableAttribute extends BaseAttribute {
  readonly kind = 'equatable'

  constructor(
    readonly name: string,
    orderBy?: OrderableField,
  ) {
    super(orderBy)
  }

  get label(): string {
    return this.name
  }

  eq(value: string): Predicate {
    return new Predicate(this, Operator.EQUAL, value)
  }

  ne(value: string): Predicate {
    return new Predicate(this, Operator.NOT_EQUAL, value)
  }

  contains(value: string): Predicate {
    return new Predicate(this, Operator.CONTAINS, value)
  }
}

export class ComparableAttribute extends BaseAttribute {
  readonly kind = 'comparable'

  constructor(
    readonly name: ComparableName,
    orderBy?: OrderableField,
    readonly coerce: (value: Operand) => string = String,
  ) {
    super(orderBy)
  }

  get label(): string {
    return this.name.name
  }

  gt(value: Operand): Predicate {
    return new Predicate(this, Operator.GREATER, value)
  }

  lt(value: Operand): Predicate {
    return new Predicate(this, Operator.LESS, value)
  }
}

export class FlagAttribute extends BaseAttribute {
  readonly kind = 'flag'
  private ownerRef: EnumerativeAttribute | null = null

  constructor(readonly name: string) {
    super()
  }

  get label(): string {
    return this.name
  }

  /** The enumerative attribute this flag was declared under. */
  get owner(): EnumerativeAttribute {
    if (!this.ownerRef) {
      throw new UnresolvableAttributeError({ kind: this.kind, attribute: this.name })
    }
    return this.ownerRef
  }

  adopt(owner: EnumerativeAttribute): void {
    this.ownerRef = owner
  }

  /** `flag == value`; `eq(false)` is the same predicate as `ne(true)`. */
  eq(value = true): Predicate {
    return new Predicate(this, value ? Operator.EQUAL : Operator.NOT_EQUAL, true)
  }

  ne(value = true): Predicate {
    return new Predicate(this, value ? Operator.NOT_EQUAL : Operator.EQUAL, true)
  }

  /** The implicit form of a bare flag. */
  resolve(): Predicate {
    return this.eq(true)
  }

  not(): Predicate {
    return this.ne(true)
  }

  and(other: Clause): Expression {
    return new Expression(this, 'and', other)
  }

  or(other: Clause): Expression {
    return new Expression(this, 'or', other)
  }
}

/** Owns a family of flags (e.g. `has:attachment`, `has:drive`). Never renders by itself. */
export class EnumerativeAttribute<F extends Record<string, FlagAttribute> = Record<string, FlagAttribute>> extends BaseAttribute {
  readonly kind = 'enumerative'

  constructor(
    readonly name: string,
    readonly flags: F,
  ) {
    super()
    for (const flag of Object.values(flags)) flag.adopt(this)
  }

  get label(): string {
    return this.name
  }
}

export type Attribute = EquatableAttribute | ComparableAttribute | FlagAttribute | EnumerativeAttribute

// ---------------------------------------------------------------------------
// Predicates and expressions
// ---------------------------------------------------------------------------

const SUPPORTED_OPERATORS: Record<Attribute['kind'], readonly Operator[]> = {
  equatable: [Operator.EQUAL, Operator.NOT_EQUAL, Operator.CONTAINS],
  comparable: [Operator.GREATER, Operator.LESS],
  flag: [Operator.EQUAL, Operator.NOT_EQUAL],
  enumerative: [],
}

function invalid(attribute: Attribute, operator: Operator): InvalidOperatorError {
  return new InvalidOperatorError({ operator, kind: attribute.kind, attribute: attribute.label })
}

/** An attribute bound to an operator and operand. Immutable: `not()` returns a copy. */
export class Predicate {
  constructor(
    readonly attribute: Attribute,
    readonly operator: Operator,
    readonly operand: Operand,
    readonly negated = false,
  ) {
    // Untyped callers can still hand us a missing operand or operator.
    if (operand === null || operand === undefined) {
      throw new MalformedExpressionError({ attribute: attribute.label, reason: 'operand is missing' })
    }
    if (operator === null || operator === undefined) {
      throw new MalformedExpressionError({ attribute: attribute.label, reason: 'logical operator is missing' })
    }
    if (!SUPPORTED_OPERATORS[attribute.kind].includes(operator)) throw invalid(attribute, operator)
  }

  not(): Predicate {
    return new Predicate(this.attribute, this.operator, this.operand, !this.negated)
  }

  and(other: Clause): Expression {
    return new Expression(this, 'and', other)
  }

  or(other: Clause): Expression {
    return new Expression(this, 'or', other)
  }

  toString(): string {
    return renderPredicate(this, {})
  }
}

export type Clause = Predicate | Expression | Attribute

const BRACKETS: Record<ChainOperator, [string, string]> = {
  and: ['(', ')'],
  or: ['{', '}'],
}

export class Expression {
  readonly left: Predicate | Expression
  readonly right: Predicate | Expression

  constructor(
    left: Clause,
    readonly operator: ChainOperator,
    right: Clause,
    readonly negated = false,
  ) {
    this.left = resolveClause(left)
    this.right = resolveClause(right)
  }

  not(): Expression {
    return new Expression(this.left, this.operator, this.right, !this.negated)
  }

  and(other: Clause): Expression {
    return new Expression(this, 'and', other)
  }

  or(other: Clause): Expression {
    return new Expression(this, 'or', other)
  }

  toString(): string {
    return renderExpression(this, {})
  }
}

/** Bind an operator to an attribute; throws InvalidOperatorError when the kind doesn't support it. */
export function predicate(attribute: Attribute, operator: Operator, operand: Operand): Predicate {
  return new Predicate(attribute, operator, operand)
}

export function and(left: Clause, right: Clause): Expression {
  return new Expression(left, 'and', right)
}

export function or(left: Clause, right: Clause): Expression {
  return new Expression(left, 'or', right)
}

/** Turn a bare attribute into its implicit predicate.
 *  Only flags have an implicit form; anything else throws. */
export function resolveClause(clause: Clause): Predicate | Expression {
  if (clause instanceof Expression) return clause
  if (clause instanceof Predicate) return clause
  if (clause instanceof FlagAttribute) return clause.resolve()
  throw new UnresolvableAttributeError({ kind: clause.kind, attribute: clause.label })
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function operandText(value: Operand, options: CompileOptions): string {
  const text = value instanceof Date ? value.toISOString() : String(value)
  if (!options.truncateAtWhitespace) return text
  return text.trim().split(/\s+/)[0] ?? ''
}

export function renderPredicate(predicate: Predicate, options: CompileOptions): string {
  const { attribute, operator, negated } = predicate

  switch (attribute.kind) {
    case 'equatable': {
      const value = operandText(predicate.operand, options)
      const minus = negated !== (operator === Operator.NOT_EQUAL) ? '-' : ''
      if (operator === Operator.CONTAINS) return `${minus}${attribute.name}:${value}`
      return `${minus}${attribute.name}:"${value}"`
    }
    case 'comparable': {
      const minus = negated ? '-' : ''
      const keyword = operator === Operator.GREATER ? attribute.name.greater : attribute.name.less
      return `${minus}${keyword}:${attribute.coerce(predicate.operand)}`
    }
    case 'flag': {
      const truth = (operator === Operator.EQUAL) !== negated
      return `${truth ? '' : '-'}${attribute.owner.name}:${attribute.name}`
    }
    case 'enumerative':
      throw invalid(attribute, operator)
  }
}

export function renderExpression(expression: Expression, options: CompileOptions): string {
  const [open, close] = BRACKETS[expression.operator]
  const left = renderSide(expression.left, options)
  const right = renderSide(expression.right, options)
  return `${expression.negated ? '-' : ''}${open}${left} ${right}${close}`
}

function renderSide(side: Predicate | Expression, options: CompileOptions): string {
  return side instanceof Expression ? renderExpression(side, options) : renderPredicate(side, options)
}

/** Compile any clause (bare flag, predicate or expression) to a search string.
 *  Throws UnresolvableAttributeError for a bare non-flag attribute, like Expression does. */
export function compile(clause: Clause, options: CompileOptions = {}): string {
  return renderSide(resolveClause(clause), options)
}
