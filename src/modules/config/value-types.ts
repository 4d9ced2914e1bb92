/**
 * Tagged value model for configuration entries.
 *
 * A `Value` is what the codec produces from raw text; a `ValueType` is the
 * descriptor-side expectation it is decoded against. Values are frozen on
 * construction: replacing a setting means building a new Value.
 */

import { MalformedValueError } from '../../core/errors.js'

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

export interface BooleanValue {
  readonly tag: 'boolean'
  readonly value: boolean
}

export interface IntegerValue {
  readonly tag: 'integer'
  readonly value: number
}

export interface FloatValue {
  readonly tag: 'float'
  readonly value: number
}

export interface StringValue {
  readonly tag: 'string'
  readonly value: string
}

/** Explicit absence ("None"), distinct from a key that was never set */
export interface NullValue {
  readonly tag: 'null'
}

export interface ListValue {
  readonly tag: 'list'
  readonly items: readonly Value[]
}

export interface TupleValue {
  readonly tag: 'tuple'
  readonly items: readonly Value[]
}

/** Proxy/relay endpoint: a host plus the candidate ports to try in order */
export interface AddressValue {
  readonly tag: 'address'
  readonly host: string
  readonly ports: readonly number[]
}

export type Value =
  | BooleanValue
  | IntegerValue
  | FloatValue
  | StringValue
  | NullValue
  | ListValue
  | TupleValue
  | AddressValue

export type ValueTag = Value['tag']

// ---------------------------------------------------------------------------
// Value types (descriptor side)
// ---------------------------------------------------------------------------

export type ValueType =
  | { readonly kind: 'boolean' }
  | { readonly kind: 'integer' }
  | { readonly kind: 'float' }
  | { readonly kind: 'string' }
  | { readonly kind: 'address' }
  | { readonly kind: 'nullable'; readonly inner: ValueType }
  | { readonly kind: 'list'; readonly element: ValueType }
  | { readonly kind: 'tuple'; readonly elements: readonly ValueType[] }

/** Builders for value types used by schema definitions */
export const t = {
  boolean: (): ValueType => ({ kind: 'boolean' }),
  integer: (): ValueType => ({ kind: 'integer' }),
  float: (): ValueType => ({ kind: 'float' }),
  string: (): ValueType => ({ kind: 'string' }),
  address: (): ValueType => ({ kind: 'address' }),
  nullable: (inner: ValueType): ValueType => ({ kind: 'nullable', inner }),
  list: (element: ValueType): ValueType => ({ kind: 'list', element }),
  tuple: (...elements: ValueType[]): ValueType => ({ kind: 'tuple', elements }),
}

/** Human-readable form of a value type, e.g. `list<integer>` */
export function describeType(type: ValueType): string {
  switch (type.kind) {
    case 'nullable':
      return `nullable<${describeType(type.inner)}>`
    case 'list':
      return `list<${describeType(type.element)}>`
    case 'tuple':
      return `tuple<${type.elements.map(describeType).join(', ')}>`
    default:
      return type.kind
  }
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export const v = {
  boolean: (value: boolean): Value => Object.freeze({ tag: 'boolean', value }),
  integer: (value: number): Value => {
    if (!Number.isSafeInteger(value)) {
      throw new MalformedValueError(`Expected an integer, got ${String(value)}`, String(value))
    }
    return Object.freeze({ tag: 'integer', value })
  },
  float: (value: number): Value => {
    if (!Number.isFinite(value)) {
      throw new MalformedValueError(`Expected a finite float, got ${String(value)}`, String(value))
    }
    return Object.freeze({ tag: 'float', value })
  },
  string: (value: string): Value => Object.freeze({ tag: 'string', value }),
  null: (): Value => Object.freeze({ tag: 'null' }),
  list: (items: readonly Value[]): Value => Object.freeze({ tag: 'list', items: Object.freeze([...items]) }),
  tuple: (items: readonly Value[]): Value => Object.freeze({ tag: 'tuple', items: Object.freeze([...items]) }),
  address: (host: string, ports: readonly number[]): Value =>
    Object.freeze({ tag: 'address', host, ports: Object.freeze([...ports]) }),
}

// ---------------------------------------------------------------------------
// Conformance
// ---------------------------------------------------------------------------

/** Whether `value` has exactly the shape `type` describes */
export function conformsTo(value: Value, type: ValueType): boolean {
  switch (type.kind) {
    case 'nullable':
      return value.tag === 'null' || conformsTo(value, type.inner)
    case 'list':
      return value.tag === 'list' && value.items.every((item) => conformsTo(item, type.element))
    case 'tuple':
      return (
        value.tag === 'tuple' &&
        value.items.length === type.elements.length &&
        value.items.every((item, i) => {
          const expected = type.elements[i]
          return expected !== undefined && conformsTo(item, expected)
        })
      )
    default:
      return value.tag === type.kind
  }
}

// ---------------------------------------------------------------------------
// Plain JS conversion (the typed accessor surface)
// ---------------------------------------------------------------------------

export interface PlainAddress {
  readonly host: string
  readonly ports: readonly number[]
}

export type PlainValue = boolean | number | string | null | PlainAddress | readonly PlainValue[]

/** Convert a tagged value to the plain JS form subsystems consume */
export function toPlain(value: Value): PlainValue {
  switch (value.tag) {
    case 'null':
      return null
    case 'list':
    case 'tuple':
      return value.items.map(toPlain)
    case 'address':
      return { host: value.host, ports: [...value.ports] }
    default:
      return value.value
  }
}

function isPlainAddress(plain: unknown): plain is PlainAddress {
  if (plain === null || typeof plain !== 'object' || Array.isArray(plain)) return false
  const host: unknown = Reflect.get(plain, 'host')
  const ports: unknown = Reflect.get(plain, 'ports')
  return (
    typeof host === 'string' &&
    Array.isArray(ports) &&
    ports.every((p): p is number => typeof p === 'number')
  )
}

/**
 * Build a tagged value of `type` from a plain JS value.
 *
 * @throws {MalformedValueError} if the plain value does not have the shape of `type`
 */
export function fromPlain(plain: unknown, type: ValueType): Value {
  const mismatch = (): MalformedValueError =>
    new MalformedValueError(
      `Expected ${describeType(type)}, got ${JSON.stringify(plain) ?? String(plain)}`,
      JSON.stringify(plain) ?? String(plain)
    )

  switch (type.kind) {
    case 'boolean':
      if (typeof plain !== 'boolean') throw mismatch()
      return v.boolean(plain)
    case 'integer':
      if (typeof plain !== 'number' || !Number.isSafeInteger(plain)) throw mismatch()
      return v.integer(plain)
    case 'float':
      if (typeof plain !== 'number' || !Number.isFinite(plain)) throw mismatch()
      return v.float(plain)
    case 'string':
      if (typeof plain !== 'string') throw mismatch()
      return v.string(plain)
    case 'nullable':
      return plain === null ? v.null() : fromPlain(plain, type.inner)
    case 'list':
      if (!Array.isArray(plain)) throw mismatch()
      return v.list(plain.map((item: unknown) => fromPlain(item, type.element)))
    case 'tuple': {
      if (!Array.isArray(plain) || plain.length !== type.elements.length) throw mismatch()
      const items: Value[] = []
      type.elements.forEach((elementType, i) => {
        items.push(fromPlain(plain[i], elementType))
      })
      return v.tuple(items)
    }
    case 'address':
      if (!isPlainAddress(plain) || !plain.ports.every((p) => Number.isSafeInteger(p))) {
        throw mismatch()
      }
      return v.address(plain.host, plain.ports)
  }
}
