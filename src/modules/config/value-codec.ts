/**
 * Value codec: converts between the flat textual encoding of a single config
 * value and its tagged in-memory form.
 *
 * Structured values use a literal syntax: `True`/`False`, `None`, decimal
 * numbers, single- or double-quoted strings, `[a, b]` lists and `(a, b)`
 * tuples. Top-level strings may be written bare.
 */

import { MalformedValueError } from '../../core/errors.js'
import { describeType, v, type Value, type ValueType } from './value-types.js'

export const NULL_LITERAL = 'None'

const TRUE_SPELLINGS: ReadonlySet<string> = new Set(['True', 'true', '1', 'yes', 'on'])
const FALSE_SPELLINGS: ReadonlySet<string> = new Set(['False', 'false', '0', 'no', 'off'])

const INTEGER_RE = /^[+-]?\d+$/
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

/** Lowest and highest legal port numbers; -1 means "unset / pick any" */
export const PORT_UNSET = -1
export const PORT_MAX = 65535

export function isValidPort(port: number): boolean {
  return Number.isSafeInteger(port) && port >= PORT_UNSET && port <= PORT_MAX
}

// ---------------------------------------------------------------------------
// Literal parsing
// ---------------------------------------------------------------------------

type Literal =
  | { kind: 'str'; value: string }
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'none' }
  | { kind: 'list'; items: Literal[] }
  | { kind: 'tuple'; items: Literal[] }

const NUMBER_TOKEN = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y
const IDENT_TOKEN = /[A-Za-z_]\w*/y

const ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  r: '\r',
  t: '\t',
}

class LiteralParser {
  private pos = 0

  constructor(private readonly text: string) {}

  parse(): Literal {
    const literal = this.parseValue()
    this.skipWhitespace()
    if (this.pos !== this.text.length) {
      throw this.error(`unexpected "${this.text.slice(this.pos)}"`)
    }
    return literal
  }

  private parseValue(): Literal {
    this.skipWhitespace()
    const ch = this.text[this.pos]
    if (ch === undefined) throw this.error('unexpected end of input')
    if (ch === '[') return { kind: 'list', items: this.parseSequence(']').items }
    if (ch === '(') {
      const { items, trailingComma } = this.parseSequence(')')
      // `(x)` is grouping, not a 1-tuple
      if (items.length === 1 && !trailingComma && items[0] !== undefined) return items[0]
      return { kind: 'tuple', items }
    }
    if (ch === "'" || ch === '"') return { kind: 'str', value: this.parseString(ch) }

    NUMBER_TOKEN.lastIndex = this.pos
    const number = NUMBER_TOKEN.exec(this.text)
    if (number !== null) {
      this.pos += number[0].length
      const parsed = Number(number[0])
      if (!Number.isFinite(parsed)) throw this.error(`number out of range: ${number[0]}`)
      return INTEGER_RE.test(number[0]) ? { kind: 'int', value: parsed } : { kind: 'float', value: parsed }
    }

    IDENT_TOKEN.lastIndex = this.pos
    const ident = IDENT_TOKEN.exec(this.text)
    if (ident !== null) {
      this.pos += ident[0].length
      switch (ident[0]) {
        case 'True':
          return { kind: 'bool', value: true }
        case 'False':
          return { kind: 'bool', value: false }
        case NULL_LITERAL:
          return { kind: 'none' }
        default:
          throw this.error(`unknown literal "${ident[0]}"`)
      }
    }

    throw this.error(`unexpected character "${ch}"`)
  }

  private parseSequence(close: ']' | ')'): { items: Literal[]; trailingComma: boolean } {
    this.pos++ // opening bracket
    const items: Literal[] = []
    let trailingComma = false
    this.skipWhitespace()
    if (this.text[this.pos] === close) {
      this.pos++
      return { items, trailingComma }
    }
    for (;;) {
      items.push(this.parseValue())
      this.skipWhitespace()
      const ch = this.text[this.pos]
      if (ch === close) {
        this.pos++
        return { items, trailingComma: false }
      }
      if (ch !== ',') throw this.error(`expected "," or "${close}"`)
      this.pos++
      this.skipWhitespace()
      if (this.text[this.pos] === close) {
        this.pos++
        trailingComma = true
        return { items, trailingComma }
      }
    }
  }

  private parseString(quote: string): string {
    this.pos++ // opening quote
    let out = ''
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos] ?? ''
      this.pos++
      if (ch === quote) return out
      if (ch === '\\') {
        const next = this.text[this.pos]
        if (next === undefined) break
        this.pos++
        out += ESCAPES[next] ?? `\\${next}`
      } else {
        out += ch
      }
    }
    throw this.error('unterminated string')
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos] ?? '')) this.pos++
  }

  private error(reason: string): MalformedValueError {
    return new MalformedValueError(
      `Cannot parse literal at offset ${String(this.pos)}: ${reason}`,
      this.text
    )
  }
}

function describeLiteral(literal: Literal): string {
  switch (literal.kind) {
    case 'str':
      return 'string'
    case 'int':
      return 'integer'
    case 'bool':
      return 'boolean'
    case 'none':
      return NULL_LITERAL
    default:
      return literal.kind
  }
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function fromLiteral(literal: Literal, type: ValueType, raw: string): Value {
  const mismatch = (): MalformedValueError =>
    new MalformedValueError(
      `Expected ${describeType(type)}, got ${describeLiteral(literal)}`,
      raw,
      { expected: describeType(type) }
    )

  switch (type.kind) {
    case 'boolean':
      if (literal.kind !== 'bool') throw mismatch()
      return v.boolean(literal.value)
    case 'integer':
      if (literal.kind !== 'int') throw mismatch()
      return v.integer(literal.value)
    case 'float':
      if (literal.kind !== 'float' && literal.kind !== 'int') throw mismatch()
      return v.float(literal.value)
    case 'string':
      if (literal.kind !== 'str') throw mismatch()
      return v.string(literal.value)
    case 'nullable':
      return literal.kind === 'none' ? v.null() : fromLiteral(literal, type.inner, raw)
    case 'list':
      if (literal.kind !== 'list') throw mismatch()
      return v.list(literal.items.map((item) => fromLiteral(item, type.element, raw)))
    case 'tuple': {
      if (literal.kind !== 'tuple') throw mismatch()
      if (literal.items.length !== type.elements.length) {
        throw new MalformedValueError(
          `Expected a tuple of length ${String(type.elements.length)}, got length ${String(literal.items.length)}`,
          raw,
          { expectedLength: type.elements.length, actualLength: literal.items.length }
        )
      }
      const items: Value[] = []
      literal.items.forEach((item, i) => {
        const elementType = type.elements[i]
        if (elementType !== undefined) items.push(fromLiteral(item, elementType, raw))
      })
      return v.tuple(items)
    }
    case 'address':
      return addressFromLiteral(literal, raw)
  }
}

function addressFromLiteral(literal: Literal, raw: string): Value {
  if (literal.kind !== 'tuple') {
    throw new MalformedValueError(`Expected a (host, [ports]) pair, got ${describeLiteral(literal)}`, raw)
  }
  if (literal.items.length !== 2) {
    throw new MalformedValueError(
      `Expected a tuple of length 2, got length ${String(literal.items.length)}`,
      raw,
      { expectedLength: 2, actualLength: literal.items.length }
    )
  }
  const [host, ports] = literal.items
  if (host?.kind !== 'str') {
    throw new MalformedValueError('Address host must be a string', raw)
  }
  if (ports?.kind !== 'list') {
    throw new MalformedValueError('Address ports must be a list of integers', raw)
  }
  const portNumbers: number[] = []
  for (const port of ports.items) {
    if (port.kind !== 'int') {
      throw new MalformedValueError(`Address port must be an integer, got ${describeLiteral(port)}`, raw)
    }
    if (!isValidPort(port.value)) {
      throw new MalformedValueError(
        `Address port ${String(port.value)} is not a valid TCP port (0-${String(PORT_MAX)}) or ${String(PORT_UNSET)}`,
        raw
      )
    }
    portNumbers.push(port.value)
  }
  return v.address(host.value, portNumbers)
}

/**
 * Decode raw config text as a value of the expected type.
 *
 * @throws {MalformedValueError} if the text is not a legal encoding of `type`
 */
export function decode(raw: string, type: ValueType): Value {
  const text = raw.trim()

  switch (type.kind) {
    case 'boolean':
      if (TRUE_SPELLINGS.has(text)) return v.boolean(true)
      if (FALSE_SPELLINGS.has(text)) return v.boolean(false)
      throw new MalformedValueError(`Expected a boolean, got "${text}"`, raw, { expected: 'boolean' })
    case 'integer':
      if (!INTEGER_RE.test(text)) {
        throw new MalformedValueError(`Expected an integer, got "${text}"`, raw, { expected: 'integer' })
      }
      return v.integer(Number(text))
    case 'float': {
      const parsed = Number(text)
      if (!FLOAT_RE.test(text) || !Number.isFinite(parsed)) {
        throw new MalformedValueError(`Expected a float, got "${text}"`, raw, { expected: 'float' })
      }
      return v.float(parsed)
    }
    case 'string':
      if (text.startsWith("'") || text.startsWith('"')) {
        return fromLiteral(new LiteralParser(text).parse(), type, raw)
      }
      return v.string(text)
    case 'nullable':
      return text === NULL_LITERAL ? v.null() : decode(raw, type.inner)
    default:
      return fromLiteral(new LiteralParser(text).parse(), type, raw)
  }
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
  return `'${escaped}'`
}

function formatFloat(value: number): string {
  // String(-0) drops the sign
  const text = Object.is(value, -0) ? '-0' : String(value)
  return /[.eE]/.test(text) ? text : `${text}.0`
}

/** A bare top-level string that would decode as something else must be quoted */
function needsQuoting(value: string): boolean {
  return (
    value === NULL_LITERAL ||
    value !== value.trim() ||
    value.startsWith("'") ||
    value.startsWith('"') ||
    /[\r\n\t]/.test(value)
  )
}

function encodeNested(value: Value): string {
  switch (value.tag) {
    case 'boolean':
      return value.value ? 'True' : 'False'
    case 'integer':
      return String(value.value)
    case 'float':
      return formatFloat(value.value)
    case 'string':
      return quote(value.value)
    case 'null':
      return NULL_LITERAL
    case 'list':
      return `[${value.items.map(encodeNested).join(', ')}]`
    case 'tuple':
      if (value.items.length === 1 && value.items[0] !== undefined) {
        return `(${encodeNested(value.items[0])},)`
      }
      return `(${value.items.map(encodeNested).join(', ')})`
    case 'address':
      return `(${quote(value.host)}, [${value.ports.map(String).join(', ')}])`
  }
}

/** Encode a value as raw config text; the exact inverse of `decode` */
export function encode(value: Value): string {
  if (value.tag === 'string') {
    return needsQuoting(value.value) ? quote(value.value) : value.value
  }
  return encodeNested(value)
}
