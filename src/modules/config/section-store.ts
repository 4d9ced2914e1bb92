/**
 * SectionStore — ordered section → key → value container owned by one registry.
 *
 * Every entry keeps the raw text it was loaded with. Known keys are decoded
 * and validated on first read and the decoded value is cached; unknown keys
 * are never decoded and are written back exactly as they were read.
 *
 * All operations are synchronous, so a read that materializes a default and
 * a validate-then-commit write can never interleave with another access.
 */

import { MalformedValueError, UnknownKeyError, ValidationError } from '../../core/errors.js'
import type { RawSection } from './config-text.js'
import {
  ENABLED_KEY,
  GENERAL_SECTION,
  VERSION_KEY,
  type KeyDescriptor,
  type SchemaTable,
} from './schema-table.js'
import { decode, encode } from './value-codec.js'
import { conformsTo, describeType, fromPlain, toPlain, v, type Value } from './value-types.js'

interface StoreEntry {
  raw: string
  /** Decoded and validated value; null until first read */
  value: Value | null
  line?: number
}

/**
 * Check a value against a descriptor's type and constraint.
 *
 * @throws {ValidationError} naming the violated constraint
 */
export function validateValue(
  section: string,
  keyName: string,
  descriptor: KeyDescriptor,
  value: Value
): void {
  if (!conformsTo(value, descriptor.type)) {
    throw new ValidationError(section, keyName, `expected ${describeType(descriptor.type)}, got ${value.tag}`)
  }
  if (descriptor.check === undefined) return
  const result = descriptor.check.safeParse(toPlain(value))
  if (!result.success) {
    throw new ValidationError(
      section,
      keyName,
      result.error.issues.map((issue) => issue.message).join('; ')
    )
  }
}

export class SectionStore {
  private readonly _sections = new Map<string, Map<string, StoreEntry>>()
  private readonly _schema: SchemaTable

  constructor(schema: SchemaTable) {
    this._schema = schema
  }

  /** Build a store from parsed config text, preserving section and key order */
  static fromSections(schema: SchemaTable, sections: readonly RawSection[]): SectionStore {
    const store = new SectionStore(schema)
    for (const section of sections) {
      const entries = store._ensureSection(section.name)
      for (const entry of section.entries) {
        entries.set(entry.key, {
          raw: entry.raw,
          value: null,
          ...(entry.line !== undefined && { line: entry.line }),
        })
      }
    }
    return store
  }

  // -------------------------------------------------------------------------
  // Typed access
  // -------------------------------------------------------------------------

  /**
   * Return the validated value for a key.
   *
   * A known key that is absent is materialized from its default and appended
   * to its section. An unknown key that was loaded is returned as its raw
   * string.
   *
   * @throws {UnknownKeyError} if the key is neither in the schema nor in the store
   * @throws {MalformedValueError} if the stored raw text cannot be decoded
   * @throws {ValidationError} if the decoded value violates the key's constraint
   */
  get(section: string, keyName: string): Value {
    const descriptor = this._schema.lookup(section, keyName)
    const entry = this._sections.get(section)?.get(keyName)

    if (entry !== undefined) {
      if (descriptor === undefined) return v.string(entry.raw)
      if (entry.value === null) {
        entry.value = this._decodeEntry(section, keyName, descriptor, entry.raw)
      }
      return entry.value
    }

    if (descriptor === undefined) throw new UnknownKeyError(section, keyName)

    const value = fromPlain(descriptor.default, descriptor.type)
    this._ensureSection(section).set(keyName, { raw: encode(value), value })
    return value
  }

  /**
   * Return the value a `get` would, without materializing absent defaults.
   */
  peek(section: string, keyName: string): Value {
    const descriptor = this._schema.lookup(section, keyName)
    const entry = this._sections.get(section)?.get(keyName)
    if (entry !== undefined) return this.get(section, keyName)
    if (descriptor === undefined) throw new UnknownKeyError(section, keyName)
    return fromPlain(descriptor.default, descriptor.type)
  }

  /**
   * Validate and store a value, replacing any previous value for the key.
   * On failure the previous value is left untouched.
   *
   * @throws {UnknownKeyError} if the key is not part of the schema
   * @throws {ValidationError} if the value violates the key's type or constraint,
   *   or is a `general.version` other than the schema's current version
   */
  set(section: string, keyName: string, value: Value): void {
    const descriptor = this._schema.lookup(section, keyName)
    if (descriptor === undefined) throw new UnknownKeyError(section, keyName)
    validateValue(section, keyName, descriptor, value)
    if (section === GENERAL_SECTION && keyName === VERSION_KEY) {
      const current = this._schema.currentVersion()
      if (value.tag !== 'integer' || value.value !== current) {
        throw new ValidationError(
          section,
          keyName,
          `the schema version can only be ${String(current)}, the version this build writes`
        )
      }
    }

    const entries = this._ensureSection(section)
    const existing = entries.get(keyName)
    entries.set(keyName, {
      raw: encode(value),
      value,
      ...(existing?.line !== undefined && { line: existing.line }),
    })
  }

  /**
   * Whether the subsystem a section configures should be instantiated.
   * `general` is always enabled.
   *
   * @throws {UnknownKeyError} if the section is not part of the schema
   */
  sectionEnabled(section: string): boolean {
    if (section === GENERAL_SECTION) return true
    if (!this._schema.hasSection(section)) throw new UnknownKeyError(section, ENABLED_KEY)
    const value = this.get(section, ENABLED_KEY)
    return value.tag === 'boolean' && value.value
  }

  // -------------------------------------------------------------------------
  // Raw access (used by migrations and serialization)
  // -------------------------------------------------------------------------

  has(section: string, keyName: string): boolean {
    return this._sections.get(section)?.has(keyName) ?? false
  }

  hasSection(section: string): boolean {
    return this._sections.has(section)
  }

  getRaw(section: string, keyName: string): string | undefined {
    return this._sections.get(section)?.get(keyName)?.raw
  }

  /** Line the key was loaded from, if it came from the source text */
  lineOf(section: string, keyName: string): number | undefined {
    return this._sections.get(section)?.get(keyName)?.line
  }

  /**
   * Replace the raw text of a key without decoding it. New keys are appended
   * to their section; new sections are appended to the store.
   */
  setRaw(section: string, keyName: string, raw: string): void {
    const entries = this._ensureSection(section)
    const existing = entries.get(keyName)
    if (existing !== undefined && existing.raw === raw) return
    entries.set(keyName, {
      raw,
      value: null,
      ...(existing?.line !== undefined && { line: existing.line }),
    })
  }

  delete(section: string, keyName: string): boolean {
    return this._sections.get(section)?.delete(keyName) ?? false
  }

  /**
   * Move a key. Within one section the key keeps its position; across
   * sections it is appended to the target section. An existing target entry
   * is overwritten.
   *
   * @returns false if the source key does not exist
   */
  rename(section: string, keyName: string, toSection: string, toKey: string): boolean {
    const entries = this._sections.get(section)
    const entry = entries?.get(keyName)
    if (entries === undefined || entry === undefined) return false
    const moved: StoreEntry = {
      raw: entry.raw,
      value: null,
      ...(entry.line !== undefined && { line: entry.line }),
    }

    if (section === toSection) {
      const rebuilt = new Map<string, StoreEntry>()
      for (const [name, existing] of entries) {
        if (name === keyName) rebuilt.set(toKey, moved)
        else if (name !== toKey) rebuilt.set(name, existing)
      }
      this._sections.set(section, rebuilt)
      return true
    }

    entries.delete(keyName)
    this._ensureSection(toSection).set(toKey, moved)
    return true
  }

  sections(): string[] {
    return [...this._sections.keys()]
  }

  keys(section: string): string[] {
    return [...(this._sections.get(section)?.keys() ?? [])]
  }

  /** Ordered section → key → raw text, for serialization. Empty sections are omitted. */
  rawDump(): RawSection[] {
    const dump: RawSection[] = []
    for (const [name, entries] of this._sections) {
      if (entries.size === 0) continue
      dump.push({
        name,
        entries: [...entries].map(([keyName, entry]) => ({
          key: keyName,
          raw: entry.raw,
          ...(entry.line !== undefined && { line: entry.line }),
        })),
      })
    }
    return dump
  }

  /** Independent copy sharing only immutable values */
  clone(): SectionStore {
    const copy = new SectionStore(this._schema)
    for (const [name, entries] of this._sections) {
      const copied = new Map<string, StoreEntry>()
      for (const [keyName, entry] of entries) copied.set(keyName, { ...entry })
      copy._sections.set(name, copied)
    }
    return copy
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _ensureSection(section: string): Map<string, StoreEntry> {
    let entries = this._sections.get(section)
    if (entries === undefined) {
      entries = new Map()
      this._sections.set(section, entries)
    }
    return entries
  }

  private _decodeEntry(
    section: string,
    keyName: string,
    descriptor: KeyDescriptor,
    raw: string
  ): Value {
    let value: Value
    try {
      value = decode(raw, descriptor.type)
    } catch (err) {
      if (err instanceof MalformedValueError) {
        throw new MalformedValueError(`${section}.${keyName}: ${err.message}`, raw, {
          ...err.context,
          section,
          key: keyName,
        })
      }
      throw err
    }
    validateValue(section, keyName, descriptor, value)
    return value
  }
}
