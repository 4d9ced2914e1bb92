/**
 * SchemaTable — static registry of every known (section, key) pair.
 *
 * Built once from a definition object and read-only afterwards. `lookup`
 * returning `undefined` means "not part of the schema": the section store
 * keeps such keys verbatim instead of rejecting them.
 */

import type { z } from 'zod'
import { ConfigError, MalformedValueError } from '../../core/errors.js'
import { conformsTo, describeType, fromPlain, type ValueType } from './value-types.js'

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

export interface KeyDescriptor<T = unknown> {
  /** Value type the raw text is decoded against */
  readonly type: ValueType
  /** Current default, materialized when the key is read but absent */
  readonly default: T
  /** Extra constraint on the plain value (port range, non-negative, ...) */
  readonly check?: z.ZodTypeAny
  /** First schema version that recognizes this key */
  readonly since: number
  readonly description: string
  /** Masked in display output and logs */
  readonly sensitive: boolean
}

export interface KeyOptions {
  check?: z.ZodTypeAny
  since?: number
  description?: string
  sensitive?: boolean
}

/** Reserved key gating whether a section's subsystem is instantiated */
export const ENABLED_KEY = 'enabled'

/** The always-active section that also carries the schema version */
export const GENERAL_SECTION = 'general'
export const VERSION_KEY = 'version'

/** Oldest version any key can claim in `since` */
const BASE_VERSION = 1

/**
 * Define a key. Pass `T` explicitly for nullable keys, since a `null`
 * default would otherwise infer `T = null`.
 */
export function key<T>(
  type: ValueType,
  defaultValue: T,
  options: KeyOptions = {}
): KeyDescriptor<T> {
  return Object.freeze({
    type,
    default: defaultValue,
    ...(options.check !== undefined && { check: options.check }),
    since: options.since ?? BASE_VERSION,
    description: options.description ?? '',
    sensitive: options.sensitive ?? false,
  })
}

export type SchemaDefinition = Record<string, Record<string, KeyDescriptor>>

export type SectionName<D extends SchemaDefinition> = keyof D & string
export type KeyName<D extends SchemaDefinition, S extends SectionName<D>> = keyof D[S] & string
export type ValueOf<
  D extends SchemaDefinition,
  S extends SectionName<D>,
  K extends KeyName<D, S>,
> = D[S][K] extends KeyDescriptor<infer T> ? T : never

// ---------------------------------------------------------------------------
// SchemaTable
// ---------------------------------------------------------------------------

export class SchemaTable<D extends SchemaDefinition = SchemaDefinition> {
  readonly definition: D
  private readonly _sections: ReadonlyMap<string, ReadonlyMap<string, KeyDescriptor>>
  private readonly _currentVersion: number
  private readonly _minimumVersion: number

  /**
   * @throws {ConfigError} if the definition breaks a schema invariant: a
   *   section other than `general` without a boolean `enabled` key, a missing
   *   `general.version`, a key introduced after the current version, or a
   *   default that does not satisfy its own type and constraint
   */
  constructor(definition: D, currentVersion: number, minimumVersion: number = currentVersion) {
    if (!Number.isSafeInteger(currentVersion) || currentVersion < BASE_VERSION) {
      throw new ConfigError(`Invalid schema version: ${String(currentVersion)}`, { currentVersion })
    }
    if (minimumVersion > currentVersion) {
      throw new ConfigError(
        `Minimum schema version ${String(minimumVersion)} exceeds current version ${String(currentVersion)}`,
        { minimumVersion, currentVersion }
      )
    }

    const plain: SchemaDefinition = definition
    const sections = new Map<string, ReadonlyMap<string, KeyDescriptor>>()
    for (const [sectionName, keys] of Object.entries(plain)) {
      const descriptors = new Map<string, KeyDescriptor>()
      for (const [keyName, descriptor] of Object.entries(keys)) {
        validateDescriptor(sectionName, keyName, descriptor, currentVersion)
        descriptors.set(keyName, descriptor)
      }
      if (sectionName !== GENERAL_SECTION) {
        const enabled = descriptors.get(ENABLED_KEY)
        if (enabled?.type.kind !== 'boolean') {
          throw new ConfigError(
            `Section "${sectionName}" must declare a boolean "${ENABLED_KEY}" key`,
            { section: sectionName }
          )
        }
      }
      sections.set(sectionName, descriptors)
    }

    if (sections.get(GENERAL_SECTION)?.get(VERSION_KEY)?.type.kind !== 'integer') {
      throw new ConfigError(
        `Schema must declare an integer "${GENERAL_SECTION}.${VERSION_KEY}" key`,
        {}
      )
    }

    this.definition = definition
    this._sections = sections
    this._currentVersion = currentVersion
    this._minimumVersion = minimumVersion
  }

  /** Descriptor for a known key, or `undefined` when the key is not part of the schema */
  lookup(section: string, keyName: string): KeyDescriptor | undefined {
    return this._sections.get(section)?.get(keyName)
  }

  hasSection(section: string): boolean {
    return this._sections.has(section)
  }

  sections(): string[] {
    return [...this._sections.keys()]
  }

  keys(section: string): string[] {
    return [...(this._sections.get(section)?.keys() ?? [])]
  }

  /** Sections that have at least one key recognized at `version` */
  sectionsInVersion(version: number): Set<string> {
    const result = new Set<string>()
    for (const [sectionName, descriptors] of this._sections) {
      for (const descriptor of descriptors.values()) {
        if (descriptor.since <= version) {
          result.add(sectionName)
          break
        }
      }
    }
    return result
  }

  currentVersion(): number {
    return this._currentVersion
  }

  /** Oldest persisted version a migration path is expected to exist from */
  minimumVersion(): number {
    return this._minimumVersion
  }
}

function validateDescriptor(
  section: string,
  keyName: string,
  descriptor: KeyDescriptor,
  currentVersion: number
): void {
  const where = `${section}.${keyName}`
  if (descriptor.since > currentVersion) {
    throw new ConfigError(
      `Key "${where}" is introduced at version ${String(descriptor.since)}, after current version ${String(currentVersion)}`,
      { section, key: keyName }
    )
  }

  let defaultOk: boolean
  try {
    defaultOk = conformsTo(fromPlain(descriptor.default, descriptor.type), descriptor.type)
  } catch (err) {
    if (!(err instanceof MalformedValueError)) throw err
    defaultOk = false
  }
  if (!defaultOk) {
    throw new ConfigError(
      `Default for "${where}" is not a ${describeType(descriptor.type)}`,
      { section, key: keyName }
    )
  }

  if (descriptor.check !== undefined && !descriptor.check.safeParse(descriptor.default).success) {
    throw new ConfigError(`Default for "${where}" violates its own constraint`, {
      section,
      key: keyName,
    })
  }
}
