/**
 * ConfigRegistry interface — public contract for the configuration registry.
 *
 * All subsystems should depend on this interface, not the concrete
 * implementation. Create an instance via `createConfigRegistry()` from
 * config-registry-impl.ts.
 */

import type pino from 'pino'
import type { MigrationResult, ConfigMigrator } from './config-migrator.js'
import type { AppSchema } from './schema-definition.js'
import type {
  KeyName,
  SchemaDefinition,
  SectionName,
  ValueOf,
} from './schema-table.js'
import type { PlainValue, Value } from './value-types.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options for constructing a registry.
 */
export interface ConfigRegistryOptions {
  /** Migration steps to apply to stale configurations (default: every built-in step) */
  migrator?: ConfigMigrator
  /** Logger for load/migration progress (default: the `config` module logger) */
  logger?: pino.Logger
}

/**
 * Lifecycle of a registry:
 *   unloaded → loading → migrating → validating → ready
 *   ready → mutating → ready (on success or rejection)
 *   ready → saved; saved accepts reads and writes like ready
 *
 * A failed load returns the registry to `unloaded`.
 */
export type RegistryState =
  | 'unloaded'
  | 'loading'
  | 'migrating'
  | 'validating'
  | 'ready'
  | 'mutating'
  | 'saved'

export interface PlainObjectOptions {
  /** Replace values of sensitive keys with `***` */
  mask?: boolean
}

// ---------------------------------------------------------------------------
// ConfigRegistry interface
// ---------------------------------------------------------------------------

/**
 * Owns the validated, migrated configuration for one process.
 */
export interface ConfigRegistry<D extends SchemaDefinition = AppSchema> {
  /**
   * Parse, migrate and validate a persisted configuration.
   *
   * @throws {ConfigLoadError} listing every malformed or invalid key
   * @throws {MigrationError} if no contiguous migration path exists
   * @throws {UnsupportedFutureVersionError} if the text comes from a newer schema
   */
  load(rawText: string): void

  /**
   * Typed read of a known key; absent keys yield (and keep) their default.
   * @throws {RegistryNotReadyError} if called before a successful load
   */
  getTyped<S extends SectionName<D>, K extends KeyName<D, S>>(section: S, keyName: K): ValueOf<D, S, K>

  /**
   * Typed write of a known key. The value is validated before it replaces
   * the current one; on failure the current value is kept.
   * @throws {ValidationError} if the value violates the key's constraint
   */
  setTyped<S extends SectionName<D>, K extends KeyName<D, S>>(
    section: S,
    keyName: K,
    value: ValueOf<D, S, K>
  ): void

  /**
   * Tagged read of any key, including retained unknown keys (returned as strings).
   * @throws {UnknownKeyError} if the key is neither known nor present
   */
  get(section: string, keyName: string): Value

  /**
   * Tagged write of a known key.
   * @throws {UnknownKeyError} if the key is not part of the schema
   * @throws {ValidationError} if the value violates the key's type or constraint
   */
  set(section: string, keyName: string, value: Value): void

  /** Whether the subsystem configured by `section` should be instantiated */
  isEnabled(section: SectionName<D>): boolean

  /** Serialize the current state, unknown keys included */
  save(): string

  /** Every known key (defaults included) as section → key → plain value */
  toPlainObject(options?: PlainObjectOptions): Record<string, Record<string, PlainValue>>

  /** `section.key` paths retained from the input that the schema does not know */
  unknownKeys(): string[]

  readonly state: RegistryState

  /** Migration applied by the last successful load, or null before any load */
  readonly migration: MigrationResult | null
}
