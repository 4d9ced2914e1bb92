/**
 * ConfigRegistry implementation — composes the text reader, section store,
 * migrator and schema table into the load → migrate → validate → access →
 * save pipeline.
 *
 * The registry does no file I/O: callers hand it the persisted text and
 * persist whatever `save()` returns.
 */

import type pino from 'pino'
import { MASKED_VALUE } from '../../cli/utils/masking.js'
import {
  ConfigLoadError,
  MalformedValueError,
  RegistryNotReadyError,
  ConfigError,
  UnknownKeyError,
  ValidationError,
  type LoadIssue,
} from '../../core/errors.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import type { ConfigMigrator, MigrationResult } from './config-migrator.js'
import type {
  ConfigRegistry,
  ConfigRegistryOptions,
  PlainObjectOptions,
  RegistryState,
} from './config-registry.js'
import { formatConfigText, parseConfigText } from './config-text.js'
import { defaultConfigMigrator } from './migrations.js'
import { defaultSchemaTable, type AppSchema } from './schema-definition.js'
import {
  GENERAL_SECTION,
  VERSION_KEY,
  type KeyName,
  type SchemaDefinition,
  type SchemaTable,
  type SectionName,
  type ValueOf,
} from './schema-table.js'
import { SectionStore } from './section-store.js'
import { fromPlain, toPlain, type PlainValue, type Value } from './value-types.js'
import { parseVersion } from './version-utils.js'

const logger = createLogger('config')

export class ConfigRegistryImpl<D extends SchemaDefinition = AppSchema> implements ConfigRegistry<D> {
  private readonly _schema: SchemaTable<D>
  private readonly _migrator: ConfigMigrator
  private readonly _logger: pino.Logger
  private _store: SectionStore | null = null
  private _state: RegistryState = 'unloaded'
  private _migration: MigrationResult | null = null

  constructor(schema: SchemaTable<D>, options: ConfigRegistryOptions = {}) {
    this._schema = schema
    this._migrator = options.migrator ?? defaultConfigMigrator
    this._logger = childLogger(options.logger ?? logger, { schemaVersion: schema.currentVersion() })
  }

  get state(): RegistryState {
    return this._state
  }

  get migration(): MigrationResult | null {
    return this._migration
  }

  load(rawText: string): void {
    if (this._state !== 'unloaded') {
      throw new ConfigError(`Configuration already loaded (state: ${this._state})`, {
        state: this._state,
      })
    }

    try {
      this._state = 'loading'
      const parsed = parseConfigText(rawText)
      const issues: LoadIssue[] = [...parsed.issues]
      const loaded = SectionStore.fromSections(this._schema, parsed.sections)

      const targetVersion = this._schema.currentVersion()
      const persistedVersion = this._readVersion(loaded, targetVersion)

      this._state = 'migrating'
      const { store, result } = this._migrator.migrate(loaded, persistedVersion, targetVersion)
      store.setRaw(GENERAL_SECTION, VERSION_KEY, String(targetVersion))
      if (result.appliedSteps.length > 0) {
        this._logger.info(
          { from: persistedVersion, to: targetVersion, steps: result.appliedSteps },
          'Configuration migrated'
        )
      }

      this._state = 'validating'
      issues.push(...this._validateAll(store))
      if (issues.length > 0) {
        throw new ConfigLoadError(issues)
      }

      this._store = store
      this._migration = result
      this._state = 'ready'
      this._logger.debug(
        { sections: store.sections().length, version: targetVersion },
        'Configuration loaded successfully'
      )
    } catch (err) {
      this._state = 'unloaded'
      throw err
    }
  }

  getTyped<S extends SectionName<D>, K extends KeyName<D, S>>(section: S, keyName: K): ValueOf<D, S, K> {
    // The value was validated against this key's descriptor, whose default has type ValueOf<D, S, K>
    return toPlain(this.get(section, keyName)) as ValueOf<D, S, K>
  }

  setTyped<S extends SectionName<D>, K extends KeyName<D, S>>(
    section: S,
    keyName: K,
    value: ValueOf<D, S, K>
  ): void {
    const descriptor = this._schema.lookup(section, keyName)
    if (descriptor === undefined) throw new UnknownKeyError(section, keyName)
    let tagged: Value
    try {
      tagged = fromPlain(value, descriptor.type)
    } catch (err) {
      if (err instanceof MalformedValueError) {
        throw new ValidationError(section, keyName, err.message)
      }
      throw err
    }
    this.set(section, keyName, tagged)
  }

  get(section: string, keyName: string): Value {
    return this._readyStore('get').get(section, keyName)
  }

  set(section: string, keyName: string, value: Value): void {
    const store = this._readyStore('set')
    const previous = this._state
    this._state = 'mutating'
    try {
      store.set(section, keyName, value)
      this._state = 'ready'
    } catch (err) {
      this._state = previous
      throw err
    }
  }

  isEnabled(section: SectionName<D>): boolean {
    return this._readyStore('isEnabled').sectionEnabled(section)
  }

  save(): string {
    const text = formatConfigText(this._readyStore('save').rawDump())
    this._state = 'saved'
    return text
  }

  toPlainObject(options: PlainObjectOptions = {}): Record<string, Record<string, PlainValue>> {
    const store = this._readyStore('toPlainObject')
    const result: Record<string, Record<string, PlainValue>> = {}
    for (const section of this._schema.sections()) {
      const values: Record<string, PlainValue> = {}
      for (const keyName of this._schema.keys(section)) {
        const plain = toPlain(store.peek(section, keyName))
        const sensitive = this._schema.lookup(section, keyName)?.sensitive ?? false
        values[keyName] = options.mask === true && sensitive && plain !== null ? MASKED_VALUE : plain
      }
      result[section] = values
    }
    return result
  }

  unknownKeys(): string[] {
    const store = this._readyStore('unknownKeys')
    const unknown: string[] = []
    for (const section of store.sections()) {
      for (const keyName of store.keys(section)) {
        if (this._schema.lookup(section, keyName) === undefined) unknown.push(`${section}.${keyName}`)
      }
    }
    return unknown
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _readyStore(operation: string): SectionStore {
    if (this._store === null || (this._state !== 'ready' && this._state !== 'saved')) {
      throw new RegistryNotReadyError(operation, this._state)
    }
    return this._store
  }

  /** A missing version means a fresh configuration written by the running build */
  private _readVersion(store: SectionStore, targetVersion: number): number {
    const raw = store.getRaw(GENERAL_SECTION, VERSION_KEY)
    return raw === undefined ? targetVersion : parseVersion(raw)
  }

  /** Decode and check every known key present in the store, collecting all failures */
  private _validateAll(store: SectionStore): LoadIssue[] {
    const issues: LoadIssue[] = []
    for (const section of store.sections()) {
      for (const keyName of store.keys(section)) {
        if (this._schema.lookup(section, keyName) === undefined) continue
        try {
          store.get(section, keyName)
        } catch (err) {
          const line = store.lineOf(section, keyName)
          const raw = store.getRaw(section, keyName)
          if (err instanceof MalformedValueError) {
            issues.push({
              code: 'MALFORMED_VALUE',
              message: err.message,
              section,
              key: keyName,
              ...(raw !== undefined && { raw }),
              ...(line !== undefined && { line }),
            })
          } else if (err instanceof ValidationError) {
            issues.push({
              code: 'VALIDATION_ERROR',
              message: err.message,
              section,
              key: keyName,
              ...(raw !== undefined && { raw }),
              ...(line !== undefined && { line }),
            })
          } else {
            throw err
          }
        }
      }
    }
    return issues
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a registry over the running build's schema.
 *
 * @example
 * const registry = createConfigRegistry()
 * registry.load(await readFile(configPath, 'utf-8'))
 * if (registry.isEnabled('http_api')) startApi(registry.getTyped('http_api', 'port'))
 */
export function createConfigRegistry(options: ConfigRegistryOptions = {}): ConfigRegistry<AppSchema> {
  return new ConfigRegistryImpl(defaultSchemaTable, options)
}
