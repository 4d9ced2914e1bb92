/**
 * ConfigMigrator — registry and executor of schema version migrations.
 *
 * Each step upgrades a store from exactly `from` to `from + 1`; steps are
 * keyed and reported as "N->M" strings and applied strictly in order.
 */

import { ConfigError, MigrationError, UnsupportedFutureVersionError } from '../../core/errors.js'
import type { SectionStore } from './section-store.js'
import { GENERAL_SECTION, VERSION_KEY } from './schema-table.js'

export interface MigrationStep {
  /** Version this step upgrades from; it produces `from + 1` */
  readonly from: number
  readonly description: string
  /** Rewrite the store in place. Must not touch `general.version`. */
  apply(store: SectionStore): void
}

export interface MigrationResult {
  fromVersion: number
  toVersion: number
  /** "N->M: description" for every step applied, in order */
  appliedSteps: string[]
  /** `section.key` paths added, removed or changed by the applied steps */
  migratedKeys: string[]
}

export function stepKey(from: number): string {
  return `${String(from)}->${String(from + 1)}`
}

function snapshot(store: SectionStore): Map<string, string> {
  const flat = new Map<string, string>()
  for (const section of store.rawDump()) {
    for (const entry of section.entries) {
      flat.set(`${section.name}.${entry.key}`, entry.raw)
    }
  }
  return flat
}

const VERSION_PATH = `${GENERAL_SECTION}.${VERSION_KEY}`

/**
 * ConfigMigrator manages an ordered set of migration steps and applies them
 * sequentially to bring a store up to a target version.
 */
export class ConfigMigrator {
  private readonly migrations: Map<number, MigrationStep> = new Map()

  /**
   * Register a migration step.
   *
   * @throws {ConfigError} if a step for the same `from` version is already registered
   */
  register(step: MigrationStep): void {
    if (this.migrations.has(step.from)) {
      throw new ConfigError(`Duplicate migration step: "${stepKey(step.from)}"`, { from: step.from })
    }
    this.migrations.set(step.from, step)
  }

  /** Registered steps in ascending `from` order */
  steps(): MigrationStep[] {
    return [...this.migrations.values()].sort((a, b) => a.from - b.from)
  }

  /**
   * Check whether a contiguous chain of steps exists from fromVersion to toVersion.
   */
  canMigrate(fromVersion: number, toVersion: number): boolean {
    if (fromVersion === toVersion) return true
    if (fromVersion > toVersion) return false
    for (let version = fromVersion; version < toVersion; version++) {
      if (!this.migrations.has(version)) return false
    }
    return true
  }

  /**
   * Apply sequential migrations from fromVersion to toVersion.
   *
   * Steps run against a clone, so the input store is never modified and a
   * failure leaves no partially migrated state behind. After each step the
   * clone's `general.version` is set to the version that step produced.
   * Migrating to the version already reached returns the input store unchanged.
   *
   * @throws {UnsupportedFutureVersionError} if fromVersion > toVersion
   * @throws {MigrationError} if a step is missing or a step fails
   */
  migrate(
    store: SectionStore,
    fromVersion: number,
    toVersion: number
  ): { store: SectionStore; result: MigrationResult } {
    if (fromVersion === toVersion) {
      return {
        store,
        result: { fromVersion, toVersion, appliedSteps: [], migratedKeys: [] },
      }
    }

    if (fromVersion > toVersion) {
      throw new UnsupportedFutureVersionError(fromVersion, toVersion)
    }

    // Check all steps exist first
    for (let version = fromVersion; version < toVersion; version++) {
      if (!this.migrations.has(version)) {
        throw new MigrationError(
          `Missing migration step: "${stepKey(version)}". ` +
            `Cannot migrate from version ${String(fromVersion)} to ${String(toVersion)}.`,
          { fromVersion, toVersion, missingStep: stepKey(version) }
        )
      }
    }

    const working = store.clone()
    const before = snapshot(working)
    const appliedSteps: string[] = []

    for (let version = fromVersion; version < toVersion; version++) {
      const step = this.migrations.get(version)
      if (step === undefined) continue // unreachable: checked above
      try {
        step.apply(working)
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        throw new MigrationError(`Migration step "${stepKey(version)}" failed: ${message}`, {
          fromVersion,
          toVersion,
          step: stepKey(version),
        })
      }
      working.setRaw(GENERAL_SECTION, VERSION_KEY, String(version + 1))
      appliedSteps.push(`${stepKey(version)}: ${step.description}`)
    }

    const after = snapshot(working)
    const migratedKeys: string[] = []
    for (const [path, raw] of after) {
      if (path !== VERSION_PATH && before.get(path) !== raw) migratedKeys.push(path)
    }
    for (const path of before.keys()) {
      if (path !== VERSION_PATH && !after.has(path)) migratedKeys.push(path)
    }

    return {
      store: working,
      result: { fromVersion, toVersion, appliedSteps, migratedKeys },
    }
  }
}
