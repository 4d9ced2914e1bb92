/**
 * `p2pconf config` command group
 *
 * Subcommands:
 *   - `p2pconf config show <file>`                 — display the typed config (credentials masked)
 *   - `p2pconf config validate <file>`             — report every problem in a config file
 *   - `p2pconf config migrate <file>`              — upgrade a config file to the current version
 *   - `p2pconf config get <file> <key>`            — print one value
 *   - `p2pconf config set <file> <key> <value>`    — update one value
 *
 * The registry core never touches the filesystem; reading and writing the
 * config file happens here.
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { readFile, writeFile } from 'fs/promises'
import {
  ConfigLoadError,
  MigrationError,
  RegistryError,
  UnsupportedFutureVersionError,
} from '../../core/errors.js'
import { createConfigRegistry } from '../../modules/config/config-registry-impl.js'
import type { ConfigRegistry } from '../../modules/config/config-registry.js'
import { defaultSchemaTable } from '../../modules/config/schema-definition.js'
import { decode, encode } from '../../modules/config/value-codec.js'
import { formatUnsupportedVersionError } from '../../modules/config/version-utils.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

/** Split "section.key" at the first dot */
export function splitKeyPath(path: string): [string, string] | null {
  const dot = path.indexOf('.')
  if (dot <= 0 || dot === path.length - 1) return null
  return [path.slice(0, dot), path.slice(dot + 1)]
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Read and load a config file.
 *
 * @returns the ready registry, or an exit code after reporting the problem
 */
async function loadRegistry(
  filePath: string,
  opts: { allowMissing?: boolean } = {}
): Promise<ConfigRegistry | number> {
  let text: string
  try {
    text = await readFile(filePath, 'utf-8')
  } catch (err) {
    if (isMissingFile(err) && opts.allowMissing === true) {
      text = ''
    } else if (isMissingFile(err)) {
      process.stderr.write(`  Error: Config file not found: ${filePath}\n`)
      return CONFIG_EXIT_INVALID
    } else {
      const message = err instanceof Error ? err.message : String(err)
      process.stderr.write(`  Error: Failed to read config file: ${message}\n`)
      return CONFIG_EXIT_ERROR
    }
  }

  const registry = createConfigRegistry()
  try {
    registry.load(text)
  } catch (err) {
    return reportLoadError(err)
  }
  return registry
}

function reportLoadError(err: unknown): number {
  if (err instanceof ConfigLoadError) {
    process.stderr.write(`  Configuration has ${String(err.issues.length)} problem(s):\n`)
    for (const issue of err.issues) {
      const where =
        issue.section !== undefined && issue.key !== undefined
          ? `${issue.section}.${issue.key}`
          : (issue.section ?? '(file)')
      const line = issue.line !== undefined ? ` (line ${String(issue.line)})` : ''
      process.stderr.write(`  • ${where}${line}: ${issue.message}\n`)
    }
    return CONFIG_EXIT_INVALID
  }
  if (err instanceof UnsupportedFutureVersionError) {
    const message = formatUnsupportedVersionError(
      err.version,
      err.currentVersion,
      defaultSchemaTable.minimumVersion()
    )
    process.stderr.write(`  Configuration error: ${message}\n`)
    return CONFIG_EXIT_INVALID
  }
  if (err instanceof MigrationError) {
    process.stderr.write(`  Configuration error: ${err.message}\n`)
    return CONFIG_EXIT_INVALID
  }
  const message = err instanceof Error ? err.message : String(err)
  logger.error({ err }, 'Failed to load configuration')
  process.stderr.write(`  Error loading configuration: ${message}\n`)
  return CONFIG_EXIT_ERROR
}

async function writeConfig(filePath: string, text: string): Promise<number> {
  try {
    await writeFile(filePath, text, 'utf-8')
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`  Error: Failed to write file: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(filePath: string, opts: ConfigShowOptions = {}): Promise<number> {
  const registry = await loadRegistry(filePath)
  if (typeof registry === 'number') return registry

  const masked = registry.toPlainObject({ mask: true })
  const format = opts.format ?? 'yaml'

  if (format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# Configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }

  const unknown = registry.unknownKeys()
  if (unknown.length > 0) {
    process.stderr.write(`  Retained ${String(unknown.length)} unrecognized key(s): ${unknown.join(', ')}\n`)
  }

  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config validate` action
// ---------------------------------------------------------------------------

export async function runConfigValidate(filePath: string): Promise<number> {
  const registry = await loadRegistry(filePath)
  if (typeof registry === 'number') return registry

  const version = registry.getTyped('general', 'version')
  const migration = registry.migration
  if (migration !== null && migration.appliedSteps.length > 0) {
    process.stdout.write(
      `  Configuration is valid after migrating from version ${String(migration.fromVersion)} to ${String(version)}.\n`
    )
  } else {
    process.stdout.write(`  Configuration is valid (version ${String(version)}).\n`)
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config migrate` action
// ---------------------------------------------------------------------------

export interface ConfigMigrateOptions {
  /** Where to write the migrated config (default: overwrite the input) */
  output?: string
}

export async function runConfigMigrate(filePath: string, opts: ConfigMigrateOptions = {}): Promise<number> {
  const registry = await loadRegistry(filePath)
  if (typeof registry === 'number') return registry

  const migration = registry.migration
  const version = registry.getTyped('general', 'version')
  if (migration === null || migration.appliedSteps.length === 0) {
    process.stdout.write(`  Configuration is already at version ${String(version)}.\n`)
    return CONFIG_EXIT_SUCCESS
  }

  const target = opts.output ?? filePath
  const written = await writeConfig(target, registry.save())
  if (written !== CONFIG_EXIT_SUCCESS) return written

  process.stdout.write(
    `  Migrated ${filePath} from version ${String(migration.fromVersion)} to ${String(version)}:\n`
  )
  for (const step of migration.appliedSteps) {
    process.stdout.write(`    ${step}\n`)
  }
  if (target !== filePath) {
    process.stdout.write(`  Written to ${target}\n`)
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(filePath: string, keyPath: string): Promise<number> {
  const parts = splitKeyPath(keyPath)
  if (parts === null) {
    process.stderr.write(`  Error: key must look like "section.key", got "${keyPath}"\n`)
    return CONFIG_EXIT_INVALID
  }

  const registry = await loadRegistry(filePath)
  if (typeof registry === 'number') return registry

  try {
    process.stdout.write(`${encode(registry.get(parts[0], parts[1]))}\n`)
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof RegistryError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    throw err
  }
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

export async function runConfigSet(filePath: string, keyPath: string, rawValue: string): Promise<number> {
  const parts = splitKeyPath(keyPath)
  if (parts === null) {
    process.stderr.write(`  Error: key must look like "section.key", got "${keyPath}"\n`)
    return CONFIG_EXIT_INVALID
  }
  const [section, keyName] = parts

  const descriptor = defaultSchemaTable.lookup(section, keyName)
  if (descriptor === undefined) {
    process.stderr.write(`  Error: Unknown config key: ${keyPath}\n`)
    return CONFIG_EXIT_INVALID
  }

  const registry = await loadRegistry(filePath, { allowMissing: true })
  if (typeof registry === 'number') return registry

  try {
    registry.set(section, keyName, decode(rawValue, descriptor.type))
  } catch (err) {
    if (err instanceof RegistryError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    throw err
  }

  const written = await writeConfig(filePath, registry.save())
  if (written !== CONFIG_EXIT_SUCCESS) return written
  process.stdout.write(`  Set ${keyPath} = ${encode(registry.get(section, keyName))}\n`)
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

/**
 * Register the `config` command group on a Commander program.
 */
export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Inspect, validate, migrate and edit a configuration file')

  configCmd
    .command('show <file>')
    .description('Display the typed configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .action(async (file: string, opts: { format: string }) => {
      const exitCode = await runConfigShow(file, {
        format: opts.format === 'json' ? 'json' : 'yaml',
      })
      process.exit(exitCode)
    })

  configCmd
    .command('validate <file>')
    .description('Load a configuration and report every problem found')
    .action(async (file: string) => {
      process.exit(await runConfigValidate(file))
    })

  configCmd
    .command('migrate <file>')
    .description('Upgrade a configuration to the current schema version')
    .option('--output <file>', 'Write the migrated configuration here instead of in place')
    .action(async (file: string, opts: { output?: string }) => {
      const exitCode = await runConfigMigrate(file, {
        ...(opts.output !== undefined && { output: opts.output }),
      })
      process.exit(exitCode)
    })

  configCmd
    .command('get <file> <key>')
    .description('Print one value (key as section.key)')
    .action(async (file: string, keyPath: string) => {
      process.exit(await runConfigGet(file, keyPath))
    })

  configCmd
    .command('set <file> <key> <value>')
    .description('Update one value (key as section.key, value in config syntax)')
    .action(async (file: string, keyPath: string, value: string) => {
      process.exit(await runConfigSet(file, keyPath, value))
    })
}
