/**
 * Error definitions for the configuration registry
 * Provides the structured error hierarchy raised by load, migrate, get and set
 */

/** Base error class for all registry errors */
export class RegistryError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'RegistryError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RegistryError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown for invalid schema definitions and other programming errors */
export class ConfigError extends RegistryError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when raw text cannot be decoded as the expected value type */
export class MalformedValueError extends RegistryError {
  public readonly raw: string

  constructor(message: string, raw: string, context: Record<string, unknown> = {}) {
    super(message, 'MALFORMED_VALUE', { raw, ...context })
    this.name = 'MalformedValueError'
    this.raw = raw
  }
}

/** Error thrown when a key is neither in the schema nor in the raw store */
export class UnknownKeyError extends RegistryError {
  public readonly section: string
  public readonly key: string

  constructor(section: string, key: string) {
    super(`Unknown config key: ${section}.${key}`, 'UNKNOWN_KEY', { section, key })
    this.name = 'UnknownKeyError'
    this.section = section
    this.key = key
  }
}

/** Error thrown when a decoded value violates its key's constraint */
export class ValidationError extends RegistryError {
  public readonly section: string
  public readonly key: string
  public readonly constraint: string

  constructor(section: string, key: string, constraint: string) {
    super(`Invalid value for ${section}.${key}: ${constraint}`, 'VALIDATION_ERROR', {
      section,
      key,
      constraint,
    })
    this.name = 'ValidationError'
    this.section = section
    this.key = key
    this.constraint = constraint
  }
}

/** Error thrown when no contiguous migration path covers a version range */
export class MigrationError extends RegistryError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'MIGRATION_ERROR', context)
    this.name = 'MigrationError'
  }
}

/** Error thrown when a persisted config comes from a newer schema than the running one */
export class UnsupportedFutureVersionError extends RegistryError {
  public readonly version: number
  public readonly currentVersion: number

  constructor(version: number, currentVersion: number) {
    super(
      `Configuration version ${String(version)} is newer than the supported version ${String(currentVersion)}. ` +
        'Downgrading a configuration is not supported.',
      'UNSUPPORTED_FUTURE_VERSION',
      { version, currentVersion }
    )
    this.name = 'UnsupportedFutureVersionError'
    this.version = version
    this.currentVersion = currentVersion
  }
}

/** Error thrown when the registry is used before it reached the ready state */
export class RegistryNotReadyError extends RegistryError {
  constructor(operation: string, state: string) {
    super(
      `Configuration registry is not ready (state: ${state}). Call load() before ${operation}().`,
      'REGISTRY_NOT_READY',
      { operation, state }
    )
    this.name = 'RegistryNotReadyError'
  }
}

/** A single problem found while loading a configuration */
export interface LoadIssue {
  code: 'MALFORMED_VALUE' | 'VALIDATION_ERROR' | 'CONFIG_SYNTAX'
  message: string
  section?: string
  key?: string
  raw?: string
  line?: number
}

/** Error thrown when a load finds one or more problems; carries all of them */
export class ConfigLoadError extends RegistryError {
  public readonly issues: readonly LoadIssue[]

  constructor(issues: readonly LoadIssue[]) {
    const lines = issues.map((issue) => `  • ${formatIssueLocation(issue)}${issue.message}`)
    super(
      `Configuration load failed with ${String(issues.length)} issue(s):\n${lines.join('\n')}`,
      'CONFIG_LOAD_FAILED',
      { issues }
    )
    this.name = 'ConfigLoadError'
    this.issues = issues
  }
}

function formatIssueLocation(issue: LoadIssue): string {
  const where =
    issue.section !== undefined && issue.key !== undefined
      ? `${issue.section}.${issue.key}`
      : issue.section
  const line = issue.line !== undefined ? `line ${String(issue.line)}` : undefined
  const parts = [where, line].filter((p): p is string => p !== undefined)
  return parts.length > 0 ? `${parts.join(' @ ')}: ` : ''
}
