/**
 * Version utility functions for the persisted schema version.
 *
 * Pure helpers for parsing `general.version` and reporting a version the
 * running build cannot read.
 */

import { MigrationError } from '../../core/errors.js'

/**
 * Parse a raw `general.version` value into a number.
 *
 * @param raw - Raw text such as "17"
 * @returns The integer value
 * @throws {MigrationError} if the text is not a non-negative integer
 */
export function parseVersion(raw: string): number {
  const text = raw.trim()
  // Digits only: no signs, dots or exponents
  if (!/^\d+$/.test(text)) {
    throw new MigrationError(
      `Invalid configuration version "${raw}": expected a non-negative integer (e.g. "17").`,
      { raw }
    )
  }
  return Number(text)
}

/**
 * Format the standard "written by a newer build" message.
 *
 * @param version - The persisted version found
 * @param current - The running schema's version
 * @param minimum - The oldest version a migration path exists from
 */
export function formatUnsupportedVersionError(version: number, current: number, minimum: number): string {
  return (
    `Configuration version ${String(version)} was written by a newer build. ` +
    `This build supports versions ${String(minimum)} to ${String(current)}; please upgrade.`
  )
}
