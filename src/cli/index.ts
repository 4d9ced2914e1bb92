#!/usr/bin/env node
/**
 * p2pconf CLI - Main entry point
 * Provides the `p2pconf` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { logger } from '../utils/logger.js'
import { registerConfigCommand } from './commands/config.js'

/** Resolve the package version relative to this file (run from dist/ or src/) */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const candidates = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of candidates) {
    try {
      const content = await readFile(pkgPath, 'utf-8')
      const pkg = JSON.parse(content) as { version?: string; name?: string }
      if (pkg.name === 'p2pconf' && pkg.version !== undefined) {
        return pkg.version
      }
    } catch {
      // Try next path
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('p2pconf')
    .description('Versioned, schema-validated configuration for the peer-to-peer client')
    .version(version, '-v, --version', 'Output the current version')

  registerConfigCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
