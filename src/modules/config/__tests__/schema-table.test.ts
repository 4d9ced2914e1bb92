/**
 * Unit tests for schema-table.ts
 */

import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { ConfigError } from '../../../core/errors.js'
import { SchemaTable, key } from '../schema-table.js'
import { defaultSchemaTable, CURRENT_SCHEMA_VERSION, MINIMUM_SCHEMA_VERSION } from '../schema-definition.js'
import { t } from '../value-types.js'

const general = {
  version: key(t.integer(), 3),
}

describe('key', () => {
  it('fills in defaults for omitted options', () => {
    const descriptor = key(t.boolean(), true)
    expect(descriptor.since).toBe(1)
    expect(descriptor.description).toBe('')
    expect(descriptor.sensitive).toBe(false)
    expect(descriptor.check).toBeUndefined()
    expect(Object.isFrozen(descriptor)).toBe(true)
  })
})

describe('SchemaTable', () => {
  // -------------------------------------------------------------------------
  // Lookup
  // -------------------------------------------------------------------------

  describe('lookup', () => {
    const table = new SchemaTable(
      {
        general,
        cache: {
          enabled: key(t.boolean(), false),
          size: key(t.integer(), 10, { check: z.number().int().min(0), since: 2 }),
        },
      },
      3,
      1
    )

    it('returns the descriptor of a known key', () => {
      expect(table.lookup('cache', 'size')?.default).toBe(10)
      expect(table.lookup('cache', 'size')?.since).toBe(2)
    })

    it('returns undefined for unknown sections and keys', () => {
      expect(table.lookup('cache', 'ttl')).toBeUndefined()
      expect(table.lookup('nope', 'enabled')).toBeUndefined()
    })

    it('lists sections and keys in definition order', () => {
      expect(table.sections()).toEqual(['general', 'cache'])
      expect(table.keys('cache')).toEqual(['enabled', 'size'])
      expect(table.keys('nope')).toEqual([])
      expect(table.hasSection('cache')).toBe(true)
      expect(table.hasSection('nope')).toBe(false)
    })

    it('reports the sections recognized at a version', () => {
      expect([...table.sectionsInVersion(1)]).toEqual(['general', 'cache'])
    })

    it('exposes the version range', () => {
      expect(table.currentVersion()).toBe(3)
      expect(table.minimumVersion()).toBe(1)
    })
  })

  // -------------------------------------------------------------------------
  // Definition checks
  // -------------------------------------------------------------------------

  describe('definition checks', () => {
    it('rejects a section without an enabled key', () => {
      expect(() => new SchemaTable({ general, cache: { size: key(t.integer(), 1) } }, 3)).toThrow(
        'Section "cache" must declare a boolean "enabled" key'
      )
    })

    it('rejects a non-boolean enabled key', () => {
      expect(() => new SchemaTable({ general, cache: { enabled: key(t.integer(), 1) } }, 3)).toThrow(
        ConfigError
      )
    })

    it('rejects a schema without general.version', () => {
      expect(() => new SchemaTable({ general: {} }, 3)).toThrow(
        'Schema must declare an integer "general.version" key'
      )
    })

    it('rejects a key introduced after the current version', () => {
      expect(
        () => new SchemaTable({ general: { ...general, late: key(t.boolean(), true, { since: 4 }) } }, 3)
      ).toThrow('Key "general.late" is introduced at version 4, after current version 3')
    })

    it('rejects a default of the wrong type', () => {
      expect(() => new SchemaTable({ general: { ...general, name: key(t.string(), 5) } }, 3)).toThrow(
        'Default for "general.name" is not a string'
      )
    })

    it('rejects a default that violates its constraint', () => {
      expect(
        () =>
          new SchemaTable(
            { general: { ...general, rate: key(t.integer(), -1, { check: z.number().min(0) }) } },
            3
          )
      ).toThrow('Default for "general.rate" violates its own constraint')
    })

    it('rejects a minimum version above the current one', () => {
      expect(() => new SchemaTable({ general }, 3, 4)).toThrow(
        'Minimum schema version 4 exceeds current version 3'
      )
    })
  })

  // -------------------------------------------------------------------------
  // Application schema
  // -------------------------------------------------------------------------

  describe('application schema', () => {
    it('uses the current and minimum versions', () => {
      expect(defaultSchemaTable.currentVersion()).toBe(CURRENT_SCHEMA_VERSION)
      expect(defaultSchemaTable.minimumVersion()).toBe(MINIMUM_SCHEMA_VERSION)
    })

    it('marks proxy credentials and the API key as sensitive', () => {
      expect(defaultSchemaTable.lookup('libtorrent', 'lt_proxyauth')?.sensitive).toBe(true)
      expect(defaultSchemaTable.lookup('libtorrent', 'anon_proxyauth')?.sensitive).toBe(true)
      expect(defaultSchemaTable.lookup('http_api', 'api_key')?.sensitive).toBe(true)
      expect(defaultSchemaTable.lookup('libtorrent', 'port')?.sensitive).toBe(false)
    })

    it('introduces trustchain at version 18', () => {
      expect(defaultSchemaTable.sectionsInVersion(17).has('trustchain')).toBe(false)
      expect(defaultSchemaTable.sectionsInVersion(18).has('trustchain')).toBe(true)
    })
  })
})
