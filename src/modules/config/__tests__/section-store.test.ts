/**
 * Unit tests for section-store.ts
 */

import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { MalformedValueError, UnknownKeyError, ValidationError } from '../../../core/errors.js'
import { parseConfigText } from '../config-text.js'
import { SchemaTable, key } from '../schema-table.js'
import { SectionStore, validateValue } from '../section-store.js'
import { t, v, type PlainAddress } from '../value-types.js'

const schema = new SchemaTable(
  {
    general: {
      version: key(t.integer(), 2),
      name: key(t.string(), 'node'),
    },
    network: {
      enabled: key(t.boolean(), true),
      port: key(t.integer(), -1, { check: z.number().int().min(-1).max(65535) }),
      proxy: key<PlainAddress | null>(t.nullable(t.address()), null),
    },
    cache: {
      enabled: key(t.boolean(), false),
    },
  },
  2
)

function storeFrom(text: string): SectionStore {
  return SectionStore.fromSections(schema, parseConfigText(text).sections)
}

describe('SectionStore', () => {
  // -------------------------------------------------------------------------
  // get
  // -------------------------------------------------------------------------

  describe('get', () => {
    it('decodes and validates a known key', () => {
      const store = storeFrom('[network]\nport = 7000')
      expect(store.get('network', 'port')).toEqual(v.integer(7000))
    })

    it('returns the cached value on repeated reads', () => {
      const store = storeFrom('[network]\nport = 7000')
      expect(store.get('network', 'port')).toBe(store.get('network', 'port'))
    })

    it('materializes an absent default and keeps it', () => {
      const store = storeFrom('[network]\nport = 7000')
      expect(store.get('network', 'enabled')).toEqual(v.boolean(true))
      expect(store.getRaw('network', 'enabled')).toBe('True')
      expect(store.keys('network')).toEqual(['port', 'enabled'])
    })

    it('materializes a default into a section missing from the text', () => {
      const store = storeFrom('[network]\nport = 7000')
      expect(store.get('general', 'name')).toEqual(v.string('node'))
      expect(store.sections()).toEqual(['network', 'general'])
    })

    it('returns an unknown loaded key as its raw string', () => {
      const store = storeFrom('[network]\nlegacy_flag = [1, 2')
      expect(store.get('network', 'legacy_flag')).toEqual(v.string('[1, 2'))
    })

    it('throws UnknownKeyError for a key neither known nor loaded', () => {
      const store = storeFrom('')
      expect(() => store.get('network', 'nope')).toThrow(UnknownKeyError)
    })

    it('prefixes decode errors with the key path', () => {
      const store = storeFrom('[network]\nport = seven')
      try {
        store.get('network', 'port')
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedValueError)
        if (!(err instanceof MalformedValueError)) return
        expect(err.message).toBe('network.port: Expected an integer, got "seven"')
        expect(err.raw).toBe('seven')
        expect(err.context).toMatchObject({ section: 'network', key: 'port' })
      }
    })

    it('throws ValidationError for a value outside its constraint', () => {
      const store = storeFrom('[network]\nport = 70000')
      expect(() => store.get('network', 'port')).toThrow(ValidationError)
    })
  })

  describe('peek', () => {
    it('returns the default without adding it', () => {
      const store = storeFrom('')
      expect(store.peek('network', 'port')).toEqual(v.integer(-1))
      expect(store.has('network', 'port')).toBe(false)
    })
  })

  // -------------------------------------------------------------------------
  // set
  // -------------------------------------------------------------------------

  describe('set', () => {
    it('replaces a value in place and re-encodes it', () => {
      const store = storeFrom('[network]\nport = 7000\nenabled = True')
      store.set('network', 'port', v.integer(7100))
      expect(store.getRaw('network', 'port')).toBe('7100')
      expect(store.keys('network')).toEqual(['port', 'enabled'])
      expect(store.lineOf('network', 'port')).toBe(2)
    })

    it('appends a key that was absent', () => {
      const store = storeFrom('[network]\nport = 7000')
      store.set('network', 'proxy', v.address('127.0.0.1', [1080]))
      expect(store.getRaw('network', 'proxy')).toBe("('127.0.0.1', [1080])")
    })

    it('keeps the previous value when the constraint fails', () => {
      const store = storeFrom('[network]\nport = 7000')
      expect(() => store.set('network', 'port', v.integer(-5))).toThrow(ValidationError)
      expect(store.get('network', 'port')).toEqual(v.integer(7000))
      expect(store.getRaw('network', 'port')).toBe('7000')
    })

    it('rejects a value of the wrong type', () => {
      const store = storeFrom('')
      expect(() => store.set('network', 'port', v.string('7000'))).toThrow(
        'Invalid value for network.port: expected integer, got string'
      )
    })

    it('only accepts the current schema version for general.version', () => {
      const store = storeFrom('[general]\nversion = 2')
      expect(() => store.set('general', 'version', v.integer(3))).toThrow(
        'Invalid value for general.version: the schema version can only be 2, the version this build writes'
      )
      expect(() => store.set('general', 'version', v.integer(1))).toThrow(ValidationError)
      expect(store.getRaw('general', 'version')).toBe('2')
      store.set('general', 'version', v.integer(2))
      expect(store.get('general', 'version')).toEqual(v.integer(2))
    })

    it('rejects unknown keys', () => {
      const store = storeFrom('[network]\nlegacy_flag = 1')
      expect(() => store.set('network', 'legacy_flag', v.integer(2))).toThrow(UnknownKeyError)
      expect(store.getRaw('network', 'legacy_flag')).toBe('1')
    })
  })

  // -------------------------------------------------------------------------
  // sectionEnabled
  // -------------------------------------------------------------------------

  describe('sectionEnabled', () => {
    it('treats general as always enabled', () => {
      expect(storeFrom('').sectionEnabled('general')).toBe(true)
    })

    it('reads the enabled key, falling back to its default', () => {
      const store = storeFrom('[network]\nenabled = False')
      expect(store.sectionEnabled('network')).toBe(false)
      expect(store.sectionEnabled('cache')).toBe(false)
    })

    it('throws for a section outside the schema', () => {
      expect(() => storeFrom('').sectionEnabled('nope')).toThrow('Unknown config key: nope.enabled')
    })
  })

  // -------------------------------------------------------------------------
  // Raw access
  // -------------------------------------------------------------------------

  describe('raw access', () => {
    it('drops the cached value when the raw text changes', () => {
      const store = storeFrom('[network]\nport = 7000')
      store.get('network', 'port')
      store.setRaw('network', 'port', '7200')
      expect(store.get('network', 'port')).toEqual(v.integer(7200))
    })

    it('renames within a section keeping the position', () => {
      const store = storeFrom('[network]\na = 1\nb = 2\nc = 3')
      expect(store.rename('network', 'b', 'network', 'port')).toBe(true)
      expect(store.keys('network')).toEqual(['a', 'port', 'c'])
      expect(store.getRaw('network', 'port')).toBe('2')
    })

    it('keeps the source line of a renamed key', () => {
      const store = storeFrom('[network]\nold_port = 1')
      store.rename('network', 'old_port', 'network', 'port')
      expect(store.lineOf('network', 'port')).toBe(2)
    })

    it('renames across sections by appending', () => {
      const store = storeFrom('[general]\nport = 1\n[network]\nenabled = True')
      store.rename('general', 'port', 'network', 'port')
      expect(store.has('general', 'port')).toBe(false)
      expect(store.keys('network')).toEqual(['enabled', 'port'])
    })

    it('reports a missing rename source', () => {
      expect(storeFrom('').rename('network', 'a', 'network', 'b')).toBe(false)
    })

    it('deletes keys', () => {
      const store = storeFrom('[network]\nport = 1')
      expect(store.delete('network', 'port')).toBe(true)
      expect(store.delete('network', 'port')).toBe(false)
    })

    it('omits empty sections from the dump', () => {
      const store = storeFrom('[network]\nport = 1\n[cache]\nenabled = True')
      store.delete('cache', 'enabled')
      expect(store.rawDump()).toEqual([{ name: 'network', entries: [{ key: 'port', raw: '1', line: 2 }] }])
    })

    it('clones independently', () => {
      const store = storeFrom('[network]\nport = 1')
      const copy = store.clone()
      copy.setRaw('network', 'port', '2')
      copy.setRaw('cache', 'enabled', 'True')
      expect(store.getRaw('network', 'port')).toBe('1')
      expect(store.hasSection('cache')).toBe(false)
    })
  })
})

describe('validateValue', () => {
  const descriptor = key(t.integer(), 0, { check: z.number().int().min(0, 'must be at least 0') })

  it('accepts a conforming value', () => {
    expect(() => validateValue('s', 'k', descriptor, v.integer(3))).not.toThrow()
  })

  it('names the failed constraint', () => {
    expect(() => validateValue('s', 'k', descriptor, v.integer(-1))).toThrow(
      'Invalid value for s.k: must be at least 0'
    )
  })
})
