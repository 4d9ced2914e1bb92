/**
 * Integration tests for the config registry: load → migrate → validate →
 * access → save
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import {
  ConfigError,
  ConfigLoadError,
  MigrationError,
  RegistryNotReadyError,
  UnknownKeyError,
  UnsupportedFutureVersionError,
  ValidationError,
} from '../../../core/errors.js'
import { ConfigMigrator } from '../config-migrator.js'
import { ConfigRegistryImpl, createConfigRegistry } from '../config-registry-impl.js'
import type { ConfigRegistry } from '../config-registry.js'
import { defaultSchemaTable } from '../schema-definition.js'
import { v } from '../value-types.js'

const silent = pino({ level: 'silent' })

let registry: ConfigRegistry

beforeEach(() => {
  registry = createConfigRegistry({ logger: silent })
})

function loadError(text: string): ConfigLoadError {
  try {
    registry.load(text)
  } catch (err) {
    if (err instanceof ConfigLoadError) return err
    throw err
  }
  throw new Error('expected load to fail')
}

// ---------------------------------------------------------------------------
// Loading and migration
// ---------------------------------------------------------------------------

describe('load', () => {
  it('migrates a version 17 configuration and enables trustchain', () => {
    registry.load('[general]\nversion = 17\n[libtorrent]\nport = 7000\n')
    expect(registry.getTyped('trustchain', 'enabled')).toBe(true)
    expect(registry.getTyped('general', 'version')).toBe(18)
    expect(registry.migration?.appliedSteps).toEqual(['17->18: trustchain section is introduced'])
    expect(registry.state).toBe('ready')
  })

  it('treats a configuration without a version as current', () => {
    registry.load('[libtorrent]\nport = 7000\n')
    expect(registry.getTyped('general', 'version')).toBe(18)
    expect(registry.migration?.appliedSteps).toEqual([])
  })

  it('rejects a configuration from a newer build and stays unloaded', () => {
    expect(() => registry.load('[general]\nversion = 999\n')).toThrow(UnsupportedFutureVersionError)
    expect(registry.state).toBe('unloaded')
  })

  it('rejects a version older than the migration chain', () => {
    expect(() => registry.load('[general]\nversion = 3\n')).toThrow(
      'Missing migration step: "3->4". Cannot migrate from version 3 to 18.'
    )
  })

  it('rejects a version that is not an integer', () => {
    expect(() => registry.load('[general]\nversion = seventeen\n')).toThrow(MigrationError)
    expect(registry.state).toBe('unloaded')
  })

  it('accepts a custom migrator', () => {
    const custom = new ConfigRegistryImpl(defaultSchemaTable, { migrator: new ConfigMigrator(), logger: silent })
    expect(() => custom.load('[general]\nversion = 17\n')).toThrow(MigrationError)
  })

  it('can only load once', () => {
    registry.load('')
    expect(() => registry.load('')).toThrow(ConfigError)
  })

  it('can retry after a failed load', () => {
    expect(() => registry.load('[general]\nversion = 999\n')).toThrow()
    registry.load('[general]\nversion = 18\n')
    expect(registry.state).toBe('ready')
  })
})

// ---------------------------------------------------------------------------
// Load reports
// ---------------------------------------------------------------------------

describe('load report', () => {
  it('reports an unreadable legacy value next to other problems', () => {
    const err = loadError(
      '[general]\nversion = 14\n[tunnel_community]\nsocks5_listen_port = abc\n[libtorrent]\nport = xyz\n'
    )
    expect(err.issues.map((issue) => [issue.code, issue.section, issue.key, issue.line])).toEqual([
      ['MALFORMED_VALUE', 'tunnel_community', 'socks5_listen_ports', 4],
      ['MALFORMED_VALUE', 'libtorrent', 'port', 6],
    ])
    expect(err.issues[0]?.raw).toBe('abc')
  })

  it('lists every malformed key across sections', () => {
    const err = loadError('[general]\nversion = 18\n[libtorrent]\nutp = maybe\n[http_api]\nport = eighty\n')
    expect(err.issues.map((issue) => `${issue.code} ${String(issue.section)}.${String(issue.key)}`)).toEqual([
      'MALFORMED_VALUE libtorrent.utp',
      'MALFORMED_VALUE http_api.port',
    ])
    expect(err.issues[0]?.line).toBe(4)
    expect(err.issues[1]?.raw).toBe('eighty')
    expect(registry.state).toBe('unloaded')
  })

  it('includes constraint violations and syntax problems', () => {
    const err = loadError('[general]\nversion = 18\nstray line\n[libtorrent]\nmax_download_rate = -5\n')
    expect(err.issues.map((issue) => issue.code)).toEqual(['CONFIG_SYNTAX', 'VALIDATION_ERROR'])
    expect(err.issues[1]?.message).toBe(
      'Invalid value for libtorrent.max_download_rate: Number must be greater than or equal to 0'
    )
  })

  it('reports problems left after migration', () => {
    const err = loadError('[general]\nversion = 17\n[trustchain]\nenabled = sometimes\n')
    expect(err.issues).toHaveLength(1)
    expect(err.issues[0]?.section).toBe('trustchain')
  })
})

// ---------------------------------------------------------------------------
// Typed access
// ---------------------------------------------------------------------------

describe('typed access', () => {
  beforeEach(() => {
    registry.load('[general]\nversion = 18\n[libtorrent]\nmax_download_rate = 100\n')
  })

  it('returns defaults for absent keys', () => {
    expect(registry.getTyped('libtorrent', 'max_upload_rate')).toBe(0)
    expect(registry.getTyped('general', 'nickname')).toBe('Swarm User')
    expect(registry.getTyped('libtorrent', 'anon_proxyserver')).toBeNull()
  })

  it('writes a valid value', () => {
    registry.setTyped('libtorrent', 'max_download_rate', 250)
    expect(registry.getTyped('libtorrent', 'max_download_rate')).toBe(250)
  })

  it('rejects a negative rate and keeps the prior value', () => {
    expect(() => registry.setTyped('libtorrent', 'max_download_rate', -5)).toThrow(ValidationError)
    expect(registry.getTyped('libtorrent', 'max_download_rate')).toBe(100)
    expect(registry.state).toBe('ready')
  })

  it('refuses to change the schema version', () => {
    expect(() => registry.setTyped('general', 'version', 999)).toThrow(ValidationError)
    expect(() => registry.setTyped('general', 'version', 15)).toThrow(ValidationError)
    expect(registry.getTyped('general', 'version')).toBe(18)

    const reloaded = createConfigRegistry({ logger: silent })
    reloaded.load(registry.save())
    expect(reloaded.getTyped('general', 'version')).toBe(18)
  })

  it('rejects a fractional integer', () => {
    expect(() => registry.setTyped('libtorrent', 'max_download_rate', 1.5)).toThrow(ValidationError)
  })

  it('writes addresses and lists', () => {
    registry.setTyped('libtorrent', 'anon_proxyserver', { host: '127.0.0.1', ports: [1080, 1081] })
    registry.setTyped('credit_mining', 'sources', ['channel-a'])
    expect(registry.getTyped('libtorrent', 'anon_proxyserver')).toEqual({
      host: '127.0.0.1',
      ports: [1080, 1081],
    })
    expect(registry.getTyped('credit_mining', 'sources')).toEqual(['channel-a'])
  })

  it('rejects a value outside an enumerated set', () => {
    expect(() => registry.setTyped('credit_mining', 'policy', 'fastest')).toThrow(ValidationError)
  })

  it('reports section enablement', () => {
    expect(registry.isEnabled('libtorrent')).toBe(true)
    expect(registry.isEnabled('http_api')).toBe(false)
    expect(registry.isEnabled('general')).toBe(true)
  })
})

describe('tagged access', () => {
  it('returns unknown keys as strings and refuses to write them', () => {
    registry.load('[libtorrent]\nfuture_option = (1, 2)\n')
    expect(registry.get('libtorrent', 'future_option')).toEqual(v.string('(1, 2)'))
    expect(() => registry.set('libtorrent', 'future_option', v.string('x'))).toThrow(UnknownKeyError)
    expect(registry.unknownKeys()).toEqual(['libtorrent.future_option'])
  })

  it('throws for a key neither known nor present', () => {
    registry.load('')
    expect(() => registry.get('libtorrent', 'nope')).toThrow(UnknownKeyError)
  })

  it('refuses access before load', () => {
    expect(() => registry.get('general', 'version')).toThrow(RegistryNotReadyError)
    expect(() => registry.save()).toThrow(RegistryNotReadyError)
  })
})

// ---------------------------------------------------------------------------
// Saving
// ---------------------------------------------------------------------------

describe('save', () => {
  it('writes an address literal back exactly as it was read', () => {
    const text = "[general]\nversion = 18\n\n[libtorrent]\nanon_proxyserver = ('127.0.0.1', [5,4,3,2,1])\n"
    registry.load(text)
    expect(registry.save()).toBe(text)
    expect(registry.state).toBe('saved')
  })

  it('keeps unknown keys and sections verbatim', () => {
    const text = '[general]\nversion = 18\nold_flag = yes please\n\n[plugins]\nlist = a,b\n'
    registry.load(text)
    expect(registry.save()).toBe(text)
  })

  it('writes the migrated version and new keys', () => {
    registry.load('[general]\nversion = 17\n')
    expect(registry.save()).toBe('[general]\nversion = 18\n\n[trustchain]\nenabled = True\n')
  })

  it('writes defaults that were read', () => {
    registry.load('[general]\nversion = 18\n')
    registry.getTyped('http_api', 'port')
    expect(registry.save()).toBe('[general]\nversion = 18\n\n[http_api]\nport = -1\n')
  })

  it('writes updated values in place', () => {
    registry.load('[libtorrent]\nmax_download_rate = 1\nutp = False\n')
    registry.setTyped('libtorrent', 'max_download_rate', 64)
    expect(registry.save()).toBe('[libtorrent]\nmax_download_rate = 64\nutp = False\n\n[general]\nversion = 18\n')
  })

  it('keeps accepting reads and writes after saving', () => {
    registry.load('')
    registry.save()
    registry.setTyped('http_api', 'enabled', true)
    expect(registry.isEnabled('http_api')).toBe(true)
  })
})

// ---------------------------------------------------------------------------
// Plain object view
// ---------------------------------------------------------------------------

describe('toPlainObject', () => {
  it('masks sensitive values that are set', () => {
    registry.load("[libtorrent]\nanon_proxyauth = ('user', 'test-secret')\n[http_api]\napi_key = test-key\n")
    const masked = registry.toPlainObject({ mask: true })
    expect(masked['libtorrent']?.['anon_proxyauth']).toBe('***')
    expect(masked['libtorrent']?.['lt_proxyauth']).toBeNull()
    expect(masked['http_api']?.['api_key']).toBe('***')
    expect(registry.toPlainObject()['http_api']?.['api_key']).toBe('test-key')
  })

  it('includes defaults without adding them to the saved text', () => {
    registry.load('[general]\nversion = 18\n')
    expect(registry.toPlainObject()['torrent_collecting']?.['magnet_timeout']).toBe(5)
    expect(registry.save()).toBe('[general]\nversion = 18\n')
  })
})

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

describe('logging', () => {
  it('logs applied migrations with the schema version bound', () => {
    const lines: string[] = []
    const stream = new Writable({
      write(chunk: Buffer, _encoding: string, callback: () => void) {
        lines.push(chunk.toString().trim())
        callback()
      },
    })
    const logged = createConfigRegistry({ logger: pino({ level: 'info' }, stream) })

    logged.load('[general]\nversion = 17\n')

    expect(lines).toHaveLength(1)
    const entry = JSON.parse(lines[0] ?? '{}') as Record<string, unknown>
    expect(entry).toMatchObject({
      msg: 'Configuration migrated',
      schemaVersion: 18,
      from: 17,
      to: 18,
      steps: ['17->18: trustchain section is introduced'],
    })
  })
})
