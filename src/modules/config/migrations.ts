/**
 * Migration steps from every supported persisted version to the current one.
 *
 * Steps work on raw text and decode old values with the types they had at
 * the time, not with the current schema. Keys a step introduces get the
 * defaults that applied at that version.
 */

import { MalformedValueError } from '../../core/errors.js'
import { ConfigMigrator, type MigrationStep } from './config-migrator.js'
import type { SectionStore } from './section-store.js'
import { decode, encode, isValidPort, PORT_UNSET } from './value-codec.js'
import { t, v } from './value-types.js'

const SOCKS5_PORT_COUNT = 5
const LEGACY_HOST_PORT_RE = /^([^\s:'"()[\]]+):(-?\d+)$/

/** The decoded integer, `undefined` when the key is absent, `null` when its text does not decode */
function readInteger(store: SectionStore, section: string, keyName: string): number | null | undefined {
  const raw = store.getRaw(section, keyName)
  if (raw === undefined) return undefined
  try {
    const value = decode(raw, t.integer())
    return value.tag === 'integer' ? value.value : null
  } catch (err) {
    if (err instanceof MalformedValueError) return null
    throw err
  }
}

function setIfAbsent(store: SectionStore, section: string, keyName: string, raw: string): void {
  if (!store.has(section, keyName)) store.setRaw(section, keyName, raw)
}

/** Move a key unless the target already exists; the source is removed either way */
function moveKey(
  store: SectionStore,
  section: string,
  keyName: string,
  toSection: string,
  toKey: string
): void {
  if (store.has(toSection, toKey)) {
    store.delete(section, keyName)
    return
  }
  store.rename(section, keyName, toSection, toKey)
}

export const MIGRATION_STEPS: readonly MigrationStep[] = [
  {
    from: 14,
    description: 'tunnel_community.socks5_listen_port becomes the socks5_listen_ports list',
    apply(store) {
      if (store.has('tunnel_community', 'socks5_listen_ports')) {
        store.delete('tunnel_community', 'socks5_listen_port')
        return
      }
      const old = readInteger(store, 'tunnel_community', 'socks5_listen_port')
      if (old === null) {
        // Unreadable text moves over as is; load validation reports it
        store.rename('tunnel_community', 'socks5_listen_port', 'tunnel_community', 'socks5_listen_ports')
        return
      }
      const first = old ?? PORT_UNSET
      const ports = Array.from({ length: SOCKS5_PORT_COUNT }, (_, i) => {
        if (first === PORT_UNSET) return PORT_UNSET
        const candidate = first + i
        return isValidPort(candidate) ? candidate : PORT_UNSET
      })
      // Renaming first keeps the key where the old one was in the file
      store.rename('tunnel_community', 'socks5_listen_port', 'tunnel_community', 'socks5_listen_ports')
      store.setRaw('tunnel_community', 'socks5_listen_ports', encode(v.list(ports.map(v.integer))))
    },
  },
  {
    from: 15,
    description: 'mainline DHT settings move from general to their own section',
    apply(store) {
      moveKey(store, 'general', 'mainline_dht', 'mainline_dht', 'enabled')
      moveKey(store, 'general', 'mainline_dht_port', 'mainline_dht', 'port')
      setIfAbsent(store, 'mainline_dht', 'enabled', 'True')
      setIfAbsent(store, 'mainline_dht', 'port', String(PORT_UNSET))
    },
  },
  {
    from: 16,
    description: 'proxy servers become (host, [ports]) addresses; credit mining is introduced',
    apply(store) {
      for (const keyName of ['lt_proxyserver', 'anon_proxyserver']) {
        const raw = store.getRaw('libtorrent', keyName)
        if (raw === undefined) continue
        const text = raw.trim()
        if (text === '') {
          store.setRaw('libtorrent', keyName, 'None')
          continue
        }
        const legacy = LEGACY_HOST_PORT_RE.exec(text)
        if (legacy !== null) {
          const port = Number(legacy[2])
          store.setRaw('libtorrent', keyName, encode(v.address(legacy[1] ?? '', [port])))
        }
      }
      store.delete('general', 'videoanalyserpath')
      setIfAbsent(store, 'credit_mining', 'enabled', 'False')
      setIfAbsent(store, 'credit_mining', 'sources', '[]')
    },
  },
  {
    from: 17,
    description: 'trustchain section is introduced',
    apply(store) {
      setIfAbsent(store, 'trustchain', 'enabled', 'True')
    },
  },
]

/** Create a migrator with every step of the running build registered */
export function createDefaultMigrator(): ConfigMigrator {
  const migrator = new ConfigMigrator()
  for (const step of MIGRATION_STEPS) migrator.register(step)
  return migrator
}

/** Singleton instance for use throughout the registry */
export const defaultConfigMigrator = createDefaultMigrator()
