/**
 * Schema for every subsystem the application configures.
 *
 * Sections:
 *  - general (always active; carries the schema version)
 *  - network listeners: libtorrent, tunnel_community, mainline_dht, dht, ipv8
 *  - torrent handling: torrent_checking, torrent_store, torrent_collecting
 *  - local services: video_server, watch_folder, http_api, resource_monitor, upgrader
 *  - credit_mining, trustchain
 */

import { z } from 'zod'
import { SchemaTable, key, type SchemaDefinition } from './schema-table.js'
import { PORT_MAX, PORT_UNSET } from './value-codec.js'
import { t, type PlainAddress } from './value-types.js'

/** Schema version this build reads and writes */
export const CURRENT_SCHEMA_VERSION = 18

/** Oldest persisted version with a migration path to the current one */
export const MINIMUM_SCHEMA_VERSION = 14

// ---------------------------------------------------------------------------
// Shared constraints
// ---------------------------------------------------------------------------

const port = z.number().int().min(PORT_UNSET).max(PORT_MAX)
const nonNegative = z.number().int().min(0)
const positive = z.number().int().min(1)
const nonNegativeFloat = z.number().min(0)
/** 0 = none, 1 = SOCKS4, 2 = SOCKS5, 3 = SOCKS5 with auth, 4 = HTTP, 5 = HTTP with auth */
const proxyType = z.number().int().min(0).max(5)
const proxyServer = z.object({ host: z.string().min(1), ports: z.array(port).min(1) }).nullable()

type Credentials = readonly [string, string]

// ---------------------------------------------------------------------------
// Definition
// ---------------------------------------------------------------------------

export const SCHEMA_DEFINITION = {
  general: {
    version: key(t.integer(), CURRENT_SCHEMA_VERSION, {
      check: positive,
      description: 'Schema version of the persisted configuration',
    }),
    state_dir: key<string | null>(t.nullable(t.string()), null, {
      description: 'Directory holding databases, keys and downloaded metadata',
    }),
    log_dir: key<string | null>(t.nullable(t.string()), null),
    ec_keypair_filename: key<string | null>(t.nullable(t.string()), null, {
      description: 'Path to the permanent identity key pair',
    }),
    nickname: key(t.string(), 'Swarm User'),
    megacache: key(t.boolean(), true),
    family_filter: key(t.boolean(), true),
    ipv6_enabled: key(t.boolean(), false),
    timeout: key(t.float(), 300.0, { check: nonNegativeFloat }),
    timeout_check_interval: key(t.float(), 60.0, { check: nonNegativeFloat }),
  },

  libtorrent: {
    enabled: key(t.boolean(), true),
    port: key(t.integer(), PORT_UNSET, { check: port }),
    lt_proxytype: key(t.integer(), 0, { check: proxyType }),
    lt_proxyserver: key<PlainAddress | null>(t.nullable(t.address()), null, { check: proxyServer }),
    lt_proxyauth: key<Credentials | null>(t.nullable(t.tuple(t.string(), t.string())), null, {
      sensitive: true,
      description: 'Username and password for the regular download proxy',
    }),
    anon_listen_port: key(t.integer(), PORT_UNSET, { check: port }),
    anon_proxytype: key(t.integer(), 0, { check: proxyType }),
    anon_proxyserver: key<PlainAddress | null>(t.nullable(t.address()), null, {
      check: proxyServer,
      description: 'SOCKS5 endpoint used for anonymous downloads',
    }),
    anon_proxyauth: key<Credentials | null>(t.nullable(t.tuple(t.string(), t.string())), null, {
      sensitive: true,
    }),
    max_connections_download: key(t.integer(), -1, { check: z.number().int().min(-1) }),
    max_download_rate: key(t.integer(), 0, {
      check: nonNegative,
      description: 'Download rate limit in KiB/s (0 = unlimited)',
    }),
    max_upload_rate: key(t.integer(), 0, {
      check: nonNegative,
      description: 'Upload rate limit in KiB/s (0 = unlimited)',
    }),
    utp: key(t.boolean(), true),
    dht: key(t.boolean(), true),
  },

  tunnel_community: {
    enabled: key(t.boolean(), true),
    socks5_listen_ports: key<readonly number[]>(t.list(t.integer()), [-1, -1, -1, -1, -1], {
      check: z.array(port).length(5),
      since: 15,
    }),
    exitnode_enabled: key(t.boolean(), false),
    random_slots: key(t.integer(), 5, { check: nonNegative }),
    competing_slots: key(t.integer(), 15, { check: nonNegative }),
  },

  mainline_dht: {
    enabled: key(t.boolean(), true, { since: 16 }),
    port: key(t.integer(), PORT_UNSET, { check: port, since: 16 }),
  },

  dht: {
    enabled: key(t.boolean(), true),
  },

  ipv8: {
    enabled: key(t.boolean(), true),
    port: key(t.integer(), 7759, { check: port }),
    address: key(t.string(), '0.0.0.0', { check: z.string().min(1) }),
    bootstrap_override: key<string | null>(t.nullable(t.string()), null),
    statistics: key(t.boolean(), false),
  },

  torrent_checking: {
    enabled: key(t.boolean(), true),
    period: key(t.integer(), 31, { check: positive, description: 'Seconds between tracker checks' }),
  },

  torrent_store: {
    enabled: key(t.boolean(), true),
    store_dir: key<string | null>(t.nullable(t.string()), null),
  },

  torrent_collecting: {
    enabled: key(t.boolean(), true),
    max_torrents: key(t.integer(), 50000, {
      check: nonNegative,
      description: 'Collected torrents kept before the oldest are evicted',
    }),
    directory: key<string | null>(t.nullable(t.string()), null),
    stop_collecting_threshold: key(t.integer(), 200, {
      check: nonNegative,
      description: 'Free disk space in MiB below which collecting stops',
    }),
    magnet_timeout: key(t.float(), 5.0, {
      check: nonNegativeFloat,
      description: 'Seconds to wait for magnet metadata before giving up',
    }),
    overflow_check_interval: key(t.integer(), 30 * 60, { check: positive }),
  },

  video_server: {
    enabled: key(t.boolean(), true),
    port: key(t.integer(), PORT_UNSET, { check: port }),
  },

  watch_folder: {
    enabled: key(t.boolean(), false),
    directory: key<string | null>(t.nullable(t.string()), null),
  },

  http_api: {
    enabled: key(t.boolean(), false),
    port: key(t.integer(), PORT_UNSET, { check: port }),
    retry_port: key(t.boolean(), false),
    api_key: key<string | null>(t.nullable(t.string()), null, { sensitive: true }),
  },

  credit_mining: {
    enabled: key(t.boolean(), false, { since: 17 }),
    sources: key<readonly string[]>(t.list(t.string()), [], { since: 17 }),
    max_torrents_active: key(t.integer(), 50, { check: positive, since: 17 }),
    max_disk_space: key(t.integer(), 50 * 1024 * 1024 * 1024, {
      check: nonNegative,
      since: 17,
      description: 'Bytes of disk the miner may fill',
    }),
    policy: key(t.string(), 'seederratio', {
      check: z.enum(['random', 'seederratio', 'upload']),
      since: 17,
    }),
  },

  trustchain: {
    enabled: key(t.boolean(), true, { since: 18 }),
    ec_keypair_filename: key<string | null>(t.nullable(t.string()), null, { since: 18 }),
    live_edges_enabled: key(t.boolean(), true, { since: 18 }),
  },

  resource_monitor: {
    enabled: key(t.boolean(), true),
    cpu_priority: key(t.integer(), 1, { check: z.number().int().min(0).max(5) }),
    poll_interval: key(t.integer(), 5, { check: positive }),
    history_size: key(t.integer(), 20, { check: positive }),
  },

  upgrader: {
    enabled: key(t.boolean(), true),
  },
} satisfies SchemaDefinition

export type AppSchema = typeof SCHEMA_DEFINITION

/** Schema table for the running build */
export const defaultSchemaTable = new SchemaTable(
  SCHEMA_DEFINITION,
  CURRENT_SCHEMA_VERSION,
  MINIMUM_SCHEMA_VERSION
)
