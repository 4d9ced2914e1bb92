/**
 * Credential masking for display output and Pino logger redaction.
 *
 * Proxy credentials and API keys must never appear in logs or in
 * `config show` output.
 */

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Pino redaction paths for credential-bearing config keys.
 * Pass this array to the `pino({ redact: ... })` option.
 *
 * @example
 * import pino from 'pino'
 * import { PINO_REDACT_PATHS } from './masking.js'
 * const logger = pino({ redact: PINO_REDACT_PATHS })
 */
export const PINO_REDACT_PATHS: string[] = [
  'api_key',
  '*.api_key',
  'lt_proxyauth',
  'anon_proxyauth',
  '*.lt_proxyauth',
  '*.anon_proxyauth',
]
