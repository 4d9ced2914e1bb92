/**
 * Barrel exports for the config module.
 */

export { createConfigRegistry, ConfigRegistryImpl } from './config-registry-impl.js'
export type {
  ConfigRegistry,
  ConfigRegistryOptions,
  RegistryState,
  PlainObjectOptions,
} from './config-registry.js'
export {
  SCHEMA_DEFINITION,
  CURRENT_SCHEMA_VERSION,
  MINIMUM_SCHEMA_VERSION,
  defaultSchemaTable,
} from './schema-definition.js'
export type { AppSchema } from './schema-definition.js'
export {
  SchemaTable,
  key,
  ENABLED_KEY,
  GENERAL_SECTION,
  VERSION_KEY,
} from './schema-table.js'
export type {
  KeyDescriptor,
  KeyOptions,
  SchemaDefinition,
  SectionName,
  KeyName,
  ValueOf,
} from './schema-table.js'
export { SectionStore, validateValue } from './section-store.js'
export { parseConfigText, formatConfigText } from './config-text.js'
export type { RawEntry, RawSection, ParsedConfigText } from './config-text.js'
export { ConfigMigrator, stepKey } from './config-migrator.js'
export type { MigrationStep, MigrationResult } from './config-migrator.js'
export { MIGRATION_STEPS, createDefaultMigrator, defaultConfigMigrator } from './migrations.js'
export { decode, encode, isValidPort, NULL_LITERAL, PORT_MAX, PORT_UNSET } from './value-codec.js'
export { t, v, conformsTo, describeType, toPlain, fromPlain } from './value-types.js'
export type { Value, ValueTag, ValueType, PlainValue, PlainAddress } from './value-types.js'
export {
  parseVersion,
  formatUnsupportedVersionError,
} from './version-utils.js'
