/**
 * Barrel exports for the config module.
 */

export {
  loadConfig,
  parseConfig,
  parseRepoId,
  toTrackedWorld,
  readEnvOverrides,
  assertKnownWorlds,
} from './config-loader.js'
export type { WorldSyncConfig } from './config-loader.js'
export {
  SettingsSchema,
  PartialSettingsSchema,
  WorldEntrySchema,
  ConfigFileSchema,
} from './config-schema.js'
export type { Settings, PartialSettings, WorldEntry, ConfigFile } from './config-schema.js'
export { DEFAULT_SETTINGS, DEFAULT_CONFIG_FILE } from './defaults.js'
