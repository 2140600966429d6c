/**
 * world-sync - keeps a directory of release-published plugin files in sync
 * with upstream GitHub releases.
 */

// Core types and errors
export type {
  RepoId,
  TrackedWorld,
  RepoSourcedWorld,
  ManualWorld,
  LocalFileRecord,
  Asset,
  Release,
  RemoteRepoRecord,
} from './core/types.js'
export { worldFileName } from './core/types.js'
export {
  WorldSyncError,
  ConfigError,
  NotFoundError,
  StaleDataError,
  RateLimitError,
  AssetNotFoundError,
  IOError,
  ReleaseFetchError,
  CacheFormatError,
} from './core/errors.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/cache/index.js'
export * from './modules/release-source/index.js'
export * from './modules/sync/index.js'

// Utilities
export { createLogger, childLogger } from './utils/logger.js'
export type { LoggerOptions } from './utils/logger.js'
