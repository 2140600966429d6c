/**
 * sync module: barrel exports
 */

export {
  openSyncContext,
  resolveWorldsDir,
  CUSTOM_WORLDS_DIR,
} from './sync-context.js'
export type { SyncContext, WorldsDirOptions, OpenSyncContextOptions } from './sync-context.js'
export { listWorlds, worldsInScope, orphanFiles } from './list-worlds.js'
export type { WorldRow } from './list-worlds.js'
export { checkWorlds } from './check-worlds.js'
export type { CheckOptions, CheckProgress, CheckResult } from './check-worlds.js'
export { updateWorlds, downloadTempName } from './update-worlds.js'
export type { UpdateAction, UpdateOptions, UpdateResult } from './update-worlds.js'
export {
  assetMatchesFile,
  findNewestAsset,
  scanReleases,
  resolveRepoWorld,
  resolveManualWorld,
  resolveWorld,
} from './version-resolver.js'
export type { ReleaseScan, WorldStatus, WorldResolution, ResolverState } from './version-resolver.js'
