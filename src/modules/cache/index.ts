/**
 * cache module: barrel exports
 */

export { WorldCache, DEFAULT_FRESHNESS_SECONDS, isIgnoredFileName } from './world-cache.js'
export type { WorldCacheDeps, RefreshRepoOptions } from './world-cache.js'
export {
  CACHE_FILE_NAME,
  CacheDocumentSchema,
  readCacheDocument,
  writeCacheDocument,
  serializeCacheDocument,
  fromDocument,
  toDocument,
} from './cache-document.js'
export type { CacheDocument, CacheSnapshot } from './cache-document.js'
export { hashFile, HASH_CHUNK_SIZE } from './file-hasher.js'
