/**
 * Error definitions for world-sync
 * Every fatal condition of a run is one of these classes, each carrying the
 * context a user needs to act on it.
 */

/** Base error class for all world-sync errors */
export class WorldSyncError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'WorldSyncError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WorldSyncError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a world definition or a requested name is invalid */
export class ConfigError extends WorldSyncError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when an expected path does not exist */
export class NotFoundError extends WorldSyncError {
  constructor(path: string, hint?: string) {
    super(hint ? `Not found: ${path} (${hint})` : `Not found: ${path}`, 'NOT_FOUND', {
      path,
    })
    this.name = 'NotFoundError'
  }
}

/** Error thrown when cached remote data is required but has never been fetched */
export class StaleDataError extends WorldSyncError {
  constructor(remedy: string, context: Record<string, unknown> = {}) {
    super(`No release data cached; run '${remedy}' first`, 'STALE_DATA', {
      remedy,
      ...context,
    })
    this.name = 'StaleDataError'
  }
}

/** Error thrown when the releases API reports an exhausted quota */
export class RateLimitError extends WorldSyncError {
  public readonly waitSeconds: number

  constructor(waitSeconds: number, formattedWait: string, context: Record<string, unknown> = {}) {
    super(
      `GitHub is rate limiting requests; wait ${formattedWait} before trying again`,
      'RATE_LIMITED',
      { waitSeconds, ...context }
    )
    this.name = 'RateLimitError'
    this.waitSeconds = waitSeconds
  }
}

/** Error thrown when a configured asset is missing from every known release */
export class AssetNotFoundError extends WorldSyncError {
  constructor(repoId: string, assetName: string) {
    super(
      `Asset "${assetName}" not found in any release from https://github.com/${repoId}/releases`,
      'ASSET_NOT_FOUND',
      { repoId, assetName }
    )
    this.name = 'AssetNotFoundError'
  }
}

/** Error thrown when reading, writing, renaming, or hashing a file fails */
export class IOError extends WorldSyncError {
  constructor(message: string, path: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : ''
    super(`${message} ${path}${detail}`, 'IO_ERROR', { path })
    this.name = 'IOError'
  }
}

/** Error thrown when a release listing or download request fails */
export class ReleaseFetchError extends WorldSyncError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'RELEASE_FETCH_ERROR', context)
    this.name = 'ReleaseFetchError'
  }
}

/** Error thrown when the persisted cache document fails validation */
export class CacheFormatError extends WorldSyncError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CACHE_FORMAT_ERROR', context)
    this.name = 'CacheFormatError'
  }
}
