/**
 * WorldCache: local-file and remote-release state for one managed directory.
 *
 * One instance is opened per invocation and passed to every operation. Both
 * halves are persisted together in the cache document (cache-document.ts)
 * after every change.
 */

import { readdir, stat } from 'fs/promises'
import { join } from 'path'
import type { Stats } from 'fs'
import { childLogger, createLogger } from '../../utils/logger.js'
import { IOError } from '../../core/errors.js'
import type { LocalFileRecord, RemoteRepoRecord, RepoId } from '../../core/types.js'
import type { ReleaseSource } from '../release-source/release-source.js'
import { CACHE_FILE_NAME, readCacheDocument, writeCacheDocument } from './cache-document.js'
import { hashFile } from './file-hasher.js'

const logger = createLogger('cache')

/** Default number of seconds a fetched release list stays fresh */
export const DEFAULT_FRESHNESS_SECONDS = 3600

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface WorldCacheDeps {
  /** Digest function for local files (default: streaming SHA-256) */
  hashFile?: (path: string) => Promise<string>
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number
  freshnessSeconds?: number
}

export interface RefreshRepoOptions {
  /** Refetch even when the cached record is still fresh */
  force?: boolean
}

/**
 * Names the loader of the host application skips; they never count as worlds.
 */
export function isIgnoredFileName(name: string): boolean {
  return name.startsWith('_') || name.startsWith('.')
}

function fingerprintMatches(record: LocalFileRecord, stats: Stats): boolean {
  return (
    record.mtime === stats.mtimeMs / 1000 &&
    record.size === stats.size &&
    record.inode === stats.ino
  )
}

// ---------------------------------------------------------------------------
// WorldCache
// ---------------------------------------------------------------------------

export class WorldCache {
  readonly dir: string
  readonly files: Map<string, LocalFileRecord>
  readonly repos: Map<RepoId, RemoteRepoRecord>
  private readonly hash: (path: string) => Promise<string>
  private readonly now: () => number
  private readonly freshnessSeconds: number

  constructor(
    dir: string,
    state: { files?: Map<string, LocalFileRecord>; repos?: Map<RepoId, RemoteRepoRecord> } = {},
    deps: WorldCacheDeps = {}
  ) {
    this.dir = dir
    this.files = state.files ?? new Map()
    this.repos = state.repos ?? new Map()
    this.hash = deps.hashFile ?? hashFile
    this.now = deps.now ?? Date.now
    this.freshnessSeconds = deps.freshnessSeconds ?? DEFAULT_FRESHNESS_SECONDS
  }

  /**
   * Load the cache document of `dir` (empty when none exists yet).
   */
  static async open(dir: string, deps: WorldCacheDeps = {}): Promise<WorldCache> {
    const snapshot = await readCacheDocument(join(dir, CACHE_FILE_NAME))
    logger.debug(
      { dir, files: snapshot.files.size, repos: snapshot.repos.size },
      'Opened cache'
    )
    return new WorldCache(dir, snapshot, deps)
  }

  get documentPath(): string {
    return join(this.dir, CACHE_FILE_NAME)
  }

  /** Persist both halves of the cache atomically */
  async save(): Promise<void> {
    await writeCacheDocument(this.documentPath, { files: this.files, repos: this.repos })
  }

  // -------------------------------------------------------------------------
  // Local files
  // -------------------------------------------------------------------------

  /**
   * Bring the file records in line with the directory contents.
   *
   * Files whose mtime, size and inode all match their record keep the stored
   * digest; everything else is hashed. Records of vanished files are dropped.
   *
   * @returns true when any record was added, changed, or removed (and saved)
   */
  async refreshFiles(): Promise<boolean> {
    let names: string[]
    try {
      names = await readdir(this.dir)
    } catch (err) {
      throw new IOError('Failed to list', this.dir, err)
    }

    let dirty = false
    const outstanding = new Set(this.files.keys())

    for (const name of names.sort()) {
      if (isIgnoredFileName(name)) continue
      const path = join(this.dir, name)
      let stats: Stats
      try {
        stats = await stat(path)
      } catch (err) {
        throw new IOError('Failed to stat', path, err)
      }
      if (!stats.isFile()) continue

      outstanding.delete(name)
      const expected = this.files.get(name)
      if (expected !== undefined && fingerprintMatches(expected, stats)) continue

      logger.debug({ file: name, known: expected !== undefined }, 'Hashing file')
      this.files.set(name, {
        mtime: stats.mtimeMs / 1000,
        size: stats.size,
        inode: stats.ino,
        sha256Hex: await this.hash(path),
      })
      dirty = true
    }

    for (const name of outstanding) {
      this.files.delete(name)
      dirty = true
    }

    if (dirty) await this.save()
    return dirty
  }

  // -------------------------------------------------------------------------
  // Remote releases
  // -------------------------------------------------------------------------

  /**
   * Whether a record was fetched within the freshness window.
   */
  isFresh(record: RemoteRepoRecord): boolean {
    return this.now() / 1000 - record.lastChecked < this.freshnessSeconds
  }

  /**
   * Refetch a repository's releases unless the cached record is fresh.
   * The new record replaces the old one wholesale and is saved immediately.
   *
   * @returns true when a fetch happened
   */
  async refreshRepo(
    repoId: RepoId,
    source: ReleaseSource,
    options: RefreshRepoOptions = {}
  ): Promise<boolean> {
    const repoLogger = childLogger(logger, { repoId })
    const existing = this.repos.get(repoId)
    if (existing !== undefined && options.force !== true && this.isFresh(existing)) {
      repoLogger.debug({ lastChecked: existing.lastChecked }, 'Release data still fresh')
      return false
    }

    const lastChecked = this.now() / 1000
    const releases = await source.listReleases(repoId)
    this.repos.set(repoId, { lastChecked, releases })
    repoLogger.debug({ releases: releases.length }, 'Cached releases')
    await this.save()
    return true
  }

  /**
   * Drop records of repositories not in `keep`, saving when any were removed.
   *
   * @returns the removed repository ids, sorted
   */
  async pruneRepos(keep: ReadonlySet<RepoId>): Promise<RepoId[]> {
    const removed = [...this.repos.keys()].filter((repoId) => !keep.has(repoId)).sort()
    if (removed.length === 0) return removed
    for (const repoId of removed) this.repos.delete(repoId)
    logger.info({ repos: removed }, 'Dropped release data of unconfigured repos')
    await this.save()
    return removed
  }
}
