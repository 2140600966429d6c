/**
 * Per-invocation context shared by the list, check, and update operations.
 *
 * Opening a context resolves the managed directory, loads the config, opens
 * the cache, and rescans the directory, so every operation starts from the
 * files actually on disk.
 */

import { mkdir, stat } from 'fs/promises'
import { join, resolve } from 'path'
import { createLogger } from '../../utils/logger.js'
import { ConfigError, IOError, NotFoundError } from '../../core/errors.js'
import { loadConfig, type WorldSyncConfig } from '../config/config-loader.js'
import { WorldCache } from '../cache/world-cache.js'
import type { ReleaseSource } from '../release-source/release-source.js'
import { GitHubReleaseSource } from '../release-source/github-release-source.js'

const logger = createLogger('sync-context')

/** Directory inside an Archipelago checkout that holds custom worlds */
export const CUSTOM_WORLDS_DIR = 'custom_worlds'

export interface SyncContext {
  readonly config: WorldSyncConfig
  readonly cache: WorldCache
  readonly source: ReleaseSource
}

export interface WorldsDirOptions {
  /** Archipelago checkout; its custom_worlds/ must already exist */
  repo?: string
  /** Worlds directory used directly; created when missing */
  dir?: string
}

export interface OpenSyncContextOptions extends WorldsDirOptions {
  configPath: string
  env?: NodeJS.ProcessEnv
  /** Replaces the GitHub source (tests, alternative hosts) */
  source?: ReleaseSource
  /** Clock in epoch milliseconds, shared by the cache and the default source */
  now?: () => number
}

/**
 * Resolve the managed directory from exactly one of `repo` / `dir`.
 *
 * @throws {NotFoundError} when `repo` has no custom_worlds/ directory
 */
export async function resolveWorldsDir(options: WorldsDirOptions): Promise<string> {
  if ((options.repo === undefined) === (options.dir === undefined)) {
    throw new ConfigError('Give exactly one of --repo or --dir')
  }

  if (options.repo !== undefined) {
    const worldsDir = resolve(join(options.repo, CUSTOM_WORLDS_DIR))
    const isDir = await stat(worldsDir).then(
      (stats) => stats.isDirectory(),
      () => false
    )
    if (!isDir) {
      throw new NotFoundError(worldsDir, 'run the Archipelago setup in that checkout first')
    }
    return worldsDir
  }

  const worldsDir = resolve(options.dir ?? '')
  try {
    await mkdir(worldsDir, { recursive: true })
  } catch (err) {
    throw new IOError('Failed to create', worldsDir, err)
  }
  return worldsDir
}

/**
 * Build the context for one invocation.
 */
export async function openSyncContext(options: OpenSyncContextOptions): Promise<SyncContext> {
  const dir = await resolveWorldsDir(options)
  const config = await loadConfig(options.configPath, options.env)
  const { settings } = config

  const cache = await WorldCache.open(dir, {
    freshnessSeconds: settings.freshness_seconds,
    now: options.now,
  })
  await cache.refreshFiles()

  const source =
    options.source ??
    new GitHubReleaseSource({
      apiBaseUrl: settings.api_base_url,
      downloadBaseUrl: settings.download_base_url,
      timeoutMs: settings.request_timeout_ms,
      token: settings.github_token,
      now: options.now,
    })

  logger.debug({ dir, worlds: config.worlds.size, files: cache.files.size }, 'Opened sync context')
  return { config, cache, source }
}
