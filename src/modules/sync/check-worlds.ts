/**
 * `check` operation: refresh cached release data, then list.
 */

import { createLogger } from '../../utils/logger.js'
import type { RepoId } from '../../core/types.js'
import type { SyncContext } from './sync-context.js'
import { listWorlds, worldsInScope, type WorldRow } from './list-worlds.js'

const logger = createLogger('check')

export interface CheckProgress {
  /** Zero-based position of the world being checked */
  index: number
  total: number
  name: string
}

export interface CheckOptions {
  /** Refetch even fresh release data */
  force?: boolean
  onProgress?: (progress: CheckProgress) => void
}

export interface CheckResult {
  rows: WorldRow[]
  /** Repositories actually fetched this run */
  fetched: RepoId[]
  /** Cached repositories dropped because nothing references them */
  pruned: RepoId[]
}

/**
 * Refresh the release record of every in-scope repo world, one at a time.
 * Each repository is fetched at most once per run; fresh records are skipped
 * unless `force` is set. With no names, records of unreferenced repositories
 * are removed from the cache.
 */
export async function checkWorlds(
  context: SyncContext,
  names: readonly string[] = [],
  options: CheckOptions = {}
): Promise<CheckResult> {
  const worlds = worldsInScope(context, names)
  const visited = new Set<RepoId>()
  const fetched: RepoId[] = []

  for (const [index, world] of worlds.entries()) {
    if (world.kind !== 'repo') continue
    options.onProgress?.({ index, total: worlds.length, name: world.name })
    if (visited.has(world.repoId)) continue
    visited.add(world.repoId)

    const didFetch = await context.cache.refreshRepo(world.repoId, context.source, {
      force: options.force,
    })
    if (didFetch) fetched.push(world.repoId)
  }

  let pruned: RepoId[] = []
  if (names.length === 0) {
    const configured = new Set<RepoId>()
    for (const world of context.config.worlds.values()) {
      if (world.kind === 'repo') configured.add(world.repoId)
    }
    pruned = await context.cache.pruneRepos(configured)
  }

  logger.debug({ fetched: fetched.length, pruned: pruned.length }, 'Check complete')
  return { rows: listWorlds(context, names), fetched, pruned }
}
