/**
 * `list` operation: classify every in-scope world from cached state only.
 */

import { assertKnownWorlds } from '../config/config-loader.js'
import type { TrackedWorld } from '../../core/types.js'
import { worldFileName } from '../../core/types.js'
import type { SyncContext } from './sync-context.js'
import { resolveWorld, type WorldStatus } from './version-resolver.js'

export interface WorldRow {
  name: string
  version: string
  status: WorldStatus
}

/**
 * Configured worlds an operation applies to, in config order.
 * An empty name list means every world.
 */
export function worldsInScope(
  context: Pick<SyncContext, 'config'>,
  names: readonly string[]
): TrackedWorld[] {
  assertKnownWorlds(context.config, names)
  const wanted = new Set(names)
  return [...context.config.worlds.values()].filter(
    (world) => wanted.size === 0 || wanted.has(world.name)
  )
}

/**
 * Files in the managed directory that no configured world refers to, sorted.
 */
export function orphanFiles(context: Pick<SyncContext, 'config' | 'cache'>): string[] {
  const referenced = new Set([...context.config.worlds.values()].map(worldFileName))
  return [...context.cache.files.keys()].filter((name) => !referenced.has(name)).sort()
}

/**
 * One row per in-scope world. With no names, orphan files follow as
 * "not listed in config" rows.
 */
export function listWorlds(context: SyncContext, names: readonly string[] = []): WorldRow[] {
  const rows: WorldRow[] = worldsInScope(context, names).map((world) => ({
    name: world.name,
    ...resolveWorld(world, context.cache),
  }))

  if (names.length === 0) {
    for (const fileName of orphanFiles(context)) {
      rows.push({ name: fileName, version: '', status: 'not listed in config' })
    }
  }
  return rows
}
