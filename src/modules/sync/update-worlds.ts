/**
 * `update` operation: download the newest asset of every outdated world and,
 * with no names given, delete files no world refers to.
 *
 * Works only from cached release data; a repo never checked is an error
 * rather than a reason to fetch. Each download lands in a hidden temporary
 * file and is renamed into place once complete, so an interrupted transfer
 * never leaves a partial file under a world's name.
 */

import { rename, rm, unlink } from 'fs/promises'
import { join } from 'path'
import { createLogger } from '../../utils/logger.js'
import { AssetNotFoundError, IOError, StaleDataError } from '../../core/errors.js'
import type { RepoId } from '../../core/types.js'
import type { SyncContext } from './sync-context.js'
import { orphanFiles, worldsInScope } from './list-worlds.js'
import { assetMatchesFile, findNewestAsset } from './version-resolver.js'

const logger = createLogger('update')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type UpdateAction =
  | {
      kind: 'download'
      world: string
      repoId: RepoId
      tagName: string
      fileName: string
      url: string
    }
  | {
      kind: 'delete'
      fileName: string
      path: string
    }

export interface UpdateOptions {
  /** Called before each action is carried out */
  onAction?: (action: UpdateAction) => void
}

export interface UpdateResult {
  /** Actions in the order they were performed */
  actions: UpdateAction[]
  downloaded: number
  deleted: number
}

/** Hidden name an in-flight download is written to */
export function downloadTempName(fileName: string): string {
  return `.${fileName}.download`
}

// ---------------------------------------------------------------------------
// Operation
// ---------------------------------------------------------------------------

export async function updateWorlds(
  context: SyncContext,
  names: readonly string[] = [],
  options: UpdateOptions = {}
): Promise<UpdateResult> {
  const { cache, source } = context
  const actions: UpdateAction[] = []
  const record = (action: UpdateAction): void => {
    actions.push(action)
    options.onAction?.(action)
  }

  let downloaded = 0
  for (const world of worldsInScope(context, names)) {
    if (world.kind === 'manual') continue

    const repo = cache.repos.get(world.repoId)
    if (repo === undefined) {
      throw new StaleDataError('check', { world: world.name, repoId: world.repoId })
    }

    const newest = findNewestAsset(repo.releases, world.assetName)
    if (newest === undefined) {
      throw new AssetNotFoundError(world.repoId, world.assetName)
    }

    const local = cache.files.get(world.assetName)
    if (local !== undefined && assetMatchesFile(newest.asset, local)) {
      logger.debug({ world: world.name, tagName: newest.release.tagName }, 'Already current')
      continue
    }

    const tagName = newest.release.tagName
    record({
      kind: 'download',
      world: world.name,
      repoId: world.repoId,
      tagName,
      fileName: world.assetName,
      url: source.downloadUrl(world.repoId, tagName, world.assetName),
    })

    const destPath = join(cache.dir, world.assetName)
    const tmpPath = join(cache.dir, downloadTempName(world.assetName))
    try {
      await source.downloadAsset(world.repoId, tagName, world.assetName, tmpPath)
    } catch (err) {
      await rm(tmpPath, { force: true })
      throw err
    }
    try {
      await rename(tmpPath, destPath)
    } catch (err) {
      await rm(tmpPath, { force: true })
      throw new IOError('Failed to move download into place at', destPath, err)
    }
    logger.info({ world: world.name, tagName, destPath }, 'Downloaded world')
    downloaded += 1
  }

  if (downloaded > 0) await cache.refreshFiles()

  let deleted = 0
  if (names.length === 0) {
    for (const fileName of orphanFiles(context)) {
      const path = join(cache.dir, fileName)
      record({ kind: 'delete', fileName, path })
      try {
        await unlink(path)
      } catch (err) {
        throw new IOError('Failed to delete', path, err)
      }
      logger.info({ path }, 'Deleted unlisted file')
      deleted += 1
    }
    if (deleted > 0) await cache.refreshFiles()
  }

  return { actions, downloaded, deleted }
}
