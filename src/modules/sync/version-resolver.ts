/**
 * Version resolution: which release (if any) a local file is, and whether it
 * is the newest one carrying the configured asset.
 *
 * File names are not trusted to encode a version. A file is identified by its
 * SHA-256 digest, or by its size when the publisher attached no digest.
 */

import type {
  Asset,
  LocalFileRecord,
  ManualWorld,
  Release,
  RemoteRepoRecord,
  RepoSourcedWorld,
  TrackedWorld,
} from '../../core/types.js'
import { worldFileName } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Outcome of scanning a release list for the release a local file came from */
export type ReleaseScan =
  | { kind: 'confirmed'; tagName: string; freshness: 'current' | 'outdated' }
  | { kind: 'unconfirmed' }

export type WorldStatus =
  | 'up to date'
  | 'update available'
  | 'unknown version'
  | 'not downloaded'
  | 'never checked'
  | 'not downloaded, never checked'
  | 'manually managed'
  | 'manual file missing from disk'
  | 'not listed in config'

export interface WorldResolution {
  /** Matched release tag, '' when no release was confirmed */
  version: string
  status: WorldStatus
}

/** Cache state the resolver reads */
export interface ResolverState {
  files: ReadonlyMap<string, LocalFileRecord>
  repos: ReadonlyMap<string, RemoteRepoRecord>
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

/**
 * Whether a release asset is the same content as a local file: equal digests,
 * or equal sizes when the asset has no digest.
 */
export function assetMatchesFile(asset: Asset, file: LocalFileRecord): boolean {
  if (asset.sha256Hex !== undefined) return asset.sha256Hex === file.sha256Hex
  return asset.size === file.size
}

/**
 * Newest release carrying `assetName`, with that asset.
 */
export function findNewestAsset(
  releases: readonly Release[],
  assetName: string
): { release: Release; asset: Asset } | undefined {
  for (const release of releases) {
    const asset = release.assets.get(assetName)
    if (asset !== undefined) return { release, asset }
  }
  return undefined
}

/**
 * Walk releases newest-first, skipping those without `assetName`, and stop at
 * the first whose asset matches the file. A match in the first release that
 * carries the asset is current; a later one is outdated.
 */
export function scanReleases(
  releases: readonly Release[],
  assetName: string,
  file: LocalFileRecord
): ReleaseScan {
  let newerCandidates = 0
  for (const release of releases) {
    const asset = release.assets.get(assetName)
    if (asset === undefined) continue
    if (assetMatchesFile(asset, file)) {
      return {
        kind: 'confirmed',
        tagName: release.tagName,
        freshness: newerCandidates === 0 ? 'current' : 'outdated',
      }
    }
    newerCandidates += 1
  }
  return { kind: 'unconfirmed' }
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export function resolveRepoWorld(
  world: RepoSourcedWorld,
  repo: RemoteRepoRecord | undefined,
  file: LocalFileRecord | undefined
): WorldResolution {
  if (repo === undefined && file === undefined) {
    return { version: '', status: 'not downloaded, never checked' }
  }
  if (file === undefined) return { version: '', status: 'not downloaded' }
  if (repo === undefined) return { version: '', status: 'never checked' }

  const scan = scanReleases(repo.releases, world.assetName, file)
  switch (scan.kind) {
    case 'confirmed':
      return {
        version: scan.tagName,
        status: scan.freshness === 'current' ? 'up to date' : 'update available',
      }
    case 'unconfirmed':
      return { version: '', status: 'unknown version' }
  }
}

export function resolveManualWorld(
  _world: ManualWorld,
  file: LocalFileRecord | undefined
): WorldResolution {
  return {
    version: '',
    status: file === undefined ? 'manual file missing from disk' : 'manually managed',
  }
}

/**
 * Classify a tracked world against the cached local and remote state.
 */
export function resolveWorld(world: TrackedWorld, state: ResolverState): WorldResolution {
  const file = state.files.get(worldFileName(world))
  if (world.kind === 'manual') return resolveManualWorld(world, file)
  return resolveRepoWorld(world, state.repos.get(world.repoId), file)
}
