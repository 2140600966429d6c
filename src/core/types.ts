/**
 * Core domain types shared by the cache, resolver, and sync operations.
 */

// ---------------------------------------------------------------------------
// Tracked items
// ---------------------------------------------------------------------------

/** "owner/repo" identifier of a GitHub repository */
export type RepoId = string

/** A world downloaded from the releases of a GitHub repository */
export interface RepoSourcedWorld {
  readonly kind: 'repo'
  readonly name: string
  readonly repoId: RepoId
  readonly assetName: string
}

/** A world whose file the user places in the directory by hand */
export interface ManualWorld {
  readonly kind: 'manual'
  readonly name: string
  readonly fileName: string
}

/** One configured unit of plugin content and how to obtain it */
export type TrackedWorld = RepoSourcedWorld | ManualWorld

/** File name a tracked world occupies in the managed directory */
export function worldFileName(world: TrackedWorld): string {
  return world.kind === 'repo' ? world.assetName : world.fileName
}

// ---------------------------------------------------------------------------
// Local files
// ---------------------------------------------------------------------------

/** Stat fingerprint and content digest of a file in the managed directory */
export interface LocalFileRecord {
  /** Modification time in seconds since the epoch */
  mtime: number
  size: number
  inode: number
  sha256Hex: string
}

// ---------------------------------------------------------------------------
// Remote releases
// ---------------------------------------------------------------------------

export interface Asset {
  size: number
  /** Lowercase hex SHA-256; absent when the publisher did not provide one */
  sha256Hex?: string
}

export interface Release {
  tagName: string
  /** Latest of the created/updated/published ISO-8601 timestamps */
  timestamp: string
  name: string
  body: string
  assets: Map<string, Asset>
}

export interface RemoteRepoRecord {
  /** Epoch seconds of the fetch that produced this record */
  lastChecked: number
  /** Newest first, in the order the releases API returned them */
  releases: Release[]
}
