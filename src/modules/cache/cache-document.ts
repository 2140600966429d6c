/**
 * Persisted cache document: schema, (de)serialization, and atomic file I/O.
 *
 * The document lives at `<managed dir>/.cache_state.json`:
 *
 *   { "files": { name: { mtime, size, inode, sha256_hex } },
 *     "repos": { "owner/repo": { last_checked, releases: [...] } } }
 *
 * Keys are written sorted with a 2-space indent and a trailing newline. A save
 * writes a temporary sibling and renames it over the document, so readers see
 * either the previous document or the new one.
 */

import { readFile, rename, rm, writeFile } from 'fs/promises'
import { z } from 'zod'
import { CacheFormatError, IOError } from '../../core/errors.js'
import type { Asset, LocalFileRecord, Release, RemoteRepoRecord } from '../../core/types.js'
import { sortKeysDeep } from '../../utils/helpers.js'

/** File name of the cache document inside the managed directory */
export const CACHE_FILE_NAME = '.cache_state.json'

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const Sha256HexSchema = z.string().regex(/^[0-9a-f]{64}$/, 'expected 64 lowercase hex characters')

const CachedFileSchema = z.object({
  mtime: z.number(),
  size: z.number().int().min(0),
  inode: z.number().int().min(0),
  sha256_hex: Sha256HexSchema,
})

const CachedAssetSchema = z.object({
  size: z.number().int().min(0),
  sha256_hex: Sha256HexSchema.nullable().optional(),
})

const CachedReleaseSchema = z.object({
  tag_name: z.string(),
  timestamp: z.string(),
  name: z.string(),
  body: z.string(),
  assets: z.record(CachedAssetSchema),
})

const CachedRepoSchema = z.object({
  last_checked: z.number(),
  releases: z.array(CachedReleaseSchema),
})

export const CacheDocumentSchema = z.object({
  files: z.record(CachedFileSchema).default({}),
  repos: z.record(CachedRepoSchema).default({}),
})

export type CacheDocument = z.infer<typeof CacheDocumentSchema>

/** In-memory form of the document */
export interface CacheSnapshot {
  files: Map<string, LocalFileRecord>
  repos: Map<string, RemoteRepoRecord>
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

function releaseFromDocument(entry: CacheDocument['repos'][string]['releases'][number]): Release {
  const assets = new Map<string, Asset>()
  for (const [name, asset] of Object.entries(entry.assets)) {
    assets.set(
      name,
      asset.sha256_hex ? { size: asset.size, sha256Hex: asset.sha256_hex } : { size: asset.size }
    )
  }
  return {
    tagName: entry.tag_name,
    timestamp: entry.timestamp,
    name: entry.name,
    body: entry.body,
    assets,
  }
}

/**
 * Convert a validated document into the in-memory snapshot.
 */
export function fromDocument(doc: CacheDocument): CacheSnapshot {
  const files = new Map<string, LocalFileRecord>()
  for (const [name, file] of Object.entries(doc.files)) {
    files.set(name, {
      mtime: file.mtime,
      size: file.size,
      inode: file.inode,
      sha256Hex: file.sha256_hex,
    })
  }

  const repos = new Map<string, RemoteRepoRecord>()
  for (const [repoId, repo] of Object.entries(doc.repos)) {
    repos.set(repoId, {
      lastChecked: repo.last_checked,
      releases: repo.releases.map(releaseFromDocument),
    })
  }

  return { files, repos }
}

/**
 * Convert the in-memory snapshot into its persisted shape.
 * Absent digests are written as `null`.
 */
export function toDocument(snapshot: CacheSnapshot): CacheDocument {
  const files: CacheDocument['files'] = {}
  for (const [name, file] of snapshot.files) {
    files[name] = {
      mtime: file.mtime,
      size: file.size,
      inode: file.inode,
      sha256_hex: file.sha256Hex,
    }
  }

  const repos: CacheDocument['repos'] = {}
  for (const [repoId, repo] of snapshot.repos) {
    repos[repoId] = {
      last_checked: repo.lastChecked,
      releases: repo.releases.map((release) => ({
        tag_name: release.tagName,
        timestamp: release.timestamp,
        name: release.name,
        body: release.body,
        assets: Object.fromEntries(
          [...release.assets].map(([assetName, asset]) => [
            assetName,
            { size: asset.size, sha256_hex: asset.sha256Hex ?? null },
          ])
        ),
      })),
    }
  }

  return { files, repos }
}

// ---------------------------------------------------------------------------
// File I/O
// ---------------------------------------------------------------------------

/**
 * Read and validate the document at `path`. A missing file is an empty cache.
 *
 * @throws {CacheFormatError} when the file is not valid JSON or fails the schema
 * @throws {IOError} on any other read failure
 */
export async function readCacheDocument(path: string): Promise<CacheSnapshot> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { files: new Map(), repos: new Map() }
    }
    throw new IOError('Failed to read cache', path, err)
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new CacheFormatError(`Cache document ${path} is not valid JSON: ${message}`, { path })
  }

  const parsed = CacheDocumentSchema.safeParse(raw)
  if (!parsed.success) {
    const [first] = parsed.error.issues
    const where = first ? `${first.path.join('.')}: ${first.message}` : parsed.error.message
    throw new CacheFormatError(`Cache document ${path} is malformed (${where})`, {
      path,
      issues: parsed.error.issues,
    })
  }
  return fromDocument(parsed.data)
}

/**
 * Serialize the snapshot the way it is stored on disk.
 */
export function serializeCacheDocument(snapshot: CacheSnapshot): string {
  return JSON.stringify(sortKeysDeep(toDocument(snapshot)), null, 2) + '\n'
}

/**
 * Atomically replace the document at `path` with the snapshot.
 *
 * @throws {IOError} when the write or rename fails; the previous document is left intact
 */
export async function writeCacheDocument(path: string, snapshot: CacheSnapshot): Promise<void> {
  const tmpPath = `${path}.tmp`
  try {
    await writeFile(tmpPath, serializeCacheDocument(snapshot), 'utf-8')
    await rename(tmpPath, path)
  } catch (err) {
    await rm(tmpPath, { force: true })
    throw new IOError('Failed to save cache', path, err)
  }
}
