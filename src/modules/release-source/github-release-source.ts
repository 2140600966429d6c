/**
 * GitHubReleaseSource: release listings and asset downloads from GitHub.
 *
 * Listing walks the paginated `GET /repos/{owner}/{repo}/releases` endpoint
 * (100 per page) following the `next` relation of the Link header. An
 * exhausted quota is reported once as a RateLimitError; nothing is retried.
 */

import { createWriteStream } from 'fs'
import { pipeline } from 'stream/promises'
import { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { formatWaitTime } from '../../utils/helpers.js'
import { RateLimitError, ReleaseFetchError } from '../../core/errors.js'
import type { Asset, Release, RepoId } from '../../core/types.js'
import type { ReleaseSource } from './release-source.js'
import { headerValue, openGet, readBody } from './http-get.js'
import { parseLinkHeader } from './link-header.js'

const logger = createLogger('github-releases')

/** Releases requested per page; the API maximum */
export const RELEASES_PER_PAGE = 100

/** Digest algorithm accepted from asset metadata */
const DIGEST_ALGORITHM = 'sha256'

// ---------------------------------------------------------------------------
// API response schema
// ---------------------------------------------------------------------------

const GitHubAssetSchema = z.object({
  name: z.string(),
  size: z.number().int().min(0),
  /** "algorithm:hex", absent or null for assets uploaded before digests existed */
  digest: z.string().nullable().optional(),
})

const GitHubReleaseSchema = z.object({
  tag_name: z.string(),
  name: z.string().nullable().optional(),
  body: z.string().nullable().optional(),
  created_at: z.string().nullable().optional(),
  updated_at: z.string().nullable().optional(),
  published_at: z.string().nullable().optional(),
  assets: z.array(GitHubAssetSchema),
})

export const GitHubReleasePageSchema = z.array(GitHubReleaseSchema)

export type GitHubRelease = z.infer<typeof GitHubReleaseSchema>

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

/**
 * Extract the hex digest from an "algorithm:hex" string.
 * Anything but a 64-character SHA-256 digest yields undefined.
 */
export function parseDigest(digest: string | null | undefined): string | undefined {
  if (!digest) return undefined
  const separator = digest.indexOf(':')
  if (separator < 0) return undefined
  const algorithm = digest.slice(0, separator)
  const hex = digest.slice(separator + 1)
  if (algorithm !== DIGEST_ALGORITHM || !/^[0-9a-fA-F]{64}$/.test(hex)) return undefined
  return hex.toLowerCase()
}

/**
 * Latest of the created/updated/published timestamps. ISO-8601 strings in the
 * same zone order lexicographically; missing values are '' and never win.
 */
export function releaseTimestamp(release: GitHubRelease): string {
  return [release.created_at, release.updated_at, release.published_at]
    .map((value) => value ?? '')
    .reduce((latest, value) => (value > latest ? value : latest), '')
}

export function toRelease(release: GitHubRelease): Release {
  const assets = new Map<string, Asset>()
  for (const asset of release.assets) {
    const sha256Hex = parseDigest(asset.digest)
    assets.set(asset.name, sha256Hex === undefined ? { size: asset.size } : { size: asset.size, sha256Hex })
  }
  return {
    tagName: release.tag_name,
    timestamp: releaseTimestamp(release),
    name: release.name ?? '',
    body: release.body ?? '',
    assets,
  }
}

// ---------------------------------------------------------------------------
// GitHubReleaseSource
// ---------------------------------------------------------------------------

export interface GitHubReleaseSourceOptions {
  apiBaseUrl?: string
  downloadBaseUrl?: string
  timeoutMs?: number
  /** Sent as a Bearer token to the API host only */
  token?: string
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number
}

export class GitHubReleaseSource implements ReleaseSource {
  private readonly apiBaseUrl: string
  private readonly downloadBaseUrl: string
  private readonly timeoutMs: number
  private readonly token: string | undefined
  private readonly now: () => number

  constructor(options: GitHubReleaseSourceOptions = {}) {
    this.apiBaseUrl = (options.apiBaseUrl ?? 'https://api.github.com').replace(/\/+$/, '')
    this.downloadBaseUrl = (options.downloadBaseUrl ?? 'https://github.com').replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs ?? 30_000
    this.token = options.token
    this.now = options.now ?? Date.now
  }

  /**
   * Fetch all releases of a repository, newest first, concatenating pages in
   * the order the API returns them.
   */
  async listReleases(repoId: RepoId): Promise<Release[]> {
    const releases: Release[] = []
    let url: string | undefined =
      `${this.apiBaseUrl}/repos/${repoId}/releases?per_page=${String(RELEASES_PER_PAGE)}`
    let page = 0

    while (url !== undefined) {
      page += 1
      logger.debug({ repoId, page }, 'Fetching release page')
      const { items, next } = await this.fetchPage(repoId, url)
      releases.push(...items.map(toRelease))
      url = next
    }

    return releases
  }

  downloadUrl(repoId: RepoId, tagName: string, assetName: string): string {
    return `${this.downloadBaseUrl}/${repoId}/releases/download/${encodeURIComponent(tagName)}/${encodeURIComponent(assetName)}`
  }

  async downloadAsset(
    repoId: RepoId,
    tagName: string,
    assetName: string,
    destPath: string
  ): Promise<void> {
    const url = this.downloadUrl(repoId, tagName, assetName)
    const res = await openGet(url, {
      headers: { 'User-Agent': 'world-sync', Accept: 'application/octet-stream' },
      timeoutMs: this.timeoutMs,
    })

    if (res.statusCode !== 200) {
      res.resume()
      throw new ReleaseFetchError(
        `Download of ${url} returned HTTP ${String(res.statusCode)}`,
        { url, status: res.statusCode }
      )
    }

    try {
      await pipeline(res, createWriteStream(destPath))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ReleaseFetchError(`Download of ${url} failed: ${message}`, { url, destPath })
    }
    logger.debug({ url, destPath }, 'Downloaded asset')
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private apiHeaders(): { headers: Record<string, string>; firstHopHeaders: Record<string, string> } {
    return {
      headers: {
        'User-Agent': 'world-sync',
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
      },
      firstHopHeaders: this.token !== undefined ? { Authorization: `Bearer ${this.token}` } : {},
    }
  }

  private async fetchPage(
    repoId: RepoId,
    url: string
  ): Promise<{ items: GitHubRelease[]; next: string | undefined }> {
    const res = await openGet(url, { ...this.apiHeaders(), timeoutMs: this.timeoutMs })
    const status = res.statusCode ?? 0

    if (
      (status === 403 || status === 429) &&
      headerValue(res, 'x-ratelimit-remaining') === '0'
    ) {
      res.resume()
      const resetAt = Number(headerValue(res, 'x-ratelimit-reset'))
      const waitSeconds = Number.isFinite(resetAt)
        ? Math.trunc(resetAt) - Math.floor(this.now() / 1000)
        : 0
      throw new RateLimitError(waitSeconds, formatWaitTime(waitSeconds), { repoId, url })
    }

    if (status !== 200) {
      res.resume()
      throw new ReleaseFetchError(`GitHub API returned HTTP ${String(status)} for ${url}`, {
        repoId,
        url,
        status,
      })
    }

    let raw: unknown
    try {
      raw = JSON.parse(await readBody(res))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ReleaseFetchError(`Unreadable release page from ${url}: ${message}`, { repoId, url })
    }

    const parsed = GitHubReleasePageSchema.safeParse(raw)
    if (!parsed.success) {
      const [first] = parsed.error.issues
      throw new ReleaseFetchError(
        `Unexpected release page shape from ${url}: ${first ? `${first.path.join('.')}: ${first.message}` : parsed.error.message}`,
        { repoId, url }
      )
    }

    return {
      items: parsed.data,
      next: parseLinkHeader(res.headers.link).get('next'),
    }
  }
}
