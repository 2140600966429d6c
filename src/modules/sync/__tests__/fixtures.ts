/**
 * Shared fixtures for sync tests: release builders and an in-process
 * ReleaseSource that serves canned releases and asset contents.
 */

import { createHash } from 'crypto'
import { writeFile } from 'fs/promises'
import { ReleaseFetchError } from '../../../core/errors.js'
import type { Asset, Release, RepoId } from '../../../core/types.js'
import type { ReleaseSource } from '../../release-source/release-source.js'

export function sha256(content: string): string {
  return createHash('sha256').update(content).digest('hex')
}

/** Asset metadata matching `content`, optionally without a digest */
export function assetFor(content: string, withDigest = true): Asset {
  const size = Buffer.byteLength(content)
  return withDigest ? { size, sha256Hex: sha256(content) } : { size }
}

export function makeRelease(tagName: string, assets: Record<string, Asset>): Release {
  return {
    tagName,
    timestamp: '2024-01-01T00:00:00Z',
    name: tagName,
    body: '',
    assets: new Map(Object.entries(assets)),
  }
}

function contentKey(repoId: RepoId, tagName: string, assetName: string): string {
  return `${repoId}@${tagName}/${assetName}`
}

export class FakeReleaseSource implements ReleaseSource {
  readonly listCalls: RepoId[] = []
  readonly downloadCalls: { repoId: RepoId; tagName: string; assetName: string; destPath: string }[] =
    []
  private readonly releases = new Map<RepoId, Release[]>()
  private readonly contents = new Map<string, string>()

  setReleases(repoId: RepoId, releases: Release[]): this {
    this.releases.set(repoId, releases)
    return this
  }

  setContent(repoId: RepoId, tagName: string, assetName: string, content: string): this {
    this.contents.set(contentKey(repoId, tagName, assetName), content)
    return this
  }

  async listReleases(repoId: RepoId): Promise<Release[]> {
    this.listCalls.push(repoId)
    const releases = this.releases.get(repoId)
    if (releases === undefined) {
      throw new ReleaseFetchError(`no releases for ${repoId}`, { repoId })
    }
    return releases
  }

  downloadUrl(repoId: RepoId, tagName: string, assetName: string): string {
    return `https://downloads.test/${repoId}/${tagName}/${assetName}`
  }

  async downloadAsset(
    repoId: RepoId,
    tagName: string,
    assetName: string,
    destPath: string
  ): Promise<void> {
    this.downloadCalls.push({ repoId, tagName, assetName, destPath })
    const content = this.contents.get(contentKey(repoId, tagName, assetName))
    if (content === undefined) {
      throw new ReleaseFetchError(`no content for ${assetName}`, { repoId, tagName })
    }
    await writeFile(destPath, content)
  }
}
