/**
 * ReleaseSource interface: where release metadata and asset bytes come from.
 *
 * The cache and the update workflow depend on this contract; the GitHub
 * implementation lives in github-release-source.ts.
 */

import type { Release, RepoId } from '../../core/types.js'

export interface ReleaseSource {
  /**
   * Fetch every release of a repository, newest first.
   *
   * @throws {RateLimitError} when the API quota is exhausted
   * @throws {ReleaseFetchError} on any other failed request
   */
  listReleases(repoId: RepoId): Promise<Release[]>

  /**
   * URL an asset of a release is downloaded from.
   */
  downloadUrl(repoId: RepoId, tagName: string, assetName: string): string

  /**
   * Stream an asset into `destPath`, creating or truncating it.
   * The caller owns making the result visible under its final name.
   */
  downloadAsset(repoId: RepoId, tagName: string, assetName: string, destPath: string): Promise<void>
}
