/**
 * release-source module: barrel exports
 */

export type { ReleaseSource } from './release-source.js'
export {
  GitHubReleaseSource,
  GitHubReleasePageSchema,
  RELEASES_PER_PAGE,
  parseDigest,
  releaseTimestamp,
  toRelease,
} from './github-release-source.js'
export type { GitHubReleaseSourceOptions, GitHubRelease } from './github-release-source.js'
export { parseLinkHeader } from './link-header.js'
export { openGet, readBody, headerValue, MAX_REDIRECTS } from './http-get.js'
export type { GetOptions } from './http-get.js'
