/**
 * Unit tests for GitHubReleaseSource.
 *
 * Mocks the built-in `https` module to avoid real network calls; each URL is
 * answered from a table of canned responses.
 */

import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest'
import https from 'https'
import type { ClientRequest, IncomingMessage, RequestOptions } from 'http'
import { EventEmitter } from 'events'
import { Readable } from 'stream'
import { mkdtempSync, readFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { RateLimitError, ReleaseFetchError } from '../../../core/errors.js'
import {
  GitHubReleaseSource,
  parseDigest,
  releaseTimestamp,
  toRelease,
  type GitHubRelease,
} from '../github-release-source.js'

// ---------------------------------------------------------------------------
// Helpers to build mock responses
// ---------------------------------------------------------------------------

interface ResponseSpec {
  status: number
  headers?: Record<string, string>
  body?: string
}

interface RecordedCall {
  url: string
  headers: Record<string, string>
}

const API = 'https://api.test'
const FIRST_PAGE = `${API}/repos/o/r/releases?per_page=100`
const NOW_MS = 1_700_000_000_000

function buildMockResponse(spec: ResponseSpec): IncomingMessage {
  const res = Readable.from([Buffer.from(spec.body ?? '')])
  return Object.assign(res, {
    statusCode: spec.status,
    headers: spec.headers ?? {},
  }) as unknown as IncomingMessage
}

function buildMockRequest(): ClientRequest {
  const req = Object.assign(new EventEmitter(), {
    setTimeout: vi.fn(),
    destroy: vi.fn(),
  })
  return req as unknown as ClientRequest
}

/**
 * Route every https.get through `routes`; unknown URLs fail like a refused
 * connection.
 */
function mockHttps(routes: Record<string, ResponseSpec>): RecordedCall[] {
  const calls: RecordedCall[] = []
  vi.spyOn(https, 'get').mockImplementation(
    (url: string | URL, options: RequestOptions, callback?: (res: IncomingMessage) => void) => {
      const target = url.toString()
      const headers: Record<string, string> = {}
      for (const [key, value] of Object.entries(options.headers ?? {})) {
        headers[key] = String(value)
      }
      calls.push({ url: target, headers })

      const req = buildMockRequest()
      const spec = routes[target]
      setImmediate(() => {
        if (spec === undefined) {
          req.emit('error', new Error('ECONNREFUSED'))
        } else {
          callback?.(buildMockResponse(spec))
        }
      })
      return req
    }
  )
  return calls
}

function releaseJson(tag: string, assets: object[] = []): object {
  return {
    tag_name: tag,
    name: `Release ${tag}`,
    body: '',
    created_at: '2024-01-01T00:00:00Z',
    published_at: '2024-01-01T00:00:00Z',
    assets,
  }
}

function page(releases: object[], link?: string): ResponseSpec {
  return {
    status: 200,
    headers: link === undefined ? {} : { link },
    body: JSON.stringify(releases),
  }
}

// ---------------------------------------------------------------------------
// Mapping helpers
// ---------------------------------------------------------------------------

describe('parseDigest', () => {
  it('accepts a sha256 digest and lowercases it', () => {
    expect(parseDigest(`sha256:${'AB'.repeat(32)}`)).toBe('ab'.repeat(32))
  })

  it('rejects other algorithms, wrong lengths, and missing values', () => {
    expect(parseDigest(`sha512:${'a'.repeat(64)}`)).toBeUndefined()
    expect(parseDigest(`sha256:${'a'.repeat(63)}`)).toBeUndefined()
    expect(parseDigest('a'.repeat(64))).toBeUndefined()
    expect(parseDigest(null)).toBeUndefined()
    expect(parseDigest(undefined)).toBeUndefined()
  })
})

describe('releaseTimestamp / toRelease', () => {
  const release: GitHubRelease = {
    tag_name: 'v1',
    name: null,
    body: null,
    created_at: '2024-01-01T00:00:00Z',
    updated_at: null,
    published_at: '2024-02-01T00:00:00Z',
    assets: [
      { name: 'a.apworld', size: 10, digest: `sha256:${'c'.repeat(64)}` },
      { name: 'b.apworld', size: 20, digest: null },
      { name: 'c.apworld', size: 30 },
    ],
  }

  it('takes the latest of the three timestamps', () => {
    expect(releaseTimestamp(release)).toBe('2024-02-01T00:00:00Z')
  })

  it('is empty when no timestamp is present', () => {
    expect(releaseTimestamp({ tag_name: 'v0', assets: [] })).toBe('')
  })

  it('maps names, bodies, and assets', () => {
    const mapped = toRelease(release)
    expect(mapped.tagName).toBe('v1')
    expect(mapped.name).toBe('')
    expect(mapped.body).toBe('')
    expect([...mapped.assets]).toEqual([
      ['a.apworld', { size: 10, sha256Hex: 'c'.repeat(64) }],
      ['b.apworld', { size: 20 }],
      ['c.apworld', { size: 30 }],
    ])
  })
})

// ---------------------------------------------------------------------------
// GitHubReleaseSource
// ---------------------------------------------------------------------------

describe('GitHubReleaseSource', () => {
  let source: GitHubReleaseSource

  beforeEach(() => {
    source = new GitHubReleaseSource({
      apiBaseUrl: `${API}/`,
      downloadBaseUrl: 'https://dl.test',
      token: 'test-token',
      now: () => NOW_MS,
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('listReleases', () => {
    it('follows next links and concatenates pages in order', async () => {
      const calls = mockHttps({
        [FIRST_PAGE]: page(
          [releaseJson('v3')],
          `<${API}/page2>; rel="next", <${API}/page3>; rel="last"`
        ),
        [`${API}/page2`]: page([releaseJson('v2')], `<${API}/page3>; rel="next"`),
        [`${API}/page3`]: page([releaseJson('v1')]),
      })

      const releases = await source.listReleases('o/r')

      expect(releases.map((r) => r.tagName)).toEqual(['v3', 'v2', 'v1'])
      expect(calls.map((c) => c.url)).toEqual([FIRST_PAGE, `${API}/page2`, `${API}/page3`])
    })

    it('sends the identifying headers and the bearer token', async () => {
      const calls = mockHttps({ [FIRST_PAGE]: page([]) })
      await source.listReleases('o/r')
      expect(calls[0]?.headers).toEqual({
        'User-Agent': 'world-sync',
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
        Authorization: 'Bearer test-token',
      })
    })

    it('omits the Authorization header without a token', async () => {
      const calls = mockHttps({ [FIRST_PAGE]: page([]) })
      await new GitHubReleaseSource({ apiBaseUrl: API }).listReleases('o/r')
      expect(calls[0]?.headers.Authorization).toBeUndefined()
    })

    it('does not forward the token across a redirect', async () => {
      const calls = mockHttps({
        [FIRST_PAGE]: { status: 301, headers: { location: 'https://mirror.test/releases' } },
        'https://mirror.test/releases': page([releaseJson('v1')]),
      })
      const releases = await source.listReleases('o/r')
      expect(releases.map((r) => r.tagName)).toEqual(['v1'])
      expect(calls[1]?.url).toBe('https://mirror.test/releases')
      expect(calls[1]?.headers.Authorization).toBeUndefined()
    })

    it.each([403, 429])('reports an exhausted quota on HTTP %i without retrying', async (status) => {
      const calls = mockHttps({
        [FIRST_PAGE]: {
          status,
          headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1700000245' },
        },
      })

      const error = await source.listReleases('o/r').catch((err: unknown) => err)

      expect(error).toBeInstanceOf(RateLimitError)
      expect(error).toMatchObject({ waitSeconds: 245, code: 'RATE_LIMITED' })
      expect(error).toHaveProperty(
        'message',
        'GitHub is rate limiting requests; wait 4m05s before trying again'
      )
      expect(calls).toHaveLength(1)
    })

    it('treats a 403 with quota remaining as an ordinary failure', async () => {
      mockHttps({
        [FIRST_PAGE]: { status: 403, headers: { 'x-ratelimit-remaining': '12' } },
      })
      await expect(source.listReleases('o/r')).rejects.toThrow(
        new ReleaseFetchError(`GitHub API returned HTTP 403 for ${FIRST_PAGE}`)
      )
    })

    it('rejects a page that is not JSON', async () => {
      mockHttps({ [FIRST_PAGE]: { status: 200, body: '<html>' } })
      await expect(source.listReleases('o/r')).rejects.toThrow(/Unreadable release page/)
    })

    it('rejects a page with an unexpected shape', async () => {
      mockHttps({ [FIRST_PAGE]: { status: 200, body: JSON.stringify({ message: 'hi' }) } })
      await expect(source.listReleases('o/r')).rejects.toThrow(/Unexpected release page shape/)
    })

    it('wraps network errors', async () => {
      mockHttps({})
      await expect(source.listReleases('o/r')).rejects.toThrow(
        `Request to ${FIRST_PAGE} failed: ECONNREFUSED`
      )
    })

    it('gives up after too many redirects', async () => {
      const calls = mockHttps({
        [FIRST_PAGE]: { status: 302, headers: { location: FIRST_PAGE } },
      })
      await expect(source.listReleases('o/r')).rejects.toThrow(/Too many redirects/)
      expect(calls).toHaveLength(6)
    })
  })

  describe('downloads', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'world-sync-download-test-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('builds the public download URL with encoded segments', () => {
      expect(source.downloadUrl('o/r', 'v1.0 beta', 'a.apworld')).toBe(
        'https://dl.test/o/r/releases/download/v1.0%20beta/a.apworld'
      )
    })

    it('streams the asset to disk through redirects without the token', async () => {
      const url = 'https://dl.test/o/r/releases/download/v1/a.apworld'
      const calls = mockHttps({
        [url]: { status: 302, headers: { location: 'https://objects.test/blob?sig=1' } },
        'https://objects.test/blob?sig=1': { status: 200, body: 'payload' },
      })
      const dest = join(dir, 'a.apworld')

      await source.downloadAsset('o/r', 'v1', 'a.apworld', dest)

      expect(readFileSync(dest, 'utf-8')).toBe('payload')
      expect(calls.map((c) => c.url)).toEqual([url, 'https://objects.test/blob?sig=1'])
      expect(calls[0]?.headers).toEqual({
        'User-Agent': 'world-sync',
        Accept: 'application/octet-stream',
      })
    })

    it('fails on a non-200 response', async () => {
      const url = 'https://dl.test/o/r/releases/download/v1/a.apworld'
      mockHttps({ [url]: { status: 404 } })
      await expect(source.downloadAsset('o/r', 'v1', 'a.apworld', join(dir, 'x'))).rejects.toThrow(
        `Download of ${url} returned HTTP 404`
      )
    })
  })
})
