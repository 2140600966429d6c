/**
 * Unit tests for WorldCache
 *
 * Uses a real temporary directory; hashing is wrapped in a spy so tests can
 * tell when the stat fast path was taken.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest'
import {
  mkdirSync,
  mkdtempSync,
  renameSync,
  rmSync,
  statSync,
  unlinkSync,
  utimesSync,
  writeFileSync,
} from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { IOError } from '../../../core/errors.js'
import { hashFile } from '../file-hasher.js'
import { isIgnoredFileName, WorldCache } from '../world-cache.js'
import { FakeReleaseSource, makeRelease, sha256 } from '../../sync/__tests__/fixtures.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW_MS = 1_700_000_000_000
/** Fixed whole-second mtime so rewritten files can keep their timestamp */
const MTIME = 1_600_000_000

describe('WorldCache', () => {
  let dir: string
  let hashSpy: Mock<(path: string) => Promise<string>>
  let nowMs: number

  function writeWorld(name: string, content: string): void {
    writeFileSync(join(dir, name), content)
    utimesSync(join(dir, name), MTIME, MTIME)
  }

  function openCache(freshnessSeconds?: number): Promise<WorldCache> {
    return WorldCache.open(dir, { hashFile: hashSpy, now: () => nowMs, freshnessSeconds })
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'world-sync-cache-test-'))
    hashSpy = vi.fn(hashFile)
    nowMs = NOW_MS
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  // -------------------------------------------------------------------------
  // refreshFiles
  // -------------------------------------------------------------------------

  describe('refreshFiles', () => {
    it('records every regular file with its digest and stat fields', async () => {
      writeWorld('a.apworld', 'abc')
      const cache = await openCache()

      expect(await cache.refreshFiles()).toBe(true)
      expect(cache.files.get('a.apworld')).toEqual({
        mtime: MTIME,
        size: 3,
        inode: statSync(join(dir, 'a.apworld')).ino,
        sha256Hex: sha256('abc'),
      })
    })

    it('skips hashing when mtime, size and inode are unchanged', async () => {
      writeWorld('a.apworld', 'abc')
      writeWorld('b.apworld', 'defg')
      const cache = await openCache()
      await cache.refreshFiles()
      expect(hashSpy).toHaveBeenCalledTimes(2)

      expect(await cache.refreshFiles()).toBe(false)
      expect(hashSpy).toHaveBeenCalledTimes(2)
    })

    it('rehashes when the size changes', async () => {
      writeWorld('a.apworld', 'abc')
      const cache = await openCache()
      await cache.refreshFiles()

      writeWorld('a.apworld', 'abcd')
      expect(await cache.refreshFiles()).toBe(true)
      expect(hashSpy).toHaveBeenCalledTimes(2)
      expect(cache.files.get('a.apworld')?.sha256Hex).toBe(sha256('abcd'))
    })

    it('rehashes when only the mtime changes', async () => {
      writeWorld('a.apworld', 'abc')
      const cache = await openCache()
      await cache.refreshFiles()

      utimesSync(join(dir, 'a.apworld'), MTIME + 10, MTIME + 10)
      expect(await cache.refreshFiles()).toBe(true)
      expect(hashSpy).toHaveBeenCalledTimes(2)
      expect(cache.files.get('a.apworld')?.mtime).toBe(MTIME + 10)
    })

    it('rehashes when the file is replaced by another inode', async () => {
      writeWorld('a.apworld', 'abc')
      const cache = await openCache()
      await cache.refreshFiles()

      writeWorld('_replacement', 'xyz')
      renameSync(join(dir, '_replacement'), join(dir, 'a.apworld'))
      expect(await cache.refreshFiles()).toBe(true)
      expect(cache.files.get('a.apworld')?.sha256Hex).toBe(sha256('xyz'))
    })

    it('ignores hidden names, underscore names, and directories', async () => {
      writeWorld('a.apworld', 'abc')
      writeWorld('.hidden.apworld', 'x')
      writeWorld('_disabled.apworld', 'y')
      mkdirSync(join(dir, 'nested.apworld'))
      const cache = await openCache()
      await cache.refreshFiles()

      expect([...cache.files.keys()]).toEqual(['a.apworld'])
    })

    it('drops records of files that vanished', async () => {
      writeWorld('a.apworld', 'abc')
      writeWorld('b.apworld', 'def')
      const cache = await openCache()
      await cache.refreshFiles()

      unlinkSync(join(dir, 'b.apworld'))
      expect(await cache.refreshFiles()).toBe(true)
      expect([...cache.files.keys()]).toEqual(['a.apworld'])
    })

    it('persists records so a reopened cache does not rehash', async () => {
      writeWorld('a.apworld', 'abc')
      const first = await openCache()
      await first.refreshFiles()

      const second = await openCache()
      expect(second.files.get('a.apworld')?.sha256Hex).toBe(sha256('abc'))
      expect(await second.refreshFiles()).toBe(false)
      expect(hashSpy).toHaveBeenCalledTimes(1)
    })

    it('propagates hashing failures', async () => {
      writeWorld('a.apworld', 'abc')
      const cache = await WorldCache.open(dir, {
        hashFile: () => Promise.reject(new IOError('Failed to hash', join(dir, 'a.apworld'))),
      })
      await expect(cache.refreshFiles()).rejects.toThrow(IOError)
    })
  })

  describe('isIgnoredFileName', () => {
    it('ignores names starting with "." or "_"', () => {
      expect(isIgnoredFileName('.cache_state.json')).toBe(true)
      expect(isIgnoredFileName('_x.apworld')).toBe(true)
      expect(isIgnoredFileName('x_.apworld')).toBe(false)
    })
  })

  // -------------------------------------------------------------------------
  // Remote releases
  // -------------------------------------------------------------------------

  describe('refreshRepo', () => {
    function makeSource(): FakeReleaseSource {
      return new FakeReleaseSource().setReleases('o/r', [
        makeRelease('v1', { 'a.apworld': { size: 3 } }),
      ])
    }

    it('fetches a repo with no record and stamps the fetch time', async () => {
      const source = makeSource()
      const cache = await openCache()

      expect(await cache.refreshRepo('o/r', source)).toBe(true)
      expect(source.listCalls).toEqual(['o/r'])
      expect(cache.repos.get('o/r')?.lastChecked).toBe(1_700_000_000)
      expect(cache.repos.get('o/r')?.releases.map((r) => r.tagName)).toEqual(['v1'])
    })

    it('skips a fresh record and refetches once the window has passed', async () => {
      const source = makeSource()
      const cache = await openCache(60)
      await cache.refreshRepo('o/r', source)

      nowMs = NOW_MS + 59_000
      expect(await cache.refreshRepo('o/r', source)).toBe(false)

      nowMs = NOW_MS + 60_000
      expect(await cache.refreshRepo('o/r', source)).toBe(true)
      expect(source.listCalls).toEqual(['o/r', 'o/r'])
      expect(cache.repos.get('o/r')?.lastChecked).toBe(1_700_000_060)
    })

    it('refetches a fresh record when forced', async () => {
      const source = makeSource()
      const cache = await openCache()
      await cache.refreshRepo('o/r', source)

      expect(await cache.refreshRepo('o/r', source, { force: true })).toBe(true)
      expect(source.listCalls).toEqual(['o/r', 'o/r'])
    })

    it('replaces the record wholesale and saves it', async () => {
      const source = makeSource()
      const cache = await openCache()
      await cache.refreshRepo('o/r', source)

      source.setReleases('o/r', [makeRelease('v2', {})])
      await cache.refreshRepo('o/r', source, { force: true })

      const reopened = await openCache()
      expect(reopened.repos.get('o/r')?.releases.map((r) => r.tagName)).toEqual(['v2'])
    })

    it('keeps the previous record when the fetch fails', async () => {
      const source = makeSource()
      const cache = await openCache()
      await cache.refreshRepo('o/r', source)

      await expect(
        cache.refreshRepo('o/missing', new FakeReleaseSource())
      ).rejects.toThrow('no releases for o/missing')
      expect(cache.repos.has('o/missing')).toBe(false)
      expect(cache.repos.has('o/r')).toBe(true)
    })
  })

  describe('pruneRepos', () => {
    it('removes repos outside the kept set and returns them sorted', async () => {
      const cache = await openCache()
      cache.repos.set('z/z', { lastChecked: 1, releases: [] })
      cache.repos.set('a/a', { lastChecked: 1, releases: [] })
      cache.repos.set('k/k', { lastChecked: 1, releases: [] })

      expect(await cache.pruneRepos(new Set(['k/k']))).toEqual(['a/a', 'z/z'])
      expect([...cache.repos.keys()]).toEqual(['k/k'])

      const reopened = await openCache()
      expect([...reopened.repos.keys()]).toEqual(['k/k'])
    })

    it('returns an empty list when nothing is removed', async () => {
      const cache = await openCache()
      cache.repos.set('k/k', { lastChecked: 1, releases: [] })
      expect(await cache.pruneRepos(new Set(['k/k']))).toEqual([])
    })
  })
})
