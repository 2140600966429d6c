import { describe, it, expect } from 'vitest'
import { parseLinkHeader } from '../link-header.js'

describe('parseLinkHeader', () => {
  it('maps each relation to its URL', () => {
    const links = parseLinkHeader(
      '<https://api.test/r?page=2>; rel="next", <https://api.test/r?page=5>; rel="last"'
    )
    expect(links.get('next')).toBe('https://api.test/r?page=2')
    expect(links.get('last')).toBe('https://api.test/r?page=5')
  })

  it('returns an empty map for a missing header', () => {
    expect(parseLinkHeader(undefined).size).toBe(0)
  })

  it('has no next relation on the last page', () => {
    const links = parseLinkHeader(
      '<https://api.test/r?page=1>; rel="first", <https://api.test/r?page=4>; rel="prev"'
    )
    expect(links.has('next')).toBe(false)
    expect(links.get('prev')).toBe('https://api.test/r?page=4')
  })

  it('splits space-separated relations and joins repeated headers', () => {
    const links = parseLinkHeader([
      '<https://api.test/a>; rel="next last"',
      '<https://api.test/b>; rel="prev"',
    ])
    expect(links.get('next')).toBe('https://api.test/a')
    expect(links.get('last')).toBe('https://api.test/a')
    expect(links.get('prev')).toBe('https://api.test/b')
  })
})
