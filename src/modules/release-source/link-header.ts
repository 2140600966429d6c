/**
 * Parsing of RFC 8288 `Link` headers as the GitHub API sends them for pagination:
 *
 *   <https://api.github.com/...&page=2>; rel="next", <...&page=5>; rel="last"
 */

const LINK_PATTERN = /<([^>]*)>;\s*rel="([^"]*)"/g

/**
 * Map each relation of a Link header to its URL.
 * Later duplicates of a relation win.
 */
export function parseLinkHeader(header: string | string[] | undefined): Map<string, string> {
  const links = new Map<string, string>()
  if (header === undefined) return links
  const text = Array.isArray(header) ? header.join(', ') : header
  for (const match of text.matchAll(LINK_PATTERN)) {
    const [, url, rel] = match
    if (url !== undefined && rel !== undefined) {
      for (const relation of rel.split(/\s+/)) {
        if (relation !== '') links.set(relation, url)
      }
    }
  }
  return links
}
