/**
 * Minimal GET helper over the built-in `https` module.
 *
 * Follows redirects, applies a socket timeout, and hands the final response
 * back unread so callers can either collect it or stream it to disk.
 */

import https from 'https'
import type { IncomingMessage } from 'http'
import { createLogger } from '../../utils/logger.js'
import { ReleaseFetchError } from '../../core/errors.js'
import { maskHeaders } from '../../cli/utils/masking.js'

const logger = createLogger('http')

/** Redirect hops followed before giving up */
export const MAX_REDIRECTS = 5

export interface GetOptions {
  headers: Record<string, string>
  timeoutMs: number
  /** Headers only sent to the first host (e.g. Authorization) */
  firstHopHeaders?: Record<string, string>
}

function isRedirect(res: IncomingMessage): boolean {
  return (
    res.statusCode !== undefined &&
    res.statusCode >= 300 &&
    res.statusCode < 400 &&
    typeof res.headers.location === 'string'
  )
}

/**
 * Issue a GET and resolve with the final (non-redirect) response.
 *
 * @throws {ReleaseFetchError} on network error, timeout, or too many redirects
 */
export function openGet(url: string, options: GetOptions): Promise<IncomingMessage> {
  return new Promise<IncomingMessage>((resolve, reject) => {
    const request = (target: string, hopsLeft: number, headers: Record<string, string>): void => {
      logger.debug({ url: target, headers: maskHeaders(headers) }, 'GET')
      const req = https.get(target, { headers }, (res) => {
        if (isRedirect(res) && res.headers.location !== undefined) {
          res.resume()
          if (hopsLeft === 0) {
            reject(new ReleaseFetchError(`Too many redirects fetching ${url}`, { url }))
            return
          }
          request(new URL(res.headers.location, target).toString(), hopsLeft - 1, options.headers)
          return
        }
        resolve(res)
      })
      req.setTimeout(options.timeoutMs, () => {
        req.destroy(new Error(`timed out after ${String(options.timeoutMs)}ms`))
      })
      req.on('error', (err: Error) => {
        reject(new ReleaseFetchError(`Request to ${target} failed: ${err.message}`, { url: target }))
      })
    }

    request(url, MAX_REDIRECTS, { ...options.headers, ...options.firstHopHeaders })
  })
}

/**
 * Collect a response body as UTF-8 text.
 */
export async function readBody(res: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of res) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf-8')
}

/**
 * Read a single-valued header, taking the first value of a repeated one.
 */
export function headerValue(res: IncomingMessage, name: string): string | undefined {
  const value = res.headers[name.toLowerCase()]
  return Array.isArray(value) ? value[0] : value
}
