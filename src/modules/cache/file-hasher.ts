/**
 * SHA-256 digests of files in the managed directory.
 */

import { createHash } from 'crypto'
import { createReadStream } from 'fs'
import { IOError } from '../../core/errors.js'

/** Bytes read per chunk while hashing */
export const HASH_CHUNK_SIZE = 0x1000

/**
 * Stream a file through SHA-256 in fixed-size chunks.
 *
 * @returns Lowercase hex digest
 * @throws {IOError} when the file cannot be read
 */
export async function hashFile(path: string): Promise<string> {
  const hash = createHash('sha256')
  try {
    for await (const chunk of createReadStream(path, { highWaterMark: HASH_CHUNK_SIZE })) {
      hash.update(chunk)
    }
  } catch (err) {
    throw new IOError('Failed to hash', path, err)
  }
  return hash.digest('hex')
}
