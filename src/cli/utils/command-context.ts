/**
 * Shared plumbing for the world commands: global options, context creation,
 * and the mapping of errors to exit codes.
 */

import { resolve } from 'path'
import { createLogger } from '../../utils/logger.js'
import { WorldSyncError } from '../../core/errors.js'
import { DEFAULT_CONFIG_FILE } from '../../modules/config/defaults.js'
import {
  openSyncContext,
  type SyncContext,
} from '../../modules/sync/sync-context.js'
import type { ReleaseSource } from '../../modules/release-source/release-source.js'

const logger = createLogger('cli')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_CODE_SUCCESS = 0
export const EXIT_CODE_ERROR = 1

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Options every world command accepts (program-level flags) */
export interface GlobalOptions {
  repo?: string
  dir?: string
  config?: string
}

/** Options the run*Command functions take; the injectable parts serve tests */
export interface WorldCommandOptions extends GlobalOptions {
  names?: string[]
  env?: NodeJS.ProcessEnv
  source?: ReleaseSource
  now?: () => number
}

/**
 * Config path from the flag, then WORLD_SYNC_CONFIG, then the default file in
 * the working directory.
 */
export function resolveConfigPath(options: GlobalOptions, env: NodeJS.ProcessEnv): string {
  return resolve(options.config ?? env['WORLD_SYNC_CONFIG'] ?? DEFAULT_CONFIG_FILE)
}

export async function openCommandContext(options: WorldCommandOptions): Promise<SyncContext> {
  const env = options.env ?? process.env
  return openSyncContext({
    repo: options.repo,
    dir: options.dir,
    configPath: resolveConfigPath(options, env),
    env,
    source: options.source,
    now: options.now,
  })
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export function writeLine(line: string): void {
  process.stdout.write(line + '\n')
}

/**
 * Report a failed command on stderr and return its exit code.
 * Errors outside the world-sync hierarchy are logged with their stack.
 */
export function reportCommandError(err: unknown): number {
  if (err instanceof WorldSyncError) {
    logger.debug({ error: err.toJSON() }, 'Command failed')
    process.stderr.write(`Error: ${err.message}\n`)
    return EXIT_CODE_ERROR
  }
  const message = err instanceof Error ? err.message : String(err)
  logger.error({ err }, 'Unexpected error')
  process.stderr.write(`Error: ${message}\n`)
  return EXIT_CODE_ERROR
}
