/**
 * `world-sync check` command
 *
 * Asks GitHub for the releases of every configured repository whose cached
 * data is older than the freshness window, then prints the same table as
 * `list`.
 *
 * Usage:
 *   world-sync --dir <worlds> check [--force] [names...]
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (rate limited, request failed, bad config)
 */

import type { Command } from 'commander'
import { checkWorlds, type CheckProgress } from '../../modules/sync/check-worlds.js'
import { formatProgressLine, formatWorldTable } from '../utils/formatting.js'
import {
  EXIT_CODE_SUCCESS,
  openCommandContext,
  reportCommandError,
  writeLine,
  type GlobalOptions,
  type WorldCommandOptions,
} from '../utils/command-context.js'

export interface CheckCommandOptions extends WorldCommandOptions {
  force?: boolean
  /** Show the progress line (default: when stderr is a terminal) */
  progress?: boolean
}

/**
 * Rewrites a single status line on stderr as checking advances.
 */
function createProgressWriter(): {
  update: (progress: CheckProgress) => void
  finish: (total: number) => void
} {
  let previousLength = 0
  const draw = (line: string, end: string): void => {
    const padding = ' '.repeat(Math.max(0, previousLength - line.length))
    process.stderr.write(`\r${line}${padding}${end}`)
    previousLength = line.length
  }
  return {
    update: (progress) => draw(formatProgressLine(progress), ''),
    finish: (total) => draw(formatProgressLine({ index: total, total }), '\n'),
  }
}

export async function runCheckCommand(options: CheckCommandOptions): Promise<number> {
  try {
    const context = await openCommandContext(options)
    const showProgress = options.progress ?? process.stderr.isTTY === true
    const writer = showProgress ? createProgressWriter() : undefined

    const names = options.names ?? []
    const result = await checkWorlds(context, names, {
      force: options.force,
      onProgress: writer?.update,
    })
    writer?.finish(names.length > 0 ? new Set(names).size : context.config.worlds.size)

    if (result.rows.length === 0) {
      writeLine('no worlds configured')
    } else {
      writeLine(formatWorldTable(result.rows))
    }
    return EXIT_CODE_SUCCESS
  } catch (err) {
    return reportCommandError(err)
  }
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Fetch the latest release data from GitHub, then list')
    .argument('[names...]', 'limit the check to these worlds')
    .option('-f, --force', 'refetch even if cached release data is still fresh')
    .action(async (names: string[], cmdOptions: { force?: boolean }) => {
      const globals = program.opts<GlobalOptions>()
      process.exitCode = await runCheckCommand({ ...globals, names, force: cmdOptions.force })
    })
}
