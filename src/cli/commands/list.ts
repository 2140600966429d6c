/**
 * `world-sync list` command (alias `ls`, the default command)
 *
 * Prints each configured world with the version it is confirmed to be and
 * its status, from cached data only. No network access.
 *
 * Usage:
 *   world-sync --dir <worlds> list [names...]
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (bad config, unknown name, unreadable directory)
 */

import type { Command } from 'commander'
import { listWorlds } from '../../modules/sync/list-worlds.js'
import { formatWorldTable } from '../utils/formatting.js'
import {
  EXIT_CODE_SUCCESS,
  openCommandContext,
  reportCommandError,
  writeLine,
  type GlobalOptions,
  type WorldCommandOptions,
} from '../utils/command-context.js'

export async function runListCommand(options: WorldCommandOptions): Promise<number> {
  try {
    const context = await openCommandContext(options)
    const rows = listWorlds(context, options.names ?? [])
    if (rows.length === 0) {
      writeLine('no worlds configured')
    } else {
      writeLine(formatWorldTable(rows))
    }
    return EXIT_CODE_SUCCESS
  } catch (err) {
    return reportCommandError(err)
  }
}

export function registerListCommand(program: Command): void {
  program
    .command('list', { isDefault: true })
    .alias('ls')
    .description('List configured worlds with their cached version and status')
    .argument('[names...]', 'limit the listing to these worlds')
    .action(async (names: string[]) => {
      const globals = program.opts<GlobalOptions>()
      process.exitCode = await runListCommand({ ...globals, names })
    })
}
