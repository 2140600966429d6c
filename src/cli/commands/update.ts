/**
 * `world-sync update` command
 *
 * Downloads the newest release asset of every world that is not already
 * current. With no names, files that no configured world refers to are
 * deleted, making the directory match the config exactly.
 *
 * Usage:
 *   world-sync --dir <worlds> update [names...]
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (never checked, asset missing, download failed)
 */

import type { Command } from 'commander'
import { updateWorlds } from '../../modules/sync/update-worlds.js'
import { formatUpdateAction, formatUpdateSummary } from '../utils/formatting.js'
import {
  EXIT_CODE_SUCCESS,
  openCommandContext,
  reportCommandError,
  writeLine,
  type GlobalOptions,
  type WorldCommandOptions,
} from '../utils/command-context.js'

export async function runUpdateCommand(options: WorldCommandOptions): Promise<number> {
  try {
    const context = await openCommandContext(options)
    const result = await updateWorlds(context, options.names ?? [], {
      onAction: (action) => writeLine(formatUpdateAction(action)),
    })
    writeLine(formatUpdateSummary(result))
    return EXIT_CODE_SUCCESS
  } catch (err) {
    return reportCommandError(err)
  }
}

export function registerUpdateCommand(program: Command): void {
  program
    .command('update')
    .description(
      'Download the latest version of each world; with no names, also delete files not listed in the config'
    )
    .argument('[names...]', 'limit the update to these worlds (disables deleting unlisted files)')
    .action(async (names: string[]) => {
      const globals = program.opts<GlobalOptions>()
      process.exitCode = await runUpdateCommand({ ...globals, names })
    })
}
