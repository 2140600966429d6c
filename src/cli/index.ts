#!/usr/bin/env node
/**
 * world-sync CLI - Main entry point
 * Provides the `world-sync` command-line interface
 */

import { Command, Option } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerListCommand } from './commands/list.js'
import { registerCheckCommand } from './commands/check.js'
import { registerUpdateCommand } from './commands/update.js'

const logger = createLogger('cli')

/** Resolve the package version relative to this file */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli/ when run from sources, dist/src/cli/ when built
  const paths = [resolve(here, '../../package.json'), resolve(here, '../../../package.json')]

  for (const pkgPath of paths) {
    try {
      const content = await readFile(pkgPath, 'utf-8')
      const pkg = JSON.parse(content) as { version?: string; name?: string }
      if (pkg.name === 'world-sync') {
        return pkg.version ?? '0.0.0'
      }
    } catch {
      // Try next path
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('world-sync')
    .description(
      'Keep a directory of custom worlds in sync with the GitHub releases listed in a config file'
    )
    .version(version, '-v, --version', 'Output the current version')
    .addOption(
      new Option('--repo <path>', 'Archipelago checkout; manages its custom_worlds/ directory').conflicts('dir')
    )
    .addOption(
      new Option('--dir <path>', 'worlds directory to manage directly (created if missing)').conflicts('repo')
    )
    .option('-c, --config <path>', 'config file (default: $WORLD_SYNC_CONFIG or ./world-sync.yaml)')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<{ repo?: string; dir?: string }>()
      if (opts.repo === undefined && opts.dir === undefined) {
        thisCommand.error('error: one of --repo <path> or --dir <path> is required')
      }
    })

  registerListCommand(program)
  registerCheckCommand(program)
  registerUpdateCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

void main()
