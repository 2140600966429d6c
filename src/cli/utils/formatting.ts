/**
 * CLI output formatting utilities
 *
 * Renders world rows, check progress, and update actions as plain text lines.
 */

import type { WorldRow } from '../../modules/sync/list-worlds.js'
import type { CheckProgress } from '../../modules/sync/check-worlds.js'
import type { UpdateAction, UpdateResult } from '../../modules/sync/update-worlds.js'
import { plural } from '../../utils/helpers.js'

/** Width of a cell in code points, so a surrogate pair counts once */
function cellWidth(text: string): number {
  return [...text].length
}

function padCell(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - cellWidth(text)))
}

/**
 * Format world rows as aligned `name  version  status` columns.
 *
 * The name and version columns are padded to their widest value and separated
 * by two spaces; the status column is left unpadded.
 */
export function formatWorldTable(rows: WorldRow[]): string {
  const nameWidth = rows.reduce((max, row) => Math.max(max, cellWidth(row.name)), 0)
  const versionWidth = rows.reduce((max, row) => Math.max(max, cellWidth(row.version)), 0)

  return rows
    .map((row) =>
      [padCell(row.name, nameWidth), padCell(row.version, versionWidth), row.status].join('  ')
    )
    .join('\n')
}

/**
 * Progress line shown while checking: `3/10 30% Some World`.
 * Without a name it renders the completed state.
 */
export function formatProgressLine(progress: Omit<CheckProgress, 'name'> & { name?: string }): string {
  const percent = progress.total === 0 ? 100 : Math.round((progress.index / progress.total) * 100)
  const base = `${String(progress.index)}/${String(progress.total)} ${String(percent)}%`
  return progress.name === undefined ? base : `${base} ${progress.name}`
}

/**
 * One line per update action, printed before it is carried out.
 */
export function formatUpdateAction(action: UpdateAction): string {
  switch (action.kind) {
    case 'download':
      return `downloading: ${action.url}`
    case 'delete':
      return `deleting: ${action.path}`
  }
}

/**
 * Closing line of an update run.
 */
export function formatUpdateSummary(result: UpdateResult): string {
  const lines = [
    result.downloaded === 0
      ? 'already up to date'
      : `downloaded ${String(result.downloaded)} new item${plural(result.downloaded)}`,
  ]
  if (result.deleted > 0) {
    lines.push(`deleted ${String(result.deleted)} unlisted file${plural(result.deleted)}`)
  }
  return lines.join('\n')
}
