/**
 * Config loader: reads the YAML config file and resolves it into settings
 * plus an ordered, immutable list of tracked worlds.
 *
 * Precedence (lowest → highest):
 *   built-in defaults → file `settings` block → environment variables
 */

import { readFile } from 'fs/promises'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { ConfigError, IOError } from '../../core/errors.js'
import type { TrackedWorld } from '../../core/types.js'
import {
  ConfigFileSchema,
  PartialSettingsSchema,
  SettingsSchema,
  type PartialSettings,
  type Settings,
  type WorldEntry,
} from './config-schema.js'
import { DEFAULT_SETTINGS } from './defaults.js'
import { isPlainObject } from '../../utils/helpers.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WorldSyncConfig {
  readonly settings: Settings
  /** Keyed by world name, in the order the file lists them */
  readonly worlds: ReadonlyMap<string, TrackedWorld>
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/** Map of environment variable names to settings keys */
const ENV_VAR_MAP: Record<string, keyof Settings> = {
  WORLD_SYNC_FRESHNESS_SECONDS: 'freshness_seconds',
  WORLD_SYNC_API_BASE_URL: 'api_base_url',
  WORLD_SYNC_DOWNLOAD_BASE_URL: 'download_base_url',
  WORLD_SYNC_REQUEST_TIMEOUT_MS: 'request_timeout_ms',
  WORLD_SYNC_FILE_EXTENSION: 'file_extension',
  GITHUB_TOKEN: 'github_token',
}

/**
 * Read relevant environment variables and return a partial settings overlay.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PartialSettings {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, settingsKey] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides[settingsKey] = /^\d+$/.test(rawValue) && settingsKey !== 'github_token'
      ? parseInt(rawValue, 10)
      : rawValue
  }

  const parsed = PartialSettingsSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// World resolution
// ---------------------------------------------------------------------------

const REPO_PATTERNS = [/^https:\/\/github\.com\/([^/]+)\/([^/]+)/, /^([^/]+)\/([^/]+)$/]

/**
 * Normalize "owner/repo" or a GitHub URL into an "owner/repo" id.
 */
export function parseRepoId(worldName: string, value: string): string {
  for (const pattern of REPO_PATTERNS) {
    const match = pattern.exec(value)
    if (match?.[1] !== undefined && match[2] !== undefined) {
      return `${match[1]}/${match[2]}`
    }
  }
  throw new ConfigError(
    `World "${worldName}": github_repo must be "owner/repo" or a https://github.com/owner/repo URL, found "${value}"`,
    { world: worldName, github_repo: value }
  )
}

function requireExtension(worldName: string, key: string, value: string, extension: string): string {
  if (!value.endsWith(extension)) {
    throw new ConfigError(
      `World "${worldName}": ${key} must end with "${extension}", found "${value}"`,
      { world: worldName, [key]: value }
    )
  }
  return value
}

/**
 * Build the tagged world for one file entry. Exactly one sourcing mode must be
 * configured; anything else names the offending world.
 */
export function toTrackedWorld(name: string, entry: WorldEntry, extension: string): TrackedWorld {
  const hasRepo = entry.github_repo !== undefined
  const hasAsset = entry.github_repo_asset !== undefined
  const hasManual = entry.manual_file_name !== undefined

  if (hasRepo !== hasAsset) {
    throw new ConfigError(
      `World "${name}": github_repo and github_repo_asset must be set together`,
      { world: name }
    )
  }
  if (hasRepo && hasManual) {
    throw new ConfigError(
      `World "${name}": cannot be both manually managed and sourced from a GitHub repo`,
      { world: name }
    )
  }

  if (entry.github_repo !== undefined && entry.github_repo_asset !== undefined) {
    const world: TrackedWorld = {
      kind: 'repo',
      name,
      repoId: parseRepoId(name, entry.github_repo),
      assetName: requireExtension(name, 'github_repo_asset', entry.github_repo_asset, extension),
    }
    return Object.freeze(world)
  }
  if (entry.manual_file_name !== undefined) {
    const world: TrackedWorld = {
      kind: 'manual',
      name,
      fileName: requireExtension(name, 'manual_file_name', entry.manual_file_name, extension),
    }
    return Object.freeze(world)
  }
  throw new ConfigError(
    `World "${name}": set either github_repo + github_repo_asset or manual_file_name`,
    { world: name }
  )
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Label of the world entry at `index` of the raw document: its name when it
 * has one, else its 1-based position.
 */
function worldLabel(raw: unknown, index: number): string {
  const entries = isPlainObject(raw) ? raw['worlds'] : undefined
  const entry: unknown = Array.isArray(entries) ? entries[index] : undefined
  const name = isPlainObject(entry) ? entry['name'] : undefined
  return typeof name === 'string' || typeof name === 'number'
    ? `"${String(name)}"`
    : `#${String(index + 1)}`
}

function describeIssue(issue: ZodIssue, raw: unknown): string {
  const [section, index, ...rest] = issue.path
  if (section === 'worlds' && typeof index === 'number') {
    const field = rest.length > 0 ? `${rest.join('.')}: ` : ''
    return `World ${worldLabel(raw, index)}: ${field}${issue.message}`
  }
  return `${issue.path.join('.') || '(root)'}: ${issue.message}`
}

/**
 * Parse a config document from its YAML text.
 *
 * @param source - Path the text came from, used in error messages
 */
export function parseConfig(
  text: string,
  source: string,
  env: NodeJS.ProcessEnv = process.env
): WorldSyncConfig {
  let raw: unknown
  try {
    raw = yaml.load(text, { filename: source })
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`Invalid YAML in ${source}: ${message}`, { path: source })
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const [first] = parsed.error.issues
    throw new ConfigError(
      `Invalid config ${source}: ${first ? describeIssue(first, raw) : parsed.error.message}`,
      { path: source, issues: parsed.error.issues }
    )
  }

  const settingsResult = SettingsSchema.safeParse({
    ...DEFAULT_SETTINGS,
    ...parsed.data.settings,
    ...readEnvOverrides(env),
  })
  if (!settingsResult.success) {
    throw new ConfigError(`Invalid settings in ${source}: ${settingsResult.error.message}`, {
      path: source,
    })
  }
  const settings = settingsResult.data

  const worlds = new Map<string, TrackedWorld>()
  for (const entry of parsed.data.worlds ?? []) {
    if (worlds.has(entry.name)) {
      throw new ConfigError(`Invalid config ${source}: World "${entry.name}" is listed more than once`, {
        path: source,
        world: entry.name,
      })
    }
    worlds.set(entry.name, toTrackedWorld(entry.name, entry, settings.file_extension))
  }

  logger.debug({ path: source, worldCount: worlds.size }, 'Loaded config')
  return { settings, worlds }
}

/**
 * Load the config file at `path`. A missing file is an empty configuration.
 */
export async function loadConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<WorldSyncConfig> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      logger.debug({ path }, 'No config file; using an empty world list')
      text = ''
    } else {
      throw new IOError('Failed to read config file', path, err)
    }
  }
  return parseConfig(text, path, env)
}

/**
 * Check requested names against the configuration.
 * @throws {ConfigError} listing every unknown name
 */
export function assertKnownWorlds(config: WorldSyncConfig, names: readonly string[]): void {
  const unknown = [...new Set(names)].filter((name) => !config.worlds.has(name)).sort()
  if (unknown.length === 0) return
  const label = unknown.length === 1 ? 'name' : 'names'
  throw new ConfigError(`World ${label} not found in config: ${unknown.join(', ')}`, {
    names: unknown,
  })
}
