/**
 * Zod validation schemas for the world-sync configuration file.
 *
 * Defines schemas for:
 *  - settings (freshness window, endpoints, file extension)
 *  - a single world entry as written in YAML
 *  - the full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export const SettingsSchema = z
  .object({
    /** Seconds a fetched release list stays fresh before `check` refetches it */
    freshness_seconds: z.number().int().min(0),
    /** Base URL of the GitHub REST API */
    api_base_url: z.string().url(),
    /** Base URL release assets are downloaded from */
    download_base_url: z.string().url(),
    /** Per-request socket timeout */
    request_timeout_ms: z.number().int().positive(),
    /** Suffix every asset and manual file name must carry */
    file_extension: z.string().min(1),
    /** Bearer token for the releases API; only ever taken from the environment */
    github_token: z.string().min(1).optional(),
  })
  .strict()

export type Settings = z.infer<typeof SettingsSchema>

export const PartialSettingsSchema = SettingsSchema.partial()
export type PartialSettings = z.infer<typeof PartialSettingsSchema>

// ---------------------------------------------------------------------------
// Worlds
// ---------------------------------------------------------------------------

/**
 * A world entry as written in the file. Which keys are present decides the
 * sourcing mode; `toTrackedWorld` in config-loader.ts enforces exclusivity.
 */
export const WorldEntrySchema = z
  .object({
    /** Display name; a bare YAML number such as `2048` is taken as text */
    name: z.union([z.string().min(1), z.number()]).transform(String),
    /** "owner/repo" or a https://github.com/owner/repo URL */
    github_repo: z.string().min(1).optional(),
    /** Name of the release asset to download */
    github_repo_asset: z.string().min(1).optional(),
    /** File placed in the directory by hand */
    manual_file_name: z.string().min(1).optional(),
  })
  .strict()

export type WorldEntry = z.output<typeof WorldEntrySchema>

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

export const ConfigFileSchema = z
  .object({
    settings: PartialSettingsSchema.omit({ github_token: true }).optional(),
    /** Listed in the order operations visit them */
    worlds: z.array(WorldEntrySchema).optional(),
  })
  .strict()

export type ConfigFile = z.infer<typeof ConfigFileSchema>
