/**
 * Built-in default values for world-sync settings.
 *
 * Overridden by the config file's `settings` block, then by environment variables.
 */

import type { Settings } from './config-schema.js'

/** Default config file name, looked up in the working directory */
export const DEFAULT_CONFIG_FILE = 'world-sync.yaml'

export const DEFAULT_SETTINGS: Settings = {
  freshness_seconds: 3600,
  api_base_url: 'https://api.github.com',
  download_base_url: 'https://github.com',
  request_timeout_ms: 30_000,
  file_extension: '.apworld',
}
