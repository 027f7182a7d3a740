/**
 * Shared constants for hostdeps
 * Single source of truth for directory names, file patterns and defaults.
 */

export const DIR_PATTERNS = {
  HOSTDEPS: '.hostdeps'
} as const;

export const HOSTDEPS_DIRS = {
  TOOLS: 'tools',
  DOWNLOADS: 'downloads'
} as const;

export const FILE_PATTERNS = {
  /** Manifest names looked up in the working directory, in priority order */
  MANIFESTS: ['hostdeps.yml', 'hostdeps.yaml', 'hostdeps.json'],
  CONFIG_FILES: ['config.jsonc', 'config.json']
} as const;

export const ENV_VARS = {
  VERBOSE: 'HOSTDEPS_VERBOSE',
  CONFIG_DIR: 'HOSTDEPS_CONFIG_DIR'
} as const;

export const DEFAULT_SETTINGS = {
  COMMAND_TIMEOUT_MS: 10 * 60 * 1000,
  DOWNLOAD_TIMEOUT_MS: 5 * 60 * 1000,
  DOWNLOAD_RETRIES: 2,
  RETRY_BACKOFF_MS: 1000,
  CONCURRENCY: 1
} as const;

/** Hard cap so a config typo cannot turn into an endless retry loop */
export const MAX_DOWNLOAD_RETRIES = 10;
