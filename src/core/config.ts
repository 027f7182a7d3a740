import { join } from 'path';
import { HostDepsConfig, HostDepsDirectories, HostDepsSettings } from '../types/index.js';
import { readJsonOrJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_SETTINGS, FILE_PATTERNS, MAX_DOWNLOAD_RETRIES } from '../constants/index.js';
import { getDefaultInstallRoot, getHostDepsDirectories } from './directory.js';

/**
 * Configuration management for hostdeps
 * Supports both JSON and JSONC formats. Loading never writes a file.
 */

export function getDefaultSettings(dirs: HostDepsDirectories = getHostDepsDirectories()): HostDepsSettings {
  return {
    commandTimeoutMs: DEFAULT_SETTINGS.COMMAND_TIMEOUT_MS,
    downloadTimeoutMs: DEFAULT_SETTINGS.DOWNLOAD_TIMEOUT_MS,
    downloadRetries: DEFAULT_SETTINGS.DOWNLOAD_RETRIES,
    retryBackoffMs: DEFAULT_SETTINGS.RETRY_BACKOFF_MS,
    concurrency: DEFAULT_SETTINGS.CONCURRENCY,
    installRoot: getDefaultInstallRoot(dirs)
  };
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Validate merged settings. A missing or non-positive timeout is a
 * configuration error rather than "wait forever".
 */
export function validateSettings(settings: HostDepsSettings): HostDepsSettings {
  if (!isPositiveInteger(settings.commandTimeoutMs)) {
    throw new ConfigError(`commandTimeoutMs must be a positive integer (got ${settings.commandTimeoutMs})`);
  }
  if (!isPositiveInteger(settings.downloadTimeoutMs)) {
    throw new ConfigError(`downloadTimeoutMs must be a positive integer (got ${settings.downloadTimeoutMs})`);
  }
  if (!isNonNegativeInteger(settings.downloadRetries) || settings.downloadRetries > MAX_DOWNLOAD_RETRIES) {
    throw new ConfigError(
      `downloadRetries must be an integer between 0 and ${MAX_DOWNLOAD_RETRIES} (got ${settings.downloadRetries})`
    );
  }
  if (!isNonNegativeInteger(settings.retryBackoffMs)) {
    throw new ConfigError(`retryBackoffMs must be a non-negative integer (got ${settings.retryBackoffMs})`);
  }
  if (!isPositiveInteger(settings.concurrency)) {
    throw new ConfigError(`concurrency must be a positive integer (got ${settings.concurrency})`);
  }
  if (typeof settings.installRoot !== 'string' || settings.installRoot.length === 0) {
    throw new ConfigError('installRoot must be a non-empty path');
  }
  return settings;
}

export class ConfigManager {
  private config: HostDepsConfig | null = null;
  private readonly dirs: HostDepsDirectories;

  constructor(dirs: HostDepsDirectories = getHostDepsDirectories()) {
    this.dirs = dirs;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
      const path = join(this.dirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load the config file, or an empty config when none exists
   */
  async load(): Promise<HostDepsConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = {};
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let fileConfig: unknown;
    try {
      fileConfig = await readJsonOrJsoncFile<unknown>(configPath);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`, {
        path: configPath
      });
    }

    if (!fileConfig || typeof fileConfig !== 'object' || Array.isArray(fileConfig)) {
      throw new ConfigError(`Configuration in ${configPath} must be an object`, { path: configPath });
    }
    this.config = pickKnownSettings(fileConfig);
    return this.config;
  }

  /**
   * Merge defaults, the config file and explicit overrides, then validate
   */
  async resolveSettings(overrides: HostDepsConfig = {}): Promise<HostDepsSettings> {
    const fileConfig = await this.load();
    const merged: HostDepsSettings = {
      ...getDefaultSettings(this.dirs),
      ...definedOnly(fileConfig),
      ...definedOnly(overrides)
    };
    return validateSettings(merged);
  }
}

const SETTING_KEYS = [
  'commandTimeoutMs',
  'downloadTimeoutMs',
  'downloadRetries',
  'retryBackoffMs',
  'concurrency',
  'installRoot'
] as const satisfies readonly (keyof HostDepsSettings)[];

function pickKnownSettings(source: object): HostDepsConfig {
  const picked: HostDepsConfig = {};
  const record = new Map(Object.entries(source));
  for (const key of SETTING_KEYS) {
    const value = record.get(key);
    if (value === undefined) continue;
    if (key === 'installRoot') {
      if (typeof value !== 'string') {
        throw new ConfigError(`installRoot must be a string`);
      }
      picked.installRoot = value;
    } else {
      if (typeof value !== 'number') {
        throw new ConfigError(`${key} must be a number`);
      }
      picked[key] = value;
    }
  }
  for (const key of record.keys()) {
    if (!SETTING_KEYS.some(known => known === key)) {
      logger.warn(`Ignoring unknown config key: ${key}`);
    }
  }
  return picked;
}

function definedOnly(config: HostDepsConfig): HostDepsConfig {
  const result: HostDepsConfig = {};
  for (const key of SETTING_KEYS) {
    if (config[key] === undefined) continue;
    if (key === 'installRoot') {
      result.installRoot = config.installRoot;
    } else {
      result[key] = config[key];
    }
  }
  return result;
}
