import { join, resolve } from 'path';
import * as yaml from 'js-yaml';
import * as semver from 'semver';
import {
  INSTALLER_TYPES,
  type CommandSet,
  type Dependency,
  type EnvironmentSpec,
  type InstallerSpec,
  type InstallerType,
  type Manifest,
  type Platform,
  type PlatformConfig
} from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import { isPlatform } from '../platforms/platform-selector.js';
import { parseChecksum } from '../install/checksum.js';

/**
 * Manifest discovery, parsing and shape validation.
 * JSON manifests go through the same YAML parser.
 */

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInstallerType(value: unknown): value is InstallerType {
  return INSTALLER_TYPES.some(type => type === value);
}

function requireString(fields: Fields, key: string, where: string): string {
  const value = fields[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${where}: '${key}' must be a non-empty string`);
  }
  return value;
}

function optionalString(fields: Fields, key: string, where: string): string | undefined {
  const value = fields[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${where}: '${key}' must be a string`);
  }
  return value;
}

function stringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${where} must be a list of strings`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ValidationError(`${where} must be a list of strings`);
    }
    items.push(item);
  }
  return items;
}

function commandList(fields: Fields, key: string, where: string): string[] {
  const list = stringList(fields[key], `${where}: 'commands.${key}'`);
  if (list.length === 0) {
    throw new ValidationError(`${where}: 'commands.${key}' must not be empty`);
  }
  return list;
}

function parseInstaller(value: unknown, where: string): InstallerSpec {
  if (!isRecord(value)) {
    throw new ValidationError(`${where}: 'installer' must be an object`);
  }
  const type = value.type;
  if (!isInstallerType(type)) {
    throw new ValidationError(
      `${where}: installer type '${String(type)}' is not one of ${INSTALLER_TYPES.join(', ')}`
    );
  }
  const installer: InstallerSpec = { type };
  const url = optionalString(value, 'url', where);
  if (url) {
    try {
      new URL(url);
    } catch {
      throw new ValidationError(`${where}: installer url '${url}' is not a valid URL`);
    }
    installer.url = url;
  }
  const checksum = optionalString(value, 'checksum', where);
  if (checksum) {
    if (!url) {
      throw new ValidationError(`${where}: a checksum is declared without an installer url`);
    }
    parseChecksum(checksum);
    installer.checksum = checksum;
  }
  return installer;
}

function parseCommands(value: unknown, where: string): CommandSet {
  if (!isRecord(value)) {
    throw new ValidationError(`${where}: 'commands' must be an object`);
  }
  const commands: CommandSet = {
    install: commandList(value, 'install', where),
    verify: commandList(value, 'verify', where)
  };
  if (value.uninstall !== undefined && value.uninstall !== null) {
    commands.uninstall = commandList(value, 'uninstall', where);
  }
  return commands;
}

function parsePlatformConfig(value: unknown, where: string): PlatformConfig {
  if (!isRecord(value)) {
    throw new ValidationError(`${where} must be an object`);
  }
  const config: PlatformConfig = {
    installer: parseInstaller(value.installer, where),
    commands: parseCommands(value.commands, where)
  };
  const productId = optionalString(value, 'product_id', where);
  if (productId !== undefined) config.product_id = productId;
  const installDir = optionalString(value, 'install_dir', where);
  if (installDir !== undefined) config.install_dir = installDir;
  const versionPattern = optionalString(value, 'version_pattern', where);
  if (versionPattern !== undefined) {
    try {
      new RegExp(versionPattern);
    } catch {
      throw new ValidationError(`${where}: version_pattern '${versionPattern}' is not a valid regular expression`);
    }
    config.version_pattern = versionPattern;
  }
  return config;
}

function parseEnvironment(value: unknown, where: string): EnvironmentSpec | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ValidationError(`${where}: 'environment' must be an object`);
  }
  const environment: EnvironmentSpec = {};
  if (value.path !== undefined && value.path !== null) {
    environment.path = stringList(value.path, `${where}: 'environment.path'`);
  }
  if (value.variables !== undefined && value.variables !== null) {
    if (!isRecord(value.variables)) {
      throw new ValidationError(`${where}: 'environment.variables' must be an object`);
    }
    const variables: Record<string, string> = {};
    for (const [name, variable] of Object.entries(value.variables)) {
      if (typeof variable !== 'string') {
        throw new ValidationError(`${where}: environment variable '${name}' must be a string`);
      }
      variables[name] = variable;
    }
    environment.variables = variables;
  }
  return environment;
}

function parseDependency(value: unknown, index: number): Dependency {
  if (!isRecord(value)) {
    throw new ValidationError(`dependencies[${index}] must be an object`);
  }
  const name = requireString(value, 'name', `dependencies[${index}]`);
  const where = `dependency '${name}'`;

  if (!isRecord(value.version)) {
    throw new ValidationError(`${where}: 'version' must be an object with a 'required' field`);
  }
  const required = requireString(value.version, 'required', where);
  if (!semver.valid(required)) {
    throw new ValidationError(`${where}: required version '${required}' is not a valid semantic version`);
  }
  const constraint = optionalString(value.version, 'constraint', where);
  if (constraint && semver.validRange(constraint) === null) {
    throw new ValidationError(`${where}: version constraint '${constraint}' is not a valid range`);
  }

  if (!isRecord(value.platforms)) {
    throw new ValidationError(`${where}: 'platforms' must be an object`);
  }
  const platforms: Partial<Record<Platform, PlatformConfig>> = {};
  for (const [key, config] of Object.entries(value.platforms)) {
    if (!isPlatform(key)) {
      throw new ValidationError(`${where}: unknown platform '${key}'`);
    }
    platforms[key] = parsePlatformConfig(config, `${where} (${key})`);
  }

  const dependency: Dependency = {
    name,
    version: constraint ? { required, constraint } : { required },
    platforms
  };
  const description = optionalString(value, 'description', where);
  if (description !== undefined) dependency.description = description;
  const environment = parseEnvironment(value.environment, where);
  if (environment) dependency.environment = environment;
  if (value.dependencies !== undefined && value.dependencies !== null) {
    dependency.dependencies = stringList(value.dependencies, `${where}: 'dependencies'`);
  }
  return dependency;
}

/**
 * Validate a parsed document and build a typed Manifest from it.
 */
export function validateManifest(document: unknown): Manifest {
  if (!isRecord(document)) {
    throw new ValidationError('manifest must be an object');
  }

  // `version: 1.0` arrives as a number from YAML
  const formatVersion = typeof document.version === 'number' ? String(document.version) : document.version;
  if (typeof formatVersion !== 'string' || formatVersion.trim() === '') {
    throw new ValidationError(`manifest: 'version' must be a non-empty string`);
  }
  const name = requireString(document, 'name', 'manifest');

  const rawDependencies = document.dependencies ?? [];
  if (!Array.isArray(rawDependencies)) {
    throw new ValidationError(`manifest: 'dependencies' must be a list`);
  }

  const dependencies = rawDependencies.map((entry, index) => parseDependency(entry, index));
  const seen = new Set<string>();
  for (const dependency of dependencies) {
    if (seen.has(dependency.name)) {
      throw new ValidationError(`dependency '${dependency.name}' is declared more than once`);
    }
    seen.add(dependency.name);
  }

  const manifest: Manifest = { version: formatVersion, name, dependencies };
  const description = optionalString(document, 'description', 'manifest');
  if (description !== undefined) manifest.description = description;
  return manifest;
}

export function parseManifest(content: string, source: string = 'manifest'): Manifest {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ValidationError(`Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return validateManifest(document);
}

/**
 * Read and validate a manifest file (YAML or JSON)
 */
export async function loadManifest(path: string): Promise<Manifest> {
  const content = await readTextFile(path);
  const manifest = parseManifest(content, path);
  logger.debug(`Loaded manifest ${manifest.name} from ${path}`, { dependencies: manifest.dependencies.length });
  return manifest;
}

/**
 * First manifest file present in `cwd`, in FILE_PATTERNS.MANIFESTS order
 */
export async function findManifest(cwd: string = process.cwd()): Promise<string | null> {
  for (const fileName of FILE_PATTERNS.MANIFESTS) {
    const candidate = join(resolve(cwd), fileName);
    if (await exists(candidate)) {
      return candidate;
    }
  }
  return null;
}
