/**
 * Artifact Installer
 *
 * Drives one dependency's installation on one platform:
 * download → checksum → install command → verify command → environment.
 * Any failing step aborts the rest; nothing after a failed step runs.
 */

import { basename, join } from 'path';
import { homedir } from 'os';
import type { Dependency, HostDepsSettings, InstallerType, PlatformConfig } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { AsyncLock } from '../../utils/async-lock.js';
import { assertNever } from '../../utils/assert-never.js';
import { ensureDir, makeExecutable, makeTempDir, remove, writeBinaryFile } from '../../utils/fs.js';
import {
  ChecksumMismatchError,
  CommandFailedError,
  TemplateError,
  ValidationError,
  VerificationFailedError
} from '../../utils/errors.js';
import { fetchWithRetry, type ArtifactFetcher, type Sleep } from './artifact-fetcher.js';
import { verifyChecksum } from './checksum.js';
import type { CommandExecutor } from './command-executor.js';
import { findUnresolvedPlaceholders, renderValue, type Substitutions } from './command-template.js';
import type { EnvironmentApplier, EnvironmentChanges } from './environment-applier.js';

export type InstallerSettings = Pick<
  HostDepsSettings,
  'commandTimeoutMs' | 'downloadTimeoutMs' | 'downloadRetries' | 'retryBackoffMs' | 'installRoot'
>;

export interface ArtifactInstallerOptions {
  executor: CommandExecutor;
  fetcher: ArtifactFetcher;
  applier: EnvironmentApplier;
  settings: InstallerSettings;
  /** Parent of the per-download temporary directories */
  downloadsDir: string;
  /** Guards the shared download area and environment mutation */
  lock?: AsyncLock;
  /** Host the commands actually run on; decides whether binaries need chmod */
  hostPlatform?: NodeJS.Platform;
  sleep?: Sleep;
}

export interface InstallOutcome {
  installDir: string;
  /** Output of the successful verify command */
  verifyOutput: string;
  /** Rendered but not yet applied; see applyEnvironment */
  environment: EnvironmentChanges;
}

/**
 * File name a downloaded artifact is stored under
 */
export function artifactFileName(url: string, dependencyName: string, type: InstallerType): string {
  let name = '';
  try {
    name = decodeURIComponent(basename(new URL(url).pathname));
  } catch {
    name = '';
  }
  if (name && name !== '/' && name !== '.') {
    return name;
  }
  switch (type) {
    case 'msi':
      return `${dependencyName}.msi`;
    case 'pkg':
      return `${dependencyName}.pkg`;
    case 'archive':
    case 'binary':
    case 'package':
      return dependencyName;
    default:
      return assertNever(type);
  }
}

function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

export function resolveInstallDir(dependency: Dependency, config: PlatformConfig, installRoot: string): string {
  return config.install_dir ? expandHome(config.install_dir) : join(installRoot, dependency.name);
}

/**
 * Render a dependency's environment spec. Only `{install_dir}` and
 * `{product_id}` are available here.
 */
export function renderEnvironment(dependency: Dependency, substitutions: Substitutions): EnvironmentChanges {
  const spec = dependency.environment;
  const path = (spec?.path ?? []).map(entry => renderValue(entry, substitutions));
  const variables: Record<string, string> = {};
  for (const [name, value] of Object.entries(spec?.variables ?? {})) {
    variables[name] = renderValue(value, substitutions);
  }
  return { path, variables };
}

export class ArtifactInstaller {
  private readonly lock: AsyncLock;
  private readonly hostPlatform: NodeJS.Platform;

  constructor(private readonly options: ArtifactInstallerOptions) {
    this.lock = options.lock ?? new AsyncLock();
    this.hostPlatform = options.hostPlatform ?? process.platform;
  }

  baseSubstitutions(dependency: Dependency, config: PlatformConfig): Substitutions {
    const substitutions: Substitutions = {
      install_dir: resolveInstallDir(dependency, config, this.options.settings.installRoot)
    };
    if (config.product_id !== undefined) {
      substitutions.product_id = config.product_id;
    }
    return substitutions;
  }

  /**
   * Install and verify one dependency. The environment is rendered but left
   * for the caller to apply once it accepts the verified version.
   */
  async install(dependency: Dependency, config: PlatformConfig): Promise<InstallOutcome> {
    const { executor, settings } = this.options;
    const base = this.baseSubstitutions(dependency, config);
    const installDir = base.install_dir ?? resolveInstallDir(dependency, config, settings.installRoot);
    const url = config.installer.url;

    // Fail on bad templates before downloading or spawning anything
    const planned: Substitutions = url ? { ...base, download_path: '' } : base;
    for (const template of [config.commands.install, config.commands.verify]) {
      const unresolved = findUnresolvedPlaceholders(template, planned);
      if (unresolved.length > 0) {
        throw new TemplateError(unresolved[0], template);
      }
    }
    const environment = renderEnvironment(dependency, base);

    let tempDir: string | undefined;
    try {
      const substitutions: Substitutions = { ...base };
      if (url) {
        tempDir = await this.lock.runExclusive(() =>
          makeTempDir(this.options.downloadsDir, `${dependency.name}-`)
        );
        substitutions.download_path = await this.download(dependency, config, url, tempDir);
      }

      if (config.commands.install.some(token => token.includes('{install_dir}'))) {
        await ensureDir(installDir);
      }

      logger.info(`Installing ${dependency.name}`);
      await executor.run(config.commands.install, substitutions, { timeoutMs: settings.commandTimeoutMs, env: this.options.applier.current() });

      let verifyOutput: string;
      try {
        const verified = await executor.run(config.commands.verify, substitutions, {
          timeoutMs: settings.commandTimeoutMs,
          env: this.options.applier.current()
        });
        verifyOutput = verified.output;
      } catch (error) {
        if (error instanceof CommandFailedError) {
          throw new VerificationFailedError(dependency.name, error.exitCode, error.output);
        }
        throw error;
      }

      logger.info(`Installed ${dependency.name}`);
      return { installDir, verifyOutput, environment };
    } finally {
      if (tempDir) {
        await remove(tempDir);
      }
    }
  }

  /**
   * Make an accepted install's PATH entries and variables visible to the
   * commands that run after it.
   */
  async applyEnvironment(environment: EnvironmentChanges): Promise<void> {
    if (environment.path.length === 0 && Object.keys(environment.variables).length === 0) {
      return;
    }
    await this.lock.runExclusive(() => this.options.applier.apply(environment));
  }

  /**
   * Run the dependency's uninstall command.
   */
  async uninstall(dependency: Dependency, config: PlatformConfig): Promise<void> {
    const template = config.commands.uninstall;
    if (!template || template.length === 0) {
      throw new ValidationError(`Dependency '${dependency.name}' declares no uninstall command`);
    }
    logger.info(`Uninstalling ${dependency.name}`);
    await this.options.executor.run(template, this.baseSubstitutions(dependency, config), {
      timeoutMs: this.options.settings.commandTimeoutMs,
      env: this.options.applier.current()
    });
  }

  private async download(
    dependency: Dependency,
    config: PlatformConfig,
    url: string,
    tempDir: string
  ): Promise<string> {
    const { settings } = this.options;
    logger.info(`Downloading ${dependency.name} from ${url}`);
    const content = await fetchWithRetry(
      this.options.fetcher,
      url,
      { timeoutMs: settings.downloadTimeoutMs },
      { retries: settings.downloadRetries, backoffMs: settings.retryBackoffMs },
      this.options.sleep
    );

    if (config.installer.checksum) {
      const result = await verifyChecksum(content, config.installer.checksum);
      if (!result.matches) {
        throw new ChecksumMismatchError(url, result.expected, result.actual);
      }
      logger.debug(`Checksum verified for ${url}`, { checksum: result.actual });
    }

    const downloadPath = join(tempDir, artifactFileName(url, dependency.name, config.installer.type));
    await writeBinaryFile(downloadPath, content);
    await this.prepareArtifact(config.installer.type, downloadPath);
    return downloadPath;
  }

  private async prepareArtifact(type: InstallerType, downloadPath: string): Promise<void> {
    switch (type) {
      case 'binary':
        if (this.hostPlatform !== 'win32') {
          await makeExecutable(downloadPath);
        }
        return;
      case 'archive':
      case 'package':
      case 'msi':
      case 'pkg':
        return;
      default:
        assertNever(type);
    }
  }
}
