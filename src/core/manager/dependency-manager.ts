/**
 * Dependency Manager
 *
 * Public engine entry point. Walks a manifest in dependency order, probes each
 * dependency with its verify command and, for `ensure`, installs what is
 * missing. Per-dependency failures end up in the returned statuses; only
 * manifest-level problems (cycles, unknown prerequisites, a bad platform
 * override) are thrown.
 */

import {
  DependencyState,
  HostDepsError,
  UpdateKind,
  type Dependency,
  type DependencyStatus,
  type DependencyStatusMap,
  type HostDepsSettings,
  type Manifest,
  type Platform,
  type PlatformConfig
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { AsyncLock } from '../../utils/async-lock.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import {
  CancelledError,
  CommandFailedError,
  FileSystemError,
  InvalidVersionFormatError,
  PrerequisiteFailedError,
  ValidationError,
  VerificationFailedError
} from '../../utils/errors.js';
import { getDownloadsDirectory } from '../directory.js';
import { computeWaves, orderDependencies } from '../dependency-graph/graph-resolver.js';
import { resolvePlatform, selectPlatformConfig } from '../platforms/platform-selector.js';
import { classifyVersion, extractInstalledVersion, type VersionClassification } from '../version/version-resolver.js';
import { ArtifactInstaller } from '../install/artifact-installer.js';
import { HttpArtifactFetcher, type ArtifactFetcher, type Sleep } from '../install/artifact-fetcher.js';
import { CommandExecutor } from '../install/command-executor.js';
import { ProcessEnvironmentApplier, type EnvironmentApplier } from '../install/environment-applier.js';
import { StatusTracker, type TransitionListener } from './status-tracker.js';

export interface DependencyManagerOptions {
  settings: HostDepsSettings;
  executor?: CommandExecutor;
  fetcher?: ArtifactFetcher;
  applier?: EnvironmentApplier;
  downloadsDir?: string;
  /** Host the process runs on; used for platform detection and artifact preparation */
  hostPlatform?: NodeJS.Platform;
  sleep?: Sleep;
  onTransition?: TransitionListener;
}

export interface ManagerRunOptions {
  /** Checked before each dependency starts; unprocessed entries become Cancelled */
  signal?: AbortSignal;
  /** Reinstall Outdated dependencies (uninstall first when declared) */
  upgrade?: boolean;
  /** Overrides settings.concurrency for this run */
  concurrency?: number;
}

interface Probe extends VersionClassification {
  installed: boolean;
}

type Processor = (dependency: Dependency, tracker: StatusTracker) => Promise<void>;

/**
 * Anything thrown that is not an engine error comes from the file system
 * operations around downloads and install directories.
 */
function toHostDepsError(error: unknown): HostDepsError {
  if (error instanceof HostDepsError) return error;
  return new FileSystemError(error instanceof Error ? error.message : String(error));
}

function firstLine(output: string): string {
  return output.trim().split(/\r?\n/)[0] ?? '';
}

export class DependencyManager {
  private readonly settings: HostDepsSettings;
  private readonly executor: CommandExecutor;
  private readonly applier: EnvironmentApplier;
  private readonly installer: ArtifactInstaller;
  private readonly hostPlatform: NodeJS.Platform;
  private readonly onTransition?: TransitionListener;

  constructor(options: DependencyManagerOptions) {
    this.settings = options.settings;
    this.executor = options.executor ?? new CommandExecutor();
    this.applier = options.applier ?? new ProcessEnvironmentApplier();
    this.hostPlatform = options.hostPlatform ?? process.platform;
    this.onTransition = options.onTransition;
    this.installer = new ArtifactInstaller({
      executor: this.executor,
      fetcher: options.fetcher ?? new HttpArtifactFetcher(),
      applier: this.applier,
      settings: this.settings,
      downloadsDir: options.downloadsDir ?? getDownloadsDirectory(),
      lock: new AsyncLock(),
      hostPlatform: this.hostPlatform,
      sleep: options.sleep
    });
  }

  /**
   * Resolve the target platform: a validated override or the detected host.
   */
  resolvePlatform(platformOverride?: string): Platform {
    return resolvePlatform(platformOverride, this.hostPlatform);
  }

  async check(manifest: Manifest, platformOverride?: string, options: ManagerRunOptions = {}): Promise<DependencyStatusMap> {
    return this.checkAll(manifest, this.resolvePlatform(platformOverride), options);
  }

  async ensure(manifest: Manifest, platformOverride?: string, options: ManagerRunOptions = {}): Promise<DependencyStatusMap> {
    return this.ensureAll(manifest, this.resolvePlatform(platformOverride), options);
  }

  /**
   * Classify every dependency without changing the host.
   */
  async checkAll(manifest: Manifest, platform: Platform, options: ManagerRunOptions = {}): Promise<DependencyStatusMap> {
    return this.runManifest(manifest, options, async (dependency, tracker) => {
      await this.checkDependency(dependency, platform, tracker);
    });
  }

  /**
   * Classify every dependency and install the ones that are missing
   * (and, with `upgrade`, the outdated ones).
   */
  async ensureAll(manifest: Manifest, platform: Platform, options: ManagerRunOptions = {}): Promise<DependencyStatusMap> {
    const upgrade = options.upgrade ?? false;
    return this.runManifest(manifest, options, async (dependency, tracker) => {
      const failedPrerequisite = (dependency.dependencies ?? []).find(name => {
        const state = tracker.state(name);
        return state === DependencyState.Failed || state === DependencyState.Cancelled;
      });
      if (failedPrerequisite !== undefined) {
        tracker.transition(dependency.name, DependencyState.Failed, {
          error: new PrerequisiteFailedError(dependency.name, failedPrerequisite)
        });
        return;
      }

      const config = await this.checkDependency(dependency, platform, tracker);
      if (config) {
        await this.installIfNeeded(dependency, config, tracker, upgrade);
      }
    });
  }

  async checkOne(dependency: Dependency, platformOverride?: string): Promise<DependencyStatus> {
    const platform = this.resolvePlatform(platformOverride);
    const tracker = new StatusTracker([dependency.name], this.onTransition);
    await this.checkDependency(dependency, platform, tracker);
    return tracker.get(dependency.name);
  }

  /**
   * Install a single dependency, ignoring its prerequisites. An explicit
   * install request also replaces an outdated installation.
   */
  async installOne(dependency: Dependency, platformOverride?: string): Promise<DependencyStatus> {
    const platform = this.resolvePlatform(platformOverride);
    const tracker = new StatusTracker([dependency.name], this.onTransition);
    const config = await this.checkDependency(dependency, platform, tracker);
    if (config) {
      await this.installIfNeeded(dependency, config, tracker, true);
    }
    return tracker.get(dependency.name);
  }

  /**
   * Run a dependency's uninstall command and report its state afterwards.
   *
   * @throws UnsupportedPlatformError, ValidationError (no uninstall command)
   *   or the command's own failure
   */
  async uninstallOne(dependency: Dependency, platformOverride?: string): Promise<DependencyStatus> {
    const platform = this.resolvePlatform(platformOverride);
    const config = selectPlatformConfig(dependency, platform);
    await this.installer.uninstall(dependency, config);
    return this.checkOne(dependency, platform);
  }

  private async runManifest(
    manifest: Manifest,
    options: ManagerRunOptions,
    processor: Processor
  ): Promise<DependencyStatusMap> {
    const concurrency = options.concurrency ?? this.settings.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError(`concurrency must be a positive integer (got ${concurrency})`);
    }

    const order = orderDependencies(manifest);
    const byName = new Map(manifest.dependencies.map(dependency => [dependency.name, dependency]));
    const tracker = new StatusTracker(
      manifest.dependencies.map(dependency => dependency.name),
      this.onTransition
    );

    const step = async (name: string): Promise<void> => {
      const dependency = byName.get(name);
      if (!dependency) return;
      if (options.signal?.aborted) {
        tracker.transition(name, DependencyState.Cancelled, { error: new CancelledError(name) });
        return;
      }
      await processor(dependency, tracker);
    };

    if (concurrency === 1) {
      for (const name of order) {
        await step(name);
      }
    } else {
      for (const wave of computeWaves(manifest, order)) {
        const outcome = await runWithConcurrency(
          wave.map(name => () => step(name)),
          concurrency
        );
        for (const [index, result] of outcome.results.entries()) {
          if (result.status === 'rejected') {
            logger.error(`Unexpected failure while processing ${wave[index]}`, { error: result.error });
            throw result.error;
          }
        }
      }
    }

    return tracker.snapshot();
  }

  /**
   * Pending → Checking → Satisfied | NeedsInstall | Outdated | Failed.
   * Returns the platform configuration when the dependency could be probed.
   */
  private async checkDependency(
    dependency: Dependency,
    platform: Platform,
    tracker: StatusTracker
  ): Promise<PlatformConfig | null> {
    tracker.transition(dependency.name, DependencyState.Checking);

    let config: PlatformConfig;
    let probe: Probe;
    try {
      config = selectPlatformConfig(dependency, platform);
      probe = await this.probe(dependency, config);
    } catch (error) {
      tracker.transition(dependency.name, DependencyState.Failed, { error: toHostDepsError(error) });
      return null;
    }

    const patch = {
      installed: probe.installed,
      currentVersion: probe.current,
      requiredUpdate: probe.update,
      compatible: probe.compatible,
      error: probe.error
    };
    if (!probe.installed) {
      tracker.transition(dependency.name, DependencyState.NeedsInstall, patch);
    } else if (probe.compatible) {
      tracker.transition(dependency.name, DependencyState.Satisfied, patch);
    } else {
      tracker.transition(dependency.name, DependencyState.Outdated, patch);
    }
    return config;
  }

  /**
   * Run the verify command and classify what it reports. A command that
   * fails or cannot be started means "not installed".
   */
  private async probe(dependency: Dependency, config: PlatformConfig): Promise<Probe> {
    const substitutions = this.installer.baseSubstitutions(dependency, config);
    let output: string;
    try {
      const result = await this.executor.run(config.commands.verify, substitutions, {
        timeoutMs: this.settings.commandTimeoutMs,
        env: this.applier.current()
      });
      output = result.output;
    } catch (error) {
      if (error instanceof CommandFailedError) {
        logger.debug(`${dependency.name} not detected`, { exitCode: error.exitCode });
        return { installed: false, ...classifyVersion(null, dependency.version.required, dependency.version.constraint) };
      }
      throw error;
    }

    return { installed: true, ...this.classifyOutput(dependency, config, output) };
  }

  private classifyOutput(dependency: Dependency, config: PlatformConfig, output: string): VersionClassification {
    const version = extractInstalledVersion(output, config.version_pattern);
    if (version === null) {
      return {
        compatible: false,
        update: UpdateKind.MajorUpdate,
        current: '',
        error: new InvalidVersionFormatError(firstLine(output), { field: 'installed', dependency: dependency.name })
      };
    }
    return classifyVersion(version, dependency.version.required, dependency.version.constraint);
  }

  /**
   * NeedsInstall (or Outdated with upgrade) → Installing → Installed | Failed.
   */
  private async installIfNeeded(
    dependency: Dependency,
    config: PlatformConfig,
    tracker: StatusTracker,
    upgrade: boolean
  ): Promise<void> {
    const state = tracker.state(dependency.name);
    const replacing = state === DependencyState.Outdated;
    if (state !== DependencyState.NeedsInstall && !(replacing && upgrade)) {
      return;
    }

    tracker.transition(dependency.name, DependencyState.Installing);
    try {
      if (replacing && config.commands.uninstall && config.commands.uninstall.length > 0) {
        await this.installer.uninstall(dependency, config);
      }
      const outcome = await this.installer.install(dependency, config);
      const classification = this.classifyOutput(dependency, config, outcome.verifyOutput);
      if (!classification.compatible) {
        // The tool runs but reports a version the manifest does not accept
        throw new VerificationFailedError(dependency.name, 0, outcome.verifyOutput);
      }
      await this.installer.applyEnvironment(outcome.environment);
      tracker.transition(dependency.name, DependencyState.Installed, {
        installed: true,
        currentVersion: classification.current,
        requiredUpdate: classification.update,
        compatible: true,
        error: null
      });
    } catch (error) {
      tracker.transition(dependency.name, DependencyState.Failed, { error: toHostDepsError(error) });
    }
  }
}
