/**
 * Library entry point: the engine without the CLI.
 */

export * from './types/index.js';
export * from './utils/errors.js';
export { logger, ConsoleLogger, parseLogLevel } from './utils/logger.js';

export { ConfigManager, getDefaultSettings, validateSettings } from './core/config.js';
export { getHostDepsDirectories, getDefaultInstallRoot, getDownloadsDirectory } from './core/directory.js';
export { loadManifest, parseManifest, validateManifest, findManifest } from './core/manifest/manifest-loader.js';

export { classifyVersion, classifyUpdate, extractInstalledVersion } from './core/version/version-resolver.js';
export type { VersionClassification } from './core/version/version-resolver.js';
export {
  resolvePlatform,
  detectHostPlatform,
  selectPlatformConfig,
  isInstallerSupported
} from './core/platforms/platform-selector.js';
export { renderTemplate, findUnresolvedPlaceholders } from './core/install/command-template.js';
export type { Substitutions } from './core/install/command-template.js';
export { CommandExecutor, SpawnCommandRunner } from './core/install/command-executor.js';
export type { CommandRunner, RunOptions, RunResult, CommandOutcome } from './core/install/command-executor.js';
export { HttpArtifactFetcher, fetchWithRetry } from './core/install/artifact-fetcher.js';
export type { ArtifactFetcher, FetchOptions, RetryPolicy } from './core/install/artifact-fetcher.js';
export { parseChecksum, verifyChecksum } from './core/install/checksum.js';
export {
  ProcessEnvironmentApplier,
  RecordingEnvironmentApplier,
  prependPathEntries
} from './core/install/environment-applier.js';
export type { EnvironmentApplier, EnvironmentChanges } from './core/install/environment-applier.js';
export { ArtifactInstaller } from './core/install/artifact-installer.js';
export type { InstallOutcome } from './core/install/artifact-installer.js';
export { orderDependencies, computeWaves } from './core/dependency-graph/graph-resolver.js';
export { DependencyManager } from './core/manager/dependency-manager.js';
export type { DependencyManagerOptions, ManagerRunOptions } from './core/manager/dependency-manager.js';
export type { TransitionListener } from './core/manager/status-tracker.js';
