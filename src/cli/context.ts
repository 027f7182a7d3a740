/**
 * CLI Context Factory
 *
 * Builds everything a command needs from the global options: the output
 * port for this session, merged settings, the target platform and the
 * loaded manifest.
 */

import { resolve } from 'path';
import type { Dependency, HostDepsConfig, HostDepsSettings, Manifest, Platform } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { ConfigManager } from '../core/config.js';
import { findManifest, loadManifest } from '../core/manifest/manifest-loader.js';
import { resolvePlatform } from '../core/platforms/platform-selector.js';
import { DependencyManager } from '../core/manager/dependency-manager.js';
import type { TransitionListener } from '../core/manager/status-tracker.js';
import type { OutputPort } from '../core/ports/output.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';

export interface GlobalOptions {
  config?: string;
  platform?: string;
  logLevel?: string;
  verbose?: boolean;
}

export interface CliContext {
  output: OutputPort;
  interactive: boolean;
  settings: HostDepsSettings;
  platform: Platform;
  manifestPath: string;
  manifest: Manifest;
}

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

export function getCliOutput(interactive: boolean): OutputPort {
  if (interactive) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  cachedPlainOutput ??= createPlainOutput();
  return cachedPlainOutput;
}

async function locateManifest(configPath: string | undefined): Promise<string> {
  if (configPath) {
    return resolve(process.cwd(), configPath);
  }
  const found = await findManifest(process.cwd());
  if (!found) {
    throw new ValidationError(
      `No manifest found in ${process.cwd()} (looked for ${FILE_PATTERNS.MANIFESTS.join(', ')}); pass one with --config`
    );
  }
  return found;
}

export async function createCliContext(
  globals: GlobalOptions,
  overrides: HostDepsConfig = {},
  interactive?: boolean
): Promise<CliContext> {
  const isInteractive = detectInteractive(interactive);
  const settings = await new ConfigManager().resolveSettings(overrides);
  const platform = resolvePlatform(globals.platform);
  const manifestPath = await locateManifest(globals.config);
  const manifest = await loadManifest(manifestPath);
  logger.debug(`Target platform: ${platform}`, { manifestPath });

  return {
    output: getCliOutput(isInteractive),
    interactive: isInteractive,
    settings,
    platform,
    manifestPath,
    manifest
  };
}

export function createManager(ctx: CliContext, onTransition?: TransitionListener): DependencyManager {
  return new DependencyManager({ settings: ctx.settings, onTransition });
}

/**
 * Abort signal tripped by the first Ctrl-C; a second one falls through to
 * Node's default handler and exits.
 */
export function createInterruptSignal(output: OutputPort): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    output.warn('Interrupted: finishing the current dependency, skipping the rest');
    controller.abort();
  });
  return controller.signal;
}

export function findDependency(manifest: Manifest, name: string): Dependency {
  const dependency = manifest.dependencies.find(entry => entry.name === name);
  if (!dependency) {
    throw new ValidationError(`Dependency '${name}' is not declared in the manifest`);
  }
  return dependency;
}
