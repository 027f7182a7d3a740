/**
 * Platform Selector
 *
 * Picks the platform descriptor a dependency declares for the resolved
 * platform. Exact key match only: a dependency configured for `linux` is
 * never used on `darwin`.
 */

import * as os from 'os';
import {
  PLATFORMS,
  type Dependency,
  type InstallerType,
  type Platform,
  type PlatformConfig
} from '../../types/index.js';
import { UnsupportedPlatformError, ValidationError } from '../../utils/errors.js';
import { assertNever } from '../../utils/assert-never.js';

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some(platform => platform === value);
}

/**
 * Whether an installer type can run on a platform at all
 */
export function isInstallerSupported(type: InstallerType, platform: Platform): boolean {
  switch (type) {
    case 'package':
    case 'binary':
    case 'archive':
      return true;
    case 'msi':
      return platform === 'windows';
    case 'pkg':
      return platform === 'darwin';
    default:
      return assertNever(type);
  }
}

/**
 * Map the running host to a platform identifier.
 */
export function detectHostPlatform(nodePlatform: NodeJS.Platform = os.platform()): Platform {
  switch (nodePlatform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'darwin';
    case 'linux':
      return 'linux';
    default:
      throw new ValidationError(
        `Host platform '${nodePlatform}' is not supported; pass --platform with one of: ${PLATFORMS.join(', ')}`
      );
  }
}

/**
 * Use the explicit override when given (validated against the closed set),
 * otherwise detect the host.
 */
export function resolvePlatform(override?: string, nodePlatform?: NodeJS.Platform): Platform {
  if (override === undefined || override === '') {
    return detectHostPlatform(nodePlatform);
  }
  const normalized = override.trim().toLowerCase();
  if (!isPlatform(normalized)) {
    throw new ValidationError(`Unknown platform '${override}'. Expected one of: ${PLATFORMS.join(', ')}`);
  }
  return normalized;
}

/**
 * Look up the dependency's configuration for `platform`.
 * @throws UnsupportedPlatformError when there is no entry, or the entry's installer cannot run there
 */
export function selectPlatformConfig(dependency: Dependency, platform: Platform): PlatformConfig {
  const config = dependency.platforms[platform];
  if (!config) {
    const declared = Object.keys(dependency.platforms);
    throw new UnsupportedPlatformError(
      dependency.name,
      platform,
      declared.length > 0 ? `declared for ${declared.join(', ')}` : 'no platforms declared'
    );
  }
  if (!isInstallerSupported(config.installer.type, platform)) {
    throw new UnsupportedPlatformError(
      dependency.name,
      platform,
      `installer type '${config.installer.type}' cannot run there`
    );
  }
  return config;
}
