import * as os from 'os';
import * as path from 'path';
import { HostDepsDirectories } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS, HOSTDEPS_DIRS } from '../constants/index.js';

/**
 * Get hostdeps directories using the dotfile convention
 * (~/.hostdeps on all platforms, like ~/.aws for the AWS CLI).
 * HOSTDEPS_CONFIG_DIR relocates everything except the runtime directory.
 */
export function getHostDepsDirectories(env: NodeJS.ProcessEnv = process.env): HostDepsDirectories {
  const baseDir = env[ENV_VARS.CONFIG_DIR] || path.join(os.homedir(), DIR_PATTERNS.HOSTDEPS);

  return {
    config: baseDir,
    data: baseDir,
    runtime: path.join(os.tmpdir(), 'hostdeps')
  };
}

/**
 * Default parent directory for `{install_dir}`
 */
export function getDefaultInstallRoot(dirs: HostDepsDirectories = getHostDepsDirectories()): string {
  return path.join(dirs.data, HOSTDEPS_DIRS.TOOLS);
}

/**
 * Directory under which each download gets its own temporary folder
 */
export function getDownloadsDirectory(dirs: HostDepsDirectories = getHostDepsDirectories()): string {
  return path.join(dirs.runtime, HOSTDEPS_DIRS.DOWNLOADS);
}
