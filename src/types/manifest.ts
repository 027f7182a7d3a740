/**
 * Manifest types.
 *
 * Field names follow the manifest file (`hostdeps.yml`) exactly, so a parsed
 * document can be used without a mapping layer.
 */

/** Platform identifiers a manifest may declare configuration for. */
export const PLATFORMS = ['windows', 'linux', 'darwin'] as const;
export type Platform = (typeof PLATFORMS)[number];

/** Installer kinds; each one constrains where it can run and how its artifact is prepared. */
export const INSTALLER_TYPES = ['package', 'binary', 'archive', 'msi', 'pkg'] as const;
export type InstallerType = (typeof INSTALLER_TYPES)[number];

/** Placeholders recognized inside command and environment templates. */
export const PLACEHOLDERS = ['download_path', 'install_dir', 'product_id'] as const;
export type Placeholder = (typeof PLACEHOLDERS)[number];

export interface VersionSpec {
  /** Exact semantic version the dependency is pinned to */
  required: string;
  /**
   * Range of tolerated installed versions (e.g. `^1.2.0`, `~3.4.1`).
   * Empty or absent means only `required` itself is accepted.
   */
  constraint?: string;
}

export interface InstallerSpec {
  type: InstallerType;
  /** Artifact to download before `install` runs; omitted for package-manager installs */
  url?: string;
  /** `<algorithm>:<hex>` or bare sha256 hex */
  checksum?: string;
}

export interface CommandSet {
  install: string[];
  verify: string[];
  uninstall?: string[];
}

export interface PlatformConfig {
  installer: InstallerSpec;
  commands: CommandSet;
  /** Value substituted for `{product_id}` (MSI product code, formula name, ...) */
  product_id?: string;
  /** Value substituted for `{install_dir}`; defaults to `<installRoot>/<dependency name>` */
  install_dir?: string;
  /** Regular expression whose first capture group is the version in the verify output */
  version_pattern?: string;
}

export interface EnvironmentSpec {
  /** Directories prepended to PATH, in order */
  path?: string[];
  variables?: Record<string, string>;
}

export interface Dependency {
  name: string;
  description?: string;
  version: VersionSpec;
  platforms: Partial<Record<Platform, PlatformConfig>>;
  environment?: EnvironmentSpec;
  /** Names of other manifest entries that must be handled first */
  dependencies?: string[];
}

export interface Manifest {
  version: string;
  name: string;
  description?: string;
  dependencies: Dependency[];
}
