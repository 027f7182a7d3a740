/**
 * Version Resolver
 *
 * Classifies a detected installed version against a dependency's pinned
 * `required` version and optional `constraint` range.
 */

import * as semver from 'semver';
import { UpdateKind } from '../../types/index.js';
import { InvalidVersionFormatError } from '../../utils/errors.js';

export interface VersionClassification {
  compatible: boolean;
  update: UpdateKind;
  /** Parsed installed version ('' when absent or unparseable) */
  current: string;
  error: InvalidVersionFormatError | null;
}

const VERSION_TOKEN = /v?(\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?)/;

/**
 * Normalize the installed version for comparison.
 * Pre-release and build metadata are dropped unless the pinned version itself
 * is a pre-release.
 */
function comparableVersion(current: semver.SemVer, required: semver.SemVer): semver.SemVer {
  if (required.prerelease.length > 0) {
    return current;
  }
  return new semver.SemVer(`${current.major}.${current.minor}.${current.patch}`);
}

/**
 * Kind of change needed to go from `current` to `required`; the most
 * significant differing component decides.
 */
export function classifyUpdate(current: semver.SemVer, required: semver.SemVer): UpdateKind {
  if (current.major !== required.major) return UpdateKind.MajorUpdate;
  if (current.minor !== required.minor) return UpdateKind.MinorUpdate;
  if (current.patch !== required.patch) return UpdateKind.PatchUpdate;
  if (semver.compare(current, required) !== 0) return UpdateKind.PatchUpdate;
  return UpdateKind.NoUpdate;
}

/**
 * Classify an installed version.
 *
 * Never throws: a version that cannot be parsed is returned as an
 * incompatible classification carrying an InvalidVersionFormatError.
 */
export function classifyVersion(
  current: string | null | undefined,
  required: string,
  constraint?: string
): VersionClassification {
  if (current === null || current === undefined || current.trim() === '') {
    return { compatible: false, update: UpdateKind.NotInstalled, current: '', error: null };
  }

  const requiredVersion = semver.parse(required);
  if (!requiredVersion) {
    return {
      compatible: false,
      update: UpdateKind.MajorUpdate,
      current: '',
      error: new InvalidVersionFormatError(required, { field: 'required' })
    };
  }

  const parsedCurrent = semver.parse(current.trim().replace(/^v/, ''));
  if (!parsedCurrent) {
    return {
      compatible: false,
      update: UpdateKind.MajorUpdate,
      current: '',
      error: new InvalidVersionFormatError(current, { field: 'installed' })
    };
  }

  const comparable = comparableVersion(parsedCurrent, requiredVersion);
  const update = classifyUpdate(comparable, requiredVersion);
  const range = constraint?.trim() ?? '';

  const compatible =
    range === ''
      ? update === UpdateKind.NoUpdate
      : semver.satisfies(comparable, range, { includePrerelease: requiredVersion.prerelease.length > 0 });

  return { compatible, update, current: parsedCurrent.version, error: null };
}

/**
 * Pull the installed version out of a verify probe's output.
 * With a pattern, its first capture group (or whole match) is used;
 * otherwise the first `x.y.z` token. Returns null when nothing matches.
 */
export function extractInstalledVersion(output: string, pattern?: string): string | null {
  if (pattern) {
    const match = new RegExp(pattern, 'm').exec(output);
    if (!match) return null;
    return (match[1] ?? match[0]).trim();
  }
  const match = VERSION_TOKEN.exec(output);
  return match ? match[1] : null;
}
