import type { HostDepsError } from './index.js';

export enum UpdateKind {
  NoUpdate = 'NoUpdate',
  PatchUpdate = 'PatchUpdate',
  MinorUpdate = 'MinorUpdate',
  MajorUpdate = 'MajorUpdate',
  NotInstalled = 'NotInstalled'
}

/**
 * Per-dependency lifecycle within one run.
 *
 * Pending → Checking → Satisfied | NeedsInstall | Outdated | Failed
 * Pending → Failed                                (prerequisite failed)
 * NeedsInstall | Outdated → Installing → Installed | Failed   (ensure only)
 * Pending → Cancelled                             (run aborted before it started)
 */
export enum DependencyState {
  Pending = 'Pending',
  Checking = 'Checking',
  Satisfied = 'Satisfied',
  NeedsInstall = 'NeedsInstall',
  Outdated = 'Outdated',
  Installing = 'Installing',
  Installed = 'Installed',
  Failed = 'Failed',
  Cancelled = 'Cancelled'
}

export interface DependencyStatus {
  name: string;
  state: DependencyState;
  installed: boolean;
  /** Detected version, or '' when not installed or not parseable */
  currentVersion: string;
  requiredUpdate: UpdateKind;
  /** True when the installed version satisfies the declared constraint */
  compatible: boolean;
  error: HostDepsError | null;
}

export type DependencyStatusMap = Map<string, DependencyStatus>;
