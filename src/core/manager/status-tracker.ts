import { DependencyState, UpdateKind, type DependencyStatus, type DependencyStatusMap } from '../../types/index.js';
import { logger } from '../../utils/logger.js';

export type TransitionListener = (name: string, state: DependencyState, status: DependencyStatus) => void;

export type StatusPatch = Partial<Omit<DependencyStatus, 'name' | 'state'>>;

const ALLOWED_TRANSITIONS: Record<DependencyState, readonly DependencyState[]> = {
  [DependencyState.Pending]: [DependencyState.Checking, DependencyState.Failed, DependencyState.Cancelled],
  [DependencyState.Checking]: [
    DependencyState.Satisfied,
    DependencyState.NeedsInstall,
    DependencyState.Outdated,
    DependencyState.Failed
  ],
  [DependencyState.NeedsInstall]: [DependencyState.Installing],
  [DependencyState.Outdated]: [DependencyState.Installing],
  [DependencyState.Installing]: [DependencyState.Installed, DependencyState.Failed],
  [DependencyState.Satisfied]: [],
  [DependencyState.Installed]: [],
  [DependencyState.Failed]: [],
  [DependencyState.Cancelled]: []
};

export function initialStatus(name: string): DependencyStatus {
  return {
    name,
    state: DependencyState.Pending,
    installed: false,
    currentVersion: '',
    requiredUpdate: UpdateKind.NotInstalled,
    compatible: false,
    error: null
  };
}

/**
 * Per-run status table. Every dependency starts Pending; transitions outside
 * the lifecycle graph are programming errors and throw.
 */
export class StatusTracker {
  private readonly statuses = new Map<string, DependencyStatus>();

  constructor(names: string[], private readonly listener?: TransitionListener) {
    for (const name of names) {
      this.statuses.set(name, initialStatus(name));
    }
  }

  get(name: string): DependencyStatus {
    const status = this.statuses.get(name);
    if (!status) {
      throw new Error(`No status tracked for '${name}'`);
    }
    return status;
  }

  state(name: string): DependencyState {
    return this.get(name).state;
  }

  transition(name: string, state: DependencyState, patch: StatusPatch = {}): DependencyStatus {
    const previous = this.get(name);
    if (!ALLOWED_TRANSITIONS[previous.state].includes(state)) {
      throw new Error(`Illegal state transition for '${name}': ${previous.state} -> ${state}`);
    }

    const next: DependencyStatus = { ...previous, ...patch, name, state };
    this.statuses.set(name, next);
    logger.debug(`${name}: ${previous.state} -> ${state}`, next.error ? { error: next.error.message } : undefined);
    this.listener?.(name, state, { ...next });
    return next;
  }

  /** Copy of every status, in construction order */
  snapshot(): DependencyStatusMap {
    const copy: DependencyStatusMap = new Map();
    for (const [name, status] of this.statuses) {
      copy.set(name, { ...status });
    }
    return copy;
  }
}
