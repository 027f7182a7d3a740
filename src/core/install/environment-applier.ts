/**
 * Environment Applier
 *
 * The only place that touches the process environment. Changes are scoped to
 * the current process (and the subprocesses it spawns afterwards); nothing is
 * persisted to shell profiles or the registry.
 */

import { delimiter } from 'path';
import { logger } from '../../utils/logger.js';

export interface EnvironmentChanges {
  /** Directories to prepend to PATH, in the order they should appear */
  path: string[];
  variables: Record<string, string>;
}

export interface EnvironmentApplier {
  apply(changes: EnvironmentChanges): void;
  /** Environment handed to subprocesses */
  current(): NodeJS.ProcessEnv;
}

/**
 * PATH's key differs in case between hosts (`Path` on Windows).
 */
function findPathKey(env: NodeJS.ProcessEnv): string {
  return Object.keys(env).find(key => key.toUpperCase() === 'PATH') ?? 'PATH';
}

/**
 * Prepend entries to a PATH value, dropping any later duplicates.
 */
export function prependPathEntries(existing: string | undefined, entries: string[], separator: string = delimiter): string {
  const current = existing ? existing.split(separator).filter(Boolean) : [];
  const merged: string[] = [];
  for (const entry of [...entries, ...current]) {
    if (!merged.includes(entry)) {
      merged.push(entry);
    }
  }
  return merged.join(separator);
}

/**
 * Mutates a live environment object (process.env by default).
 */
export class ProcessEnvironmentApplier implements EnvironmentApplier {
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly separator: string = delimiter
  ) {}

  apply(changes: EnvironmentChanges): void {
    if (changes.path.length > 0) {
      const key = findPathKey(this.env);
      this.env[key] = prependPathEntries(this.env[key], changes.path, this.separator);
      logger.debug(`Prepended to ${key}: ${changes.path.join(this.separator)}`);
    }
    for (const [name, value] of Object.entries(changes.variables)) {
      this.env[name] = value;
      logger.debug(`Set ${name}=${value}`);
    }
  }

  current(): NodeJS.ProcessEnv {
    return { ...this.env };
  }
}

/**
 * In-memory applier for tests and dry runs: records every change and keeps
 * its own copy of the environment.
 */
export class RecordingEnvironmentApplier implements EnvironmentApplier {
  readonly applied: EnvironmentChanges[] = [];
  private readonly env: NodeJS.ProcessEnv;

  constructor(initial: NodeJS.ProcessEnv = {}, private readonly separator: string = delimiter) {
    this.env = { ...initial };
  }

  apply(changes: EnvironmentChanges): void {
    this.applied.push({ path: [...changes.path], variables: { ...changes.variables } });
    if (changes.path.length > 0) {
      const key = findPathKey(this.env);
      this.env[key] = prependPathEntries(this.env[key], changes.path, this.separator);
    }
    Object.assign(this.env, changes.variables);
  }

  current(): NodeJS.ProcessEnv {
    return { ...this.env };
  }
}
