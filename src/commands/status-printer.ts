import pico from 'picocolors';
import { DependencyState, UpdateKind, type DependencyStatus, type DependencyStatusMap, type Manifest } from '../types/index.js';

export type Colors = ReturnType<typeof pico.createColors>;

const SUMMARY_ORDER: readonly DependencyState[] = [
  DependencyState.Satisfied,
  DependencyState.Installed,
  DependencyState.NeedsInstall,
  DependencyState.Outdated,
  DependencyState.Failed,
  DependencyState.Cancelled
];

const SUMMARY_LABELS: Record<DependencyState, string> = {
  [DependencyState.Pending]: 'pending',
  [DependencyState.Checking]: 'checking',
  [DependencyState.Satisfied]: 'satisfied',
  [DependencyState.NeedsInstall]: 'missing',
  [DependencyState.Outdated]: 'outdated',
  [DependencyState.Installing]: 'installing',
  [DependencyState.Installed]: 'installed',
  [DependencyState.Failed]: 'failed',
  [DependencyState.Cancelled]: 'cancelled'
};

function stateSymbol(state: DependencyState, c: Colors): string {
  switch (state) {
    case DependencyState.Satisfied:
    case DependencyState.Installed:
      return c.green('✓');
    case DependencyState.NeedsInstall:
    case DependencyState.Outdated:
      return c.yellow('!');
    case DependencyState.Failed:
      return c.red('✗');
    default:
      return c.dim('-');
  }
}

/**
 * One line per dependency, e.g. `✓ node: installed v20.11.1`.
 */
export function formatStatusLine(status: DependencyStatus, c: Colors = pico): string {
  const parts = [`${stateSymbol(status.state, c)} ${c.bold(status.name)}:`];

  if (status.installed) {
    parts.push(status.currentVersion ? `installed v${status.currentVersion}` : 'installed (version unknown)');
    if (status.requiredUpdate !== UpdateKind.NoUpdate) {
      parts.push(c.yellow(`[${status.requiredUpdate} needed]`));
    }
    if (!status.compatible) {
      parts.push(c.yellow('[incompatible]'));
    }
  } else {
    parts.push(status.state === DependencyState.Cancelled ? 'not processed' : 'not installed');
  }

  if (status.error) {
    parts.push(c.red(`[error: ${status.error.message}]`));
  }
  return parts.join(' ');
}

export function formatStatusReport(statuses: DependencyStatusMap, c: Colors = pico): string {
  return Array.from(statuses.values(), status => formatStatusLine(status, c)).join('\n');
}

/**
 * Counts per terminal state, e.g. `2 satisfied, 1 failed`.
 */
export function summarizeStatuses(statuses: DependencyStatusMap): string {
  const counts = new Map<DependencyState, number>();
  for (const status of statuses.values()) {
    counts.set(status.state, (counts.get(status.state) ?? 0) + 1);
  }
  const parts = SUMMARY_ORDER.filter(state => (counts.get(state) ?? 0) > 0).map(
    state => `${counts.get(state)} ${SUMMARY_LABELS[state]}`
  );
  return parts.length > 0 ? parts.join(', ') : 'no dependencies';
}

/**
 * A dependency needs attention unless it is present and acceptable.
 */
export function needsAttention(status: DependencyStatus): boolean {
  return status.state !== DependencyState.Satisfied && status.state !== DependencyState.Installed;
}

export function hasFailures(statuses: DependencyStatusMap): boolean {
  return Array.from(statuses.values()).some(
    status => status.state === DependencyState.Failed || status.state === DependencyState.Cancelled
  );
}

/**
 * Human-readable manifest listing for `hostdeps list`.
 */
export function formatManifest(manifest: Manifest, c: Colors = pico): string {
  const lines = [`Application: ${manifest.name}`];
  if (manifest.description) {
    lines.push(`Description: ${manifest.description}`);
  }
  lines.push(`Manifest version: ${manifest.version}`, '');

  if (manifest.dependencies.length === 0) {
    lines.push(c.dim('No dependencies declared.'));
    return lines.join('\n');
  }

  lines.push('Dependencies:');
  for (const dependency of manifest.dependencies) {
    lines.push(
      dependency.description
        ? `- ${c.bold(dependency.name)}: ${dependency.description}`
        : `- ${c.bold(dependency.name)}`
    );
    const constraint = dependency.version.constraint ? ` (constraint: ${dependency.version.constraint})` : '';
    lines.push(`  Version: ${dependency.version.required}${constraint}`);
    const platforms = Object.keys(dependency.platforms);
    if (platforms.length > 0) {
      lines.push(`  Platforms: ${platforms.join(', ')}`);
    }
    if (dependency.dependencies && dependency.dependencies.length > 0) {
      lines.push(`  Depends on: ${dependency.dependencies.join(', ')}`);
    }
  }
  return lines.join('\n');
}
