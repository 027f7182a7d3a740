/**
 * Dependency Graph Resolver
 *
 * Orders manifest entries so every prerequisite comes before its dependents.
 */

import type { Dependency, Manifest } from '../../types/index.js';
import { CyclicDependencyError, UnknownDependencyError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

enum Mark {
  Unvisited,
  Visiting,
  Done
}

function indexByName(manifest: Manifest): Map<string, Dependency> {
  const byName = new Map<string, Dependency>();
  for (const dependency of manifest.dependencies) {
    byName.set(dependency.name, dependency);
  }
  return byName;
}

/**
 * Topological order of dependency names.
 *
 * Roots are visited in manifest order and prerequisites in declared order, so
 * independent entries keep their declaration order.
 *
 * @throws UnknownDependencyError when a prerequisite is not in the manifest
 * @throws CyclicDependencyError naming the cycle, e.g. `a -> b -> a`
 */
export function orderDependencies(manifest: Manifest): string[] {
  const byName = indexByName(manifest);
  const marks = new Map<string, Mark>();
  const stack: string[] = [];
  const order: string[] = [];

  const visit = (dependency: Dependency): void => {
    const mark = marks.get(dependency.name) ?? Mark.Unvisited;
    if (mark === Mark.Done) return;
    if (mark === Mark.Visiting) {
      const start = stack.indexOf(dependency.name);
      throw new CyclicDependencyError([...stack.slice(start), dependency.name]);
    }

    marks.set(dependency.name, Mark.Visiting);
    stack.push(dependency.name);
    for (const prerequisiteName of dependency.dependencies ?? []) {
      const prerequisite = byName.get(prerequisiteName);
      if (!prerequisite) {
        throw new UnknownDependencyError(prerequisiteName, dependency.name);
      }
      visit(prerequisite);
    }
    stack.pop();
    marks.set(dependency.name, Mark.Done);
    order.push(dependency.name);
  };

  for (const dependency of manifest.dependencies) {
    visit(dependency);
  }

  logger.debug(`Resolved dependency order: ${order.join(', ')}`);
  return order;
}

/**
 * Group an order into waves: a dependency's wave is one more than the deepest
 * wave among its prerequisites. Entries inside a wave keep `order`'s order.
 */
export function computeWaves(manifest: Manifest, order: string[]): string[][] {
  const byName = indexByName(manifest);
  const depth = new Map<string, number>();
  const waves: string[][] = [];

  for (const name of order) {
    let wave = 0;
    for (const prerequisite of byName.get(name)?.dependencies ?? []) {
      wave = Math.max(wave, (depth.get(prerequisite) ?? -1) + 1);
    }
    depth.set(name, wave);
    while (waves.length <= wave) {
      waves.push([]);
    }
    waves[wave].push(name);
  }

  return waves;
}
