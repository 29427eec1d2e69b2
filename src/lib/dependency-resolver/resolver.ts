import { DependencyGraph, compareIds } from './dependency-graph';
import type { DependencyNode } from './dependency-graph';
import {
  CyclicDependencyError,
  ExcludedDependencyError,
  UnknownDependencyError,
} from './errors';
import type { DependencyResolutionError } from './errors';

/**
 * - `fail`: any unknown dependency or cycle fails the whole resolution
 * - `exclude`: unresolvable components (and everything depending on them) are
 *   left out and reported; the rest is ordered
 */
export type ResolutionPolicy = 'fail' | 'exclude';

export interface ResolveOptions {
  /** Defaults to `fail` */
  policy?: ResolutionPolicy;
}

export type ExclusionReason =
  | 'unknown_dependency'
  | 'cyclic_dependency'
  | 'dependency_excluded';

export interface ExcludedComponent {
  id: string;
  reason: ExclusionReason;
  error: DependencyResolutionError;
}

export type ResolutionResult =
  | {
      success: true;
      /** Every id appears after all of its dependencies */
      startOrder: string[];
      /** Exact reverse of startOrder */
      stopOrder: string[];
      /** Always empty under the `fail` policy */
      excluded: ExcludedComponent[];
    }
  | {
      success: false;
      code: 'unknown_dependency';
      error: UnknownDependencyError;
    }
  | {
      success: false;
      code: 'cyclic_dependency';
      error: CyclicDependencyError;
    };

/**
 * Kahn's algorithm over `candidates`: repeatedly take the smallest id whose
 * dependencies are all ordered. Whatever never reaches in-degree zero is
 * returned as `remaining` (cycle members and their dependents).
 */
function eliminate(
  graph: DependencyGraph,
  candidates: ReadonlySet<string>,
): { order: string[]; remaining: Set<string> } {
  const inDegree = new Map<string, number>();
  const available: string[] = [];

  for (const id of candidates) {
    const degree = graph
      .dependenciesOf(id)
      .filter((dependency) => candidates.has(dependency)).length;

    inDegree.set(id, degree);

    if (degree === 0) {
      available.push(id);
    }
  }

  available.sort(compareIds);

  const order: string[] = [];

  for (let next = available.shift(); next !== undefined; next = available.shift()) {
    order.push(next);

    for (const dependent of graph.dependentsOf(next)) {
      if (!candidates.has(dependent)) {
        continue;
      }

      const degree = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, degree);

      if (degree === 0) {
        available.push(dependent);
        available.sort(compareIds);
      }
    }
  }

  const ordered = new Set(order);
  const remaining = new Set([...candidates].filter((id) => !ordered.has(id)));

  return { order, remaining };
}

function smallest(ids: Iterable<string>): string | undefined {
  let result: string | undefined;

  for (const id of ids) {
    if (result === undefined || compareIds(id, result) < 0) {
      result = id;
    }
  }

  return result;
}

/**
 * Computes a reproducible start order (and its reverse as stop order) for a set
 * of components. Ties between ready components are broken by id so the same
 * input always yields the same order.
 *
 * @example
 * ```typescript
 * const result = resolveStartOrder([
 *   { id: 'c', dependencies: ['b'] },
 *   { id: 'a', dependencies: [] },
 *   { id: 'b', dependencies: ['a'] },
 * ]);
 * // result.startOrder -> ['a', 'b', 'c'], result.stopOrder -> ['c', 'b', 'a']
 * ```
 */
export function resolveStartOrder(
  nodes: Iterable<DependencyNode>,
  options: ResolveOptions = {},
): ResolutionResult {
  const graph = new DependencyGraph(nodes);
  const policy = options.policy ?? 'fail';
  const unknownReferences = graph.unknownReferences();

  if (policy === 'fail') {
    const [firstUnknown] = unknownReferences;

    if (firstUnknown) {
      return {
        success: false,
        code: 'unknown_dependency',
        error: new UnknownDependencyError(firstUnknown),
      };
    }

    const { order, remaining } = eliminate(graph, new Set(graph.ids));
    const start = smallest(remaining);

    if (start !== undefined) {
      const cycle = graph.findCycle(start, remaining);

      return {
        success: false,
        code: 'cyclic_dependency',
        error: new CyclicDependencyError({
          cycle: cycle.length > 0 ? cycle : [...remaining].sort(compareIds),
        }),
      };
    }

    return {
      success: true,
      startOrder: order,
      stopOrder: [...order].reverse(),
      excluded: [],
    };
  }

  const excluded = new Map<string, ExcludedComponent>();

  const excludeWithDependents = (
    id: string,
    reason: ExclusionReason,
    error: DependencyResolutionError,
  ): void => {
    if (!excluded.has(id)) {
      excluded.set(id, { id, reason, error });
    }

    for (const dependent of graph.transitiveDependents(id)) {
      if (!excluded.has(dependent)) {
        excluded.set(dependent, {
          id: dependent,
          reason: 'dependency_excluded',
          error: new ExcludedDependencyError({ id: dependent, dependency: id }),
        });
      }
    }
  };

  for (const reference of unknownReferences) {
    if (!excluded.has(reference.id)) {
      excludeWithDependents(
        reference.id,
        'unknown_dependency',
        new UnknownDependencyError(reference),
      );
    }
  }

  const candidates = new Set(graph.ids.filter((id) => !excluded.has(id)));
  const { order, remaining } = eliminate(graph, candidates);

  // Every stalled id depends (transitively) on a cycle; peel cycles off one at a time
  for (let start = smallest(remaining); start !== undefined; start = smallest(remaining)) {
    const cycle = graph.findCycle(start, remaining);
    const members = cycle.length > 0 ? cycle : [start];
    const error = new CyclicDependencyError({ cycle: members });

    for (const member of members) {
      excluded.delete(member);
      excludeWithDependents(member, 'cyclic_dependency', error);
    }

    for (const id of excluded.keys()) {
      remaining.delete(id);
    }
  }

  return {
    success: true,
    startOrder: order,
    stopOrder: [...order].reverse(),
    excluded: [...excluded.values()].sort((a, b) => compareIds(a.id, b.id)),
  };
}
