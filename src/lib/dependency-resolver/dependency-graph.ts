/**
 * Anything with an id and the ids it depends on. Component descriptors
 * satisfy this directly.
 */
export interface DependencyNode {
  readonly id: string;
  readonly dependencies: Iterable<string>;
}

export interface UnknownReference {
  id: string;
  dependency: string;
}

export interface DependencyGraphStatistics {
  nodeCount: number;
  edgeCount: number;
  unknownReferenceCount: number;
  rootCount: number;
  leafCount: number;
}

/**
 * Plain code-unit ordering, so results do not depend on the host locale
 */
export function compareIds(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function sorted(values: Iterable<string>): string[] {
  return [...values].sort(compareIds);
}

/**
 * Directed "depends on" graph over component ids, built fresh from a set of
 * nodes. Edges to ids outside the set are kept as unknown references and are
 * not part of any traversal.
 */
export class DependencyGraph {
  private readonly dependencyMap = new Map<string, string[]>();
  private readonly dependentMap = new Map<string, Set<string>>();

  constructor(nodes: Iterable<DependencyNode>) {
    for (const node of nodes) {
      if (this.dependencyMap.has(node.id)) {
        throw new TypeError(`Duplicate node id in dependency graph: "${node.id}"`);
      }

      this.dependencyMap.set(node.id, sorted(new Set(node.dependencies)));
      this.dependentMap.set(node.id, new Set());
    }

    for (const [id, dependencies] of this.dependencyMap) {
      for (const dependency of dependencies) {
        this.dependentMap.get(dependency)?.add(id);
      }
    }
  }

  /**
   * All node ids, sorted
   */
  public get ids(): string[] {
    return sorted(this.dependencyMap.keys());
  }

  public get size(): number {
    return this.dependencyMap.size;
  }

  public has(id: string): boolean {
    return this.dependencyMap.has(id);
  }

  /**
   * Direct dependencies that are part of the graph, sorted
   */
  public dependenciesOf(id: string): string[] {
    return (this.dependencyMap.get(id) ?? []).filter((dependency) =>
      this.dependencyMap.has(dependency),
    );
  }

  /**
   * Direct dependents, sorted
   */
  public dependentsOf(id: string): string[] {
    return sorted(this.dependentMap.get(id) ?? []);
  }

  public transitiveDependencies(id: string): string[] {
    return this.walk(id, (node) => this.dependenciesOf(node));
  }

  public transitiveDependents(id: string): string[] {
    return this.walk(id, (node) => this.dependentsOf(node));
  }

  /**
   * Nodes without dependencies (they can start first)
   */
  public roots(): string[] {
    return this.ids.filter((id) => this.dependenciesOf(id).length === 0);
  }

  /**
   * Nodes nothing depends on (they stop first)
   */
  public leaves(): string[] {
    return this.ids.filter((id) => this.dependentsOf(id).length === 0);
  }

  /**
   * Declared dependencies that point outside the graph, sorted by id then dependency
   */
  public unknownReferences(): UnknownReference[] {
    const references: UnknownReference[] = [];

    for (const id of this.ids) {
      for (const dependency of this.dependencyMap.get(id) ?? []) {
        if (!this.dependencyMap.has(dependency)) {
          references.push({ id, dependency });
        }
      }
    }

    return references;
  }

  /**
   * Follows "depends on" edges from `start`, staying inside `within` and
   * always taking the smallest dependency id, until an id repeats. Returns the
   * repeating part of the walk, or [] when the walk dead-ends.
   */
  public findCycle(start: string, within: ReadonlySet<string>): string[] {
    const path: string[] = [];
    const positions = new Map<string, number>();
    let current = start;

    while (!positions.has(current)) {
      positions.set(current, path.length);
      path.push(current);

      const next = this.dependenciesOf(current).find((dependency) =>
        within.has(dependency),
      );

      if (next === undefined) {
        return [];
      }

      current = next;
    }

    return path.slice(positions.get(current) ?? 0);
  }

  public statistics(): DependencyGraphStatistics {
    let edgeCount = 0;
    for (const id of this.dependencyMap.keys()) {
      edgeCount += this.dependenciesOf(id).length;
    }

    return {
      nodeCount: this.size,
      edgeCount,
      unknownReferenceCount: this.unknownReferences().length,
      rootCount: this.roots().length,
      leafCount: this.leaves().length,
    };
  }

  private walk(id: string, neighbors: (id: string) => string[]): string[] {
    const seen = new Set<string>();
    const queue = neighbors(id);

    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      if (seen.has(next) || next === id) {
        continue;
      }

      seen.add(next);
      queue.push(...neighbors(next));
    }

    return sorted(seen);
  }
}
