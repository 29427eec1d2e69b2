import { describe, expect, test } from 'vitest';
import { DependencyGraph, compareIds } from './dependency-graph';

function graph(): DependencyGraph {
  return new DependencyGraph([
    { id: 'db', dependencies: [] },
    { id: 'cache', dependencies: [] },
    { id: 'auth', dependencies: ['db', 'cache'] },
    { id: 'api', dependencies: ['auth', 'db', 'metrics'] },
    { id: 'web', dependencies: ['api'] },
  ]);
}

describe('DependencyGraph', () => {
  test('should expose sorted ids and direct edges', () => {
    const g = graph();

    expect(g.ids).toEqual(['api', 'auth', 'cache', 'db', 'web']);
    expect(g.dependenciesOf('api')).toEqual(['auth', 'db']);
    expect(g.dependentsOf('db')).toEqual(['api', 'auth']);
    expect(g.has('metrics')).toBe(false);
  });

  test('should walk transitive edges in both directions', () => {
    const g = graph();

    expect(g.transitiveDependencies('web')).toEqual([
      'api',
      'auth',
      'cache',
      'db',
    ]);
    expect(g.transitiveDependents('cache')).toEqual(['api', 'auth', 'web']);
  });

  test('should list roots, leaves and unknown references', () => {
    const g = graph();

    expect(g.roots()).toEqual(['cache', 'db']);
    expect(g.leaves()).toEqual(['web']);
    expect(g.unknownReferences()).toEqual([{ id: 'api', dependency: 'metrics' }]);
  });

  test('should summarize itself', () => {
    expect(graph().statistics()).toEqual({
      nodeCount: 5,
      edgeCount: 5,
      unknownReferenceCount: 1,
      rootCount: 2,
      leafCount: 1,
    });
  });

  test('should find a cycle reachable from a dependent', () => {
    const g = new DependencyGraph([
      { id: 'x', dependencies: ['y'] },
      { id: 'y', dependencies: ['z'] },
      { id: 'z', dependencies: ['y'] },
    ]);

    expect(g.findCycle('x', new Set(['x', 'y', 'z']))).toEqual(['y', 'z']);
    expect(g.findCycle('x', new Set(['x']))).toEqual([]);
  });

  test('should reject duplicate ids', () => {
    expect(
      () =>
        new DependencyGraph([
          { id: 'a', dependencies: [] },
          { id: 'a', dependencies: [] },
        ]),
    ).toThrow('Duplicate node id in dependency graph: "a"');
  });

  test('compareIds should order by code unit', () => {
    expect(['b', 'B', 'a', 'A'].sort(compareIds)).toEqual(['A', 'B', 'a', 'b']);
  });
});
