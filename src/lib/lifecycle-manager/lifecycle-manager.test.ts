import { describe, expect, test } from 'vitest';
import { PipelineContext } from '../behavior-chain';
import type { ContributionInput } from '../behavior-chain';
import { ComponentRegistry } from '../component-registry';
import { CyclicDependencyError } from '../dependency-resolver';
import { RestrictedModuleError } from '../isolation';
import { ComponentError } from './component-error';
import type { ComponentState } from './component-state';
import type { Component } from './types';
import { createTestHarness, manifestFor, recording } from './test-components';

const requireDefined = <T>(value: T | null | undefined, label: string): T => {
  expect(value).toBeDefined();
  expect(value).not.toBeNull();
  if (value === null || value === undefined) {
    throw new Error(`${label} should be defined`);
  }
  return value;
};

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let settle: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    settle = resolve;
  });

  return { promise, resolve: () => settle() };
}

function append(context: PipelineContext<unknown>, entry: string): void {
  const seen = context.getProperty('seen');
  context.setProperty('seen', [...(Array.isArray(seen) ? seen : []), entry]);
}

describe('LifecycleManager - startAll / stopAll', () => {
  test('should start in dependency order and stop in reverse', async () => {
    const { manager, define, journal } = createTestHarness();
    define('a');
    define('b');
    define('c');

    const started = await manager.startAll([
      manifestFor('c', { dependencies: ['b'] }),
      manifestFor('a'),
      manifestFor('b', { dependencies: ['a'] }),
    ]);

    expect(started.success).toBe(true);
    expect(started.code).toBeUndefined();
    expect(started.startOrder).toEqual(['a', 'b', 'c']);
    expect(started.started).toEqual(['a', 'b', 'c']);
    expect(started.failed).toEqual([]);
    expect(manager.getStartOrder()).toEqual(['a', 'b', 'c']);
    expect(manager.getState('b')).toBe('running');
    expect(manager.getRegistry().isRegistered('c')).toBe(true);

    const stopped = await manager.stopAll();

    expect(stopped.success).toBe(true);
    expect(stopped.stopOrder).toEqual(['c', 'b', 'a']);
    expect(stopped.stopped).toEqual(['c', 'b', 'a']);
    expect(journal).toEqual([
      'attach:a',
      'start:a',
      'attach:b',
      'start:b',
      'attach:c',
      'start:c',
      'detach:c',
      'detach:b',
      'detach:a',
    ]);
    expect(manager.getState('a')).toBe('stopped');
    expect(manager.getRegistry().size).toBe(0);
  });

  test('should walk a component through every state up to running', async () => {
    const { manager, define } = createTestHarness();
    define('a');

    const transitions: string[] = [];
    manager.on('component:state-changed', ({ from, to }) => {
      transitions.push(`${from}->${to}`);
    });

    await manager.startAll([manifestFor('a')]);

    expect(transitions).toEqual([
      'registered->resolved',
      'resolved->initializing',
      'initializing->initialized',
      'initialized->starting',
      'starting->running',
    ]);
  });

  test('should splice contributions into the chain while running', async () => {
    const { manager, define } = createTestHarness();
    define('a', { contributions: () => [recording('a.audit', 3), recording('a.auth', 1)] });
    define('b', { contributions: () => [recording('b.validate', 2)] });

    await manager.startAll([manifestFor('a'), manifestFor('b', { dependencies: ['a'] })]);

    expect(manager.getChain().current().ids).toEqual(['a.auth', 'b.validate', 'a.audit']);

    await manager.stopAll();

    expect(manager.getChain().current().ids).toEqual([]);
  });

  test('should fail dependents of a failed component and keep starting siblings', async () => {
    const { manager, define, journal, instances, arraySink } = createTestHarness();
    define('a', { failStart: 'boom' });
    define('b');
    define('c');
    define('d');

    const result = await manager.startAll([
      manifestFor('a'),
      manifestFor('b', { dependencies: ['a'] }),
      manifestFor('c'),
      manifestFor('d', { dependencies: ['c'] }),
    ]);

    expect(result.success).toBe(false);
    expect(result.code).toBe('component_failures');
    expect(result.startOrder).toEqual(['a', 'b', 'c', 'd']);
    expect(result.started).toEqual(['c', 'd']);
    expect(result.failed).toEqual(['a', 'b']);
    expect(result.errors.map((error) => [error.componentId, error.code])).toEqual([
      ['a', 'start_failed'],
      ['b', 'dependency_failed'],
    ]);
    expect(result.errors[0]?.message).toBe('onStart() of "a" failed: boom');
    expect(result.errors[1]?.message).toBe('Dependency "a" of "b" is failed');

    expect(manager.getState('a')).toBe('failed');
    expect(manager.getState('b')).toBe('failed');
    expect(manager.getState('d')).toBe('running');
    expect(instances('b')).toBe(0);
    expect(journal).toEqual([
      'attach:a',
      'start:a',
      'detach:a',
      'attach:c',
      'start:c',
      'attach:d',
      'start:d',
    ]);
    expect(manager.getErrors()).toHaveLength(2);
    expect(manager.getErrors('b')[0]?.severity).toBe('error');
    expect(arraySink.getSimplifiedLogs()).toContain(
      'error: Component failed: onStart() of "a" failed: boom',
    );
  });

  test('should fail the whole batch on a cycle by default', async () => {
    const { manager, define, journal } = createTestHarness();
    define('d');
    define('e');
    define('f');

    const result = await manager.startAll([
      manifestFor('d', { dependencies: ['e'] }),
      manifestFor('e', { dependencies: ['d'] }),
      manifestFor('f'),
    ]);

    expect(result.success).toBe(false);
    expect(result.code).toBe('resolution_failed');
    expect(result.startOrder).toEqual([]);
    expect(result.failed).toEqual(['d', 'e', 'f']);
    expect(result.errors.every((error) => error.code === 'cyclic_dependency')).toBe(true);

    const cause = requireDefined(result.errors[0], 'error').cause;
    expect(cause).toBeInstanceOf(CyclicDependencyError);
    if (cause instanceof CyclicDependencyError) {
      expect(cause.additionalInfo.cycle).toEqual(['d', 'e']);
    }

    expect(manager.getState('f')).toBe('failed');
    expect(journal).toEqual([]);
  });

  test('should fail only the affected subgraph under exclude-affected', async () => {
    const { manager, define } = createTestHarness({ resolutionPolicy: 'exclude-affected' });
    define('d');
    define('e');
    define('f');
    define('g');

    const result = await manager.startAll([
      manifestFor('d', { dependencies: ['e'] }),
      manifestFor('e', { dependencies: ['d'] }),
      manifestFor('f'),
      manifestFor('g', { dependencies: ['missing'] }),
    ]);

    expect(result.code).toBe('component_failures');
    expect(result.startOrder).toEqual(['f']);
    expect(result.started).toEqual(['f']);
    expect(result.failed).toEqual(['d', 'e', 'g']);
    expect(result.errors.map((error) => [error.componentId, error.code])).toEqual([
      ['d', 'cyclic_dependency'],
      ['e', 'cyclic_dependency'],
      ['g', 'unknown_dependency'],
    ]);
    expect(manager.getState('f')).toBe('running');
  });

  test('should fail every component of the batch on an unknown dependency by default', async () => {
    const { manager, define } = createTestHarness();
    define('a');
    define('b');

    const result = await manager.startAll([
      manifestFor('a'),
      manifestFor('b', { dependencies: ['missing'] }),
    ]);

    expect(result.code).toBe('resolution_failed');
    expect(result.errors[0]?.message).toBe(
      'Component "b" depends on "missing", which is not part of the component set.',
    );
    expect(manager.getState('a')).toBe('failed');
    expect(manager.getState('b')).toBe('failed');
  });

  test('should let a batch depend on components that are already running', async () => {
    const { manager, define } = createTestHarness();
    define('a');
    define('b');

    await manager.startAll([manifestFor('a')]);
    const result = await manager.startAll([manifestFor('b', { dependencies: ['a'] })]);

    expect(result.success).toBe(true);
    expect(result.startOrder).toEqual(['b']);
    expect(manager.getStartOrder()).toEqual(['a', 'b']);
  });

  test('should start an unrelated batch after a reload left a dependency failed', async () => {
    const { manager, define } = createTestHarness();
    define('a');
    define('b');
    define('c');
    define('d');
    define('e');

    await manager.startAll([
      manifestFor('a'),
      manifestFor('b', { dependencies: ['a'] }),
      manifestFor('c', { dependencies: ['b'] }),
    ]);

    define('b', { failAttach: 'broken build' });
    expect((await manager.hotReload('b')).success).toBe(false);

    const unrelated = await manager.startAll([manifestFor('d')]);

    expect(unrelated.success).toBe(true);
    expect(unrelated.started).toEqual(['d']);
    expect(manager.getState('c')).toBe('running');

    const dependent = await manager.startAll([manifestFor('e', { dependencies: ['b'] })]);

    expect(dependent.code).toBe('component_failures');
    expect(dependent.errors.map((error) => [error.componentId, error.code])).toEqual([
      ['e', 'dependency_failed'],
    ]);
    expect(dependent.errors[0]?.message).toBe('Dependency "b" of "e" is failed');
    expect(manager.getState('d')).toBe('running');
  });

  test('should fail the whole batch when a component depends on itself', async () => {
    const { manager, define, journal } = createTestHarness();
    define('a');
    define('x');

    const result = await manager.startAll([
      manifestFor('a', { dependencies: ['a'] }),
      manifestFor('x'),
    ]);

    expect(result.code).toBe('resolution_failed');
    expect(result.failed).toEqual(['a', 'x']);
    expect(result.errors.map((error) => [error.componentId, error.code])).toEqual([
      ['a', 'cyclic_dependency'],
      ['x', 'cyclic_dependency'],
    ]);

    const cause = requireDefined(result.errors[0], 'error').cause;
    expect(cause).toBeInstanceOf(CyclicDependencyError);
    if (cause instanceof CyclicDependencyError) {
      expect(cause.additionalInfo.cycle).toEqual(['a']);
    }

    expect(manager.getState('x')).toBe('failed');
    expect(journal).toEqual([]);
  });

  test('should start independent components concurrently when enabled', async () => {
    const { manager, define, journal } = createTestHarness({ concurrentStartup: true });
    define('a', { attachDelayMS: 30 });
    define('b');
    define('c');

    const result = await manager.startAll([
      manifestFor('a'),
      manifestFor('b', { dependencies: ['a'] }),
      manifestFor('c'),
    ]);

    expect(result.success).toBe(true);
    expect(result.startOrder).toEqual(['a', 'b', 'c']);
    expect([...result.started].sort()).toEqual(['a', 'b', 'c']);
    expect(journal.indexOf('start:c')).toBeLessThan(journal.indexOf('start:a'));
    expect(journal.indexOf('attach:b')).toBeGreaterThan(journal.indexOf('start:a'));
  });

  test('should report lifecycle_busy for a second startAll while one runs', async () => {
    const { manager, define } = createTestHarness();
    define('a', { attachDelayMS: 10 });
    define('b');

    const first = manager.startAll([manifestFor('a')]);
    const second = await manager.startAll([manifestFor('b')]);

    expect(second.success).toBe(false);
    expect(second.code).toBe('lifecycle_busy');
    expect((await first).success).toBe(true);
    expect(manager.getState('b')).toBeUndefined();
  });

  test('should restart stopped and failed components in a new batch', async () => {
    const { manager, define, instances } = createTestHarness();
    define('a');
    define('b', { failAttach: 'not yet' });

    await manager.startAll([manifestFor('a'), manifestFor('b')]);
    await manager.stopAll();
    define('b');

    const result = await manager.startAll([manifestFor('a'), manifestFor('b')]);

    expect(result.success).toBe(true);
    expect(manager.getState('a')).toBe('running');
    expect(manager.getState('b')).toBe('running');
    expect(instances('a')).toBe(2);
    expect(instances('b')).toBe(2);
  });

  test('should mark a component failed when onDetach throws during stopAll', async () => {
    const { manager, define } = createTestHarness();
    define('a');
    define('x', { failDetach: 'stuck' });

    await manager.startAll([manifestFor('a'), manifestFor('x')]);
    const result = await manager.stopAll();

    expect(result.success).toBe(false);
    expect(result.stopOrder).toEqual(['x', 'a']);
    expect(result.stopped).toEqual(['a']);
    expect(result.failed).toEqual(['x']);
    expect(result.errors[0]?.code).toBe('detach_failed');
    expect(result.errors[0]?.message).toBe('onDetach() of "x" failed: stuck');
    expect(manager.getState('x')).toBe('failed');
  });
});

describe('LifecycleManager - manifests and duplicates', () => {
  test('should reject an invalid manifest and fail its dependents', async () => {
    const { manager, define } = createTestHarness();
    define('k');

    const result = await manager.startAll([
      manifestFor('Bad_ID'),
      manifestFor('k', { dependencies: ['Bad_ID'] }),
    ]);

    expect(result.failed).toEqual(['Bad_ID', 'k']);
    expect(result.errors.map((error) => [error.componentId, error.code, error.severity])).toEqual([
      ['Bad_ID', 'invalid_manifest', 'critical'],
      ['k', 'dependency_failed', 'error'],
    ]);
    expect(result.errors[1]?.message).toBe('Dependency "Bad_ID" of "k" is not managed');
    expect(manager.getState('Bad_ID')).toBeUndefined();
    expect(manager.getState('k')).toBe('failed');
  });

  test('should only warn about a missing vendor', async () => {
    const { manager, define } = createTestHarness();
    define('w');

    const result = await manager.startAll([manifestFor('w', { vendor: undefined })]);

    expect(result.success).toBe(true);
    expect(result.errors.map((error) => [error.code, error.severity])).toEqual([
      ['invalid_manifest', 'warning'],
    ]);
  });

  test('should ignore a duplicate id within one batch', async () => {
    const { manager, define, instances } = createTestHarness();
    define('a');

    const result = await manager.startAll([manifestFor('a'), manifestFor('a')]);

    expect(result.success).toBe(true);
    expect(result.started).toEqual(['a']);
    expect(result.errors.map((error) => error.code)).toEqual(['duplicate_registration']);
    expect(instances('a')).toBe(1);
  });

  test('should refuse a component that is already running', async () => {
    const { manager, define, instances } = createTestHarness();
    define('a');

    await manager.startAll([manifestFor('a')]);
    const result = await manager.startAll([manifestFor('a')]);

    expect(result.failed).toEqual(['a']);
    expect(result.errors[0]?.message).toBe(
      'Component "a" is already registered. It is running.',
    );
    expect(manager.getState('a')).toBe('running');
    expect(instances('a')).toBe(1);
  });

  test('should fail and clean up a component whose id is taken in the registry', async () => {
    const registry = new ComponentRegistry<Component>();
    const { manager, define, journal } = createTestHarness({ registry });
    define('a', { contributions: () => [recording('a.auth', 1)] });

    const squatter: Component = {
      id: 'a',
      name: 'squatter',
      version: '1.0.0',
      dependencies: new Set<string>(),
      onAttach: () => undefined,
      contributeBehaviors: () => [],
      onDetach: () => undefined,
    };
    registry.register('a', squatter, {
      id: 'a',
      name: 'squatter',
      version: '1.0.0',
      dependencies: [],
      tags: [],
      registeredAt: 1,
    });

    const result = await manager.startAll([manifestFor('a')]);

    expect(result.errors.map((error) => error.code)).toEqual(['duplicate_registration']);
    expect(manager.getState('a')).toBe('failed');
    expect(registry.get('a')).toBe(squatter);
    expect(manager.getChain().current().ids).toEqual([]);
    expect(journal).toEqual(['attach:a', 'start:a', 'detach:a']);
  });
});

describe('LifecycleManager - isolation and loading', () => {
  test('should fail a component whose references include a blocked module', async () => {
    const { manager, define, instances } = createTestHarness();
    define('h');

    const result = await manager.startAll([
      manifestFor('h', {
        isolation: { blockedModules: ['left-pad'] },
        references: ['left-pad'],
      }),
    ]);

    const error = requireDefined(result.errors[0], 'error');
    expect(error.code).toBe('restricted_module');
    expect(error.severity).toBe('critical');
    expect(error.message).toBe('Module "left-pad" is blocked for component "h".');
    expect(error.cause).toBeInstanceOf(RestrictedModuleError);
    expect(manager.getState('h')).toBe('failed');
    expect(instances('h')).toBe(0);
  });

  test('should fail a reference outside the allow list even when it is not blocked', async () => {
    const { manager, define } = createTestHarness();
    define('i');

    const result = await manager.startAll([
      manifestFor('i', {
        isolation: { level: 'strict', allowedModules: ['i'] },
        references: ['lodash'],
      }),
    ]);

    expect(result.errors[0]?.message).toBe(
      'Module "lodash" is not in the allowed modules of component "i".',
    );
  });

  test('should fail a component whose entry itself is blocked', async () => {
    const { manager, define } = createTestHarness();
    define('j');

    const result = await manager.startAll([
      manifestFor('j', { isolation: { blockedModules: ['j'] } }),
    ]);

    expect(result.errors[0]?.code).toBe('restricted_module');
  });

  test('should report load_failed for an entry the loader does not know', async () => {
    const { manager } = createTestHarness();

    const result = await manager.startAll([manifestFor('ghost')]);

    const error = requireDefined(result.errors[0], 'error');
    expect(error.code).toBe('load_failed');
    expect(error.severity).toBe('critical');
    expect(manager.getState('ghost')).toBe('failed');
  });

  test('should report invalid_entry_point when the entry exports no factory', async () => {
    const { manager, loader } = createTestHarness();
    loader.defineShared('empty', () => ({ version: 1 }));

    const result = await manager.startAll([manifestFor('empty')]);

    expect(result.errors[0]?.code).toBe('invalid_entry_point');
    expect(result.errors[0]?.message).toBe(
      'Entry "empty" of component "empty" is invalid: no createComponent or default export function',
    );
  });

  test('should load the entry from the private location under standard isolation', async () => {
    const { manager, loader, define } = createTestHarness();
    define('p');
    loader.definePrivate('components/p', 'p', () => ({
      default: () => ({
        id: 'p',
        name: 'private p',
        version: '2.0.0',
        dependencies: new Set<string>(),
        onAttach: () => undefined,
        contributeBehaviors: () => [],
        onDetach: () => undefined,
      }),
    }));

    await manager.startAll([manifestFor('p', { location: 'components/p' })]);

    const instance = requireDefined(manager.getComponent('p'), 'component p');
    expect(instance.name).toBe('private p');
  });

  test('should time out a hook that does not settle', async () => {
    const { manager, define } = createTestHarness({ attachTimeoutMS: 20 });
    define('slow', { attachDelayMS: 200 });

    const result = await manager.startAll([manifestFor('slow')]);

    const error = requireDefined(result.errors[0], 'error');
    expect(error.code).toBe('timeout');
    expect(error.message).toBe('Component "slow" onAttach() timed out after 20ms');
    expect(manager.getState('slow')).toBe('failed');
  });

  test('should reject an instance whose dependencies differ from its manifest', async () => {
    const { manager, define, instances, journal } = createTestHarness();
    define('x', { dependencies: ['a'] });

    const result = await manager.startAll([manifestFor('x')]);

    expect(result.errors.map((error) => [error.componentId, error.code, error.severity])).toEqual([
      ['x', 'invalid_entry_point', 'critical'],
    ]);
    expect(result.errors[0]?.message).toBe(
      'Entry "x" of component "x" is invalid: component declares dependencies [a] but its manifest lists []',
    );
    expect(manager.getState('x')).toBe('failed');
    expect(instances('x')).toBe(1);
    expect(journal).toEqual([]);
  });
});

describe('LifecycleManager - hotReload', () => {
  test('should reload a component under a new boundary and keep its stop position', async () => {
    const { manager, define, journal, instances } = createTestHarness();
    define('a');
    define('b');
    define('c');

    await manager.startAll([
      manifestFor('a'),
      manifestFor('b', { dependencies: ['a'] }),
      manifestFor('c', { dependencies: ['b'] }),
    ]);
    journal.length = 0;

    const events: string[] = [];
    manager.on('component:reloading', ({ id }) => {
      events.push(`reloading:${id}`);
    });
    manager.on('component:reloaded', ({ id }) => {
      events.push(`reloaded:${id}`);
    });

    const result = await manager.hotReload('b');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.boundaryId).not.toBe(result.previousBoundaryId);
    }
    expect(journal).toEqual(['detach:b', 'attach:b', 'start:b']);
    expect(events).toEqual(['reloading:b', 'reloaded:b']);
    expect(instances('b')).toBe(2);
    expect(manager.getState('c')).toBe('running');
    expect(manager.getDescriptor('b')?.reloadCount).toBe(1);
    expect(manager.getStatistics().reloads).toBe(1);

    const stopped = await manager.stopAll();
    expect(stopped.stopOrder).toEqual(['c', 'b', 'a']);
  });

  test('should swap the priority-2 contribution out and back in atomically', async () => {
    const { manager, define } = createTestHarness();
    const gate = deferred();

    const aContributions = (): ContributionInput[] => [
      {
        id: 'a.first',
        priority: 1,
        behavior: async (context, next) => {
          await gate.promise;
          append(context, 'a.first');
          return next();
        },
      },
      recording('a.last', 3),
    ];
    const bContributions = (instance: number): ContributionInput[] => [
      {
        id: 'b.check',
        priority: 2,
        behavior: (context, next) => {
          append(context, `b#${instance}`);
          return next();
        },
      },
    ];

    define('a', { contributions: aContributions });
    define('b', { contributions: bContributions });
    await manager.startAll([manifestFor('a'), manifestFor('b', { dependencies: ['a'] })]);

    const chain = manager.getChain();
    const rebuilds: string[][] = [];
    chain.on('chain:rebuilt', ({ stepIds }) => {
      rebuilds.push(stepIds);
    });

    const inFlightContext = new PipelineContext<unknown>({ message: 'in-flight' });
    const inFlight = chain.current().run(inFlightContext);

    const reload = await manager.hotReload('b');
    expect(reload.success).toBe(true);
    expect(rebuilds).toEqual([
      ['a.first', 'a.last'],
      ['a.first', 'b.check', 'a.last'],
    ]);

    gate.resolve();
    expect((await inFlight).success).toBe(true);
    expect(inFlightContext.getProperty('seen')).toEqual(['a.first', 'b#1', 'a.last']);

    const freshContext = new PipelineContext<unknown>({ message: 'fresh' });
    await chain.current().run(freshContext);
    expect(freshContext.getProperty('seen')).toEqual(['a.first', 'b#2', 'a.last']);
  });

  test('should leave a component failed with its contributions removed when reload fails', async () => {
    const { manager, define } = createTestHarness();
    define('a', { contributions: () => [recording('a.auth', 1)] });
    define('b', { contributions: () => [recording('b.validate', 2)] });
    define('c');

    await manager.startAll([
      manifestFor('a'),
      manifestFor('b', { dependencies: ['a'] }),
      manifestFor('c', { dependencies: ['b'] }),
    ]);

    const failures: ComponentError[] = [];
    manager.on('component:reload-failed', ({ error }) => {
      failures.push(error);
    });

    define('b', { failAttach: 'broken build' });
    const result = await manager.hotReload('b');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.code).toBe('start_failed');
      expect(result.error.code).toBe('attach_failed');
      expect(result.error.message).toBe('onAttach() of "b" failed: broken build');
    }
    expect(failures).toHaveLength(1);
    expect(manager.getState('b')).toBe('failed');
    expect(manager.getChain().current().ids).toEqual(['a.auth']);
    expect(manager.getRegistry().isRegistered('b')).toBe(false);
    expect(manager.getState('c')).toBe('running');
    expect(manager.getErrors('b').map((error) => error.code)).toEqual(['attach_failed']);
  });

  test('should refuse unknown, stopped and already reloading components', async () => {
    const { manager, define } = createTestHarness();
    define('a', { detachDelayMS: 10 });

    const unknown = await manager.hotReload('nope');
    expect(unknown).toMatchObject({ success: false, code: 'not_found' });

    await manager.startAll([manifestFor('a')]);

    const first = manager.hotReload('a');
    const second = await manager.hotReload('a');
    expect(second).toMatchObject({ success: false, code: 'reload_in_progress' });
    expect(manager.isReloading('a')).toBe(true);
    expect((await first).success).toBe(true);
    expect(manager.isReloading('a')).toBe(false);

    await manager.stopAll();

    const stopped = await manager.hotReload('a');
    expect(stopped).toMatchObject({ success: false, code: 'not_running' });
    if (!stopped.success) {
      expect(stopped.error.message).toBe(
        'Component "a" is stopped, only running components can be reloaded',
      );
    }
  });
});

describe('LifecycleManager - removal and queries', () => {
  test('should remove a running component permanently', async () => {
    const { manager, define, journal } = createTestHarness();
    define('a', { contributions: () => [recording('a.auth', 1)] });

    await manager.startAll([manifestFor('a')]);

    const removed: string[] = [];
    manager.on('component:removed', ({ id }) => {
      removed.push(id);
    });

    const result = await manager.removeComponent('a');

    expect(result.success).toBe(true);
    expect(removed).toEqual(['a']);
    expect(journal).toEqual(['attach:a', 'start:a', 'detach:a']);
    expect(manager.getState('a')).toBeUndefined();
    expect(manager.getChain().current().ids).toEqual([]);
    expect(await manager.removeComponent('a')).toMatchObject({
      success: false,
      code: 'not_found',
    });
  });

  test('should refuse to remove a component that running components depend on', async () => {
    const { manager, define, journal } = createTestHarness();
    define('a');
    define('b');
    define('d');

    await manager.startAll([manifestFor('a'), manifestFor('b', { dependencies: ['a'] })]);

    const refused = await manager.removeComponent('a');

    expect(refused).toMatchObject({ success: false, code: 'has_dependents' });
    if (!refused.success) {
      expect(refused.error.message).toBe(
        'Cannot remove "a" while running components depend on it: b',
      );
    }
    expect(manager.getState('a')).toBe('running');
    expect(manager.getState('b')).toBe('running');
    expect(journal).toEqual(['attach:a', 'start:a', 'attach:b', 'start:b']);

    expect((await manager.startAll([manifestFor('d')])).success).toBe(true);

    expect((await manager.removeComponent('b')).success).toBe(true);
    expect((await manager.removeComponent('a')).success).toBe(true);
    expect(manager.getStartOrder()).toEqual(['d']);
  });

  test('should describe managed components and count them per state', async () => {
    const { manager, define } = createTestHarness();
    define('a');
    define('b');
    define('c', { failStart: 'nope' });

    await manager.startAll([
      manifestFor('a', { tags: ['core'] }),
      manifestFor('b'),
      manifestFor('c'),
    ]);

    const descriptor = requireDefined(manager.getDescriptor('a'), 'descriptor');
    expect(descriptor).toMatchObject({
      id: 'a',
      version: '1.0.0',
      vendor: 'test-vendor',
      state: 'running',
      entry: 'a',
      tags: ['core'],
      reloadCount: 0,
      stoppedAt: null,
    });
    expect(descriptor.isolation.level).toBe('standard');
    expect(descriptor.registeredAt).toBeGreaterThan(0);

    const statistics = manager.getStatistics();
    const expected: Partial<Record<ComponentState, number>> = { running: 2, failed: 1 };
    expect(statistics.total).toBe(3);
    expect(statistics.running).toBe(2);
    expect(statistics.byState).toMatchObject(expected);
    expect(statistics.errors).toBe(1);
    expect(manager.getDescriptors().map((item) => item.id)).toEqual(['a', 'b', 'c']);

    manager.clearErrors();
    expect(manager.getErrors()).toEqual([]);
  });

  test('should keep going when an event listener throws', async () => {
    const { manager, define, arraySink } = createTestHarness();
    define('a');

    manager.on('component:started', () => {
      throw new Error('listener broke');
    });

    const result = await manager.startAll([manifestFor('a')]);

    expect(result.success).toBe(true);
    expect(arraySink.getSimplifiedLogs()).toContain('error: Event handler error');
  });

  test('should reject negative hook timeouts at construction', () => {
    expect(() => createTestHarness({ attachTimeoutMS: -1 })).toThrow(TypeError);
  });

  test('should wrap thrown values as ComponentError', () => {
    const error = ComponentError.fromException('a', 'start_failed', 'plain string');

    expect(error.message).toBe('plain string');
    expect(error.severity).toBe('error');
  });
});

describe('LifecycleManager - stopComponent / restartComponent', () => {
  test('should stop one component and refuse while running components depend on it', async () => {
    const { manager, define, journal } = createTestHarness();
    define('a', { contributions: () => [recording('a.auth', 1)] });
    define('b', { contributions: () => [recording('b.validate', 2)] });

    await manager.startAll([manifestFor('a'), manifestFor('b', { dependencies: ['a'] })]);
    journal.length = 0;

    const refused = await manager.stopComponent('a');

    expect(refused).toMatchObject({ success: false, code: 'has_dependents' });
    if (!refused.success) {
      expect(refused.error.message).toBe('Cannot stop "a" while running components depend on it: b');
    }
    expect(manager.getState('a')).toBe('running');

    const stoppedB = await manager.stopComponent('b');

    expect(stoppedB.success).toBe(true);
    expect(manager.getState('b')).toBe('stopped');
    expect(manager.getChain().current().ids).toEqual(['a.auth']);
    expect(manager.getRegistry().isRegistered('b')).toBe(false);

    expect((await manager.stopComponent('a')).success).toBe(true);
    expect(journal).toEqual(['detach:b', 'detach:a']);
    expect(await manager.stopComponent('a')).toMatchObject({ success: false, code: 'not_running' });
    expect(await manager.stopComponent('nope')).toMatchObject({ success: false, code: 'not_found' });
  });

  test('should restart a component with a fresh instance in its old stop position', async () => {
    const { manager, define, journal, instances } = createTestHarness();
    define('a');
    define('b');
    define('c');

    await manager.startAll([manifestFor('a'), manifestFor('b'), manifestFor('c')]);
    journal.length = 0;

    const restarted: string[] = [];
    manager.on('component:restarted', ({ id }) => {
      restarted.push(id);
    });

    const result = await manager.restartComponent('b');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.boundaryId).not.toBe('');
    }
    expect(journal).toEqual(['detach:b', 'attach:b', 'start:b']);
    expect(instances('b')).toBe(2);
    expect(restarted).toEqual(['b']);
    expect(manager.getStartOrder()).toEqual(['a', 'b', 'c']);
  });

  test('should start a stopped component and leave a failed restart failed', async () => {
    const { manager, define } = createTestHarness();
    define('a');
    define('b');

    await manager.startAll([manifestFor('a'), manifestFor('b', { dependencies: ['a'] })]);

    expect(await manager.restartComponent('a')).toMatchObject({
      success: false,
      code: 'has_dependents',
    });

    await manager.stopComponent('b');
    expect((await manager.restartComponent('b')).success).toBe(true);
    expect(manager.getStartOrder()).toEqual(['a', 'b']);

    define('b', { failStart: 'bad config' });
    const failed = await manager.restartComponent('b');

    expect(failed).toMatchObject({ success: false, code: 'start_failed' });
    if (!failed.success) {
      expect(failed.error.message).toBe('onStart() of "b" failed: bad config');
    }
    expect(manager.getState('b')).toBe('failed');
    expect(manager.getErrors('b').map((error) => error.code)).toEqual(['start_failed']);
    expect(await manager.restartComponent('b')).toMatchObject({
      success: false,
      code: 'invalid_state',
    });
  });
});
