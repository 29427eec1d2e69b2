/**
 * Test components for LifecycleManager unit and integration tests
 *
 * Components are defined on a RegistryLoader under their own id, so every
 * load (including a hot reload) builds a fresh instance. A shared journal
 * records hook calls in order.
 */

import { createContribution } from '../behavior-chain';
import type { BehaviorContribution, ContributionInput } from '../behavior-chain';
import { RegistryLoader } from '../isolation';
import { Logger } from '../logger';
import type { ArraySink } from '../logger';
import { sleep } from '../sleep';
import { BaseComponent } from './base-component';
import { LifecycleManager } from './lifecycle-manager';
import type { ComponentFactoryOptions, ComponentManifest, LifecycleManagerOptions } from './types';

export interface FakeComponentOptions {
  /** Declared on the instance; defaults to the manifest's */
  dependencies?: string[];
  /** Contributions built per instance; the instance number starts at 1 */
  contributions?: (instance: number) => ContributionInput[];
  failAttach?: string;
  failStart?: string;
  failDetach?: string;
  attachDelayMS?: number;
  startDelayMS?: number;
  detachDelayMS?: number;
}

/**
 * Component that journals its hooks and fails or stalls on request
 */
export class FakeComponent extends BaseComponent {
  public readonly instance: number;
  private readonly journal: string[];
  private readonly options: FakeComponentOptions;

  constructor(
    logger: Logger,
    id: string,
    instance: number,
    journal: string[],
    options: FakeComponentOptions = {},
  ) {
    super(logger, { id, dependencies: options.dependencies });
    this.instance = instance;
    this.journal = journal;
    this.options = options;
  }

  public async onStart(): Promise<void> {
    this.journal.push(`start:${this.id}`);

    if (this.options.startDelayMS !== undefined) {
      await sleep(this.options.startDelayMS);
    }

    if (this.options.failStart) {
      throw new Error(this.options.failStart);
    }
  }

  public contributeBehaviors(): BehaviorContribution[] {
    return (this.options.contributions?.(this.instance) ?? []).map((input) =>
      createContribution(input),
    );
  }

  protected async attach(): Promise<void> {
    this.journal.push(`attach:${this.id}`);

    if (this.options.attachDelayMS !== undefined) {
      await sleep(this.options.attachDelayMS);
    }

    if (this.options.failAttach) {
      throw new Error(this.options.failAttach);
    }
  }

  protected async detach(): Promise<void> {
    this.journal.push(`detach:${this.id}`);

    if (this.options.detachDelayMS !== undefined) {
      await sleep(this.options.detachDelayMS);
    }

    if (this.options.failDetach) {
      throw new Error(this.options.failDetach);
    }
  }
}

export function manifestFor(
  id: string,
  overrides: Partial<ComponentManifest> = {},
): ComponentManifest {
  return {
    id,
    name: id,
    version: '1.0.0',
    vendor: 'test-vendor',
    entry: id,
    ...overrides,
  };
}

/**
 * A contribution that appends its id to the `seen` property and continues
 */
export function recording(id: string, priority: number): ContributionInput {
  return {
    id,
    priority,
    behavior: (context, next) => {
      const seen = context.getProperty('seen');
      context.setProperty('seen', [...(Array.isArray(seen) ? seen : []), id]);
      return next();
    },
  };
}

export interface TestHarness {
  manager: LifecycleManager;
  loader: RegistryLoader;
  logger: Logger;
  arraySink: ArraySink;
  journal: string[];
  /** Defines a component entry; options may be changed before a reload */
  define(id: string, options?: FakeComponentOptions): void;
  /** Instances created so far for an id */
  instances(id: string): number;
}

export function createTestHarness(
  options: Partial<Omit<LifecycleManagerOptions, 'logger' | 'loader'>> = {},
): TestHarness {
  const { logger, arraySink } = Logger.createTestOptimizedLogger();
  const loader = new RegistryLoader();
  const journal: string[] = [];
  const counts = new Map<string, number>();

  const manager = new LifecycleManager({
    ...options,
    logger,
    loader,
    locator: options.locator ?? loader.locator,
  });

  const define = (id: string, componentOptions: FakeComponentOptions = {}): void => {
    loader.defineShared(id, () => ({
      createComponent: (factoryOptions: ComponentFactoryOptions) => {
        const instance = (counts.get(id) ?? 0) + 1;
        counts.set(id, instance);

        return new FakeComponent(factoryOptions.logger, id, instance, journal, {
          dependencies: factoryOptions.manifest.dependencies,
          ...componentOptions,
        });
      },
    }));
  };

  return {
    manager,
    loader,
    logger,
    arraySink,
    journal,
    define,
    instances: (id) => counts.get(id) ?? 0,
  };
}
