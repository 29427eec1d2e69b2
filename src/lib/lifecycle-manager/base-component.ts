import type { BehaviorContribution } from '../behavior-chain';
import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import {
  ComponentNotAttachedError,
  InvalidComponentIdError,
  InvalidManifestError,
} from './errors';
import { isValidComponentId, isValidVersion } from './manifest';
import type { Component, ComponentContext } from './types';

export interface BaseComponentOptions {
  /** Lowercase dot separated id, e.g. `acme.billing` */
  id: string;
  /** Defaults to the id */
  name?: string;
  /** Defaults to `1.0.0` */
  version?: string;
  /** Ids of components that must be running before this one attaches */
  dependencies?: Iterable<string>;
}

/**
 * Abstract base class for managed components
 *
 * Subclasses implement `contributeBehaviors()` and, when they hold resources,
 * override `attach()` / `detach()`. The manager drives the public hooks:
 * - `onAttach(context)` stores the context, then calls `attach()`
 * - `onStart()` (optional) runs after attach, before contributions are taken
 * - `onDetach()` calls `detach()`, then drops the context
 *
 * @example
 * ```typescript
 * class RateLimitComponent extends BaseComponent {
 *   private buckets = new Map<string, number>();
 *
 *   constructor(logger: Logger) {
 *     super(logger, { id: 'acme.rate-limit', version: '1.2.0' });
 *   }
 *
 *   protected detach() {
 *     this.buckets.clear();
 *   }
 *
 *   public contributeBehaviors() {
 *     return [
 *       createContribution({
 *         id: 'acme.rate-limit.check',
 *         priority: 50,
 *         behavior: (context, next) => this.check(context, next),
 *       }),
 *     ];
 *   }
 * }
 * ```
 */
export abstract class BaseComponent implements Component {
  public readonly id: string;
  public readonly name: string;
  public readonly version: string;
  public readonly dependencies: ReadonlySet<string>;

  /** Component logger (scoped to the component id) */
  protected logger: LoggerService;

  private attachedContext?: ComponentContext;

  /**
   * @throws {InvalidComponentIdError} If the id doesn't match the id format
   * @throws {InvalidManifestError} If the version is not `major.minor.patch`
   */
  constructor(rootLogger: Logger, options: BaseComponentOptions) {
    if (!isValidComponentId(options.id)) {
      throw new InvalidComponentIdError({ id: options.id });
    }

    const version = options.version ?? '1.0.0';
    if (!isValidVersion(version)) {
      throw new InvalidManifestError({
        id: options.id,
        problems: [`version "${version}" is not major.minor.patch`],
      });
    }

    this.id = options.id;
    this.name = options.name ?? options.id;
    this.version = version;
    this.dependencies = new Set(options.dependencies ?? []);

    // Component logs as its own service
    this.logger = rootLogger.service(this.id);
  }

  public abstract contributeBehaviors(): Iterable<BehaviorContribution>;

  public async onAttach(context: ComponentContext): Promise<void> {
    this.attachedContext = context;
    this.logger = context.logger;
    await this.attach();
  }

  public async onDetach(): Promise<void> {
    try {
      await this.detach();
    } finally {
      this.attachedContext = undefined;
    }
  }

  public get isAttached(): boolean {
    return this.attachedContext !== undefined;
  }

  /**
   * Acquire resources. Dependencies are running when this is called.
   */
  protected attach(): Promise<void> | void {
    return undefined;
  }

  /**
   * Release resources. Dependents have already been detached.
   */
  protected detach(): Promise<void> | void {
    return undefined;
  }

  /**
   * @throws {ComponentNotAttachedError} Before attach or after detach
   */
  protected get context(): ComponentContext {
    if (!this.attachedContext) {
      throw new ComponentNotAttachedError({ componentId: this.id });
    }

    return this.attachedContext;
  }

  /**
   * A running component by id, if any
   */
  protected getComponent(id: string): Component | undefined {
    return this.context.getComponent(id);
  }

  /**
   * Loads a module through this component's isolation boundary
   */
  protected importModule(moduleName: string): Promise<unknown> {
    return this.context.importModule(moduleName);
  }
}
