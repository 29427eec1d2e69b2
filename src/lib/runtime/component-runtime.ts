import { ActiveChain } from '../behavior-chain';
import type { ChainRunOptions, ChainRunResult, ChainStepDescription, Terminal } from '../behavior-chain';
import { ComponentRegistry } from '../component-registry';
import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import { LifecycleManager } from '../lifecycle-manager';
import type {
  Component,
  ComponentError,
  ComponentManifest,
  ComponentState,
  HotReloadResult,
  LifecycleManagerOptions,
  ManagedComponentDescriptor,
  StartAllResult,
  StopAllResult,
} from '../lifecycle-manager';

export interface ComponentRuntimeOptions
  extends Omit<LifecycleManagerOptions, 'registry' | 'chain'> {
  /** What runs after the last behavior; defaults to returning `context.result` */
  terminal?: Terminal;
  /** Deadline for every dispatch that does not pass its own */
  requestTimeoutMS?: number;
}

/**
 * One object for a host process: owns the registry, the active chain and the
 * lifecycle manager, and exposes the control surface a supervisor needs.
 *
 * @example
 * ```typescript
 * const runtime = new ComponentRuntime({ logger, loader, requestTimeoutMS: 5000 });
 * await runtime.start(manifests);
 * const outcome = await runtime.dispatch({ path: '/orders' });
 * await runtime.stop();
 * ```
 */
export class ComponentRuntime {
  public readonly lifecycle: LifecycleManager;
  public readonly chain: ActiveChain;
  public readonly registry: ComponentRegistry<Component>;
  private readonly logger: LoggerService;

  constructor(options: ComponentRuntimeOptions) {
    const { terminal, requestTimeoutMS, ...managerOptions } = options;

    this.logger = options.logger.service('runtime');
    this.registry = new ComponentRegistry<Component>();
    this.chain = new ActiveChain({
      logger: options.logger,
      terminal,
      defaultTimeoutMS: requestTimeoutMS,
    });
    this.lifecycle = new LifecycleManager({
      ...managerOptions,
      registry: this.registry,
      chain: this.chain,
    });
  }

  public async start(manifests: Iterable<ComponentManifest>): Promise<StartAllResult> {
    const result = await this.lifecycle.startAll(manifests);

    this.logger.info('Runtime start: {{started}} running, {{failed}} failed', {
      params: { started: result.started.length, failed: result.failed.length },
    });

    return result;
  }

  public stop(): Promise<StopAllResult> {
    return this.lifecycle.stopAll();
  }

  public reload(id: string): Promise<HotReloadResult> {
    return this.lifecycle.hotReload(id);
  }

  /**
   * Runs one message through the current chain snapshot
   */
  public dispatch(message: unknown, options: ChainRunOptions = {}): Promise<ChainRunResult> {
    return this.chain.run(message, options);
  }

  public getState(id: string): ComponentState | undefined {
    return this.lifecycle.getState(id);
  }

  public getErrors(id?: string): ComponentError[] {
    return this.lifecycle.getErrors(id);
  }

  public getComponent(id: string): Component | undefined {
    return this.registry.get(id);
  }

  public getDescriptors(): ManagedComponentDescriptor[] {
    return this.lifecycle.getDescriptors();
  }

  /**
   * The steps a dispatch would run right now, in order
   */
  public describeChain(): ChainStepDescription[] {
    return this.chain.current().describe();
  }
}
