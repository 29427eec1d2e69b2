import { ActiveChain, DuplicateContributionError } from '../behavior-chain';
import type { BehaviorContribution } from '../behavior-chain';
import { ComponentRegistry } from '../component-registry';
import { DuplicateRegistrationError } from '../component-registry';
import { resolveStartOrder } from '../dependency-resolver';
import type {
  DependencyNode,
  DependencyResolutionError,
  ExclusionReason,
} from '../dependency-resolver';
import { EventEmitterProtected } from '../event-emitter';
import {
  LoadBoundary,
  ModuleLoadError,
  RestrictedModuleError,
  defaultSharedCore,
} from '../isolation';
import type {
  IsolationRequirements,
  Loader,
  PrivateModuleLocator,
  SharedCoreModules,
} from '../isolation';
import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import { assertTimeoutMS, isFunction, isRecord } from '../type-guards';
import { ms } from '../unix-time-helpers';
import { ComponentError } from './component-error';
import type { ComponentErrorCode } from './component-error';
import { assertTransition } from './component-state';
import type { ComponentState } from './component-state';
import { ComponentHookTimeoutError, InvalidEntryPointError } from './errors';
import type { LifecycleHook } from './errors';
import type { LifecycleManagerEventMap } from './events';
import { validateManifest } from './manifest';
import type { NormalizedManifest } from './manifest';
import type {
  Component,
  ComponentContext,
  ComponentManifest,
  HotReloadResult,
  LifecycleManagerOptions,
  LifecycleStatistics,
  ManagedComponentDescriptor,
  RemoveComponentResult,
  RestartComponentFailureCode,
  RestartComponentResult,
  BatchResolutionPolicy,
  StartAllResult,
  StopAllResult,
  StopComponentFailureCode,
  StopComponentResult,
} from './types';

interface ComponentRecord {
  manifest: NormalizedManifest;
  requirements: IsolationRequirements;
  state: ComponentState;
  instance?: Component;
  boundary?: LoadBoundary;
  attached: boolean;
  reloadCount: number;
  startedAt: number | null;
  stoppedAt: number | null;
}

type SingleOperationCheck =
  | { ok: true; record: ComponentRecord }
  | {
      ok: false;
      code: 'not_found' | 'reload_in_progress' | 'lifecycle_busy';
      error: ComponentError;
    };

function isPending(record: ComponentRecord): boolean {
  return record.state === 'registered' || record.state === 'stopped';
}

const EXCLUSION_CODES: Record<ExclusionReason, ComponentErrorCode> = {
  unknown_dependency: 'unknown_dependency',
  cyclic_dependency: 'cyclic_dependency',
  dependency_excluded: 'dependency_excluded',
};

/**
 * Structural check for a value returned by a component factory
 */
export function isComponent(value: unknown): value is Component {
  return (
    isRecord(value) &&
    typeof value['id'] === 'string' &&
    typeof value['name'] === 'string' &&
    typeof value['version'] === 'string' &&
    value['dependencies'] instanceof Set &&
    typeof value['onAttach'] === 'function' &&
    typeof value['contributeBehaviors'] === 'function' &&
    typeof value['onDetach'] === 'function' &&
    (value['onStart'] === undefined || typeof value['onStart'] === 'function')
  );
}

/**
 * LifecycleManager - dependency-ordered component lifecycle
 *
 * Drives every component through its state machine, loading its code through
 * a per-component LoadBoundary, registering it once running and splicing its
 * behavior contributions into the active chain.
 *
 * Features:
 * - Best-effort batch startup: a failure fails its dependents, siblings keep
 *   starting, and every failure is collected into the result
 * - Reverse-order shutdown
 * - Hot reload of one component under a new boundary, with its contributions
 *   out of the chain for the whole reload
 * - Single-component stop and restart, refused while running dependents exist
 * - Hook timeouts, typed events, structured errors
 */
export class LifecycleManager extends EventEmitterProtected<LifecycleManagerEventMap> {
  private readonly logger: LoggerService;
  private readonly rootLogger: Logger;
  private readonly loader: Loader;
  private readonly registry: ComponentRegistry<Component>;
  private readonly chain: ActiveChain;
  private readonly sharedCore: SharedCoreModules;
  private readonly locator?: PrivateModuleLocator;
  private readonly attachTimeoutMS: number;
  private readonly startTimeoutMS: number;
  private readonly detachTimeoutMS: number;
  private readonly resolutionPolicy: BatchResolutionPolicy;
  private readonly concurrentStartup: boolean;

  private readonly records = new Map<string, ComponentRecord>();
  /** Ids in the order they reached running; stop order is the reverse */
  private runningOrder: string[] = [];
  private readonly reloads = new Map<string, Promise<HotReloadResult>>();
  private errorLog: ComponentError[] = [];
  private operation: 'starting' | 'stopping' | 'restarting' | 'removing' | null = null;

  constructor(options: LifecycleManagerOptions) {
    const logger = options.logger.service('lifecycle-manager');

    super({
      onListenerError: (error, callbackName) => {
        logger.error('Event handler error', {
          params: { callbackName, error },
        });
      },
    });

    this.rootLogger = options.logger;
    this.logger = logger;
    this.loader = options.loader;
    this.registry = options.registry ?? new ComponentRegistry<Component>();
    this.chain = options.chain ?? new ActiveChain({ logger: options.logger });
    this.sharedCore = options.sharedCore ?? defaultSharedCore;
    this.locator = options.locator;

    this.attachTimeoutMS = options.attachTimeoutMS ?? 30000;
    this.startTimeoutMS = options.startTimeoutMS ?? 30000;
    this.detachTimeoutMS = options.detachTimeoutMS ?? 10000;
    assertTimeoutMS('attachTimeoutMS', this.attachTimeoutMS);
    assertTimeoutMS('startTimeoutMS', this.startTimeoutMS);
    assertTimeoutMS('detachTimeoutMS', this.detachTimeoutMS);

    this.resolutionPolicy = options.resolutionPolicy ?? 'fail-all';
    this.concurrentStartup = options.concurrentStartup ?? false;
  }

  // ============================================================================
  // Startup
  // ============================================================================

  /**
   * Validates, resolves and starts a batch of components.
   *
   * Never throws for a single component's failure: failed components end in
   * `failed`, components depending on them are failed without being loaded,
   * and everything else keeps starting. Components already running may be
   * depended on by the batch.
   */
  public async startAll(
    manifests: Iterable<ComponentManifest>,
  ): Promise<StartAllResult> {
    const startedAt = ms();
    const errors: ComponentError[] = [];

    if (this.operation !== null || this.reloads.size > 0) {
      const error = ComponentError.warning(
        '*',
        'lifecycle_busy',
        `Cannot start while ${this.operation ?? 'reloading'}`,
      );
      this.recordErrors([error]);

      return {
        success: false,
        code: 'lifecycle_busy',
        startOrder: [],
        started: [],
        failed: [],
        errors: [error],
        durationMS: ms() - startedAt,
      };
    }

    this.operation = 'starting';

    try {
      const batch = this.admitBatch(manifests, errors);
      const failed = new Set<string>(batch.rejected);

      const resolution = resolveStartOrder(this.resolutionNodes(batch.ids, batch.rejected), {
        policy: this.resolutionPolicy === 'fail-all' ? 'fail' : 'exclude',
      });

      if (!resolution.success) {
        this.logger.error('Dependency resolution failed: {{message}}', {
          params: { message: resolution.error.message },
        });

        for (const id of batch.ids) {
          const record = this.requireRecord(id);

          if (isPending(record)) {
            const error = ComponentError.critical(
              id,
              resolution.code,
              resolution.error.message,
              resolution.error,
            );
            this.markFailed(record, error);
            errors.push(error);
          }
          failed.add(id);
        }

        return this.finishStart(startedAt, 'resolution_failed', [], [], failed, errors);
      }

      for (const excluded of resolution.excluded) {
        const record = this.records.get(excluded.id);

        if (record && batch.ids.includes(excluded.id) && isPending(record)) {
          const error = this.resolutionError(
            excluded.id,
            EXCLUSION_CODES[excluded.reason],
            excluded.error,
          );
          this.markFailed(record, error);
          errors.push(error);
          failed.add(excluded.id);
        }
      }

      const batchIds = new Set(batch.ids);
      const startOrder = resolution.startOrder.filter((id) => batchIds.has(id));
      const toStart = startOrder.filter((id) => isPending(this.requireRecord(id)));

      for (const id of toStart) {
        this.transition(this.requireRecord(id), 'resolved');
      }

      const started = this.concurrentStartup
        ? await this.startConcurrently(toStart, errors)
        : await this.startSequentially(toStart, errors);

      for (const id of toStart) {
        if (!started.includes(id)) {
          failed.add(id);
        }
      }

      return this.finishStart(
        startedAt,
        failed.size > 0 ? 'component_failures' : undefined,
        startOrder,
        started,
        failed,
        errors,
      );
    } finally {
      this.operation = null;
    }
  }

  // ============================================================================
  // Shutdown
  // ============================================================================

  /**
   * Stops every running component in reverse start order. Reloads in
   * progress are awaited first.
   */
  public async stopAll(): Promise<StopAllResult> {
    const startedAt = ms();

    if (this.operation !== null) {
      const error = ComponentError.warning(
        '*',
        'lifecycle_busy',
        `Cannot stop while ${this.operation}`,
      );
      this.recordErrors([error]);

      return {
        success: false,
        code: 'lifecycle_busy',
        stopOrder: [],
        stopped: [],
        failed: [],
        errors: [error],
        durationMS: ms() - startedAt,
      };
    }

    this.operation = 'stopping';

    try {
      await Promise.allSettled(this.reloads.values());

      const stopOrder = [...this.runningOrder].reverse();
      const stopped: string[] = [];
      const failed: string[] = [];
      const errors: ComponentError[] = [];

      this.logger.info('Stopping {{count}} components', {
        params: { count: stopOrder.length, stopOrder },
      });

      for (const id of stopOrder) {
        const record = this.records.get(id);

        if (!record || record.state !== 'running') {
          continue;
        }

        const error = await this.stopRecord(record);

        if (error) {
          errors.push(error);
          failed.push(id);
        } else {
          stopped.push(id);
        }
      }

      this.recordErrors(errors);

      const durationMS = ms() - startedAt;

      if (failed.length === 0) {
        this.logger.success('Stopped {{count}} components', {
          params: { count: stopped.length, durationMS },
        });
      } else {
        this.logger.warn('Stopped with {{count}} failures', {
          params: { count: failed.length, failed },
        });
      }

      this.safeEmit('lifecycle:stopped', { stopOrder, stopped, failed, durationMS });

      return {
        success: failed.length === 0,
        code: failed.length > 0 ? 'component_failures' : undefined,
        stopOrder,
        stopped,
        failed,
        errors,
        durationMS,
      };
    } finally {
      this.operation = null;
    }
  }

  // ============================================================================
  // Hot reload
  // ============================================================================

  /**
   * Replaces a running component's code without touching other components.
   *
   * The component's contributions leave the active chain in one swap before
   * anything else happens and come back in one swap only if the new instance
   * reaches running. On failure the component is left `failed` with its
   * contributions out of the chain.
   */
  public hotReload(id: string): Promise<HotReloadResult> {
    const inFlight = this.reloads.get(id);

    if (inFlight) {
      const error = ComponentError.information(
        id,
        'reload_in_progress',
        `Component "${id}" is already reloading`,
      );
      this.recordErrors([error]);

      return Promise.resolve({
        success: false,
        componentId: id,
        code: 'reload_in_progress',
        error,
        durationMS: 0,
      });
    }

    const reload = this.hotReloadInternal(id).finally(() => {
      this.reloads.delete(id);
    });

    this.reloads.set(id, reload);
    return reload;
  }

  private async hotReloadInternal(id: string): Promise<HotReloadResult> {
    const startedAt = ms();
    const fail = (
      code: Extract<HotReloadResult, { success: false }>['code'],
      error: ComponentError,
    ): HotReloadResult => {
      this.recordErrors([error]);
      this.logger.entity(id).error('Hot reload failed: {{message}}', {
        params: { message: error.message, code },
      });
      this.safeEmit('component:reload-failed', { id, error });

      return { success: false, componentId: id, code, error, durationMS: ms() - startedAt };
    };

    // Let the caller's synchronous code run before anything changes
    await Promise.resolve();

    const record = this.records.get(id);

    if (!record) {
      return fail(
        'not_found',
        ComponentError.warning(id, 'not_found', `Component "${id}" is not managed`),
      );
    }

    if (this.operation !== null) {
      return fail(
        'lifecycle_busy',
        ComponentError.warning(id, 'lifecycle_busy', `Cannot reload while ${this.operation}`),
      );
    }

    if (record.state !== 'running') {
      return fail(
        'not_running',
        ComponentError.warning(
          id,
          'invalid_state',
          `Component "${id}" is ${record.state}, only running components can be reloaded`,
        ),
      );
    }

    const log = this.logger.entity(id);
    const previousBoundaryId = record.boundary?.id ?? '';
    const position = this.runningOrder.indexOf(id);

    log.info('Hot reload started');
    this.safeEmit('component:reloading', { id });

    // Out of the chain first; in-flight requests keep their snapshot
    this.chain.removeContributions(id);

    const detachError = await this.stopRecord(record);
    if (detachError) {
      return fail('detach_failed', detachError);
    }

    this.transition(record, 'unloaded');

    const dependencyError = this.checkDependenciesRunning(record);
    if (dependencyError) {
      this.transition(record, 'resolved');
      this.markFailed(record, dependencyError);
      return fail('dependency_failed', dependencyError);
    }

    this.transition(record, 'resolved');

    const startError = await this.startRecord(record, position);
    if (startError) {
      return fail('start_failed', startError);
    }

    record.reloadCount++;

    const durationMS = ms() - startedAt;
    const boundaryId = record.boundary?.id ?? '';

    log.success('Hot reload completed', {
      params: { durationMS, previousBoundaryId, boundaryId },
    });
    this.safeEmit('component:reloaded', {
      id,
      previousBoundaryId,
      boundaryId,
      durationMS,
    });

    return { success: true, componentId: id, previousBoundaryId, boundaryId, durationMS };
  }

  // ============================================================================
  // Removal
  // ============================================================================

  /**
   * Permanently removes a component: stops it if running, unloads it and
   * destroys its record. Its errors stay in `getErrors()`. Refused while
   * running components depend on it.
   */
  public async removeComponent(id: string): Promise<RemoveComponentResult> {
    const check = this.checkSingleOperation(id, 'remove');

    if (!check.ok) {
      return { success: false, componentId: id, code: check.code, error: check.error };
    }

    const { record } = check;
    const dependentsError = this.dependentsError(id, 'remove');

    if (dependentsError) {
      return { success: false, componentId: id, code: 'has_dependents', error: dependentsError };
    }

    this.operation = 'removing';

    try {
      if (record.state === 'running') {
        const error = await this.stopRecord(record);

        if (error) {
          this.recordErrors([error]);
          return { success: false, componentId: id, code: 'stop_failed', error };
        }
      }

      if (record.state === 'stopped') {
        this.transition(record, 'unloaded');
      }

      this.records.delete(id);
      this.logger.entity(id).info('Component removed');
      this.safeEmit('component:removed', { id });

      return { success: true, componentId: id };
    } finally {
      this.operation = null;
    }
  }

  // ============================================================================
  // Single component stop / restart
  // ============================================================================

  /**
   * Stops one running component, releasing its boundary. Refused while
   * running components depend on it; stop those first.
   */
  public async stopComponent(id: string): Promise<StopComponentResult> {
    const startedAt = ms();
    const fail = (code: StopComponentFailureCode, error: ComponentError): StopComponentResult => ({
      success: false,
      componentId: id,
      code,
      error,
      durationMS: ms() - startedAt,
    });

    const check = this.checkSingleOperation(id, 'stop');
    if (!check.ok) {
      return fail(check.code, check.error);
    }

    const { record } = check;

    if (record.state !== 'running') {
      return fail(
        'not_running',
        ComponentError.warning(
          id,
          'invalid_state',
          `Component "${id}" is ${record.state}, only running components can be stopped`,
        ),
      );
    }

    const dependentsError = this.dependentsError(id, 'stop');
    if (dependentsError) {
      return fail('has_dependents', dependentsError);
    }

    this.operation = 'stopping';

    try {
      const detachError = await this.stopRecord(record);

      if (detachError) {
        this.recordErrors([detachError]);
        return fail('detach_failed', detachError);
      }

      return { success: true, componentId: id, durationMS: ms() - startedAt };
    } finally {
      this.operation = null;
    }
  }

  /**
   * Stops a running component (same refusals as `stopComponent`) and starts it
   * again under a new boundary, keeping its stop-order position. A stopped
   * component is just started.
   */
  public async restartComponent(id: string): Promise<RestartComponentResult> {
    const startedAt = ms();
    const fail = (
      code: RestartComponentFailureCode,
      error: ComponentError,
    ): RestartComponentResult => ({
      success: false,
      componentId: id,
      code,
      error,
      durationMS: ms() - startedAt,
    });

    const check = this.checkSingleOperation(id, 'restart');
    if (!check.ok) {
      return fail(check.code, check.error);
    }

    const { record } = check;
    const wasRunning = record.state === 'running';

    if (!wasRunning && record.state !== 'stopped') {
      return fail(
        'invalid_state',
        ComponentError.warning(
          id,
          'invalid_state',
          `Component "${id}" is ${record.state}, only running or stopped components can be restarted`,
        ),
      );
    }

    if (wasRunning) {
      const dependentsError = this.dependentsError(id, 'restart');
      if (dependentsError) {
        return fail('has_dependents', dependentsError);
      }
    }

    const log = this.logger.entity(id);
    const position = this.runningOrder.indexOf(id);
    this.operation = 'restarting';

    try {
      log.info('Restarting component');

      if (wasRunning) {
        const detachError = await this.stopRecord(record);

        if (detachError) {
          this.recordErrors([detachError]);
          return fail('detach_failed', detachError);
        }
      }

      this.transition(record, 'resolved');

      const dependencyError = this.checkDependenciesRunning(record);
      if (dependencyError) {
        this.markFailed(record, dependencyError);
        this.recordErrors([dependencyError]);
        return fail('dependency_failed', dependencyError);
      }

      const startError = await this.startRecord(record, position);
      if (startError) {
        this.recordErrors([startError]);
        return fail('start_failed', startError);
      }

      const durationMS = ms() - startedAt;
      const boundaryId = record.boundary?.id ?? '';

      log.success('Component restarted', { params: { durationMS, boundaryId } });
      this.safeEmit('component:restarted', { id, boundaryId, durationMS });

      return { success: true, componentId: id, boundaryId, durationMS };
    } finally {
      this.operation = null;
    }
  }

  private checkSingleOperation(id: string, verb: string): SingleOperationCheck {
    const record = this.records.get(id);

    if (!record) {
      return {
        ok: false,
        code: 'not_found',
        error: ComponentError.warning(id, 'not_found', `Component "${id}" is not managed`),
      };
    }

    if (this.reloads.has(id)) {
      return {
        ok: false,
        code: 'reload_in_progress',
        error: ComponentError.information(
          id,
          'reload_in_progress',
          `Component "${id}" is reloading`,
        ),
      };
    }

    if (this.operation !== null || this.reloads.size > 0) {
      return {
        ok: false,
        code: 'lifecycle_busy',
        error: ComponentError.warning(
          id,
          'lifecycle_busy',
          `Cannot ${verb} while ${this.operation ?? 'reloading'}`,
        ),
      };
    }

    return { ok: true, record };
  }

  /**
   * Running components that list `id` as a dependency, in start order
   */
  private runningDependents(id: string): string[] {
    return this.runningOrder.filter(
      (runningId) => this.records.get(runningId)?.manifest.dependencies.includes(id) ?? false,
    );
  }

  private dependentsError(id: string, verb: string): ComponentError | undefined {
    const dependents = this.runningDependents(id);

    if (dependents.length === 0) {
      return undefined;
    }

    return ComponentError.warning(
      id,
      'has_dependents',
      `Cannot ${verb} "${id}" while running components depend on it: ${dependents.join(', ')}`,
    );
  }

  // ============================================================================
  // Queries
  // ============================================================================

  public getState(id: string): ComponentState | undefined {
    return this.records.get(id)?.state;
  }

  /**
   * Every error recorded so far, oldest first, optionally for one component
   */
  public getErrors(id?: string): ComponentError[] {
    return id === undefined
      ? [...this.errorLog]
      : this.errorLog.filter((error) => error.componentId === id);
  }

  public clearErrors(): void {
    this.errorLog = [];
  }

  public getDescriptor(id: string): ManagedComponentDescriptor | undefined {
    const record = this.records.get(id);
    return record ? this.describe(record) : undefined;
  }

  public getDescriptors(): ManagedComponentDescriptor[] {
    return [...this.records.values()].map((record) => this.describe(record));
  }

  /**
   * Running components in the order they started
   */
  public getStartOrder(): string[] {
    return [...this.runningOrder];
  }

  /**
   * A running component by id
   */
  public getComponent(id: string): Component | undefined {
    return this.registry.get(id);
  }

  public getRegistry(): ComponentRegistry<Component> {
    return this.registry;
  }

  public getChain(): ActiveChain {
    return this.chain;
  }

  public isReloading(id: string): boolean {
    return this.reloads.has(id);
  }

  public getStatistics(): LifecycleStatistics {
    const byState: Record<ComponentState, number> = {
      registered: 0,
      resolved: 0,
      initializing: 0,
      initialized: 0,
      starting: 0,
      running: 0,
      stopping: 0,
      stopped: 0,
      failed: 0,
      unloaded: 0,
    };
    let reloads = 0;

    for (const record of this.records.values()) {
      byState[record.state]++;
      reloads += record.reloadCount;
    }

    return {
      total: this.records.size,
      byState,
      running: byState.running,
      reloads,
      errors: this.errorLog.length,
      chainVersion: this.chain.version,
      chainLength: this.chain.current().length,
    };
  }

  // ============================================================================
  // Batch admission and resolution
  // ============================================================================

  /**
   * Validates manifests and creates (or resets) records. Returns the ids that
   * take part in resolution and those rejected outright.
   */
  private admitBatch(
    manifests: Iterable<ComponentManifest>,
    errors: ComponentError[],
  ): { ids: string[]; rejected: string[] } {
    const ids: string[] = [];
    const rejected: string[] = [];
    const seen = new Set<string>();

    for (const input of manifests) {
      const id = input.id;

      if (seen.has(id)) {
        const cause = new DuplicateRegistrationError({ id });
        const error = ComponentError.error(id, 'duplicate_registration', cause.message, cause);
        errors.push(error);
        this.logger.entity(id).error('Duplicate component in batch, ignoring');
        continue;
      }

      seen.add(id);

      const existing = this.records.get(id);
      if (existing && existing.state !== 'stopped' && existing.state !== 'failed') {
        const cause = new DuplicateRegistrationError({ id });
        const error = ComponentError.error(
          id,
          'duplicate_registration',
          `${cause.message} It is ${existing.state}.`,
          cause,
        );
        errors.push(error);
        rejected.push(id);
        this.logger.entity(id).error('Component is already managed ({{state}})', {
          params: { state: existing.state },
        });
        continue;
      }

      const validation = validateManifest(input);
      errors.push(...validation.warnings);

      for (const warning of validation.warnings) {
        this.logger.entity(id).warn(warning.message);
      }

      if (!validation.valid) {
        errors.push(validation.error);
        rejected.push(id);
        this.logger.entity(id).error(validation.error.message);
        continue;
      }

      if (existing) {
        existing.manifest = validation.manifest;
        existing.requirements = validation.requirements;

        // stopped goes straight to resolved
        if (existing.state === 'failed') {
          this.transition(existing, 'registered');
        }
      } else {
        this.records.set(id, {
          manifest: validation.manifest,
          requirements: validation.requirements,
          state: 'registered',
          attached: false,
          reloadCount: 0,
          startedAt: null,
          stoppedAt: null,
        });
        this.logger.entity(id).debug('Component registered ({{version}})', {
          params: { version: validation.manifest.version },
        });
      }

      ids.push(id);
    }

    return { ids, rejected };
  }

  /**
   * Batch components with their dependencies, plus every other managed
   * component as a node without edges: those were ordered when they started,
   * and whether they are running is checked per component at start time, so
   * a dependency on one that is not running fails with `dependency_failed`.
   * Rejected ids stay in the graph the same way.
   */
  private resolutionNodes(batchIds: string[], rejectedIds: string[]): DependencyNode[] {
    const nodes: DependencyNode[] = [];
    const batch = new Set(batchIds);

    for (const [id, record] of this.records) {
      nodes.push({ id, dependencies: batch.has(id) ? record.manifest.dependencies : [] });
    }

    for (const id of rejectedIds) {
      if (!this.records.has(id)) {
        nodes.push({ id, dependencies: [] });
      }
    }

    return nodes;
  }

  private resolutionError(
    id: string,
    code: ComponentErrorCode,
    error: DependencyResolutionError,
  ): ComponentError {
    return code === 'dependency_excluded'
      ? ComponentError.error(id, code, error.message, error)
      : ComponentError.critical(id, code, error.message, error);
  }

  private async startSequentially(
    order: string[],
    errors: ComponentError[],
  ): Promise<string[]> {
    const started: string[] = [];

    for (const id of order) {
      if (await this.startInBatch(id, errors)) {
        started.push(id);
      }
    }

    return started;
  }

  /**
   * Every component starts as soon as all of its dependencies settled; the
   * order is topological, so a dependency's promise always exists already
   */
  private async startConcurrently(
    order: string[],
    errors: ComponentError[],
  ): Promise<string[]> {
    const pending = new Map<string, Promise<boolean>>();
    const started: string[] = [];

    for (const id of order) {
      const record = this.requireRecord(id);
      const dependencies = record.manifest.dependencies.flatMap((dependency) => {
        const promise = pending.get(dependency);
        return promise ? [promise] : [];
      });

      pending.set(
        id,
        Promise.all(dependencies).then(async () => {
          const ok = await this.startInBatch(id, errors);

          if (ok) {
            started.push(id);
          }

          return ok;
        }),
      );
    }

    await Promise.all(pending.values());
    return started;
  }

  private async startInBatch(id: string, errors: ComponentError[]): Promise<boolean> {
    const record = this.requireRecord(id);
    const dependencyError = this.checkDependenciesRunning(record);

    if (dependencyError) {
      this.markFailed(record, dependencyError);
      errors.push(dependencyError);
      return false;
    }

    const error = await this.startRecord(record);

    if (error) {
      errors.push(error);
      return false;
    }

    return true;
  }

  private finishStart(
    startedAt: number,
    code: StartAllResult['code'],
    startOrder: string[],
    started: string[],
    failed: Set<string>,
    errors: ComponentError[],
  ): StartAllResult {
    this.recordErrors(errors);

    const durationMS = ms() - startedAt;
    const failedList = [...failed];

    if (failedList.length === 0) {
      this.logger.success('Started {{count}} components', {
        params: { count: started.length, durationMS, startOrder },
      });
    } else {
      this.logger.warn('Started {{started}} components, {{failed}} failed', {
        params: { started: started.length, failed: failedList.length, failedList },
      });
    }

    this.safeEmit('lifecycle:started', {
      startOrder,
      started,
      failed: failedList,
      durationMS,
    });

    return {
      success: failedList.length === 0 && code === undefined,
      code,
      startOrder,
      started,
      failed: failedList,
      errors,
      durationMS,
    };
  }

  // ============================================================================
  // Single component transitions
  // ============================================================================

  /**
   * resolved -> running. Returns the error the component failed with, if any;
   * on failure the component is already `failed` and cleaned up.
   */
  private async startRecord(
    record: ComponentRecord,
    position?: number,
  ): Promise<ComponentError | undefined> {
    const { manifest } = record;
    const id = manifest.id;
    const log = this.logger.entity(id);
    const startedAt = ms();

    const boundary = new LoadBoundary({
      componentId: id,
      requirements: record.requirements,
      privateLocation: manifest.location,
      sharedCore: this.sharedCore,
      locator: this.locator,
    });
    record.boundary = boundary;

    try {
      this.transition(record, 'initializing');

      const references = boundary.resolveAll(manifest.references);
      if (!references.success) {
        throw ComponentError.critical(
          id,
          'restricted_module',
          references.rejected.error.message,
          references.rejected.error,
        );
      }

      const instance = await this.createInstance(record, boundary);
      record.instance = instance;

      await this.runHook(id, 'onAttach', this.attachTimeoutMS, 'attach_failed', () =>
        instance.onAttach(this.createContext(record, boundary)),
      );
      record.attached = true;
      this.transition(record, 'initialized');

      this.transition(record, 'starting');
      const onStart = instance.onStart;
      if (onStart) {
        await this.runHook(id, 'onStart', this.startTimeoutMS, 'start_failed', () =>
          onStart.call(instance),
        );
      }

      const contributions = this.collectContributions(id, instance);

      try {
        this.chain.setContributions(id, contributions);
      } catch (error) {
        throw ComponentError.fromException(id, 'start_failed', error, {
          severity: error instanceof DuplicateContributionError ? 'critical' : 'error',
        });
      }

      this.transition(record, 'running');
      const registered = this.registry.register(id, instance, {
        id,
        name: manifest.name,
        version: manifest.version,
        vendor: manifest.vendor,
        dependencies: manifest.dependencies,
        tags: manifest.tags,
        registeredAt: ms(),
      });

      if (!registered) {
        const cause = new DuplicateRegistrationError({ id });
        throw ComponentError.error(id, 'duplicate_registration', cause.message, cause);
      }
      // A reloaded component keeps its place in the stop order
      if (position !== undefined && position >= 0) {
        this.runningOrder.splice(position, 0, id);
      } else {
        this.runningOrder.push(id);
      }
      record.startedAt = ms();
      record.stoppedAt = null;

      const durationMS = ms() - startedAt;
      log.success('Component started', {
        params: { durationMS, contributions: contributions.length },
      });
      this.safeEmit('component:registered', { id, version: manifest.version });
      this.safeEmit('component:started', { id, durationMS });

      return undefined;
    } catch (error) {
      const componentError =
        error instanceof ComponentError
          ? error
          : ComponentError.fromException(id, 'start_failed', error);

      await this.cleanupFailedStart(record);
      this.markFailed(record, componentError);

      return componentError;
    }
  }

  /**
   * running -> stopped, releasing everything the component held. Returns the
   * detach error, in which case the component ends `failed` instead.
   */
  private async stopRecord(record: ComponentRecord): Promise<ComponentError | undefined> {
    const id = record.manifest.id;
    const log = this.logger.entity(id);

    this.chain.removeContributions(id);
    this.registry.unregister(id);
    this.runningOrder = this.runningOrder.filter((runningId) => runningId !== id);

    this.transition(record, 'stopping');

    let detachError: ComponentError | undefined;
    const instance = record.instance;

    if (instance && record.attached) {
      try {
        await this.runHook(id, 'onDetach', this.detachTimeoutMS, 'detach_failed', () =>
          instance.onDetach(),
        );
      } catch (error) {
        detachError =
          error instanceof ComponentError
            ? error
            : ComponentError.fromException(id, 'detach_failed', error);
      }
    }

    record.attached = false;
    record.instance = undefined;
    this.releaseBoundary(record);
    record.stoppedAt = ms();

    if (detachError) {
      this.markFailed(record, detachError);
      return detachError;
    }

    this.transition(record, 'stopped');
    log.info('Component stopped');
    this.safeEmit('component:stopped', { id });

    return undefined;
  }

  private async createInstance(
    record: ComponentRecord,
    boundary: LoadBoundary,
  ): Promise<Component> {
    const { manifest } = record;
    const id = manifest.id;
    let exports: unknown;

    try {
      exports = (await this.loader.load(manifest.entry, boundary)).exports;
    } catch (error) {
      if (error instanceof RestrictedModuleError) {
        throw ComponentError.critical(id, 'restricted_module', error.message, error);
      }

      throw ComponentError.fromException(id, 'load_failed', error, {
        severity: 'critical',
        message:
          error instanceof ModuleLoadError
            ? error.message
            : `Failed to load entry "${manifest.entry}" of component "${id}"`,
      });
    }

    const invalidEntry = (reason: string, cause?: unknown): ComponentError => {
      const entryError = new InvalidEntryPointError({
        componentId: id,
        entry: manifest.entry,
        reason,
      });

      return ComponentError.critical(
        id,
        'invalid_entry_point',
        entryError.message,
        cause ?? entryError,
      );
    };

    const factory = isRecord(exports)
      ? isFunction(exports['createComponent'])
        ? exports['createComponent']
        : exports['default']
      : undefined;

    if (!isFunction(factory)) {
      throw invalidEntry('no createComponent or default export function');
    }

    let instance: unknown;
    try {
      instance = await factory({ logger: this.rootLogger, manifest });
    } catch (error) {
      throw invalidEntry('component factory threw', error);
    }

    if (!isComponent(instance)) {
      throw invalidEntry('factory did not return a component');
    }

    if (instance.id !== id) {
      throw invalidEntry(`factory returned component "${instance.id}"`);
    }

    const declared = [...instance.dependencies].sort();
    const listed = [...manifest.dependencies].sort();

    if (
      declared.length !== listed.length ||
      declared.some((dependency, index) => dependency !== listed[index])
    ) {
      throw invalidEntry(
        `component declares dependencies [${declared.join(', ')}] but its manifest lists [${listed.join(', ')}]`,
      );
    }

    return instance;
  }

  private createContext(record: ComponentRecord, boundary: LoadBoundary): ComponentContext {
    const id = record.manifest.id;

    return {
      componentId: id,
      manifest: Object.freeze({ ...record.manifest }),
      logger: this.rootLogger.service('component').entity(id),
      getComponent: (otherId) => this.registry.get(otherId),
      importModule: async (moduleName) =>
        (await this.loader.load(moduleName, boundary)).exports,
    };
  }

  private collectContributions(id: string, instance: Component): BehaviorContribution[] {
    try {
      return [...instance.contributeBehaviors()];
    } catch (error) {
      throw ComponentError.fromException(id, 'start_failed', error, {
        message: `contributeBehaviors() of "${id}" threw: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }

  /**
   * Runs one hook against its timeout; failures and timeouts come back as
   * ComponentError
   */
  private async runHook(
    id: string,
    hook: LifecycleHook,
    timeoutMS: number,
    code: ComponentErrorCode,
    invoke: () => Promise<void> | void,
  ): Promise<void> {
    let timeoutHandle: NodeJS.Timeout | undefined;
    const hookPromise = (async () => invoke())();

    try {
      if (timeoutMS > 0) {
        const timeoutPromise = new Promise<never>((_, reject) => {
          timeoutHandle = setTimeout(() => {
            // A hook that settles after its timeout only gets logged
            void hookPromise.catch((error: unknown) => {
              this.logger.entity(id).warn('{{hook}}() failed after timing out', {
                params: { hook, error },
              });
            });
            reject(new ComponentHookTimeoutError({ componentId: id, hook, timeoutMS }));
          }, timeoutMS);
        });

        await Promise.race([hookPromise, timeoutPromise]);
      } else {
        await hookPromise;
      }
    } catch (error) {
      if (error instanceof ComponentHookTimeoutError) {
        throw ComponentError.error(id, 'timeout', error.message, error);
      }

      throw ComponentError.fromException(id, code, error, {
        message: `${hook}() of "${id}" failed: ${error instanceof Error ? error.message : String(error)}`,
      });
    } finally {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
    }
  }

  /**
   * Best-effort undo of a partial start: out of the chain and registry,
   * detached if it got that far
   */
  private async cleanupFailedStart(record: ComponentRecord): Promise<void> {
    const id = record.manifest.id;

    this.chain.removeContributions(id);
    if (this.registry.get(id) === record.instance) {
      this.registry.unregister(id);
    }
    this.runningOrder = this.runningOrder.filter((runningId) => runningId !== id);

    const instance = record.instance;
    if (instance && record.attached) {
      try {
        await this.runHook(id, 'onDetach', this.detachTimeoutMS, 'detach_failed', () =>
          instance.onDetach(),
        );
      } catch (error) {
        const detachError =
          error instanceof ComponentError
            ? error
            : ComponentError.fromException(id, 'detach_failed', error);

        this.recordErrors([
          ComponentError.warning(id, 'detach_failed', detachError.message, detachError),
        ]);
      }
    }

    record.attached = false;
    record.instance = undefined;
    this.releaseBoundary(record);
  }

  private releaseBoundary(record: ComponentRecord): void {
    const boundary = record.boundary;

    if (boundary) {
      this.loader.release?.(boundary);
      boundary.release();
      record.boundary = undefined;
    }
  }

  private checkDependenciesRunning(record: ComponentRecord): ComponentError | undefined {
    const id = record.manifest.id;

    for (const dependency of record.manifest.dependencies) {
      const state = this.records.get(dependency)?.state;

      if (state !== 'running') {
        return ComponentError.error(
          id,
          'dependency_failed',
          `Dependency "${dependency}" of "${id}" is ${state ?? 'not managed'}`,
        );
      }
    }

    return undefined;
  }

  /**
   * Moves a component to failed (if it isn't already). Recording the error is
   * up to the caller.
   */
  private markFailed(record: ComponentRecord, error: ComponentError): void {
    const id = record.manifest.id;

    if (record.state !== 'failed') {
      this.transition(record, 'failed');
    }

    this.logger.entity(id).error('Component failed: {{message}}', {
      params: { message: error.message, code: error.code, severity: error.severity },
    });
    this.safeEmit('component:failed', { id, error });
  }

  private transition(record: ComponentRecord, to: ComponentState): void {
    const id = record.manifest.id;
    const from = record.state;

    assertTransition(id, from, to);
    record.state = to;

    this.logger.entity(id).debug('{{from}} -> {{to}}', { params: { from, to } });
    this.safeEmit('component:state-changed', { id, from, to });
  }

  private recordErrors(errors: ComponentError[]): void {
    this.errorLog.push(...errors);
  }

  private requireRecord(id: string): ComponentRecord {
    const record = this.records.get(id);

    if (!record) {
      throw new Error(`No record for component "${id}"`);
    }

    return record;
  }

  private describe(record: ComponentRecord): ManagedComponentDescriptor {
    const { manifest } = record;

    return {
      id: manifest.id,
      name: manifest.name,
      version: manifest.version,
      vendor: manifest.vendor,
      dependencies: [...manifest.dependencies],
      tags: [...manifest.tags],
      registeredAt: this.registry.getDescriptor(manifest.id)?.registeredAt ?? 0,
      state: record.state,
      isolation: record.requirements,
      location: manifest.location,
      entry: manifest.entry,
      reloadCount: record.reloadCount,
      startedAt: record.startedAt,
      stoppedAt: record.stoppedAt,
    };
  }

  private safeEmit<K extends keyof LifecycleManagerEventMap>(
    event: K,
    data: LifecycleManagerEventMap[K],
  ): void {
    try {
      this.emit(event, data);
    } catch (error) {
      this.logger.error('Event handler error', {
        params: { event, error },
      });
    }
  }
}
