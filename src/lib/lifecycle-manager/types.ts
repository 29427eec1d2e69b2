import type { BehaviorContribution } from '../behavior-chain';
import type { ActiveChain } from '../behavior-chain';
import type { ComponentDescriptor, ComponentRegistry } from '../component-registry';
import type {
  IsolationRequirements,
  IsolationRequirementsInput,
  Loader,
  PrivateModuleLocator,
  SharedCoreModules,
} from '../isolation';
import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import type { ComponentError } from './component-error';
import type { ComponentState } from './component-state';

/**
 * Everything the host needs to know about a component before loading it
 */
export interface ComponentManifest {
  /** Unique, see `isValidComponentId` */
  id: string;
  name: string;
  /** `major.minor.patch` with an optional `-tag` */
  version: string;
  vendor?: string;
  /** Ids of components that must be running first */
  dependencies?: string[];
  /** Defaults to standard isolation with no lists */
  isolation?: IsolationRequirementsInput;
  /** Private module directory (or registry location) */
  location?: string;
  /** Module whose `createComponent` (or default) export builds the component */
  entry: string;
  /** Modules the component will load; checked against the boundary up front */
  references?: string[];
  tags?: string[];
}

/**
 * What a component receives on attach. Lookups only see running components;
 * `importModule` goes through the component's own load boundary.
 */
export interface ComponentContext {
  readonly componentId: string;
  readonly manifest: Readonly<ComponentManifest>;
  readonly logger: LoggerService;
  getComponent(id: string): Component | undefined;
  importModule(moduleName: string): Promise<unknown>;
}

/**
 * Contract every managed component satisfies.
 *
 * The manager calls `onAttach` while initializing, `onStart` (if present)
 * while starting, collects `contributeBehaviors()` before the component goes
 * running, and calls `onDetach` while stopping.
 */
export interface Component {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly dependencies: ReadonlySet<string>;
  onAttach(context: ComponentContext): Promise<void> | void;
  onStart?(): Promise<void> | void;
  contributeBehaviors(): Iterable<BehaviorContribution>;
  onDetach(): Promise<void> | void;
}

export interface ComponentFactoryOptions {
  logger: Logger;
  manifest: Readonly<ComponentManifest>;
}

/**
 * Shape of an entry module's `createComponent` / default export
 */
export type ComponentFactory = (
  options: ComponentFactoryOptions,
) => Component | Promise<Component>;

/**
 * - `fail-all`: an unknown dependency or a cycle fails every component of the
 *   batch (default)
 * - `exclude-affected`: only the components involved, and their dependents,
 *   fail; the rest of the batch starts
 */
export type BatchResolutionPolicy = 'fail-all' | 'exclude-affected';

export interface LifecycleManagerOptions {
  logger: Logger;
  loader: Loader;
  /** Defaults to a fresh registry */
  registry?: ComponentRegistry<Component>;
  /** Defaults to a fresh chain */
  chain?: ActiveChain;
  /** Defaults to Node.js built-ins plus the runtime package */
  sharedCore?: SharedCoreModules;
  /** Finds modules in a component's private location */
  locator?: PrivateModuleLocator;
  /** Default 30000, 0 disables */
  attachTimeoutMS?: number;
  /** Default 30000, 0 disables */
  startTimeoutMS?: number;
  /** Default 10000, 0 disables */
  detachTimeoutMS?: number;
  /** Default `fail-all` */
  resolutionPolicy?: BatchResolutionPolicy;
  /**
   * Start independent components at the same time; a component still waits
   * for all of its dependencies. Default false (one at a time, in order).
   */
  concurrentStartup?: boolean;
}

/**
 * Registry identity plus what only the manager knows
 */
export interface ManagedComponentDescriptor extends ComponentDescriptor {
  readonly state: ComponentState;
  readonly isolation: IsolationRequirements;
  readonly location?: string;
  readonly entry: string;
  readonly reloadCount: number;
  readonly startedAt: number | null;
  readonly stoppedAt: number | null;
}

export interface StartAllResult {
  success: boolean;
  code?: 'lifecycle_busy' | 'resolution_failed' | 'component_failures';
  /** Resolved order of the batch (already running dependencies excluded) */
  startOrder: string[];
  started: string[];
  failed: string[];
  errors: ComponentError[];
  durationMS: number;
}

export interface StopAllResult {
  success: boolean;
  code?: 'lifecycle_busy' | 'component_failures';
  stopOrder: string[];
  stopped: string[];
  failed: string[];
  errors: ComponentError[];
  durationMS: number;
}

export type HotReloadFailureCode =
  | 'not_found'
  | 'not_running'
  | 'reload_in_progress'
  | 'lifecycle_busy'
  | 'detach_failed'
  | 'dependency_failed'
  | 'start_failed';

export type HotReloadResult =
  | {
      success: true;
      componentId: string;
      previousBoundaryId: string;
      boundaryId: string;
      durationMS: number;
    }
  | {
      success: false;
      componentId: string;
      code: HotReloadFailureCode;
      error: ComponentError;
      durationMS: number;
    };

export type RemoveComponentResult =
  | { success: true; componentId: string }
  | {
      success: false;
      componentId: string;
      code:
        | 'not_found'
        | 'lifecycle_busy'
        | 'reload_in_progress'
        | 'has_dependents'
        | 'stop_failed';
      error: ComponentError;
    };

export type StopComponentFailureCode =
  | 'not_found'
  | 'not_running'
  | 'lifecycle_busy'
  | 'reload_in_progress'
  | 'has_dependents'
  | 'detach_failed';

export type StopComponentResult =
  | { success: true; componentId: string; durationMS: number }
  | {
      success: false;
      componentId: string;
      code: StopComponentFailureCode;
      error: ComponentError;
      durationMS: number;
    };

export type RestartComponentFailureCode =
  | Exclude<StopComponentFailureCode, 'not_running'>
  | 'invalid_state'
  | 'dependency_failed'
  | 'start_failed';

/**
 * Restart is stop (when running) followed by a start under a new boundary
 */
export type RestartComponentResult =
  | { success: true; componentId: string; boundaryId: string; durationMS: number }
  | {
      success: false;
      componentId: string;
      code: RestartComponentFailureCode;
      error: ComponentError;
      durationMS: number;
    };

export interface LifecycleStatistics {
  total: number;
  byState: Record<ComponentState, number>;
  running: number;
  reloads: number;
  errors: number;
  chainVersion: number;
  chainLength: number;
}
