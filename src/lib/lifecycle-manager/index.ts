/**
 * LifecycleManager - dependency-ordered component lifecycle
 *
 * Starts, stops and hot-reloads isolated components:
 * - Dependency-ordered, best-effort startup with aggregated errors
 * - Reverse-order shutdown
 * - Per-component load boundaries
 * - Behavior contributions spliced into the active chain
 * - Event-driven architecture
 *
 * @module lifecycle-manager
 */

// Core classes
export { LifecycleManager, isComponent } from './lifecycle-manager';
export { BaseComponent } from './base-component';
export type { BaseComponentOptions } from './base-component';
export type { LifecycleManagerEventMap } from './events';

// State machine
export {
  COMPONENT_STATES,
  allowedTransitions,
  assertTransition,
  canTransition,
  isActiveState,
} from './component-state';
export type { ComponentState } from './component-state';

// Manifests
export { isValidComponentId, isValidVersion, validateManifest } from './manifest';
export type { ManifestValidationResult, NormalizedManifest } from './manifest';

// Types
export type {
  Component,
  ComponentContext,
  ComponentFactory,
  ComponentFactoryOptions,
  ComponentManifest,
  HotReloadFailureCode,
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

// Errors
export { ComponentError } from './component-error';
export type { ComponentErrorCode, ComponentErrorSeverity } from './component-error';
export * from './errors';
