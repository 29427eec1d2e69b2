import type { ComponentState } from './component-state';

/**
 * Error thrown when a component id doesn't match the id format
 *
 * Ids are lowercase, dot separated segments of letters, digits and hyphens:
 * `/^[a-z][a-z0-9-]*(\.[a-z][a-z0-9-]*)*$/`
 *
 * Valid ids: 'billing', 'acme.http-gateway', 'orders.v2'
 * Invalid ids: 'Billing', 'http_gateway', '.orders', 'orders.', ''
 */
export class InvalidComponentIdError extends Error {
  public errPrefix = 'LifecycleManagerErr';
  public errType = 'Component';
  public errCode = 'InvalidId';
  public additionalInfo: { id: string };

  constructor(additionalInfo: { id: string }) {
    super(
      `Invalid component id: "${additionalInfo.id}". Component ids are lowercase, dot separated segments of letters, numbers and hyphens.`,
    );
    this.name = 'InvalidComponentIdError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a manifest is missing required fields or has malformed
 * ones. Lists every problem found, not only the first.
 */
export class InvalidManifestError extends Error {
  public errPrefix = 'LifecycleManagerErr';
  public errType = 'Manifest';
  public errCode = 'InvalidManifest';
  public additionalInfo: { id: string; problems: string[] };

  constructor(additionalInfo: { id: string; problems: string[] }) {
    super(
      `Invalid manifest for "${additionalInfo.id}": ${additionalInfo.problems.join('; ')}`,
    );
    this.name = 'InvalidManifestError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a component's entry module does not export a usable
 * factory, or the factory returns something that is not the component the
 * manifest describes
 */
export class InvalidEntryPointError extends Error {
  public errPrefix = 'LifecycleManagerErr';
  public errType = 'Loader';
  public errCode = 'InvalidEntryPoint';
  public additionalInfo: { componentId: string; entry: string; reason: string };

  constructor(additionalInfo: {
    componentId: string;
    entry: string;
    reason: string;
  }) {
    super(
      `Entry "${additionalInfo.entry}" of component "${additionalInfo.componentId}" is invalid: ${additionalInfo.reason}`,
    );
    this.name = 'InvalidEntryPointError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown on a state change the lifecycle does not allow (programmer
 * error inside the manager)
 */
export class InvalidStateTransitionError extends Error {
  public errPrefix = 'LifecycleManagerErr';
  public errType = 'Lifecycle';
  public errCode = 'InvalidStateTransition';
  public additionalInfo: {
    componentId: string;
    from: ComponentState;
    to: ComponentState;
  };

  constructor(additionalInfo: {
    componentId: string;
    from: ComponentState;
    to: ComponentState;
  }) {
    super(
      `Component "${additionalInfo.componentId}" cannot go from ${additionalInfo.from} to ${additionalInfo.to}`,
    );
    this.name = 'InvalidStateTransitionError';
    this.additionalInfo = additionalInfo;
  }
}

export type LifecycleHook = 'onAttach' | 'onStart' | 'onDetach';

/**
 * Error thrown when a component lifecycle hook does not settle in time
 */
export class ComponentHookTimeoutError extends Error {
  public errPrefix = 'LifecycleManagerErr';
  public errType = 'Component';
  public errCode = 'HookTimeout';
  public additionalInfo: {
    componentId: string;
    hook: LifecycleHook;
    timeoutMS: number;
  };

  constructor(additionalInfo: {
    componentId: string;
    hook: LifecycleHook;
    timeoutMS: number;
  }) {
    super(
      `Component "${additionalInfo.componentId}" ${additionalInfo.hook}() timed out after ${additionalInfo.timeoutMS}ms`,
    );
    this.name = 'ComponentHookTimeoutError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a component uses its context before attach or after
 * detach
 */
export class ComponentNotAttachedError extends Error {
  public errPrefix = 'LifecycleManagerErr';
  public errType = 'Component';
  public errCode = 'NotAttached';
  public additionalInfo: { componentId: string };

  constructor(additionalInfo: { componentId: string }) {
    super(`Component "${additionalInfo.componentId}" is not attached`);
    this.name = 'ComponentNotAttachedError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error prefix constant for all lifecycle manager errors
 */
export const lifecycleManagerErrPrefix = 'LifecycleManagerErr';

/**
 * Error type constants
 */
export const lifecycleManagerErrTypes = {
  Component: 'Component',
  Manifest: 'Manifest',
  Loader: 'Loader',
  Lifecycle: 'Lifecycle',
} as const;

/**
 * Error code constants
 */
export const lifecycleManagerErrCodes = {
  InvalidId: 'InvalidId',
  InvalidManifest: 'InvalidManifest',
  InvalidEntryPoint: 'InvalidEntryPoint',
  InvalidStateTransition: 'InvalidStateTransition',
  HookTimeout: 'HookTimeout',
  NotAttached: 'NotAttached',
  ComponentFailure: 'ComponentFailure',
} as const;
