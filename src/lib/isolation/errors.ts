/**
 * Why a module was refused by a component's load boundary
 * - `blocked`: listed in the component's blocked modules
 * - `not_allowed`: an allow-list is set and the module is not on it
 */
export type RestrictionReason = 'blocked' | 'not_allowed';

/**
 * Error returned when a load boundary refuses a module. Prevents the
 * component from starting.
 */
export class RestrictedModuleError extends Error {
  public errPrefix = 'IsolationErr';
  public errType = 'Isolation';
  public errCode = 'RestrictedModule';
  public additionalInfo: {
    componentId: string;
    moduleName: string;
    reason: RestrictionReason;
  };

  constructor(additionalInfo: {
    componentId: string;
    moduleName: string;
    reason: RestrictionReason;
  }) {
    super(
      additionalInfo.reason === 'blocked'
        ? `Module "${additionalInfo.moduleName}" is blocked for component "${additionalInfo.componentId}".`
        : `Module "${additionalInfo.moduleName}" is not in the allowed modules of component "${additionalInfo.componentId}".`,
    );
    this.name = 'RestrictedModuleError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a loader cannot produce a module the boundary accepted
 */
export class ModuleLoadError extends Error {
  public errPrefix = 'IsolationErr';
  public errType = 'Loader';
  public errCode = 'LoadFailed';
  public additionalInfo: {
    componentId: string;
    moduleName: string;
    source: 'shared-core' | 'private';
    specifier?: string;
  };

  constructor(
    additionalInfo: {
      componentId: string;
      moduleName: string;
      source: 'shared-core' | 'private';
      specifier?: string;
    },
    options?: { cause?: unknown },
  ) {
    super(
      `Failed to load module "${additionalInfo.moduleName}" (${additionalInfo.source}) for component "${additionalInfo.componentId}".`,
      options,
    );
    this.name = 'ModuleLoadError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a released boundary is used again (programmer error)
 */
export class BoundaryReleasedError extends Error {
  public errPrefix = 'IsolationErr';
  public errType = 'Isolation';
  public errCode = 'BoundaryReleased';
  public additionalInfo: { componentId: string; boundaryId: string };

  constructor(additionalInfo: { componentId: string; boundaryId: string }) {
    super(
      `Load boundary ${additionalInfo.boundaryId} of component "${additionalInfo.componentId}" has been released.`,
    );
    this.name = 'BoundaryReleasedError';
    this.additionalInfo = additionalInfo;
  }
}

export const isolationErrPrefix = 'IsolationErr';

export const isolationErrTypes = {
  Isolation: 'Isolation',
  Loader: 'Loader',
} as const;

export const isolationErrCodes = {
  RestrictedModule: 'RestrictedModule',
  LoadFailed: 'LoadFailed',
  BoundaryReleased: 'BoundaryReleased',
} as const;
