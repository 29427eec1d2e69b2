import { generateID } from '../id-helpers';
import { ms } from '../unix-time-helpers';
import { BoundaryReleasedError, RestrictedModuleError } from './errors';
import type { IsolationRequirements } from './isolation-requirements';
import type { PrivateModuleLocator } from './module-locator';
import { defaultSharedCore } from './shared-core';
import type { SharedCoreModules } from './shared-core';

export type ModuleSource = 'shared-core' | 'private' | 'rejected';

export type ModuleResolution =
  | { source: 'shared-core'; moduleName: string }
  | { source: 'private'; moduleName: string; resolvedPath: string }
  | { source: 'rejected'; moduleName: string; error: RestrictedModuleError };

export type AcceptedModuleResolution = Exclude<
  ModuleResolution,
  { source: 'rejected' }
>;

export interface LoadBoundaryOptions {
  componentId: string;
  requirements: IsolationRequirements;
  /** The component's own module directory; without it nothing resolves as private */
  privateLocation?: string;
  sharedCore?: SharedCoreModules;
  locator?: PrivateModuleLocator;
}

/**
 * Per component instance loading policy. Decides where a module comes from,
 * never how it is loaded.
 *
 * Resolution order:
 * 1. shared-core module -> `shared-core`, whatever the level
 * 2. level `none` -> `shared-core`
 * 3. blocked -> `rejected`
 * 4. allow-list set and module not on it -> `rejected`
 * 5. level `standard` and found in the private location -> `private`
 * 6. otherwise -> `shared-core`
 */
export class LoadBoundary {
  public readonly id = generateID('uuid7');
  public readonly createdAt = ms();
  public readonly componentId: string;
  public readonly requirements: IsolationRequirements;
  public readonly privateLocation?: string;

  private readonly sharedCore: SharedCoreModules;
  private readonly locator?: PrivateModuleLocator;
  private _released = false;

  constructor(options: LoadBoundaryOptions) {
    this.componentId = options.componentId;
    this.requirements = options.requirements;
    this.privateLocation = options.privateLocation;
    this.sharedCore = options.sharedCore ?? defaultSharedCore;
    this.locator = options.locator;
  }

  public get released(): boolean {
    return this._released;
  }

  public resolve(moduleName: string): ModuleResolution {
    this.assertActive();

    const { level, allowedModules, blockedModules } = this.requirements;

    if (this.sharedCore.has(moduleName) || level === 'none') {
      return { source: 'shared-core', moduleName };
    }

    if (blockedModules.has(moduleName)) {
      return this.reject(moduleName, 'blocked');
    }

    if (allowedModules.size > 0 && !allowedModules.has(moduleName)) {
      return this.reject(moduleName, 'not_allowed');
    }

    if (level === 'standard' && this.privateLocation !== undefined) {
      const resolvedPath = this.locator?.locate(this.privateLocation, moduleName);

      if (resolvedPath !== undefined) {
        return { source: 'private', moduleName, resolvedPath };
      }
    }

    return { source: 'shared-core', moduleName };
  }

  /**
   * Resolves every name; stops at the first rejection
   */
  public resolveAll(
    moduleNames: Iterable<string>,
  ):
    | { success: true; resolutions: AcceptedModuleResolution[] }
    | { success: false; rejected: Extract<ModuleResolution, { source: 'rejected' }> } {
    const resolutions: AcceptedModuleResolution[] = [];

    for (const moduleName of moduleNames) {
      const resolution = this.resolve(moduleName);

      if (resolution.source === 'rejected') {
        return { success: false, rejected: resolution };
      }

      resolutions.push(resolution);
    }

    return { success: true, resolutions };
  }

  /**
   * Marks the boundary dead. Returns false when it was already released.
   */
  public release(): boolean {
    if (this._released) {
      return false;
    }

    this._released = true;
    return true;
  }

  private reject(
    moduleName: string,
    reason: 'blocked' | 'not_allowed',
  ): ModuleResolution {
    return {
      source: 'rejected',
      moduleName,
      error: new RestrictedModuleError({
        componentId: this.componentId,
        moduleName,
        reason,
      }),
    };
  }

  private assertActive(): void {
    if (this._released) {
      throw new BoundaryReleasedError({
        componentId: this.componentId,
        boundaryId: this.id,
      });
    }
  }
}
