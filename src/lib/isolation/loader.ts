import type { LoadBoundary } from './load-boundary';

export interface LoadedModule {
  readonly moduleName: string;
  readonly source: 'shared-core' | 'private';
  /** Set for private modules: where the locator found it */
  readonly resolvedPath?: string;
  readonly exports: unknown;
}

/**
 * Given a module name and a boundary, return the module's exports or fail.
 *
 * Implementations must consult `boundary.resolve()` first and reject with the
 * returned `RestrictedModuleError` when it refuses the module; failures to
 * produce an accepted module reject with `ModuleLoadError`.
 */
export interface Loader {
  load(moduleName: string, boundary: LoadBoundary): Promise<LoadedModule>;
  /** Drop whatever the loader keeps for a boundary that is going away */
  release?(boundary: LoadBoundary): void;
}
