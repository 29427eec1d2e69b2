import type { LoadBoundary } from './load-boundary';
import type { LoadedModule, Loader } from './loader';
import { ModuleLoadError } from './errors';
import type { PrivateModuleLocator } from './module-locator';

/**
 * Produces a module's exports. Called on every load, so a reload under a new
 * boundary gets a fresh instance.
 */
export type ModuleFactory = () => unknown;

function privateKey(privateLocation: string, moduleName: string): string {
  return `${privateLocation}::${moduleName}`;
}

/**
 * Compiled-in registry of module factories, for hosts where components ship
 * inside the host bundle. Shared modules are keyed by name, private ones by
 * private location and name; `locator` exposes the private side to load
 * boundaries.
 *
 * @example
 * ```typescript
 * const loader = new RegistryLoader();
 * loader.definePrivate('components/billing', 'billing', () => ({ createComponent }));
 * const manager = new LifecycleManager({ logger, loader, locator: loader.locator });
 * ```
 */
export class RegistryLoader implements Loader {
  private readonly sharedModules = new Map<string, ModuleFactory>();
  private readonly privateModules = new Map<string, ModuleFactory>();
  private readonly loadedByBoundary = new Map<string, string[]>();

  public readonly locator: PrivateModuleLocator = {
    locate: (privateLocation, moduleName) => {
      const key = privateKey(privateLocation, moduleName);
      return this.privateModules.has(key) ? key : undefined;
    },
  };

  public defineShared(moduleName: string, factory: ModuleFactory): this {
    this.sharedModules.set(moduleName, factory);
    return this;
  }

  public definePrivate(
    privateLocation: string,
    moduleName: string,
    factory: ModuleFactory,
  ): this {
    this.privateModules.set(privateKey(privateLocation, moduleName), factory);
    return this;
  }

  public async load(
    moduleName: string,
    boundary: LoadBoundary,
  ): Promise<LoadedModule> {
    const resolution = boundary.resolve(moduleName);

    if (resolution.source === 'rejected') {
      throw resolution.error;
    }

    const factory =
      resolution.source === 'private'
        ? this.privateModules.get(resolution.resolvedPath)
        : this.sharedModules.get(moduleName);

    if (!factory) {
      throw new ModuleLoadError({
        componentId: boundary.componentId,
        moduleName,
        source: resolution.source,
      });
    }

    let exports: unknown;
    try {
      exports = await factory();
    } catch (error) {
      throw new ModuleLoadError(
        {
          componentId: boundary.componentId,
          moduleName,
          source: resolution.source,
        },
        { cause: error },
      );
    }

    const loaded = this.loadedByBoundary.get(boundary.id) ?? [];
    loaded.push(moduleName);
    this.loadedByBoundary.set(boundary.id, loaded);

    return resolution.source === 'private'
      ? {
          moduleName,
          source: 'private',
          resolvedPath: resolution.resolvedPath,
          exports,
        }
      : { moduleName, source: 'shared-core', exports };
  }

  /**
   * Module names loaded through a boundary that has not been released yet
   */
  public loadedModules(boundary: LoadBoundary): string[] {
    return [...(this.loadedByBoundary.get(boundary.id) ?? [])];
  }

  public release(boundary: LoadBoundary): void {
    this.loadedByBoundary.delete(boundary.id);
  }
}
