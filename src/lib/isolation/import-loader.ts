import { pathToFileURL } from 'node:url';
import type { LoadBoundary } from './load-boundary';
import type { LoadedModule, Loader } from './loader';
import { ModuleLoadError } from './errors';

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface ImportLoaderOptions {
  /** Defaults to native dynamic `import()` */
  importModule?: ModuleImporter;
}

const nativeImport: ModuleImporter = (specifier) => import(specifier);

/**
 * Loads modules with dynamic `import()`.
 *
 * Private modules are imported from their file URL with the boundary id as a
 * query string, so a new boundary (hot reload) evaluates a fresh module
 * instance. Shared-core modules are imported by name and come from the host's
 * module cache. Node.js cannot unload ES modules; `release` only forgets the
 * boundary, the old instance is collected once nothing references it.
 */
export class ImportLoader implements Loader {
  private readonly importModule: ModuleImporter;
  private readonly specifiersByBoundary = new Map<string, string[]>();

  constructor(options: ImportLoaderOptions = {}) {
    this.importModule = options.importModule ?? nativeImport;
  }

  public async load(
    moduleName: string,
    boundary: LoadBoundary,
  ): Promise<LoadedModule> {
    const resolution = boundary.resolve(moduleName);

    if (resolution.source === 'rejected') {
      throw resolution.error;
    }

    const specifier =
      resolution.source === 'private'
        ? `${pathToFileURL(resolution.resolvedPath).href}?boundary=${boundary.id}`
        : moduleName;

    let exports: unknown;
    try {
      exports = await this.importModule(specifier);
    } catch (error) {
      throw new ModuleLoadError(
        {
          componentId: boundary.componentId,
          moduleName,
          source: resolution.source,
          specifier,
        },
        { cause: error },
      );
    }

    const specifiers = this.specifiersByBoundary.get(boundary.id) ?? [];
    specifiers.push(specifier);
    this.specifiersByBoundary.set(boundary.id, specifiers);

    return resolution.source === 'private'
      ? {
          moduleName,
          source: 'private',
          resolvedPath: resolution.resolvedPath,
          exports,
        }
      : { moduleName, source: 'shared-core', exports };
  }

  public importedSpecifiers(boundary: LoadBoundary): string[] {
    return [...(this.specifiersByBoundary.get(boundary.id) ?? [])];
  }

  public release(boundary: LoadBoundary): void {
    this.specifiersByBoundary.delete(boundary.id);
  }
}
