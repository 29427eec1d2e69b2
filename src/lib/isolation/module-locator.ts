import { existsSync, readFileSync, statSync } from 'node:fs';
import { isAbsolute, join, relative, resolve } from 'node:path';
import { isRecord } from '../type-guards';

/**
 * Answers "can this module be resolved from that private location, and where
 * is it?". The boundary only needs the yes/no; loaders use the returned path.
 */
export interface PrivateModuleLocator {
  locate(privateLocation: string, moduleName: string): string | undefined;
}

const FILE_EXTENSIONS = ['.js', '.mjs', '.cjs'];

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

function readPackageEntry(packageDir: string): string | undefined {
  const manifestPath = join(packageDir, 'package.json');

  if (!isFile(manifestPath)) {
    return undefined;
  }

  let manifest: unknown;
  try {
    manifest = JSON.parse(readFileSync(manifestPath, 'utf8'));
  } catch {
    return undefined;
  }

  const main =
    isRecord(manifest) && typeof manifest['main'] === 'string'
      ? manifest['main']
      : 'index.js';
  const entry = join(packageDir, main);

  return isFile(entry) ? entry : undefined;
}

/**
 * Looks for a module inside a component's private directory:
 *
 * 1. `<location>/node_modules/<name>` (package.json `main`, or index.js)
 * 2. `<location>/<name>` with a .js, .mjs or .cjs extension (or as given)
 * 3. `<location>/<name>/index.js`
 *
 * Names that would escape the directory (`../x`, absolute paths) never match.
 */
export class FileSystemModuleLocator implements PrivateModuleLocator {
  public locate(privateLocation: string, moduleName: string): string | undefined {
    if (isAbsolute(moduleName)) {
      return undefined;
    }

    const root = resolve(privateLocation);
    const inside = (path: string): boolean => {
      const rel = relative(root, path);
      return rel.length > 0 && !rel.startsWith('..') && !isAbsolute(rel);
    };

    const packageDir = join(root, 'node_modules', moduleName);
    if (inside(packageDir)) {
      const entry = readPackageEntry(packageDir);
      if (entry) {
        return entry;
      }
    }

    const base = join(root, moduleName);
    if (!inside(base)) {
      return undefined;
    }

    if (FILE_EXTENSIONS.some((ext) => base.endsWith(ext)) && isFile(base)) {
      return base;
    }

    for (const ext of FILE_EXTENSIONS) {
      if (isFile(base + ext)) {
        return base + ext;
      }
    }

    const index = join(base, 'index.js');
    return isFile(index) ? index : undefined;
  }
}

/**
 * In-memory locator for hosts that compile components in: each private
 * location maps module names to whatever key the loader understands.
 */
export class StaticModuleLocator implements PrivateModuleLocator {
  private readonly entries = new Map<string, Map<string, string>>();

  constructor(entries: Record<string, Record<string, string>> = {}) {
    for (const [location, modules] of Object.entries(entries)) {
      for (const [moduleName, target] of Object.entries(modules)) {
        this.add(location, moduleName, target);
      }
    }
  }

  public add(privateLocation: string, moduleName: string, target = moduleName): void {
    let modules = this.entries.get(privateLocation);

    if (!modules) {
      modules = new Map();
      this.entries.set(privateLocation, modules);
    }

    modules.set(moduleName, target);
  }

  public remove(privateLocation: string, moduleName: string): boolean {
    return this.entries.get(privateLocation)?.delete(moduleName) ?? false;
  }

  public locate(privateLocation: string, moduleName: string): string | undefined {
    return this.entries.get(privateLocation)?.get(moduleName);
  }
}
