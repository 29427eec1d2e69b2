import { isBuiltin } from 'node:module';

/**
 * Package name components import the runtime API from. It is always shared so
 * every component sees the same classes (instanceof checks keep working).
 */
export const RUNTIME_PACKAGE_NAME = 'component-runtime';

export interface SharedCoreOptions {
  /** Extra trusted host modules, matched by name or `name/sub/path` */
  modules?: Iterable<string>;
  /** Treat Node.js built-ins (`fs`, `node:fs`, ...) as shared. Default true */
  includeNodeBuiltins?: boolean;
}

/**
 * The fixed, process-wide set of modules that always load from the host,
 * whatever a component's isolation level says.
 */
export class SharedCoreModules {
  private readonly names: ReadonlySet<string>;
  private readonly includeNodeBuiltins: boolean;

  constructor(options: SharedCoreOptions = {}) {
    this.names = new Set([RUNTIME_PACKAGE_NAME, ...(options.modules ?? [])]);
    this.includeNodeBuiltins = options.includeNodeBuiltins ?? true;
  }

  public has(moduleName: string): boolean {
    if (this.includeNodeBuiltins && isBuiltin(moduleName)) {
      return true;
    }

    for (const name of this.names) {
      if (moduleName === name || moduleName.startsWith(name + '/')) {
        return true;
      }
    }

    return false;
  }

  /**
   * Explicitly listed names, sorted (built-ins are matched, not listed)
   */
  public list(): string[] {
    return [...this.names].sort();
  }
}

export const defaultSharedCore = new SharedCoreModules();
