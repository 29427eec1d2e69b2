/**
 * Error thrown or returned when a component depends on an id that is not part
 * of the set being resolved
 */
export class UnknownDependencyError extends Error {
  public errPrefix = 'DependencyResolverErr';
  public errType = 'Dependency';
  public errCode = 'UnknownDependency';
  public additionalInfo: { id: string; dependency: string };

  constructor(additionalInfo: { id: string; dependency: string }) {
    super(
      `Component "${additionalInfo.id}" depends on "${additionalInfo.dependency}", which is not part of the component set.`,
    );
    this.name = 'UnknownDependencyError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error returned when the dependency graph contains a cycle
 *
 * `cycle` lists the members in walk order: D depends on E, E depends on D
 * gives `['D', 'E']`.
 */
export class CyclicDependencyError extends Error {
  public errPrefix = 'DependencyResolverErr';
  public errType = 'Dependency';
  public errCode = 'CyclicDependency';
  public additionalInfo: { cycle: string[] };

  constructor(additionalInfo: { cycle: string[] }) {
    super(
      `Circular dependency detected: ${additionalInfo.cycle.join(' -> ')} -> ${additionalInfo.cycle[0]}`,
    );
    this.name = 'CyclicDependencyError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * A component left out of the start order because something it (transitively)
 * depends on was left out
 */
export class ExcludedDependencyError extends Error {
  public errPrefix = 'DependencyResolverErr';
  public errType = 'Dependency';
  public errCode = 'DependencyExcluded';
  public additionalInfo: { id: string; dependency: string };

  constructor(additionalInfo: { id: string; dependency: string }) {
    super(
      `Component "${additionalInfo.id}" cannot start because its dependency "${additionalInfo.dependency}" could not be resolved.`,
    );
    this.name = 'ExcludedDependencyError';
    this.additionalInfo = additionalInfo;
  }
}

export type DependencyResolutionError =
  | UnknownDependencyError
  | CyclicDependencyError
  | ExcludedDependencyError;

export const dependencyResolverErrPrefix = 'DependencyResolverErr';

export const dependencyResolverErrTypes = {
  Dependency: 'Dependency',
} as const;

export const dependencyResolverErrCodes = {
  UnknownDependency: 'UnknownDependency',
  CyclicDependency: 'CyclicDependency',
  DependencyExcluded: 'DependencyExcluded',
} as const;
