export { DependencyGraph, compareIds } from './dependency-graph';
export type {
  DependencyNode,
  DependencyGraphStatistics,
  UnknownReference,
} from './dependency-graph';
export { resolveStartOrder } from './resolver';
export type {
  ExcludedComponent,
  ExclusionReason,
  ResolutionPolicy,
  ResolutionResult,
  ResolveOptions,
} from './resolver';
export * from './errors';
