export * from './errors';
export {
  ISOLATION_LEVELS,
  createIsolationRequirements,
  isIsolationLevel,
  noIsolation,
  standardIsolation,
  strictIsolation,
} from './isolation-requirements';
export type {
  IsolationLevel,
  IsolationRequirements,
  IsolationRequirementsInput,
} from './isolation-requirements';
export {
  RUNTIME_PACKAGE_NAME,
  SharedCoreModules,
  defaultSharedCore,
} from './shared-core';
export type { SharedCoreOptions } from './shared-core';
export { FileSystemModuleLocator, StaticModuleLocator } from './module-locator';
export type { PrivateModuleLocator } from './module-locator';
export { LoadBoundary } from './load-boundary';
export type {
  AcceptedModuleResolution,
  LoadBoundaryOptions,
  ModuleResolution,
  ModuleSource,
} from './load-boundary';
export type { LoadedModule, Loader } from './loader';
export { RegistryLoader } from './registry-loader';
export type { ModuleFactory } from './registry-loader';
export { ImportLoader } from './import-loader';
export type { ImportLoaderOptions, ModuleImporter } from './import-loader';
