export { ComponentRuntime } from './component-runtime';
export type { ComponentRuntimeOptions } from './component-runtime';
