export { ComponentRegistry } from './component-registry';
export type { ComponentDescriptor } from './component-registry';
export * from './errors';
