// module entry point

// Runtime facade
export * from './lib/runtime';

// Lifecycle
export * from './lib/lifecycle-manager';

// Building blocks
export * from './lib/dependency-resolver';
export * from './lib/isolation';
export * from './lib/component-registry';
export * from './lib/behavior-chain';

// Logging
export * from './lib/logger';

// Event handling
export { EventEmitter, EventEmitterProtected } from './lib/event-emitter';
export type { EventCallback, EventEmitterOptions, EventMap } from './lib/event-emitter';

// Callback handling
export { safeHandleCallback } from './lib/safe-handle-callback';

// Helpers
export { generateID, IDENTIFIER_TYPES } from './lib/id-helpers';
export type { IdentifierType } from './lib/id-helpers';
export { errorToString, toError } from './lib/error-to-string';
export { sleep } from './lib/sleep';
export { ms, msUntil } from './lib/unix-time-helpers';
