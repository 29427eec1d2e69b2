import { InvalidStateTransitionError } from './errors';

/**
 * Lifecycle states of a managed component.
 *
 * Main path: registered -> resolved -> initializing -> initialized ->
 * starting -> running -> stopping -> stopped. `failed` is reachable from
 * every transition and ends that attempt; `unloaded` follows `stopped` on hot
 * reload and permanent removal.
 */
export type ComponentState =
  | 'registered'
  | 'resolved'
  | 'initializing'
  | 'initialized'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'failed'
  | 'unloaded';

export const COMPONENT_STATES: readonly ComponentState[] = [
  'registered',
  'resolved',
  'initializing',
  'initialized',
  'starting',
  'running',
  'stopping',
  'stopped',
  'failed',
  'unloaded',
];

const TRANSITIONS: Record<ComponentState, readonly ComponentState[]> = {
  registered: ['resolved', 'failed'],
  resolved: ['initializing', 'failed'],
  initializing: ['initialized', 'failed'],
  initialized: ['starting', 'failed'],
  starting: ['running', 'failed'],
  running: ['stopping', 'failed'],
  stopping: ['stopped', 'failed'],
  // resolved: restart after a stop
  stopped: ['unloaded', 'resolved', 'failed'],
  // a new attempt starts over from registered
  failed: ['registered'],
  // reload re-resolves
  unloaded: ['resolved'],
};

export function canTransition(from: ComponentState, to: ComponentState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function allowedTransitions(from: ComponentState): ComponentState[] {
  return [...TRANSITIONS[from]];
}

/**
 * @throws {InvalidStateTransitionError}
 */
export function assertTransition(
  componentId: string,
  from: ComponentState,
  to: ComponentState,
): void {
  if (!canTransition(from, to)) {
    throw new InvalidStateTransitionError({ componentId, from, to });
  }
}

/**
 * States in which a component holds a boundary and possibly loaded code
 */
export function isActiveState(state: ComponentState): boolean {
  return (
    state === 'initializing' ||
    state === 'initialized' ||
    state === 'starting' ||
    state === 'running' ||
    state === 'stopping'
  );
}
