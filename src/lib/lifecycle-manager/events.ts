import type { ComponentError } from './component-error';
import type { ComponentState } from './component-state';

export type LifecycleManagerEventMap = {
  /** Added to the registry (the component is running) */
  'component:registered': { id: string; version: string };
  'component:state-changed': {
    id: string;
    from: ComponentState;
    to: ComponentState;
  };
  'component:started': { id: string; durationMS: number };
  'component:stopped': { id: string };
  'component:failed': { id: string; error: ComponentError };
  'component:reloading': { id: string };
  'component:reloaded': {
    id: string;
    previousBoundaryId: string;
    boundaryId: string;
    durationMS: number;
  };
  'component:reload-failed': { id: string; error: ComponentError };
  'component:restarted': { id: string; boundaryId: string; durationMS: number };
  'component:removed': { id: string };
  'lifecycle:started': {
    startOrder: string[];
    started: string[];
    failed: string[];
    durationMS: number;
  };
  'lifecycle:stopped': {
    stopOrder: string[];
    stopped: string[];
    failed: string[];
    durationMS: number;
  };
};
