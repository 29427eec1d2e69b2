export * from './errors';
export {
  PipelineContext,
  LAST_ERROR_PROPERTY,
  CANCELLED_AT_PROPERTY,
} from './pipeline-context';
export type { PipelineContextOptions } from './pipeline-context';
export { executeWithErrorHandler } from './behavior';
export type {
  Behavior,
  BehaviorErrorHandler,
  BehaviorFunction,
  Constraint,
  Next,
} from './behavior';
export {
  conditional,
  fromFunction,
  passThrough,
  sequence,
  timeoutBehavior,
  withErrorHandling,
} from './behaviors';
export { createContribution, DEFAULT_PRIORITY } from './contribution';
export type { BehaviorContribution, ContributionInput } from './contribution';
export { BehaviorChain, buildChain } from './behavior-chain';
export type {
  BuildChainOptions,
  ChainRunResult,
  ChainStep,
  ChainStepDescription,
  Terminal,
} from './behavior-chain';
export { ActiveChain } from './active-chain';
export type {
  ActiveChainEventMap,
  ActiveChainOptions,
  ChainRunOptions,
} from './active-chain';
