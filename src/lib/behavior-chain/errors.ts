/**
 * Typed failure a chain run reports when its deadline passes before the
 * chain completes. The in-flight execution is cancelled through the context.
 */
export class TimeoutFailure extends Error {
  public errPrefix = 'BehaviorChainErr';
  public errType = 'Chain';
  public errCode = 'Timeout';
  public additionalInfo: {
    contextId: string;
    timeoutMS: number;
    elapsedMS: number;
  };

  constructor(additionalInfo: {
    contextId: string;
    timeoutMS: number;
    elapsedMS: number;
  }) {
    super(`Chain execution timed out after ${additionalInfo.timeoutMS}ms`);
    this.name = 'TimeoutFailure';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Typed failure a chain run reports when its context was cancelled
 */
export class CancelledFailure extends Error {
  public errPrefix = 'BehaviorChainErr';
  public errType = 'Chain';
  public errCode = 'Cancelled';
  public additionalInfo: { contextId: string; reason?: string };

  constructor(additionalInfo: { contextId: string; reason?: string }) {
    super(
      additionalInfo.reason
        ? `Chain execution cancelled: ${additionalInfo.reason}`
        : 'Chain execution cancelled',
    );
    this.name = 'CancelledFailure';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a behavior calls `next()` more than once in one run
 */
export class NextCalledMultipleTimesError extends Error {
  public errPrefix = 'BehaviorChainErr';
  public errType = 'Chain';
  public errCode = 'NextCalledMultipleTimes';
  public additionalInfo: { contributionId: string };

  constructor(additionalInfo: { contributionId: string }) {
    super(
      `Behavior "${additionalInfo.contributionId}" called next() multiple times`,
    );
    this.name = 'NextCalledMultipleTimesError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when two contributions in one chain share an id
 */
export class DuplicateContributionError extends Error {
  public errPrefix = 'BehaviorChainErr';
  public errType = 'Contribution';
  public errCode = 'DuplicateContribution';
  public additionalInfo: { contributionId: string; owner: string; existingOwner: string };

  constructor(additionalInfo: {
    contributionId: string;
    owner: string;
    existingOwner: string;
  }) {
    super(
      `Contribution "${additionalInfo.contributionId}" from "${additionalInfo.owner}" is already contributed by "${additionalInfo.existingOwner}"`,
    );
    this.name = 'DuplicateContributionError';
    this.additionalInfo = additionalInfo;
  }
}

export type ChainFailure = TimeoutFailure | CancelledFailure;

export function isChainFailure(error: unknown): error is ChainFailure {
  return error instanceof TimeoutFailure || error instanceof CancelledFailure;
}

export const behaviorChainErrPrefix = 'BehaviorChainErr';

export const behaviorChainErrTypes = {
  Chain: 'Chain',
  Contribution: 'Contribution',
} as const;

export const behaviorChainErrCodes = {
  Timeout: 'Timeout',
  Cancelled: 'Cancelled',
  NextCalledMultipleTimes: 'NextCalledMultipleTimes',
  DuplicateContribution: 'DuplicateContribution',
} as const;
