import { EventEmitterProtected } from '../event-emitter';
import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import { assertTimeoutMS } from '../type-guards';
import { BehaviorChain } from './behavior-chain';
import type { ChainRunResult, Terminal } from './behavior-chain';
import type { BehaviorContribution } from './contribution';
import { DuplicateContributionError } from './errors';
import { PipelineContext } from './pipeline-context';

export type ActiveChainEventMap = {
  'chain:rebuilt': {
    version: number;
    reason: 'contributions-set' | 'contributions-removed' | 'enabled-changed';
    owner?: string;
    stepIds: string[];
  };
};

export interface ActiveChainOptions<TMessage = unknown> {
  logger: Logger;
  terminal?: Terminal<TMessage>;
  /** Deadline applied to every `run()` that does not pass its own */
  defaultTimeoutMS?: number;
}

export interface ChainRunOptions {
  timeoutMS?: number;
  signal?: AbortSignal;
  properties?: Record<string, unknown>;
}

/**
 * Holds the current chain snapshot and rebuilds it when contributions change.
 *
 * Contributions are grouped by owner (a component id) so a component's whole
 * set is spliced in or out in one step. Every change builds a complete new
 * `BehaviorChain` and swaps the reference; a request that already took
 * `current()` keeps running against the snapshot it took.
 *
 * @example
 * ```typescript
 * const chain = new ActiveChain({ logger, defaultTimeoutMS: 5000 });
 * chain.setContributions('auth', [checkToken]);
 * const result = await chain.run({ path: '/orders' });
 * ```
 */
export class ActiveChain<TMessage = unknown> extends EventEmitterProtected<ActiveChainEventMap> {
  private readonly logger: LoggerService;
  private readonly terminal?: Terminal<TMessage>;
  private readonly defaultTimeoutMS?: number;
  private readonly contributionsByOwner = new Map<
    string,
    readonly BehaviorContribution<TMessage>[]
  >();
  private readonly ownerByContributionId = new Map<string, string>();
  private readonly enabledOverrides = new Map<string, boolean>();
  private snapshot: BehaviorChain<TMessage>;
  private _version = 0;

  constructor(options: ActiveChainOptions<TMessage>) {
    const logger = options.logger.service('behavior-chain');

    super({
      onListenerError: (error, callbackName) => {
        logger.error('Event handler error', {
          params: { callbackName, error },
        });
      },
    });

    if (options.defaultTimeoutMS !== undefined) {
      assertTimeoutMS('defaultTimeoutMS', options.defaultTimeoutMS);
    }

    this.logger = logger;
    this.terminal = options.terminal;
    this.defaultTimeoutMS = options.defaultTimeoutMS;
    this.snapshot = BehaviorChain.build<TMessage>([], {
      terminal: this.terminal,
      version: this._version,
    });
  }

  public get version(): number {
    return this._version;
  }

  /**
   * The snapshot new requests run against
   */
  public current(): BehaviorChain<TMessage> {
    return this.snapshot;
  }

  public owners(): string[] {
    return [...this.contributionsByOwner.keys()];
  }

  public contributionsOf(owner: string): BehaviorContribution<TMessage>[] {
    return [...(this.contributionsByOwner.get(owner) ?? [])];
  }

  public ownerOf(contributionId: string): string | undefined {
    return this.ownerByContributionId.get(contributionId);
  }

  /**
   * Replaces everything `owner` contributes in one swap.
   *
   * @throws {DuplicateContributionError} when an id is already used by another
   * owner or twice in `contributions`; the chain is left unchanged
   */
  public setContributions(
    owner: string,
    contributions: Iterable<BehaviorContribution<TMessage>>,
  ): void {
    const list = [...contributions];
    const seen = new Set<string>();

    for (const contribution of list) {
      const existingOwner = this.ownerByContributionId.get(contribution.id);

      if (
        seen.has(contribution.id) ||
        (existingOwner !== undefined && existingOwner !== owner)
      ) {
        throw new DuplicateContributionError({
          contributionId: contribution.id,
          owner,
          existingOwner: existingOwner ?? owner,
        });
      }

      seen.add(contribution.id);
    }

    this.forgetOwner(owner);
    this.contributionsByOwner.set(owner, Object.freeze(list));

    for (const contribution of list) {
      this.ownerByContributionId.set(contribution.id, owner);
    }

    this.rebuild('contributions-set', owner);
  }

  /**
   * Takes out everything `owner` contributed in one swap. Returns false when
   * the owner had nothing in the chain.
   */
  public removeContributions(owner: string): boolean {
    if (!this.contributionsByOwner.has(owner)) {
      return false;
    }

    this.forgetOwner(owner);
    this.rebuild('contributions-removed', owner);
    return true;
  }

  /**
   * Overrides a contribution's enabled flag for as long as it stays in the
   * chain. Returns false for unknown ids.
   */
  public setEnabled(contributionId: string, enabled: boolean): boolean {
    const owner = this.ownerByContributionId.get(contributionId);

    if (owner === undefined) {
      return false;
    }

    this.enabledOverrides.set(contributionId, enabled);
    this.rebuild('enabled-changed', owner);
    return true;
  }

  public isEnabled(contributionId: string): boolean {
    return this.current().ids.includes(contributionId);
  }

  /**
   * Runs `message` through the current snapshot with a fresh context
   */
  public async run(
    message: TMessage,
    options: ChainRunOptions = {},
  ): Promise<ChainRunResult> {
    const chain = this.snapshot;
    const timeoutMS = options.timeoutMS ?? this.defaultTimeoutMS;
    const context = new PipelineContext<TMessage>({
      message,
      properties: options.properties,
      signal: options.signal,
    });

    try {
      const result = await (
        timeoutMS !== undefined ? chain.withTimeout(timeoutMS) : chain
      ).run(context);

      if (!result.success) {
        this.logger.entity(context.contextId).warn('Chain run failed: {{code}}', {
          params: { code: result.code, version: chain.version },
        });
      }

      return result;
    } finally {
      context.dispose();
    }
  }

  private forgetOwner(owner: string): void {
    for (const contribution of this.contributionsByOwner.get(owner) ?? []) {
      this.ownerByContributionId.delete(contribution.id);
      this.enabledOverrides.delete(contribution.id);
    }

    this.contributionsByOwner.delete(owner);
  }

  private rebuild(
    reason: ActiveChainEventMap['chain:rebuilt']['reason'],
    owner: string,
  ): void {
    const effective: BehaviorContribution<TMessage>[] = [];

    for (const list of this.contributionsByOwner.values()) {
      for (const contribution of list) {
        const enabled = this.enabledOverrides.get(contribution.id);
        effective.push(
          enabled === undefined || enabled === contribution.enabled
            ? contribution
            : { ...contribution, enabled },
        );
      }
    }

    this._version++;
    this.snapshot = BehaviorChain.build(effective, {
      terminal: this.terminal,
      version: this._version,
    });

    const stepIds = this.snapshot.ids;

    this.logger.debug('Chain rebuilt (v{{version}}, {{count}} steps)', {
      params: { version: this._version, count: stepIds.length, reason, owner },
    });

    this.emit('chain:rebuilt', {
      version: this._version,
      reason,
      owner,
      stepIds,
    });
  }
}
