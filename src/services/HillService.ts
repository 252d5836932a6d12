/**
 * Hill Service
 *
 * Per-event pipeline for every tracked guild: takes the scope lock, runs the
 * reconciliation engine against the scope's state, and republishes the
 * leaderboard whenever the state changed.
 */

import type { ChannelMessage } from '../packages/core/ports/index.js';
import { logger } from '../utils/logger.js';
import { ChampionshipState } from './ChampionshipState.js';
import type { LeaderboardPublisher } from './LeaderboardPublisher.js';
import {
  type DeletedMessage,
  type ReconcileResult,
  type ReconciliationEngine,
  changesState,
} from './ReconciliationEngine.js';
import { ScopeRegistry } from './ScopeRegistry.js';

/**
 * Everything owned by one guild
 */
export interface HillScope {
  guildId: string;
  resultsChannelId: string;
  state: ChampionshipState;
  engine: ReconciliationEngine;
  publisher: LeaderboardPublisher;
}

export interface AttachScopeParams {
  guildId: string;
  resultsChannelId: string;
  engine: ReconciliationEngine;
  publisher: LeaderboardPublisher;
}

export class HillService {
  private readonly registry = new ScopeRegistry<HillScope>();

  /**
   * Recover a guild's state from its leaderboard channel and start tracking it.
   * Re-attaching a tracked guild waits for its queued tasks before swapping state.
   */
  async attachScope(params: AttachScopeParams, now: Date = new Date()): Promise<HillScope> {
    if (this.registry.has(params.guildId)) {
      return this.registry.run(params.guildId, async () => {
        const scope = await this.recoverScope(params);
        await this.expireIfIdle(scope, now);
        return scope;
      });
    }

    const scope = await this.recoverScope(params);
    await this.registry.run(params.guildId, (current) => this.expireIfIdle(current, now));
    return scope;
  }

  getScope(guildId: string): HillScope | undefined {
    return this.registry.get(guildId);
  }

  /**
   * Whether a channel is the results channel of a tracked guild
   */
  isResultsChannel(guildId: string, channelId: string): boolean {
    return this.registry.get(guildId)?.resultsChannelId === channelId;
  }

  async handleMessage(guildId: string, message: ChannelMessage, now: Date = new Date()): Promise<ReconcileResult> {
    return this.registry.run(guildId, async (scope) => {
      const result = await scope.engine.handleMessage(scope.state, message, scope.resultsChannelId, now);
      await this.publishIfChanged(scope, result);
      return result;
    });
  }

  async handleDeletion(guildId: string, deleted: DeletedMessage): Promise<ReconcileResult> {
    return this.registry.run(guildId, async (scope) => {
      const result = await scope.engine.handleDeletion(scope.state, deleted, scope.resultsChannelId);
      await this.publishIfChanged(scope, result);
      return result;
    });
  }

  /**
   * Expire idle titles in every tracked guild. Returns the guilds that expired.
   */
  async sweepTimeouts(now: Date = new Date()): Promise<string[]> {
    const expired: string[] = [];
    for (const guildId of this.registry.scopeIds()) {
      const didExpire = await this.registry.run(guildId, (scope) => this.expireIfIdle(scope, now));
      if (didExpire) expired.push(guildId);
    }
    return expired;
  }

  private async recoverScope(params: AttachScopeParams): Promise<HillScope> {
    const recovered = await params.publisher.recover();
    const scope: HillScope = { ...params, state: recovered ?? new ChampionshipState() };
    this.registry.register(params.guildId, scope);

    logger.info(
      { guildId: params.guildId, recovered: recovered !== null, holderId: scope.state.holderId },
      'Tracking guild'
    );
    return scope;
  }

  private async expireIfIdle(scope: HillScope, now: Date): Promise<boolean> {
    const expired = await scope.engine.timeoutSweep(scope.state, now);
    if (expired) {
      await scope.publisher.publish(scope.state);
    }
    return expired;
  }

  private async publishIfChanged(scope: HillScope, result: ReconcileResult): Promise<void> {
    logger.debug({ guildId: scope.guildId, status: result.status, expired: result.expired }, 'Reconciled message');
    if (changesState(result)) {
      await scope.publisher.publish(scope.state);
    }
  }
}
