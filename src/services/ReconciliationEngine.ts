/**
 * Reconciliation Engine
 *
 * Turns channel events into title-state changes:
 * - new or edited messages are parsed and applied once per content version
 * - an edit that flips a recorded winner re-derives state from the recent
 *   window, or is ignored when the message is older than that window
 * - deleting a message that was part of the window re-derives state
 *
 * All methods expect the caller to hold the scope lock (see ScopeRegistry).
 * History is fetched before anything is mutated, so a failed fetch leaves
 * the state exactly as it was.
 */

import { createHash } from 'node:crypto';
import type {
  ChannelMessage,
  IMemberDirectory,
  IMessageHistory,
} from '../packages/core/ports/index.js';
import { logger } from '../utils/logger.js';
import {
  HistoryUnavailableError,
  describeError,
  withRetry,
  type RetryConfig,
} from '../utils/errors.js';
import { type ChampionshipState, buildResultKey } from './ChampionshipState.js';
import type { MarkerRoleSync } from './MarkerRoleSync.js';
import { type GameOutcome, parseResults, sortedPlayerPair } from './resultParser.js';
import type { TitleManager } from './TitleManager.js';

export type ReconcileStatus =
  | 'not_applicable'
  | 'duplicate'
  | 'applied'
  | 'recalculated'
  | 'ignored_too_old'
  | 'history_unavailable';

export interface ReconcileResult {
  status: ReconcileStatus;
  /** The title expired during the pre-check */
  expired: boolean;
}

/**
 * A deleted message. Content is null when the platform no longer has it.
 */
export interface DeletedMessage {
  id: string;
  content: string | null;
}

export interface ReconciliationEngineDeps {
  history: IMessageHistory;
  members: IMemberDirectory;
  titles: TitleManager;
  roles: MarkerRoleSync;
  recentWindow: number;
  retry?: Partial<RetryConfig>;
}

type Membership = 'present' | 'absent' | 'unknown';

/**
 * SHA-256 hex digest of a message's raw text
 */
export function fingerprint(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Whether a result should trigger a leaderboard refresh
 */
export function changesState(result: ReconcileResult): boolean {
  return result.expired || result.status === 'applied' || result.status === 'recalculated';
}

export class ReconciliationEngine {
  private readonly history: IMessageHistory;
  private readonly members: IMemberDirectory;
  private readonly titles: TitleManager;
  private readonly roles: MarkerRoleSync;
  private readonly recentWindow: number;
  private readonly retry: Partial<RetryConfig>;

  constructor(deps: ReconciliationEngineDeps) {
    this.history = deps.history;
    this.members = deps.members;
    this.titles = deps.titles;
    this.roles = deps.roles;
    this.recentWindow = deps.recentWindow;
    this.retry = deps.retry ?? {};
  }

  /**
   * Process a new or edited message from the results channel
   */
  async handleMessage(
    state: ChampionshipState,
    message: ChannelMessage,
    channelId: string,
    now: Date = new Date()
  ): Promise<ReconcileResult> {
    const expired = await this.timeoutSweep(state, now);

    const outcomes = parseResults(message.content);
    if (outcomes.length === 0) {
      return { status: 'not_applicable', expired };
    }

    const keyed = outcomes.map((outcome) => ({
      outcome,
      key: buildResultKey(message.id, sortedPlayerPair(outcome), message.createdAt),
    }));

    const winnerChanged = keyed.some(({ outcome, key }) => {
      const recorded = state.recordedWinner(key);
      return recorded !== undefined && recorded !== outcome.winnerId;
    });

    if (winnerChanged) {
      return { status: await this.reconcileChangedWinner(state, message.id, channelId), expired };
    }

    const digest = fingerprint(message.content);
    if (state.isMessageUnchanged(message.id, digest)) {
      logger.debug({ messageId: message.id }, 'Message already processed with same content');
      return { status: 'duplicate', expired };
    }

    for (const { outcome, key } of keyed) {
      await this.applyOne(state, outcome, message.createdAt, key, true);
    }
    state.recordMessage(message.id, digest);

    logger.info(
      { messageId: message.id, outcomes: outcomes.length, holderId: state.holderId, streak: state.currentStreak },
      'Applied results'
    );

    await this.prune(state, channelId);
    return { status: 'applied', expired };
  }

  /**
   * Process a deleted message from the results channel
   */
  async handleDeletion(
    state: ChampionshipState,
    deleted: DeletedMessage,
    channelId: string
  ): Promise<ReconcileResult> {
    if (deleted.content !== null && parseResults(deleted.content).length === 0) {
      return { status: 'not_applicable', expired: false };
    }

    if (!state.hasProcessedMessage(deleted.id)) {
      logger.debug({ messageId: deleted.id }, 'Deleted message outside the tracked window');
      return { status: 'not_applicable', expired: false };
    }

    logger.info({ messageId: deleted.id }, 'Tracked result deleted, recalculating');
    return { status: await this.recalculate(state, channelId), expired: false };
  }

  /**
   * Rebuild holder, streak and ledgers from the recent window of the channel
   */
  async recalculate(
    state: ChampionshipState,
    channelId: string
  ): Promise<'recalculated' | 'history_unavailable'> {
    let window: ChannelMessage[];
    try {
      window = await this.fetchWindow(channelId);
    } catch (error) {
      logger.error({ channelId, error: describeError(error) }, 'Recalculation aborted, state unchanged');
      return 'history_unavailable';
    }

    await this.replay(state, window);
    return 'recalculated';
  }

  /**
   * Expire an idle title and drop the holder's role. Returns true on expiry.
   */
  async timeoutSweep(state: ChampionshipState, now: Date = new Date()): Promise<boolean> {
    const check = this.titles.checkTimeout(state, now);
    if (!check.expired || check.previousHolderId === null) {
      return false;
    }

    logger.info({ previousHolderId: check.previousHolderId }, 'Title expired after inactivity');
    await this.roles.revoke(check.previousHolderId, 'Title expired after inactivity');
    return true;
  }

  private async reconcileChangedWinner(
    state: ChampionshipState,
    messageId: string,
    channelId: string
  ): Promise<ReconcileStatus> {
    let window: ChannelMessage[];
    try {
      window = await this.fetchWindow(channelId);
    } catch (error) {
      logger.error({ messageId, error: describeError(error) }, 'Cannot check edit recency, state unchanged');
      return 'history_unavailable';
    }

    if (!window.some((candidate) => candidate.id === messageId)) {
      logger.info({ messageId, recentWindow: this.recentWindow }, 'Winner changed in old message, ignoring edit');
      return 'ignored_too_old';
    }

    logger.info({ messageId }, 'Winner changed in recent message, recalculating');
    await this.replay(state, window);
    return 'recalculated';
  }

  /**
   * Replay a newest-first window oldest-first over a cleared state
   */
  private async replay(state: ChampionshipState, window: readonly ChannelMessage[]): Promise<void> {
    const before = state.snapshotHolder();

    state.clearLedgers();
    state.vacate();
    state.lastActivityAt = null;

    const chronological = window.filter((message) => !message.authorIsBot).reverse();
    for (const message of chronological) {
      const outcomes = parseResults(message.content);
      if (outcomes.length === 0) continue;

      for (const outcome of outcomes) {
        const key = buildResultKey(message.id, sortedPlayerPair(outcome), message.createdAt);
        await this.applyOne(state, outcome, message.createdAt, key, false);
      }
      state.recordMessage(message.id, fingerprint(message.content));
    }

    state.retainMessages(new Set(window.map((message) => message.id)));

    logger.info(
      {
        replayed: chronological.length,
        previousHolderId: before.holderId,
        previousStreak: before.currentStreak,
        holderId: state.holderId,
        streak: state.currentStreak,
      },
      'Recalculation complete'
    );

    await this.syncRolesAfterReplay(before.holderId, state.holderId);
  }

  private async syncRolesAfterReplay(previous: string | null, current: string | null): Promise<void> {
    if (previous !== null && previous === current) {
      await this.roles.grant(current, 'Restoring title role after recalculation');
      return;
    }

    if (previous !== null) {
      await this.roles.revoke(previous, 'Title changed during recalculation');
    }
    if (current !== null) {
      await this.roles.grant(current, 'Holds the title after recalculation');
    }
  }

  private async applyOne(
    state: ChampionshipState,
    outcome: GameOutcome,
    at: Date,
    resultKey: string,
    syncRoles: boolean
  ): Promise<void> {
    if (await this.passesMembershipGate(state, outcome)) {
      const change = this.titles.applyOutcome(state, outcome, at);
      if (syncRoles) {
        await this.roles.apply(change);
      }
    }
    state.recordResult(resultKey, outcome.winnerId);
  }

  /**
   * Vacate a departed holder; refuse outcomes whose players are not members
   */
  private async passesMembershipGate(state: ChampionshipState, outcome: GameOutcome): Promise<boolean> {
    const holderId = state.holderId;
    if (holderId !== null && (await this.membership(holderId)) === 'absent') {
      logger.warn({ holderId }, 'Title holder left the guild, vacating title');
      state.vacate();
    }

    const [winner, loser] = await Promise.all([
      this.membership(outcome.winnerId),
      this.membership(outcome.loserId),
    ]);
    if (winner !== 'present' || loser !== 'present') {
      logger.warn(
        { winnerId: outcome.winnerId, loserId: outcome.loserId, winner, loser },
        'Could not resolve both players, skipping title effects'
      );
      return false;
    }
    return true;
  }

  private async membership(userId: string): Promise<Membership> {
    try {
      return (await this.members.resolve(userId)) === null ? 'absent' : 'present';
    } catch (error) {
      logger.error({ userId, error: describeError(error) }, 'Member lookup failed');
      return 'unknown';
    }
  }

  /**
   * Drop ledger entries that fell out of the recent window
   */
  private async prune(state: ChampionshipState, channelId: string): Promise<void> {
    let window: ChannelMessage[];
    try {
      window = await this.fetchWindow(channelId);
    } catch (error) {
      logger.warn({ channelId, error: describeError(error) }, 'Skipping ledger pruning');
      return;
    }

    const removed = state.retainMessages(new Set(window.map((message) => message.id)));
    if (removed.results > 0 || removed.messages > 0) {
      logger.debug(removed, 'Pruned ledgers');
    }
  }

  /** Last `recentWindow` messages, newest-first */
  private async fetchWindow(channelId: string): Promise<ChannelMessage[]> {
    try {
      return await withRetry(
        () => this.history.fetchRecent(channelId, this.recentWindow),
        this.retry,
        'fetchRecent'
      );
    } catch (error) {
      if (error instanceof HistoryUnavailableError) throw error;
      throw new HistoryUnavailableError(channelId, error);
    }
  }
}
