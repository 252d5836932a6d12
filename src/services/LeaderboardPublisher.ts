/**
 * Leaderboard Publisher
 *
 * Owns the display and payload messages of one leaderboard channel:
 * finds them on startup, recovers state from the payload, and rewrites both
 * after every state change.
 */

import type { ChannelMessage, ILeaderboardBoard } from '../packages/core/ports/index.js';
import { logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import type { ChampionshipState } from './ChampionshipState.js';
import {
  type LeaderboardFormatOptions,
  extractPayload,
  renderDisplay,
  renderPayload,
} from './leaderboardFormat.js';

/** Discord message length limit */
export const MESSAGE_CHAR_LIMIT = 2000;

export interface LeaderboardPublisherOptions extends LeaderboardFormatOptions {
  recoveryScanLimit: number;
}

export class LeaderboardPublisher {
  private displayMessageId: string | null = null;
  private payloadMessageId: string | null = null;

  constructor(
    private readonly board: ILeaderboardBoard,
    private readonly options: LeaderboardPublisherOptions
  ) {}

  get messageIds(): { display: string | null; payload: string | null } {
    return { display: this.displayMessageId, payload: this.payloadMessageId };
  }

  /**
   * Locate both messages among the bot's recent posts and adopt the newest
   * readable payload. Returns null when there is nothing to recover.
   */
  async recover(): Promise<ChampionshipState | null> {
    let messages: ChannelMessage[];
    try {
      messages = await this.board.fetchOwnMessages(this.options.recoveryScanLimit);
    } catch (error) {
      logger.error({ error: describeError(error) }, 'Could not read leaderboard channel, starting fresh');
      return null;
    }

    // Newest-first: the first match of each header wins
    const display = messages.find((message) => message.content.startsWith(this.options.displayHeader));
    const payload = messages.find((message) => message.content.startsWith(this.options.stateHeader));

    this.displayMessageId = display?.id ?? null;
    this.payloadMessageId = payload?.id ?? null;

    if (!payload) {
      logger.info('No state message found, starting fresh');
      return null;
    }

    const state = extractPayload(payload.content);
    if (state) {
      logger.info(
        { holderId: state.holderId, streak: state.currentStreak, payloadMessageId: payload.id },
        'Recovered championship state'
      );
    }
    return state;
  }

  /**
   * Write both messages, editing them when known and posting otherwise
   */
  async publish(state: ChampionshipState): Promise<void> {
    const display = renderDisplay(state, this.options);
    const payload = renderPayload(state, this.options);

    if (payload.length > MESSAGE_CHAR_LIMIT) {
      logger.error(
        {
          length: payload.length,
          limit: MESSAGE_CHAR_LIMIT,
          processedMessages: state.processedMessages.size,
          processedResults: state.processedResults.size,
        },
        'State message exceeds platform limit, state will not persist'
      );
    }

    this.displayMessageId = await this.upsert(this.displayMessageId, display, 'display');
    this.payloadMessageId = await this.upsert(this.payloadMessageId, payload, 'payload');
  }

  private async upsert(messageId: string | null, content: string, kind: string): Promise<string | null> {
    try {
      if (messageId !== null) {
        await this.board.edit(messageId, content);
        logger.debug({ kind, messageId }, 'Updated leaderboard message');
        return messageId;
      }

      const postedId = await this.board.post(content);
      logger.info({ kind, messageId: postedId }, 'Created leaderboard message');
      try {
        await this.board.pin(postedId);
      } catch (error) {
        logger.warn({ kind, messageId: postedId, error: describeError(error) }, 'Could not pin leaderboard message');
      }
      return postedId;
    } catch (error) {
      logger.error({ kind, messageId, error: describeError(error) }, 'Failed to write leaderboard message');
      return messageId;
    }
  }
}
