/**
 * Discord Channel Operations
 *
 * Channel lookup, results-channel history and the leaderboard board.
 */

import { TextChannel, type Guild, type Message } from 'discord.js';
import type {
  ChannelMessage,
  ILeaderboardBoard,
  IMessageHistory,
} from '../../../packages/core/ports/index.js';
import { HistoryUnavailableError, PermissionDeniedError } from '../../../utils/errors.js';
import { compareIds } from '../../resultParser.js';
import { toPlatformError } from './platformErrors.js';

/**
 * Find a text channel by name
 */
export function findTextChannel(guild: Guild, name: string): TextChannel | null {
  const channel = guild.channels.cache.find(
    (candidate) => candidate instanceof TextChannel && candidate.name === name
  );
  return channel instanceof TextChannel ? channel : null;
}

export function toChannelMessage(message: Message): ChannelMessage {
  return {
    id: message.id,
    authorId: message.author.id,
    authorIsBot: message.author.bot,
    content: message.content,
    createdAt: message.createdAt,
  };
}

async function fetchNewestFirst(channel: TextChannel, limit: number): Promise<Message[]> {
  const fetched = await channel.messages.fetch({ limit });
  return [...fetched.values()].sort((a, b) => compareIds(b.id, a.id));
}

/**
 * History of any text channel in the guild, newest-first
 */
export function createMessageHistory(guild: Guild): IMessageHistory {
  return {
    async fetchRecent(channelId: string, limit: number): Promise<ChannelMessage[]> {
      const channel = guild.channels.cache.get(channelId);
      if (!(channel instanceof TextChannel)) {
        throw new HistoryUnavailableError(channelId, 'not a text channel');
      }

      try {
        const messages = await fetchNewestFirst(channel, limit);
        return messages.map(toChannelMessage);
      } catch (error) {
        const mapped = toPlatformError(error, 'read message history');
        if (mapped instanceof PermissionDeniedError) {
          throw new HistoryUnavailableError(channelId, mapped);
        }
        throw mapped;
      }
    },
  };
}

/**
 * The leaderboard channel, seen through the bot's own messages
 */
export function createLeaderboardBoard(channel: TextChannel, botUserId: string): ILeaderboardBoard {
  return {
    async fetchOwnMessages(limit: number): Promise<ChannelMessage[]> {
      try {
        const messages = await fetchNewestFirst(channel, limit);
        return messages.filter((message) => message.author.id === botUserId).map(toChannelMessage);
      } catch (error) {
        throw toPlatformError(error, 'read leaderboard channel');
      }
    },

    async post(content: string): Promise<string> {
      try {
        const message = await channel.send(content);
        return message.id;
      } catch (error) {
        throw toPlatformError(error, 'post leaderboard message');
      }
    },

    async edit(messageId: string, content: string): Promise<void> {
      try {
        await channel.messages.edit(messageId, content);
      } catch (error) {
        throw toPlatformError(error, 'edit leaderboard message');
      }
    },

    async pin(messageId: string): Promise<void> {
      try {
        await channel.messages.pin(messageId, 'Hill leaderboard');
      } catch (error) {
        throw toPlatformError(error, 'pin leaderboard message');
      }
    },
  };
}
