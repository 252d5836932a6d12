/**
 * Discord Event Handler
 *
 * Wires Discord client events to the hill service: guild setup on ready and
 * on join, and result tracking for message create, edit and delete.
 */

import { Events, type Client, type Guild, type Message } from 'discord.js';
import type { Config } from '../../../config.js';
import { logger } from '../../../utils/logger.js';
import { describeError } from '../../../utils/errors.js';
import type { HillService } from '../../HillService.js';
import { LeaderboardPublisher } from '../../LeaderboardPublisher.js';
import { MarkerRoleSync } from '../../MarkerRoleSync.js';
import { ReconciliationEngine } from '../../ReconciliationEngine.js';
import { TitleManager } from '../../TitleManager.js';
import {
  createLeaderboardBoard,
  createMemberDirectory,
  createMessageHistory,
  ensureTitleRole,
  findTextChannel,
  toChannelMessage,
} from '../operations/index.js';

/**
 * Set up Discord client event handlers
 */
export function setupEventHandlers(
  client: Client,
  hill: HillService,
  config: Config,
  onReady: () => void
): void {
  client.once(Events.ClientReady, async (readyClient) => {
    logger.info({ user: readyClient.user.tag, guilds: readyClient.guilds.cache.size }, 'Discord bot connected');

    for (const guild of readyClient.guilds.cache.values()) {
      await initializeGuild(guild, readyClient.user.id, hill, config);
    }
    onReady();
  });

  client.on(Events.Error, (error) => {
    logger.error({ error: error.message }, 'Discord client error');
  });

  client.on(Events.Warn, (message) => {
    logger.warn({ message }, 'Discord client warning');
  });

  client.on(Events.GuildCreate, async (guild) => {
    if (client.user) {
      await initializeGuild(guild, client.user.id, hill, config);
    }
  });

  client.on(Events.MessageCreate, async (message) => {
    await handleResultMessage(message, hill, config);
  });

  client.on(Events.MessageUpdate, async (oldMessage, newMessage) => {
    let message: Message;
    try {
      message = newMessage.partial ? await newMessage.fetch() : newMessage;
    } catch (error) {
      logger.warn({ messageId: newMessage.id, error: describeError(error) }, 'Could not fetch edited message');
      return;
    }

    // Embed unfurls also fire updates
    if (!oldMessage.partial && oldMessage.content === message.content) return;
    await handleResultMessage(message, hill, config);
  });

  client.on(Events.MessageDelete, async (message) => {
    const guildId = message.guildId;
    if (guildId === null || !hill.isResultsChannel(guildId, message.channelId)) return;
    if (!message.partial && message.author.bot) return;

    try {
      await hill.handleDeletion(guildId, {
        id: message.id,
        content: message.partial ? null : message.content,
      });
    } catch (error) {
      logger.error({ guildId, messageId: message.id, error: describeError(error) }, 'Failed to handle deletion');
    }
  });
}

/**
 * Locate a guild's channels and title role, then hand it to the hill service
 */
export async function initializeGuild(
  guild: Guild,
  botUserId: string,
  hill: HillService,
  config: Config
): Promise<boolean> {
  const { channels, titleRoleName } = config.discord;

  const resultsChannel = findTextChannel(guild, channels.results);
  const leaderboardChannel = findTextChannel(guild, channels.leaderboard);
  if (!resultsChannel || !leaderboardChannel) {
    logger.warn(
      {
        guildId: guild.id,
        results: resultsChannel !== null,
        leaderboard: leaderboardChannel !== null,
      },
      'Required channels not found, guild not tracked'
    );
    return false;
  }

  const role = await ensureTitleRole(guild, titleRoleName);
  if (!role) {
    return false;
  }

  const members = createMemberDirectory(guild, role);
  const engine = new ReconciliationEngine({
    history: createMessageHistory(guild),
    members,
    titles: new TitleManager(config.title.timeoutMs),
    roles: new MarkerRoleSync(members),
    recentWindow: config.reconciliation.recentWindow,
  });
  const publisher = new LeaderboardPublisher(createLeaderboardBoard(leaderboardChannel, botUserId), {
    displayHeader: config.leaderboard.displayHeader,
    stateHeader: config.leaderboard.stateHeader,
    topN: config.leaderboard.topN,
    titleTimeoutMs: config.title.timeoutMs,
    recoveryScanLimit: config.leaderboard.recoveryScanLimit,
  });

  try {
    await hill.attachScope({ guildId: guild.id, resultsChannelId: resultsChannel.id, engine, publisher });
    return true;
  } catch (error) {
    logger.error({ guildId: guild.id, error: describeError(error) }, 'Failed to initialize guild');
    return false;
  }
}

/**
 * Run a new or edited results-channel message through the hill service
 */
async function handleResultMessage(message: Message, hill: HillService, config: Config): Promise<void> {
  if (message.author.bot || !message.inGuild()) return;
  if (!hill.isResultsChannel(message.guildId, message.channelId)) return;

  try {
    const result = await hill.handleMessage(message.guildId, toChannelMessage(message));

    const reaction = config.discord.successReaction;
    if (reaction !== '' && (result.status === 'applied' || result.status === 'recalculated')) {
      await message.react(reaction).catch((error: unknown) => {
        logger.warn({ messageId: message.id, error: describeError(error) }, 'Could not add success reaction');
      });
    }
  } catch (error) {
    logger.error({ messageId: message.id, error: describeError(error) }, 'Failed to process result message');
  }
}
