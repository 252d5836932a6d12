/**
 * Discord Service
 *
 * Manages the Discord bot connection. Guild setup and message handling are
 * delegated to the handlers module.
 */

import { Client, GatewayIntentBits, Partials } from 'discord.js';
import type { Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { setupEventHandlers } from './discord/handlers/index.js';
import type { HillService } from './HillService.js';

export class DiscordService {
  private readonly client: Client;
  private isReady = false;

  constructor(
    private readonly config: Config,
    hill: HillService
  ) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMembers,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.GuildMessageReactions,
        GatewayIntentBits.MessageContent,
      ],
      // Edits and deletes of uncached messages arrive as partials
      partials: [Partials.Message, Partials.Channel],
    });

    setupEventHandlers(this.client, hill, config, () => {
      this.isReady = true;
    });
  }

  /**
   * Connect to Discord
   */
  async connect(): Promise<void> {
    if (this.isReady) {
      logger.debug('Discord bot already connected');
      return;
    }

    logger.info('Connecting to Discord...');
    await this.client.login(this.config.discord.botToken);
  }

  /**
   * Disconnect from Discord
   */
  async disconnect(): Promise<void> {
    logger.info('Disconnecting from Discord...');
    await this.client.destroy();
    this.isReady = false;
  }
}
