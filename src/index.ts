/**
 * Hillkeeper Entry Point
 *
 * Discord bot that tracks a king-of-the-hill title from reported results:
 * - Parses results posted in the results channel
 * - Keeps the title holder, streaks and the marker role in sync
 * - Publishes the leaderboard and its recoverable state to the leaderboard channel
 */

import { loadConfig } from './config.js';
import { logger } from './utils/logger.js';
import { describeError } from './utils/errors.js';
import { DiscordService } from './services/discord.js';
import { HillService } from './services/HillService.js';

async function main() {
  const config = loadConfig();
  logger.info(
    {
      config: {
        channels: config.discord.channels,
        recentWindow: config.reconciliation.recentWindow,
        timeoutMs: config.title.timeoutMs,
      },
    },
    'Starting Hillkeeper'
  );

  const hill = new HillService();
  const discord = new DiscordService(config, hill);
  await discord.connect();

  let sweepTimer: NodeJS.Timeout | null = null;
  if (config.title.sweepIntervalMs > 0) {
    sweepTimer = setInterval(() => {
      hill.sweepTimeouts().catch((error: unknown) => {
        logger.error({ error: describeError(error) }, 'Timeout sweep failed');
      });
    }, config.title.sweepIntervalMs);
  }

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    if (sweepTimer) clearInterval(sweepTimer);
    await discord.disconnect();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ error: describeError(error) }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  logger.info('Hillkeeper started successfully');
}

main().catch((error: unknown) => {
  logger.fatal({ error: describeError(error) }, 'Failed to start Hillkeeper');
  process.exit(1);
});
