import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { logger } from './utils/logger.js';
import { ConfigError } from './utils/errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  discord: z.object({
    botToken: z.string().min(1, 'DISCORD_BOT_TOKEN is required'),
    channels: z.object({
      results: z.string().min(1).default('scrimmage-results'),
      leaderboard: z.string().min(1).default('king-of-the-hill'),
    }),
    titleRoleName: z.string().min(1).default('King of the Hill'),
    // Empty string disables the reaction
    successReaction: z.string().default('✅'),
  }),

  title: z.object({
    timeoutDays: z.coerce.number().positive().default(3),
    // Minutes between expiry sweeps; 0 disables the timer
    sweepMinutes: z.coerce.number().int().min(0).default(15),
  }),

  reconciliation: z.object({
    recentWindow: z.coerce.number().int().min(1).max(100).default(5),
  }),

  leaderboard: z.object({
    topN: z.coerce.number().int().min(1).max(50).default(10),
    displayHeader: z.string().min(1).default('🏆 Hill Leaderboard'),
    stateHeader: z.string().min(1).default('📊 Hill State'),
    recoveryScanLimit: z.coerce.number().int().min(1).max(100).default(50),
  }),

  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  }),
});

/**
 * Typed configuration object
 */
export interface Config {
  discord: {
    botToken: string;
    channels: {
      results: string;
      leaderboard: string;
    };
    titleRoleName: string;
    successReaction: string;
  };
  title: {
    timeoutMs: number;
    sweepIntervalMs: number;
  };
  reconciliation: {
    recentWindow: number;
  };
  leaderboard: {
    topN: number;
    displayHeader: string;
    stateHeader: string;
    recoveryScanLimit: number;
  };
  logging: {
    level: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  };
}

/**
 * Parse and validate configuration from environment variables
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const rawConfig = {
    discord: {
      botToken: env.DISCORD_BOT_TOKEN ?? '',
      channels: {
        results: env.RESULTS_CHANNEL,
        leaderboard: env.LEADERBOARD_CHANNEL,
      },
      titleRoleName: env.TITLE_ROLE_NAME,
      successReaction: env.SUCCESS_REACTION,
    },
    title: {
      timeoutDays: env.TITLE_TIMEOUT_DAYS,
      sweepMinutes: env.TIMEOUT_SWEEP_MINUTES,
    },
    reconciliation: {
      recentWindow: env.RECENT_WINDOW,
    },
    leaderboard: {
      topN: env.LEADERBOARD_TOP_N,
      displayHeader: env.LEADERBOARD_HEADER,
      stateHeader: env.STATE_HEADER,
      recoveryScanLimit: env.RECOVERY_SCAN_LIMIT,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    logger.fatal({ errors: result.error.issues }, 'Configuration validation failed');
    throw new ConfigError(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  const parsed = result.data;

  return {
    discord: parsed.discord,
    title: {
      timeoutMs: parsed.title.timeoutDays * DAY_MS,
      sweepIntervalMs: parsed.title.sweepMinutes * 60 * 1000,
    },
    reconciliation: parsed.reconciliation,
    leaderboard: parsed.leaderboard,
    logging: parsed.logging,
  };
}

/**
 * Load .env files and parse the process environment
 */
export function loadConfig(): Config {
  // .env.local wins for development, .env is the fallback
  dotenvConfig({ path: '.env.local' });
  dotenvConfig();
  return parseConfig(process.env);
}
