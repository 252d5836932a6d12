/**
 * Leaderboard Formatting
 *
 * Renders a ChampionshipState into the two leaderboard-channel messages:
 * the human-readable display and the recoverable state payload.
 */

import { logger } from '../utils/logger.js';
import { PayloadCorruptError, describeError } from '../utils/errors.js';
import type { ChampionshipState } from './ChampionshipState.js';
import { deserializeState, serializeState } from './stateCodec.js';

export interface LeaderboardFormatOptions {
  displayHeader: string;
  stateHeader: string;
  topN: number;
  titleTimeoutMs: number;
}

const PAYLOAD_BLOCK = /\|\|```(?:json|text)\n([\s\S]+?)\n```\|\|/;

function relativeTimestamp(date: Date): string {
  return `<t:${Math.floor(date.getTime() / 1000)}:R>`;
}

function streakLine(playerId: string, streak: number, egoFloor: number | null): string {
  const ego = egoFloor === null ? '' : ` (Ego: ${egoFloor})`;
  return `<@${playerId}> - ${streak} wins${ego}`;
}

/**
 * Display message: current champion, ranked best streaks and activity times
 */
export function renderDisplay(state: ChampionshipState, options: LeaderboardFormatOptions): string {
  const lines: string[] = [options.displayHeader, ''];

  if (state.holderId !== null) {
    lines.push('**Current Champion** 👑');
    lines.push(streakLine(state.holderId, state.currentStreak, state.holderEgoFloor));
    lines.push('');
  }

  lines.push('**Best Streaks**');
  const ranked = state.rankedBestStreaks(options.topN);
  if (ranked.length === 0) {
    lines.push('No games recorded yet!');
  } else {
    ranked.forEach((entry, index) => {
      lines.push(`${index + 1}. ${streakLine(entry.playerId, entry.streak, entry.egoFloor)}`);
    });
  }

  lines.push('');
  if (state.lastActivityAt !== null) {
    lines.push(`Last game: ${relativeTimestamp(state.lastActivityAt)}`);
    if (state.holderId !== null) {
      const expiresAt = new Date(state.lastActivityAt.getTime() + options.titleTimeoutMs);
      lines.push(`Title expires: ${relativeTimestamp(expiresAt)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Payload message: header, then the JSON state inside a spoilered code block
 */
export function renderPayload(state: ChampionshipState, options: Pick<LeaderboardFormatOptions, 'stateHeader'>): string {
  return `${options.stateHeader}\n\n||\`\`\`json\n${serializeState(state)}\n\`\`\`||`;
}

/**
 * Recover state from a payload message. Returns null when the block is
 * missing or invalid.
 */
export function extractPayload(content: string): ChampionshipState | null {
  const match = PAYLOAD_BLOCK.exec(content);
  const json = match?.[1];
  if (json === undefined) {
    logger.error('State message has no payload block, starting fresh');
    return null;
  }

  try {
    return deserializeState(json);
  } catch (error) {
    if (error instanceof PayloadCorruptError) {
      logger.error({ issues: error.issues, error: error.message }, 'State payload corrupt, starting fresh');
      return null;
    }
    logger.error({ error: describeError(error) }, 'Unexpected error reading state payload');
    return null;
  }
}
