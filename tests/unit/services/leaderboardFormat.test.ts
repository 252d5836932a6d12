/**
 * Leaderboard Formatting Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  },
}));

import { ChampionshipState } from '../../../src/services/ChampionshipState.js';
import {
  type LeaderboardFormatOptions,
  extractPayload,
  renderDisplay,
  renderPayload,
} from '../../../src/services/leaderboardFormat.js';
import { toPayload } from '../../../src/services/stateCodec.js';
import { logger } from '../../../src/utils/logger.js';

const OPTIONS: LeaderboardFormatOptions = {
  displayHeader: '🏆 Hill Leaderboard',
  stateHeader: '📊 Hill State',
  topN: 10,
  titleTimeoutMs: 3 * 24 * 60 * 60 * 1000,
};

function reignState(): ChampionshipState {
  const state = new ChampionshipState();
  state.restoreBestStreak('1', 3, 70);
  state.restoreBestStreak('2', 1, 95);
  state.crown('2', 95);
  state.lastActivityAt = new Date('2026-01-01T00:00:00.000Z');
  return state;
}

describe('renderDisplay', () => {
  it('shows the champion, the ranking and activity times', () => {
    expect(renderDisplay(reignState(), OPTIONS)).toBe(
      [
        '🏆 Hill Leaderboard',
        '',
        '**Current Champion** 👑',
        '<@2> - 1 wins (Ego: 95)',
        '',
        '**Best Streaks**',
        '1. <@1> - 3 wins (Ego: 70)',
        '2. <@2> - 1 wins (Ego: 95)',
        '',
        'Last game: <t:1767225600:R>',
        'Title expires: <t:1767484800:R>',
      ].join('\n')
    );
  });

  it('renders an empty leaderboard', () => {
    expect(renderDisplay(new ChampionshipState(), OPTIONS)).toBe(
      '🏆 Hill Leaderboard\n\n**Best Streaks**\nNo games recorded yet!\n'
    );
  });

  it('omits the expiry line while the title is vacant', () => {
    const state = reignState();
    state.vacate();

    const lines = renderDisplay(state, OPTIONS).split('\n');

    expect(lines).not.toContain('**Current Champion** 👑');
    expect(lines.at(-1)).toBe('Last game: <t:1767225600:R>');
  });

  it('limits the ranking to the top N in stable order', () => {
    const state = new ChampionshipState();
    state.restoreBestStreak('5', 2, 70);
    state.restoreBestStreak('6', 4, 60);
    state.restoreBestStreak('7', 2, 90);

    const lines = renderDisplay(state, { ...OPTIONS, topN: 2 }).split('\n');

    expect(lines.filter((line) => /^\d+\. /.test(line))).toEqual([
      '1. <@6> - 4 wins (Ego: 60)',
      '2. <@5> - 2 wins (Ego: 70)',
    ]);
  });
});

describe('renderPayload / extractPayload', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('wraps the state in a spoilered json block under the header', () => {
    const content = renderPayload(reignState(), OPTIONS);

    expect(content.startsWith('📊 Hill State\n\n||```json\n{')).toBe(true);
    expect(content.endsWith('}\n```||')).toBe(true);
  });

  it('recovers the rendered state', () => {
    const state = reignState();
    state.recordMessage('100', 'abc');
    state.recordResult('100:1:2:1767225600', '2');

    const recovered = extractPayload(renderPayload(state, OPTIONS));

    expect(recovered).not.toBeNull();
    if (recovered) {
      expect(toPayload(recovered)).toEqual(toPayload(state));
    }
  });

  it('accepts a text fence', () => {
    const recovered = extractPayload('📊 Hill State\n\n||```text\n{"holder_id":"4","current_streak":2,"holder_ego_floor":50}\n```||');

    expect(recovered?.holderId).toBe('4');
    expect(recovered?.currentStreak).toBe(2);
  });

  it('returns null for a corrupt payload', () => {
    expect(extractPayload('📊 Hill State\n\n||```json\n{"current_streak":"two"}\n```||')).toBeNull();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('returns null when the block is missing', () => {
    expect(extractPayload('📊 Hill State\n\nnothing here')).toBeNull();
    expect(logger.error).toHaveBeenCalledWith('State message has no payload block, starting fresh');
  });
});
