/**
 * Title Manager Tests
 */

import { describe, it, expect } from 'vitest';
import { ChampionshipState } from '../../../src/services/ChampionshipState.js';
import { GameOutcome } from '../../../src/services/resultParser.js';
import { TitleManager } from '../../../src/services/TitleManager.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = new Date('2026-02-10T12:00:00.000Z');

/** Winner listed first, one ego value for both players */
function win(winnerId: string, loserId: string, ego: number): GameOutcome {
  return new GameOutcome(winnerId, 5, loserId, 3, ego, ego);
}

describe('TitleManager', () => {
  const titles = new TitleManager(3 * DAY_MS);

  describe('applyOutcome', () => {
    it('crowns the winner of a vacant title', () => {
      const state = new ChampionshipState();

      const change = titles.applyOutcome(state, win('1', '2', 90), NOW);

      expect(change).toEqual({ kind: 'crowned', holderId: '1' });
      expect(state.holderId).toBe('1');
      expect(state.currentStreak).toBe(1);
      expect(state.holderEgoFloor).toBe(90);
      expect(state.rankedBestStreaks()).toEqual([{ playerId: '1', streak: 1, egoFloor: 90 }]);
      expect(state.lastActivityAt).toBe(NOW);
    });

    it('extends the streak and tightens the ego floor on a defense', () => {
      const state = new ChampionshipState();
      state.crown('1', 90);
      state.recordStreakIfBetter('1', 1, 90);

      const change = titles.applyOutcome(state, win('1', '3', 70), NOW);

      expect(change).toEqual({ kind: 'defended', holderId: '1', streak: 2 });
      expect(state.currentStreak).toBe(2);
      expect(state.holderEgoFloor).toBe(70);
      expect(state.bestStreakOf('1')).toBe(2);
      expect(state.bestStreakEgoFloorOf('1')).toBe(70);
    });

    it('keeps the ego floor when the defense was against a higher ego', () => {
      const state = new ChampionshipState();
      state.crown('1', 70);

      titles.applyOutcome(state, win('1', '3', 95), NOW);

      expect(state.holderEgoFloor).toBe(70);
      expect(state.bestStreakEgoFloorOf('1')).toBe(70);
    });

    it('hands the title to the player who beats the holder', () => {
      const state = new ChampionshipState();
      state.crown('1', 70, 2);
      state.recordStreakIfBetter('1', 2, 70);

      const change = titles.applyOutcome(state, new GameOutcome('3', 5, '1', 4, 95, 95), NOW);

      expect(change).toEqual({ kind: 'dethroned', holderId: '3', previousHolderId: '1', previousStreak: 2 });
      expect(state.bestStreakOf('1')).toBe(2);
      expect(state.bestStreakEgoFloorOf('1')).toBe(70);
      expect(state.holderId).toBe('3');
      expect(state.currentStreak).toBe(1);
      expect(state.holderEgoFloor).toBe(95);
      expect(state.bestStreakOf('3')).toBe(1);
    });

    it('captures an uncommitted reign when the holder is beaten', () => {
      const state = new ChampionshipState();
      state.restoreBestStreak('1', 1, 90);
      state.crown('1', 70, 3);

      titles.applyOutcome(state, win('3', '1', 85), NOW);

      expect(state.bestStreakOf('1')).toBe(3);
      expect(state.bestStreakEgoFloorOf('1')).toBe(70);
    });

    it('does not lower an existing best of the new holder', () => {
      const state = new ChampionshipState();
      state.recordStreakIfBetter('3', 4, 60);
      state.crown('1', 80);

      titles.applyOutcome(state, win('3', '1', 99), NOW);

      expect(state.bestStreakOf('3')).toBe(4);
      expect(state.bestStreakEgoFloorOf('3')).toBe(60);
    });

    it('leaves the title alone when neither player holds it', () => {
      const state = new ChampionshipState();
      state.crown('1', 80, 2);
      const before = state.snapshotHolder();

      const change = titles.applyOutcome(state, win('3', '4', 50), NOW);

      expect(change).toEqual({ kind: 'unaffected' });
      expect(state.snapshotHolder()).toEqual(before);
      expect(state.hasBestStreak('3')).toBe(false);
    });

    it('uses the winner ego from a split ego statement', () => {
      const state = new ChampionshipState();

      titles.applyOutcome(state, new GameOutcome('1', 2, '3', 5, 80, 60), NOW);

      expect(state.holderId).toBe('3');
      expect(state.holderEgoFloor).toBe(60);
    });

    it('never lowers a best streak or raises the ego floor over a reign', () => {
      const state = new ChampionshipState();
      const egos = [90, 95, 70, 85, 60, 99];
      let floor = Number.POSITIVE_INFINITY;
      let best = 0;

      for (const ego of egos) {
        titles.applyOutcome(state, win('1', '2', ego), NOW);
        const current = state.holderEgoFloor ?? Number.POSITIVE_INFINITY;
        const currentBest = state.bestStreakOf('1') ?? 0;
        expect(current).toBeLessThanOrEqual(floor);
        expect(currentBest).toBeGreaterThanOrEqual(best);
        floor = current;
        best = currentBest;
      }

      expect(state.currentStreak).toBe(6);
      expect(state.holderEgoFloor).toBe(60);
      expect(state.bestStreakOf('1')).toBe(6);
    });
  });

  describe('checkTimeout', () => {
    it('vacates a title idle for longer than the timeout', () => {
      const state = new ChampionshipState();
      state.crown('1', 90);
      state.lastActivityAt = new Date(NOW.getTime() - 4 * DAY_MS);

      expect(titles.checkTimeout(state, NOW)).toEqual({ expired: true, previousHolderId: '1' });
      expect(state.holderId).toBeNull();
      expect(state.currentStreak).toBe(0);
      expect(state.holderEgoFloor).toBeNull();
    });

    it('keeps a title idle for exactly the timeout', () => {
      const state = new ChampionshipState();
      state.crown('1', 90);
      state.lastActivityAt = new Date(NOW.getTime() - 3 * DAY_MS);

      expect(titles.checkTimeout(state, NOW)).toEqual({ expired: false, previousHolderId: null });
      expect(state.holderId).toBe('1');
    });

    it('ignores a vacant title', () => {
      const state = new ChampionshipState();
      state.lastActivityAt = new Date(NOW.getTime() - 10 * DAY_MS);

      expect(titles.checkTimeout(state, NOW).expired).toBe(false);
    });
  });
});
