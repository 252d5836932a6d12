/**
 * Title Manager
 *
 * Pure state machine over the title slot (Vacant / Held). Each transition
 * mutates ChampionshipState and returns a TitleChange naming the marker-role
 * effects the caller must perform. No platform calls happen here.
 */

import type { ChampionshipState } from './ChampionshipState.js';
import type { GameOutcome } from './resultParser.js';

/**
 * Result of applying one outcome
 */
export type TitleChange =
  | { kind: 'crowned'; holderId: string }
  | { kind: 'defended'; holderId: string; streak: number }
  | { kind: 'dethroned'; holderId: string; previousHolderId: string; previousStreak: number }
  | { kind: 'unaffected' };

export interface TimeoutCheck {
  expired: boolean;
  previousHolderId: string | null;
}

export const DEFAULT_TITLE_TIMEOUT_MS = 3 * 24 * 60 * 60 * 1000;

export class TitleManager {
  constructor(private readonly timeoutMs: number = DEFAULT_TITLE_TIMEOUT_MS) {}

  /**
   * Apply one outcome at activity time `at`
   */
  applyOutcome(state: ChampionshipState, outcome: GameOutcome, at: Date): TitleChange {
    const { winnerId, loserId, winnerEgo } = outcome;
    const holderId = state.holderId;

    if (holderId === null) {
      state.crown(winnerId, winnerEgo);
      state.recordStreakIfBetter(winnerId, 1, winnerEgo);
      state.lastActivityAt = at;
      return { kind: 'crowned', holderId: winnerId };
    }

    if (holderId === winnerId) {
      state.incrementStreak();
      state.tightenHolderEgoFloor(winnerEgo);
      state.lastActivityAt = at;
      state.recordStreakIfBetter(winnerId, state.currentStreak, state.holderEgoFloor ?? winnerEgo);
      return { kind: 'defended', holderId: winnerId, streak: state.currentStreak };
    }

    if (holderId === loserId) {
      const previousStreak = state.currentStreak;
      // Best is committed incrementally, so this only fires for restored states
      state.recordStreakIfBetter(loserId, previousStreak, state.holderEgoFloor ?? winnerEgo);

      state.crown(winnerId, winnerEgo);
      if (!state.hasBestStreak(winnerId)) {
        state.recordStreakIfBetter(winnerId, 1, winnerEgo);
      }
      state.lastActivityAt = at;
      return { kind: 'dethroned', holderId: winnerId, previousHolderId: loserId, previousStreak };
    }

    return { kind: 'unaffected' };
  }

  /**
   * Vacate the title when the holder has been idle longer than the timeout
   */
  checkTimeout(state: ChampionshipState, now: Date): TimeoutCheck {
    const holderId = state.holderId;
    if (holderId === null || state.lastActivityAt === null) {
      return { expired: false, previousHolderId: null };
    }

    if (now.getTime() - state.lastActivityAt.getTime() <= this.timeoutMs) {
      return { expired: false, previousHolderId: null };
    }

    state.vacate();
    return { expired: true, previousHolderId: holderId };
  }
}
