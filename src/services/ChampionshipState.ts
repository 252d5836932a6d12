/**
 * Championship State
 *
 * The authoritative in-memory model of one guild's title: who holds it, the
 * current streak and ego floor, all-time best streaks, and the two dedup
 * ledgers used by reconciliation.
 *
 * Holder, streak and ego floor only change together (crown / vacate), so
 * `currentStreak === 0`, `holderId === null` and `holderEgoFloor === null`
 * always agree.
 */

/**
 * Holder fields captured before a recalculation
 */
export interface HolderSnapshot {
  holderId: string | null;
  currentStreak: number;
  holderEgoFloor: number | null;
  lastActivityAt: Date | null;
}

/**
 * One row of the all-time ranking
 */
export interface BestStreakEntry {
  playerId: string;
  streak: number;
  egoFloor: number;
}

export class ChampionshipState {
  private readonly bestStreaks = new Map<string, number>();
  private readonly bestStreakEgoFloors = new Map<string, number>();
  private _holderId: string | null = null;
  private _currentStreak = 0;
  private _holderEgoFloor: number | null = null;

  lastActivityAt: Date | null = null;

  /** message id -> content fingerprint */
  readonly processedMessages = new Map<string, string>();

  /** composite result key -> recorded winner id */
  readonly processedResults = new Map<string, string>();

  get holderId(): string | null {
    return this._holderId;
  }

  get currentStreak(): number {
    return this._currentStreak;
  }

  get holderEgoFloor(): number | null {
    return this._holderEgoFloor;
  }

  // ---------------------------------------------------------------------------
  // Best streaks
  // ---------------------------------------------------------------------------

  bestStreakOf(playerId: string): number | undefined {
    return this.bestStreaks.get(playerId);
  }

  bestStreakEgoFloorOf(playerId: string): number | undefined {
    return this.bestStreakEgoFloors.get(playerId);
  }

  hasBestStreak(playerId: string): boolean {
    return this.bestStreaks.has(playerId);
  }

  /**
   * Commit a streak only when it strictly beats the stored best.
   * Returns true if the record was written.
   */
  recordStreakIfBetter(playerId: string, streak: number, egoFloor: number): boolean {
    const stored = this.bestStreaks.get(playerId);
    if (stored !== undefined && stored >= streak) {
      return false;
    }
    this.bestStreaks.set(playerId, streak);
    this.bestStreakEgoFloors.set(playerId, egoFloor);
    return true;
  }

  /** Unconditional write, used when rebuilding state from a payload */
  restoreBestStreak(playerId: string, streak: number, egoFloor: number): void {
    this.bestStreaks.set(playerId, streak);
    this.bestStreakEgoFloors.set(playerId, egoFloor);
  }

  /**
   * All best streaks, highest first. Equal streaks keep insertion order.
   */
  rankedBestStreaks(limit?: number): BestStreakEntry[] {
    const entries: BestStreakEntry[] = [];
    for (const [playerId, streak] of this.bestStreaks) {
      entries.push({ playerId, streak, egoFloor: this.bestStreakEgoFloors.get(playerId) ?? 0 });
    }
    entries.sort((a, b) => b.streak - a.streak);
    return limit === undefined ? entries : entries.slice(0, limit);
  }

  /** Best streak pairs in insertion order */
  bestStreakEntries(): BestStreakEntry[] {
    return [...this.bestStreaks].map(([playerId, streak]) => ({
      playerId,
      streak,
      egoFloor: this.bestStreakEgoFloors.get(playerId) ?? 0,
    }));
  }

  // ---------------------------------------------------------------------------
  // Holder
  // ---------------------------------------------------------------------------

  crown(playerId: string, ego: number, streak: number = 1): void {
    if (!Number.isInteger(streak) || streak < 1) {
      throw new RangeError(`Streak must be a positive integer, got ${streak}`);
    }
    this._holderId = playerId;
    this._currentStreak = streak;
    this._holderEgoFloor = ego;
  }

  vacate(): void {
    this._holderId = null;
    this._currentStreak = 0;
    this._holderEgoFloor = null;
  }

  incrementStreak(): void {
    if (this._holderId === null) {
      throw new Error('Cannot extend a streak while the title is vacant');
    }
    this._currentStreak += 1;
  }

  /** Ego floor only ever moves down during a reign */
  tightenHolderEgoFloor(ego: number): void {
    if (this._holderEgoFloor === null || ego < this._holderEgoFloor) {
      this._holderEgoFloor = ego;
    }
  }

  snapshotHolder(): HolderSnapshot {
    return {
      holderId: this._holderId,
      currentStreak: this._currentStreak,
      holderEgoFloor: this._holderEgoFloor,
      lastActivityAt: this.lastActivityAt,
    };
  }

  // ---------------------------------------------------------------------------
  // Dedup ledgers
  // ---------------------------------------------------------------------------

  recordResult(resultKey: string, winnerId: string): void {
    this.processedResults.set(resultKey, winnerId);
  }

  recordedWinner(resultKey: string): string | undefined {
    return this.processedResults.get(resultKey);
  }

  recordMessage(messageId: string, fingerprint: string): void {
    this.processedMessages.set(messageId, fingerprint);
  }

  hasProcessedMessage(messageId: string): boolean {
    return this.processedMessages.has(messageId);
  }

  isMessageUnchanged(messageId: string, fingerprint: string): boolean {
    return this.processedMessages.get(messageId) === fingerprint;
  }

  clearLedgers(): void {
    this.processedMessages.clear();
    this.processedResults.clear();
  }

  /**
   * Drop ledger entries for messages outside `keepMessageIds`.
   * Returns how many entries of each ledger were removed.
   */
  retainMessages(keepMessageIds: ReadonlySet<string>): { results: number; messages: number } {
    let results = 0;
    let messages = 0;

    for (const key of [...this.processedResults.keys()]) {
      if (!keepMessageIds.has(messageIdOfResultKey(key))) {
        this.processedResults.delete(key);
        results++;
      }
    }

    for (const messageId of [...this.processedMessages.keys()]) {
      if (!keepMessageIds.has(messageId)) {
        this.processedMessages.delete(messageId);
        messages++;
      }
    }

    return { results, messages };
  }
}

// =============================================================================
// Composite result keys
// =============================================================================

/**
 * Build the ledger key for one outcome:
 * `<messageId>:<playerIdLow>:<playerIdHigh>:<unixSeconds>`
 */
export function buildResultKey(
  messageId: string,
  sortedPair: readonly [string, string],
  occurredAt: Date
): string {
  const unixSeconds = Math.floor(occurredAt.getTime() / 1000);
  return `${messageId}:${sortedPair[0]}:${sortedPair[1]}:${unixSeconds}`;
}

export function messageIdOfResultKey(resultKey: string): string {
  const separator = resultKey.indexOf(':');
  return separator === -1 ? resultKey : resultKey.slice(0, separator);
}
