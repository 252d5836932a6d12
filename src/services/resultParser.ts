/**
 * Result Parser
 *
 * Turns free-form result text into structured game outcomes.
 *
 * Accepted statement (whitespace optional between tokens):
 *   <@A> 5-3 <@B> (90)      one ego value for both players
 *   <@A> 5-3 <@B> (80/90)   ego per player, in mention order
 *   <@A> 5-3 <@B> 90        parentheses may be omitted
 *
 * A message may carry several statements; they are returned in order of
 * appearance. Ties are dropped.
 */

import { logger } from '../utils/logger.js';

const RESULT_PATTERN =
  /<@!?(\d+)>\s*(\d+)\s*-\s*(\d+)\s*<@!?(\d+)>\s*\(?\s*(\d+)(?:\s*\/\s*(\d+))?\s*\)?/g;

/**
 * One reported game between two players
 */
export class GameOutcome {
  constructor(
    readonly playerAId: string,
    readonly scoreA: number,
    readonly playerBId: string,
    readonly scoreB: number,
    readonly egoA: number,
    readonly egoB: number
  ) {}

  get isTie(): boolean {
    return this.scoreA === this.scoreB;
  }

  private get aWins(): boolean {
    return this.scoreA > this.scoreB;
  }

  get winnerId(): string {
    return this.aWins ? this.playerAId : this.playerBId;
  }

  get loserId(): string {
    return this.aWins ? this.playerBId : this.playerAId;
  }

  get winnerEgo(): number {
    return this.aWins ? this.egoA : this.egoB;
  }

  get loserEgo(): number {
    return this.aWins ? this.egoB : this.egoA;
  }
}

/**
 * Normalize a snowflake so "007" and "7" name the same player
 */
export function canonicalId(raw: string): string {
  return BigInt(raw).toString();
}

/**
 * Compare two snowflakes numerically
 */
export function compareIds(a: string, b: string): number {
  const x = BigInt(a);
  const y = BigInt(b);
  if (x === y) return 0;
  return x < y ? -1 : 1;
}

/**
 * Both player ids in ascending numeric order
 */
export function sortedPlayerPair(outcome: GameOutcome): [string, string] {
  const { playerAId, playerBId } = outcome;
  return compareIds(playerAId, playerBId) <= 0 ? [playerAId, playerBId] : [playerBId, playerAId];
}

function toInteger(raw: string | undefined, field: string): number {
  if (raw === undefined) {
    throw new RangeError(`missing ${field}`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${field} out of range: ${raw}`);
  }
  return value;
}

function buildOutcome(match: RegExpMatchArray): GameOutcome {
  const [, rawA, rawScoreA, rawScoreB, rawB, rawEgoA, rawEgoB] = match;
  if (rawA === undefined || rawB === undefined) {
    throw new RangeError('missing player mention');
  }

  const egoA = toInteger(rawEgoA, 'ego');
  const egoB = rawEgoB === undefined ? egoA : toInteger(rawEgoB, 'ego');

  return new GameOutcome(
    canonicalId(rawA),
    toInteger(rawScoreA, 'score'),
    canonicalId(rawB),
    toInteger(rawScoreB, 'score'),
    egoA,
    egoB
  );
}

/**
 * Parse every result statement in a message.
 * Never throws; returns an empty array when nothing matches.
 */
export function parseResults(text: string): GameOutcome[] {
  const outcomes: GameOutcome[] = [];

  for (const match of text.matchAll(RESULT_PATTERN)) {
    let outcome: GameOutcome;
    try {
      outcome = buildOutcome(match);
    } catch (error) {
      logger.warn(
        { statement: match[0], error: error instanceof Error ? error.message : String(error) },
        'Skipping malformed result statement'
      );
      continue;
    }

    if (outcome.isTie) {
      logger.debug({ statement: match[0] }, 'Ignoring tied result');
      continue;
    }

    outcomes.push(outcome);
  }

  return outcomes;
}
