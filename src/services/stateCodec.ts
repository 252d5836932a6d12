/**
 * Championship State Codec
 *
 * Lossless conversion between ChampionshipState and the flat JSON payload
 * stored in the leaderboard channel.
 *
 * Wire contract (v1):
 *   best_streaks          : player id -> best streak
 *   best_streak_ego_floors: player id -> ego floor of that streak
 *   holder_id             : nullable snowflake
 *   current_streak        : 0 when vacant
 *   holder_ego_floor      : nullable integer
 *   last_activity_at      : ISO-8601 with offset, nullable
 *   processed_messages    : message id -> sha256 hex
 *   processed_results     : "<msg>:<low>:<high>:<unixSeconds>" -> winner id
 *
 * Snowflakes are written as decimal strings. Readers also accept bare JSON
 * integers, including ones beyond Number.MAX_SAFE_INTEGER.
 */

import { z } from 'zod';
import { PayloadCorruptError } from '../utils/errors.js';
import { ChampionshipState } from './ChampionshipState.js';
import { canonicalId } from './resultParser.js';

export const PAYLOAD_VERSION = 1;

const snowflakeKey = z.string().regex(/^\d+$/, 'expected a numeric id');

const snowflake = z
  .union([snowflakeKey, z.number().int().nonnegative().safe()])
  .transform((value) => canonicalId(String(value)));

export const StatePayloadSchema = z.object({
  version: z.literal(PAYLOAD_VERSION).optional(),
  best_streaks: z.record(snowflakeKey, z.number().int().nonnegative()).default({}),
  best_streak_ego_floors: z.record(snowflakeKey, z.number().int()).default({}),
  holder_id: snowflake.nullable().default(null),
  current_streak: z.number().int().nonnegative().default(0),
  holder_ego_floor: z.number().int().nullable().default(null),
  last_activity_at: z.string().nullable().default(null),
  processed_messages: z.record(snowflakeKey, z.string()).default({}),
  processed_results: z.record(z.string(), snowflake).default({}),
});

/** Payload as written by {@link toPayload} */
export interface StatePayloadV1 {
  version: typeof PAYLOAD_VERSION;
  best_streaks: Record<string, number>;
  best_streak_ego_floors: Record<string, number>;
  holder_id: string | null;
  current_streak: number;
  holder_ego_floor: number | null;
  last_activity_at: string | null;
  processed_messages: Record<string, string>;
  processed_results: Record<string, string>;
}

// Bare integers past MAX_SAFE_INTEGER lose precision in JSON.parse; quote them first.
// Safe ones stay numbers so ego values still validate as numbers.
const BARE_LARGE_INTEGER = /([:[,]\s*)(\d{16,})(?=\s*[,}\]])/g;

function quoteLargeIntegers(json: string): string {
  return json.replace(BARE_LARGE_INTEGER, (match: string, prefix: string, digits: string) =>
    Number.isSafeInteger(Number(digits)) ? match : `${prefix}"${digits}"`
  );
}

const EXPLICIT_OFFSET = /(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse an ISO-8601 timestamp, reading it as UTC when no offset is given
 */
export function parseTimestamp(raw: string): Date {
  let text = raw.trim();
  if (DATE_ONLY.test(text)) {
    text = `${text}T00:00:00`;
  }
  // Date keeps millisecond precision
  text = text.replace(/(\.\d{3})\d+/, '$1');
  if (!EXPLICIT_OFFSET.test(text)) {
    text = `${text}Z`;
  }

  const date = new Date(text);
  if (Number.isNaN(date.getTime())) {
    throw new PayloadCorruptError(`Invalid timestamp: ${raw}`);
  }
  return date;
}

export function toPayload(state: ChampionshipState): StatePayloadV1 {
  const bestStreaks: Record<string, number> = {};
  const bestStreakEgoFloors: Record<string, number> = {};
  for (const entry of state.bestStreakEntries()) {
    bestStreaks[entry.playerId] = entry.streak;
    bestStreakEgoFloors[entry.playerId] = entry.egoFloor;
  }

  return {
    version: PAYLOAD_VERSION,
    best_streaks: bestStreaks,
    best_streak_ego_floors: bestStreakEgoFloors,
    holder_id: state.holderId,
    current_streak: state.currentStreak,
    holder_ego_floor: state.holderEgoFloor,
    last_activity_at: state.lastActivityAt?.toISOString() ?? null,
    processed_messages: Object.fromEntries(state.processedMessages),
    processed_results: Object.fromEntries(state.processedResults),
  };
}

/**
 * Rebuild a state from an already-decoded payload object
 *
 * @throws PayloadCorruptError
 */
export function fromPayload(data: unknown): ChampionshipState {
  const result = StatePayloadSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new PayloadCorruptError('State payload failed validation', issues);
  }

  const payload = result.data;
  const state = new ChampionshipState();

  const floorKeys = Object.keys(payload.best_streak_ego_floors);
  const streakKeys = Object.keys(payload.best_streaks);
  if (
    floorKeys.length !== streakKeys.length ||
    streakKeys.some((key) => payload.best_streak_ego_floors[key] === undefined)
  ) {
    throw new PayloadCorruptError('best_streaks and best_streak_ego_floors have different players');
  }

  for (const key of streakKeys) {
    const streak = payload.best_streaks[key];
    const floor = payload.best_streak_ego_floors[key];
    if (streak !== undefined && floor !== undefined) {
      state.restoreBestStreak(canonicalId(key), streak, floor);
    }
  }

  if (payload.holder_id !== null) {
    if (payload.current_streak < 1 || payload.holder_ego_floor === null) {
      throw new PayloadCorruptError('Title holder present without a streak and ego floor');
    }
    state.crown(payload.holder_id, payload.holder_ego_floor, payload.current_streak);
  }

  state.lastActivityAt =
    payload.last_activity_at === null ? null : parseTimestamp(payload.last_activity_at);

  for (const [messageId, fingerprint] of Object.entries(payload.processed_messages)) {
    state.recordMessage(canonicalId(messageId), fingerprint);
  }
  for (const [resultKey, winnerId] of Object.entries(payload.processed_results)) {
    state.recordResult(resultKey, winnerId);
  }

  return state;
}

export function serializeState(state: ChampionshipState): string {
  return JSON.stringify(toPayload(state));
}

/**
 * @throws PayloadCorruptError when the text is not a valid payload
 */
export function deserializeState(json: string): ChampionshipState {
  let data: unknown;
  try {
    data = JSON.parse(quoteLargeIntegers(json));
  } catch (error) {
    throw new PayloadCorruptError(
      `State payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return fromPayload(data);
}
