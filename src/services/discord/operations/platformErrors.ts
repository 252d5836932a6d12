/**
 * Discord error mapping
 *
 * Converts discord.js REST errors into the application's error types so the
 * core never sees platform classes.
 */

import { DiscordAPIError as RestAPIError, RESTJSONErrorCodes } from 'discord.js';
import { DiscordAPIError, PermissionDeniedError } from '../../../utils/errors.js';

const PERMISSION_CODES = new Set<number | string>([
  RESTJSONErrorCodes.MissingPermissions,
  RESTJSONErrorCodes.MissingAccess,
]);

const UNKNOWN_MEMBER_CODES = new Set<number | string>([
  RESTJSONErrorCodes.UnknownMember,
  RESTJSONErrorCodes.UnknownUser,
]);

export function toPlatformError(error: unknown, action: string): Error {
  if (error instanceof RestAPIError) {
    if (PERMISSION_CODES.has(error.code)) {
      return new PermissionDeniedError(action, error.message);
    }
    return new DiscordAPIError(
      error.message,
      typeof error.code === 'number' ? error.code : undefined,
      error.status
    );
  }
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * True when a member lookup failed because the user is not in the guild
 */
export function isUnknownMember(error: unknown): boolean {
  return error instanceof RestAPIError && UNKNOWN_MEMBER_CODES.has(error.code);
}
