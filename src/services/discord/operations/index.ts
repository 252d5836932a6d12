/**
 * Discord Operations Barrel Export
 */

export { ensureTitleRole, createMemberDirectory } from './RoleOperations.js';
export {
  findTextChannel,
  toChannelMessage,
  createMessageHistory,
  createLeaderboardBoard,
} from './ChannelOperations.js';
export { toPlatformError, isUnknownMember } from './platformErrors.js';
