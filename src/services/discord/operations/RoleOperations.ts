/**
 * Discord Role Operations
 *
 * Title-role lookup and the member directory used by the championship core.
 */

import type { Guild, Role } from 'discord.js';
import type { IMemberDirectory, MemberHandle } from '../../../packages/core/ports/index.js';
import { logger } from '../../../utils/logger.js';
import { describeError } from '../../../utils/errors.js';
import { isUnknownMember, toPlatformError } from './platformErrors.js';

/**
 * Get the title role by name, creating it if it doesn't exist
 */
export async function ensureTitleRole(guild: Guild, roleName: string): Promise<Role | null> {
  const existing = guild.roles.cache.find((role) => role.name === roleName);
  if (existing) {
    return existing;
  }

  try {
    const created = await guild.roles.create({ name: roleName, reason: 'Title role for the hill leaderboard' });
    logger.info({ guildId: guild.id, roleName }, 'Created title role');
    return created;
  } catch (error) {
    logger.error(
      { guildId: guild.id, roleName, error: describeError(toPlatformError(error, 'create role')) },
      'Could not create title role'
    );
    return null;
  }
}

/**
 * Member directory backed by the guild member manager
 */
export function createMemberDirectory(guild: Guild, role: Role): IMemberDirectory {
  return {
    async resolve(userId: string): Promise<MemberHandle | null> {
      try {
        const member = await guild.members.fetch(userId);
        return { id: member.id, hasMarker: member.roles.cache.has(role.id) };
      } catch (error) {
        if (isUnknownMember(error)) {
          return null;
        }
        throw toPlatformError(error, 'fetch member');
      }
    },

    async addMarker(member: MemberHandle, reason: string): Promise<void> {
      try {
        const guildMember = await guild.members.fetch(member.id);
        await guildMember.roles.add(role, reason);
      } catch (error) {
        throw toPlatformError(error, 'add title role');
      }
    },

    async removeMarker(member: MemberHandle, reason: string): Promise<void> {
      try {
        const guildMember = await guild.members.fetch(member.id);
        await guildMember.roles.remove(role, reason);
      } catch (error) {
        throw toPlatformError(error, 'remove title role');
      }
    },
  };
}
