/**
 * Marker Role Sync
 *
 * Performs the marker-role side effects that surround title transitions.
 * Failures are logged and swallowed: the title state stays committed and the
 * next recalculation or restart re-syncs the role.
 */

import type { IMemberDirectory, MemberHandle } from '../packages/core/ports/index.js';
import { logger } from '../utils/logger.js';
import { describeError, safeExecute } from '../utils/errors.js';
import type { TitleChange } from './TitleManager.js';

export class MarkerRoleSync {
  constructor(private readonly members: IMemberDirectory) {}

  /**
   * Attach the marker to a player unless they already carry it
   */
  async grant(playerId: string, reason: string): Promise<boolean> {
    const member = await this.lookup(playerId);
    if (!member) {
      logger.warn({ playerId }, 'Cannot grant title role: player not in guild');
      return false;
    }
    if (member.hasMarker) {
      return true;
    }

    const done = await safeExecute(() => this.members.addMarker(member, reason), {
      playerId,
      operation: 'addMarker',
    });
    if (done) {
      logger.info({ playerId, reason }, 'Granted title role');
    }
    return done;
  }

  async revoke(playerId: string, reason: string): Promise<boolean> {
    const member = await this.lookup(playerId);
    if (!member || !member.hasMarker) {
      return true;
    }

    const done = await safeExecute(() => this.members.removeMarker(member, reason), {
      playerId,
      operation: 'removeMarker',
    });
    if (done) {
      logger.info({ playerId, reason }, 'Revoked title role');
    }
    return done;
  }

  private async lookup(playerId: string): Promise<MemberHandle | null> {
    try {
      return await this.members.resolve(playerId);
    } catch (error) {
      logger.error({ playerId, error: describeError(error) }, 'Member lookup failed');
      return null;
    }
  }

  /**
   * Perform the role effects of one title transition
   */
  async apply(change: TitleChange): Promise<void> {
    switch (change.kind) {
      case 'crowned':
        await this.grant(change.holderId, 'Claimed the vacant title');
        return;
      case 'dethroned':
        await this.revoke(change.previousHolderId, 'Lost the title');
        await this.grant(change.holderId, 'Took the title');
        return;
      case 'defended':
      case 'unaffected':
        return;
    }
  }
}
