/**
 * Chat Platform Ports
 *
 * Defines the contracts the championship core consumes from the chat
 * platform. The Discord adapter implements them; tests use in-process fakes.
 *
 * Implementations report platform refusals as PermissionDeniedError and
 * history failures as HistoryUnavailableError.
 *
 * @module packages/core/ports/IChatPlatform
 */

// =============================================================================
// Messages
// =============================================================================

/**
 * A message as seen by the championship core
 */
export interface ChannelMessage {
  /** Discord snowflake */
  id: string;
  authorId: string;
  /** True for any bot account, including this one */
  authorIsBot: boolean;
  content: string;
  createdAt: Date;
}

/**
 * Read access to a channel's recent history
 */
export interface IMessageHistory {
  /**
   * Fetch the last `limit` messages of a channel.
   *
   * Ordering contract: the result is NEWEST-FIRST. Callers that replay
   * history reverse it themselves.
   *
   * @throws HistoryUnavailableError when the history cannot be read
   */
  fetchRecent(channelId: string, limit: number): Promise<ChannelMessage[]>;
}

// =============================================================================
// Members and the marker role
// =============================================================================

/**
 * Membership handle for one guild member
 */
export interface MemberHandle {
  id: string;
  /** Whether the member currently carries the title marker role */
  hasMarker: boolean;
}

/**
 * Member lookup and marker-role mutation
 */
export interface IMemberDirectory {
  /** Resolve a user id to a member, or null when the user is not in the guild */
  resolve(userId: string): Promise<MemberHandle | null>;

  /** @throws PermissionDeniedError */
  addMarker(member: MemberHandle, reason: string): Promise<void>;

  /** @throws PermissionDeniedError */
  removeMarker(member: MemberHandle, reason: string): Promise<void>;
}

// =============================================================================
// Leaderboard channel
// =============================================================================

/**
 * The channel holding the display and payload messages
 */
export interface ILeaderboardBoard {
  /** Messages authored by this bot, newest-first */
  fetchOwnMessages(limit: number): Promise<ChannelMessage[]>;

  /** Post a new message and return its id */
  post(content: string): Promise<string>;

  edit(messageId: string, content: string): Promise<void>;

  pin(messageId: string): Promise<void>;
}
