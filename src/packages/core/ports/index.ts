/**
 * Core Ports
 *
 * Re-exports all port interfaces for the championship core.
 */

export type {
  ChannelMessage,
  IMessageHistory,
  MemberHandle,
  IMemberDirectory,
  ILeaderboardBoard,
} from './IChatPlatform.js';
