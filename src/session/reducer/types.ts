import type { Channel, ChannelCategory, Message } from '@/shared/chat-types';
import type { TransportEvent } from '@/shared/websocket/frame.schema';

// =============================================================================
// State Types
// =============================================================================

/**
 * Session lifecycle as a discriminated union.
 *
 * Transitions:
 *   connecting → chatting → error
 *   connecting → error
 * `error` is terminal; leaving it requires restarting the client.
 */
export type SessionPhase =
  | { phase: 'connecting' }
  | { phase: 'chatting' }
  | { phase: 'error'; reason: string };

/** Health of the streaming connection as last reported by the transport. */
export type ConnectionState = 'connecting' | 'live' | 'error';

export interface SessionState {
  phase: SessionPhase;
  connectionState: ConnectionState;
  /** Channels of every category, flattened and sorted by position. Set once. */
  channels: readonly Channel[];
  /**
   * Per-channel message buffers, oldest first. A buffer is created by the
   * first history load or live message and only grows afterwards.
   */
  messagesByChannel: ReadonlyMap<number, readonly Message[]>;
  /** Channels a LOAD_HISTORY has been issued for. History is loaded at most once. */
  historyRequested: ReadonlySet<number>;
  /** Usernames currently online; replaced wholesale by each presence update. */
  onlineUsers: ReadonlySet<string>;
  /** Index into `channels`; null exactly when `channels` is empty. */
  activeChannelIndex: number | null;
  /** Cause of the fatal condition that halted the session. */
  lastError: string | null;
  /** Non-fatal problem to show the user (failed send). */
  notice: string | null;
  /** Bumped whenever the active channel's buffer needs to be redrawn. */
  viewRevision: number;
}

// =============================================================================
// Event Types
// =============================================================================

export type SessionEvent =
  // Topology fetch results
  | { type: 'TOPOLOGY_LOADED'; payload: { categories: readonly ChannelCategory[] } }
  | { type: 'TOPOLOGY_FAILED'; payload: { reason: string } }
  // History loader results
  | { type: 'HISTORY_LOADED'; payload: { channelId: number; messages: readonly Message[] } }
  | { type: 'HISTORY_FAILED'; payload: { channelId: number; reason: string } }
  // Streaming connection
  | TransportEvent
  // User input
  | { type: 'CHANNEL_NEXT' }
  | { type: 'CHANNEL_PREVIOUS' }
  | { type: 'MESSAGE_SUBMITTED'; payload: { text: string } }
  | { type: 'QUIT_REQUESTED' }
  // Send results
  | { type: 'SEND_SUCCEEDED'; payload: { channelId: number } }
  | { type: 'SEND_FAILED'; payload: { channelId: number; reason: string } };

export type SessionEventType = SessionEvent['type'];

// =============================================================================
// Command Types
// =============================================================================

/** Side effects requested by the reducer; executed by the session runtime. */
export type SessionCommand =
  | { type: 'FETCH_TOPOLOGY' }
  | { type: 'LOAD_HISTORY'; channelId: number }
  | { type: 'SEND_MESSAGE'; channelId: number; content: string }
  | { type: 'EXIT' };

export interface Transition {
  state: SessionState;
  commands: SessionCommand[];
}
