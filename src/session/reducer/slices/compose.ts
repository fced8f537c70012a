import { activeChannelId, unchanged } from '../state';
import type { SessionEvent, SessionState, Transition } from '../types';

export function formatSendNotice(reason: string): string {
  return `send failed: ${reason}`;
}

/**
 * Message submission. Sends are fire-and-forget from the reducer's side;
 * their outcome only ever touches `notice`.
 */
export function reduceComposeSlice(state: SessionState, event: SessionEvent): Transition | null {
  switch (event.type) {
    case 'MESSAGE_SUBMITTED': {
      const channelId = activeChannelId(state);
      const content = event.payload.text.trim();
      if (state.phase.phase !== 'chatting' || channelId === null || content === '') {
        return unchanged(state);
      }
      return { state, commands: [{ type: 'SEND_MESSAGE', channelId, content }] };
    }
    case 'SEND_SUCCEEDED':
      if (state.notice === null) {
        return unchanged(state);
      }
      return { state: { ...state, notice: null }, commands: [] };
    case 'SEND_FAILED':
      return {
        state: { ...state, notice: formatSendNotice(event.payload.reason) },
        commands: [],
      };
    default:
      return null;
  }
}
