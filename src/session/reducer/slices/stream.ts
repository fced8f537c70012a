import { appendMessage } from '../helpers';
import { activeChannelId, haltSession, markViewDirty, unchanged } from '../state';
import type { SessionEvent, SessionState, Transition } from '../types';

/**
 * Events produced by the streaming connection. Live messages and presence
 * are accepted while still connecting because the socket may open before
 * the topology arrives.
 */
export function reduceStreamSlice(state: SessionState, event: SessionEvent): Transition | null {
  switch (event.type) {
    case 'TRANSPORT_CONNECTED':
      if (state.connectionState === 'live') {
        return unchanged(state);
      }
      return { state: { ...state, connectionState: 'live' }, commands: [] };
    case 'MESSAGE_CREATED': {
      const { message } = event.payload;
      const buffer = state.messagesByChannel.get(message.channelId);
      const appended = appendMessage(buffer, message);
      if (appended === buffer) {
        return unchanged(state);
      }
      const messagesByChannel = new Map(state.messagesByChannel);
      messagesByChannel.set(message.channelId, appended);
      const next: SessionState = { ...state, messagesByChannel };
      return {
        state: activeChannelId(state) === message.channelId ? markViewDirty(next) : next,
        commands: [],
      };
    }
    case 'PRESENCE_CHANGED':
      return {
        state: { ...state, onlineUsers: new Set(event.payload.usernames) },
        commands: [],
      };
    case 'TRANSPORT_ERROR':
      return haltSession(state, event.payload.reason);
    default:
      return null;
  }
}
