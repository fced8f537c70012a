import { installHistory } from '../helpers';
import { activeChannelId, haltSession, markViewDirty, unchanged } from '../state';
import type { SessionEvent, SessionState, Transition } from '../types';

export function reduceHistorySlice(state: SessionState, event: SessionEvent): Transition | null {
  switch (event.type) {
    case 'HISTORY_LOADED': {
      if (state.phase.phase !== 'chatting') {
        return unchanged(state);
      }
      const { channelId, messages } = event.payload;
      const messagesByChannel = new Map(state.messagesByChannel);
      messagesByChannel.set(channelId, installHistory(state.messagesByChannel.get(channelId), messages));
      const next: SessionState = { ...state, messagesByChannel };
      return {
        state: activeChannelId(state) === channelId ? markViewDirty(next) : next,
        commands: [],
      };
    }
    case 'HISTORY_FAILED':
      return haltSession(state, event.payload.reason);
    default:
      return null;
  }
}
