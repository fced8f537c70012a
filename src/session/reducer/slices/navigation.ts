import { wrapIndex } from '../helpers';
import { markViewDirty, unchanged } from '../state';
import type { SessionEvent, SessionState, Transition } from '../types';

function moveActiveChannel(state: SessionState, delta: number): Transition {
  if (state.phase.phase !== 'chatting' || state.activeChannelIndex === null) {
    return unchanged(state);
  }
  const index = wrapIndex(state.activeChannelIndex, delta, state.channels.length);
  const channel = state.channels[index];
  if (!channel) {
    return unchanged(state);
  }
  const next: SessionState = { ...state, activeChannelIndex: index };
  if (!state.messagesByChannel.has(channel.id)) {
    if (state.historyRequested.has(channel.id)) {
      return { state: next, commands: [] };
    }
    return {
      state: { ...next, historyRequested: new Set(state.historyRequested).add(channel.id) },
      commands: [{ type: 'LOAD_HISTORY', channelId: channel.id }],
    };
  }
  return { state: markViewDirty(next), commands: [] };
}

export function reduceNavigationSlice(state: SessionState, event: SessionEvent): Transition | null {
  switch (event.type) {
    case 'CHANNEL_NEXT':
      return moveActiveChannel(state, 1);
    case 'CHANNEL_PREVIOUS':
      return moveActiveChannel(state, -1);
    default:
      return null;
  }
}
