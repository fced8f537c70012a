import { flattenChannels } from '../helpers';
import { haltSession, unchanged } from '../state';
import type { SessionEvent, SessionState, Transition } from '../types';

export const NO_CHANNELS_REASON = 'no channels found';

export function reduceTopologySlice(state: SessionState, event: SessionEvent): Transition | null {
  switch (event.type) {
    case 'TOPOLOGY_LOADED': {
      // The topology is installed once; a late duplicate is ignored.
      if (state.phase.phase !== 'connecting') {
        return unchanged(state);
      }
      const channels = flattenChannels(event.payload.categories);
      const first = channels[0];
      if (!first) {
        return haltSession(state, NO_CHANNELS_REASON);
      }
      return {
        state: {
          ...state,
          phase: { phase: 'chatting' },
          channels,
          activeChannelIndex: 0,
          historyRequested: new Set([first.id]),
        },
        commands: [{ type: 'LOAD_HISTORY', channelId: first.id }],
      };
    }
    case 'TOPOLOGY_FAILED':
      return haltSession(state, event.payload.reason);
    default:
      return null;
  }
}
